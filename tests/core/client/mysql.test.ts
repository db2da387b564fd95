import { describe, it, expect, afterEach } from 'vitest';

import { MysqlClient } from '../../../src/core/client/mysql.js';
import { ExternalToolError } from '../../../src/core/errors.js';
import { observer } from '../../../src/core/observer.js';
import { fakeRunner, ok } from './helpers.js';

const INDEX_OUTPUT = [
    'Table\tNon_unique\tKey_name\tSeq_in_index\tColumn_name',
    'orders\t0\tPRIMARY\t1\tid',
    'orders\t1\tidx_customer_date\t2\tcreated_at',
    'orders\t1\tidx_customer_date\t1\tcustomer_id',
    '',
].join('\n');

describe('client: MysqlClient', () => {

    let cleanup: (() => void) | null = null;

    afterEach(() => {

        cleanup?.();
        cleanup = null;

    });

    describe('describeColumns', () => {

        it('should run SHOW COLUMNS in batch mode after the configured args', async () => {

            const { runner, calls } = fakeRunner(() => ok('Field\tType\n'));
            const client = new MysqlClient({ args: ['-h', 'db.local'], runner });

            const output = await client.describeColumns('shop', 'orders');

            expect(output).toBe('Field\tType\n');
            expect(calls).toEqual([{
                command: 'mysql',
                args: ['-h', 'db.local', '--batch', '-e', 'SHOW COLUMNS FROM `orders`', 'shop'],
            }]);

        });

        it('should quote backticks inside table names', async () => {

            const { runner, calls } = fakeRunner(() => ok(''));
            const client = new MysqlClient({ runner });

            await client.describeColumns('shop', 'odd`name');

            expect(calls[0]?.args).toContain('SHOW COLUMNS FROM `odd``name`');

        });

        it('should use a configured command', async () => {

            const { runner, calls } = fakeRunner(() => ok(''));
            const client = new MysqlClient({ command: 'mariadb', runner });

            await client.describeColumns('shop', 'orders');

            expect(client.command).toBe('mariadb');
            expect(calls[0]?.command).toBe('mariadb');

        });

        it('should throw ExternalToolError on a non-zero exit', async () => {

            const stderr = 'ERROR 1146 (42S02): Table \'shop.nope\' doesn\'t exist\n';
            const { runner } = fakeRunner(() => ({ stdout: '', stderr, exitCode: 1 }));
            const client = new MysqlClient({ runner });

            const promise = client.describeColumns('shop', 'nope');

            await expect(promise).rejects.toBeInstanceOf(ExternalToolError);
            await expect(promise).rejects.toMatchObject({
                reason: 'exit-code',
                exitCode: 1,
                message: 'Database client \'mysql\' exited with code 1: ERROR 1146 (42S02): Table \'shop.nope\' doesn\'t exist',
            });

        });

        it('should pass through a missing client error', async () => {

            const missing = new ExternalToolError('mysql', 'not-found');
            const { runner } = fakeRunner(() => missing);
            const client = new MysqlClient({ runner });

            await expect(client.describeColumns('shop', 'orders')).rejects.toBe(missing);
            expect(missing.message).toBe('Database client \'mysql\' not found. Is it installed and on PATH?');

        });

        it('should wrap other runner failures as spawn failures', async () => {

            const { runner } = fakeRunner(() => new Error('EACCES'));
            const client = new MysqlClient({ runner });

            await expect(client.describeColumns('shop', 'orders')).rejects.toMatchObject({
                name: 'ExternalToolError',
                reason: 'spawn-failed',
                message: 'Could not start database client \'mysql\': EACCES',
            });

        });

        it('should emit client:error when the client fails', async () => {

            const errors: unknown[] = [];
            cleanup = observer.on('client:error', (data) => errors.push(data));

            const { runner } = fakeRunner(() => ({ stdout: '', stderr: 'denied', exitCode: 2 }));
            const client = new MysqlClient({ runner });

            await expect(client.describeColumns('shop', 'orders')).rejects.toThrow();
            expect(errors).toEqual([{ command: 'mysql', error: 'Database client \'mysql\' exited with code 2: denied' }]);

        });

    });

    describe('tableStats', () => {

        it('should collect row count, size and indexes', async () => {

            const { runner, calls } = fakeRunner((sql) => {

                if (sql.startsWith('SELECT COUNT(*)')) {

                    return ok('COUNT(*)\n42\n');

                }

                if (sql.includes('information_schema.TABLES')) {

                    return ok('size_mb\n1.50\n');

                }

                return ok(INDEX_OUTPUT);

            });

            const client = new MysqlClient({ runner });
            const stats = await client.tableStats('shop', 'orders');

            expect(calls).toHaveLength(3);
            expect(stats).toEqual({
                rowCount: 42,
                sizeMb: 1.5,
                indexCount: 2,
                indexes: [
                    { name: 'PRIMARY', unique: true, columns: ['id'] },
                    { name: 'idx_customer_date', unique: false, columns: ['customer_id', 'created_at'] },
                ],
            });

        });

        it('should leave a failed statistic null and warn', async () => {

            const warnings: unknown[] = [];
            cleanup = observer.on('stats:warning', (data) => warnings.push(data));

            const { runner } = fakeRunner((sql) => {

                if (sql.startsWith('SELECT COUNT(*)')) {

                    return ok('COUNT(*)\n7\n');

                }

                if (sql.includes('information_schema.TABLES')) {

                    return { stdout: '', stderr: 'denied', exitCode: 1 };

                }

                return ok(INDEX_OUTPUT);

            });

            const client = new MysqlClient({ runner });
            const stats = await client.tableStats('shop', 'orders');

            expect(stats.rowCount).toBe(7);
            expect(stats.sizeMb).toBeNull();
            expect(stats.indexCount).toBe(2);
            expect(warnings).toEqual([{
                table: 'orders',
                statistic: 'size',
                error: 'Database client \'mysql\' exited with code 1: denied',
            }]);

        });

        it('should report every statistic as unavailable when all queries fail', async () => {

            cleanup = observer.on('stats:warning', () => undefined);

            const { runner } = fakeRunner(() => ({ stdout: '', stderr: '', exitCode: 1 }));
            const client = new MysqlClient({ runner });

            expect(await client.tableStats('shop', 'orders')).toEqual({
                rowCount: null,
                sizeMb: null,
                indexCount: null,
                indexes: [],
            });

        });

    });

});
