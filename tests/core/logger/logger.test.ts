import { describe, it, expect, afterEach } from 'vitest';
import { Writable } from 'node:stream';

import { Logger } from '../../../src/core/logger/logger.js';
import { observer } from '../../../src/core/observer.js';

/**
 * Writable that keeps every chunk as a string.
 */
function captureStream(): { stream: Writable; lines: string[] } {

    const lines: string[] = [];
    const stream = new Writable({
        write(chunk: Buffer, _encoding, callback) {

            lines.push(chunk.toString());
            callback();

        },
    });

    return { stream, lines };

}

describe('logger: Logger class', () => {

    let logger: Logger | null = null;

    afterEach(() => {

        logger?.stop();
        logger = null;

    });

    describe('construction', () => {

        it('should default to warn level and idle state', () => {

            logger = new Logger();

            expect(logger.level).toBe('warn');
            expect(logger.isEnabled).toBe(true);
            expect(logger.state).toBe('idle');

        });

        it('should be disabled at silent level', () => {

            logger = new Logger({ config: { level: 'silent' } });

            expect(logger.isEnabled).toBe(false);

            logger.start();

            expect(logger.state).toBe('idle');

        });

    });

    describe('event capture', () => {

        it('should write events allowed by the level', () => {

            const { stream, lines } = captureStream();

            logger = new Logger({ config: { level: 'warn' }, stream });
            logger.start();

            observer.emit('cache:warning', { key: 'k', path: '/tmp/k.json', error: 'denied' });
            observer.emit('cache:hit', { key: 'k', table: 'orders', ageMs: 10 });

            expect(lines).toHaveLength(1);
            expect(lines[0]).toMatch(/\[WARN \] \[cache:warning\] Could not write cache entry \/tmp\/k\.json: denied\n$/);

        });

        it('should write everything at verbose, with data', () => {

            const { stream, lines } = captureStream();

            logger = new Logger({ config: { level: 'verbose' }, stream });
            logger.start();

            observer.emit('client:spawn', { command: 'mysql', args: ['--batch'] });

            expect(lines).toHaveLength(1);
            expect(lines[0]).toContain('[DEBUG] [client:spawn] Running mysql --batch {"command":"mysql","args":["--batch"]}');

        });

        it('should stop writing after stop()', () => {

            const { stream, lines } = captureStream();

            logger = new Logger({ config: { level: 'warn' }, stream });
            logger.start();
            logger.stop();

            observer.emit('cache:warning', { key: 'k', path: '/tmp/k.json', error: 'denied' });

            expect(lines).toHaveLength(0);
            expect(logger.state).toBe('stopped');

        });

    });

    describe('direct logging', () => {

        it('should write direct messages without being started', () => {

            const { stream, lines } = captureStream();

            logger = new Logger({ config: { level: 'warn' }, stream });
            logger.warn('Statistics ignored');
            logger.info('not shown');

            expect(lines).toHaveLength(1);
            expect(lines[0]).toMatch(/^\[[^\]]+\] \[WARN \] Statistics ignored\n$/);

        });

    });

});
