import { describe, it, expect } from 'vitest';

import { stripColor, theme } from '../../../src/core/theme.js';
import { colorCell, colorHeader, colorType } from '../../../src/core/render/color.js';
import type { ColumnRecord } from '../../../src/core/describe/types.js';

const ID: ColumnRecord = { Field: 'id', Type: 'int(11)', Null: 'NO', Key: 'PRI', Default: null, Extra: 'auto_increment' };
const NAME: ColumnRecord = { Field: 'name', Type: 'varchar(40)', Null: 'YES', Key: 'MUL', Default: null, Extra: '' };

describe('render: color', () => {

    describe('colorType', () => {

        it('should color by type family', () => {

            expect(colorType('enum(\'a\',')).toBe(theme.info('enum(\'a\','));
            expect(colorType('  \'b\')')).toBe(theme.info('  \'b\')'));
            expect(colorType('bigint unsigned')).toBe(theme.primary('bigint unsigned'));
            expect(colorType('varchar(40)')).toBe(theme.success('varchar(40)'));
            expect(colorType('mediumtext')).toBe(theme.success('mediumtext'));
            expect(colorType('datetime')).toBe(theme.warning('datetime'));
            expect(colorType('year')).toBe(theme.warning('year'));

        });

        it('should leave other types plain', () => {

            expect(colorType('decimal(10,2)')).toBe('decimal(10,2)');
            expect(colorType('json')).toBe('json');

        });

    });

    describe('colorCell', () => {

        it('should color key roles', () => {

            expect(colorCell('Key', 'PRI', ID)).toBe(theme.bold(theme.error('PRI')));
            expect(colorCell('Key', 'MUL', NAME)).toBe(theme.bold(theme.success('MUL')));
            expect(colorCell('Key', 'UNI', NAME)).toBe(theme.bold(theme.primary('UNI')));

        });

        it('should color nullability', () => {

            expect(colorCell('Null', 'NO', ID)).toBe(theme.bold(theme.error('NO')));
            expect(colorCell('Null', 'YES', NAME)).toBe(theme.success('YES'));

        });

        it('should bold the field of a primary key', () => {

            expect(colorCell('Field', 'id', ID)).toBe(theme.bold('id'));
            expect(colorCell('Field', 'name', NAME)).toBe('name');

        });

        it('should highlight auto_increment', () => {

            expect(colorCell('Extra', 'auto_increment', ID)).toBe(theme.bold(theme.warning('auto_increment')));
            expect(colorCell('Default', 'NULL', ID)).toBe('NULL');

        });

        it('should keep the text under the color', () => {

            expect(stripColor(colorCell('Key', 'PRI', ID))).toBe('PRI');
            expect(stripColor(colorHeader('Field'))).toBe('Field');

        });

    });

});
