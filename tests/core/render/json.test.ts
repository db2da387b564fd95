import { describe, it, expect } from 'vitest';

import { createRenderOptions } from '../../../src/core/render/types.js';
import { projectRecord, renderJson } from '../../../src/core/render/json.js';
import { renderTable } from '../../../src/core/render/table.js';
import { ORDERS, USERS, USERS_WITH_STATS } from './fixtures.js';

describe('render: json', () => {

    it('should render every column with a null default kept null', () => {

        const output = renderJson([USERS], createRenderOptions({ format: 'json' }));

        expect(JSON.parse(output)).toEqual([{
            database: 'shop',
            table: 'users',
            columns: USERS.columns,
        }]);
        expect(output.endsWith('}\n]\n')).toBe(true);

    });

    it('should indent with two spaces', () => {

        const output = renderJson([USERS], createRenderOptions({ format: 'json', columns: ['Field'] }));

        expect(output).toBe([
            '[',
            '  {',
            '    "database": "shop",',
            '    "table": "users",',
            '    "columns": [',
            '      {',
            '        "Field": "id"',
            '      },',
            '      {',
            '        "Field": "email"',
            '      }',
            '    ]',
            '  }',
            ']',
            '',
        ].join('\n'));

    });

    it('should order keys by the column filter', () => {

        const status = { Field: 'status', Type: 'varchar(8)', Null: 'NO', Key: '', Default: 'new', Extra: '' };
        const projected = projectRecord(status, ['Null', 'Field', 'Default']);

        expect(Object.keys(projected)).toEqual(['Null', 'Field', 'Default']);
        expect(projected).toEqual({ Null: 'NO', Field: 'status', Default: 'new' });

    });

    it('should match the table render field for field, in order', () => {

        const columns = ['Null', 'Field', 'Default', 'Key'] as const;
        const parsed: unknown = JSON.parse(renderJson([USERS], createRenderOptions({ format: 'json', columns })));
        const tableLines = renderTable(USERS, createRenderOptions({ columns })).split('\n');

        // Title, border, header, border, rows..., border
        const cellsOf = (line: string) => line.slice(1, -1).split('|').map((cell) => cell.trim());
        const header = cellsOf(tableLines[2] ?? '');
        const rows = tableLines.slice(4, -1).map(cellsOf);

        expect(Array.isArray(parsed)).toBe(true);

        const jsonColumns = Array.isArray(parsed) ? parsed[0].columns : [];
        const jsonRows = jsonColumns.map((record: Record<string, string | null>) =>
            Object.values(record).map((value) => value ?? 'NULL'));

        expect(header).toEqual([...columns]);
        expect(jsonColumns.map((record: Record<string, string | null>) => Object.keys(record)))
            .toEqual(rows.map(() => [...columns]));
        expect(jsonRows).toEqual(rows);
        expect(rows).toEqual([
            ['NO', 'id', 'NULL', 'PRI'],
            ['YES', 'email', 'NULL', ''],
        ]);

    });

    it('should include statistics only when asked', () => {

        const withStats = JSON.parse(renderJson([USERS_WITH_STATS], createRenderOptions({
            format: 'json',
            includeStats: true,
        })));
        const without = JSON.parse(renderJson([USERS_WITH_STATS], createRenderOptions({ format: 'json' })));

        expect(withStats[0].stats).toEqual(USERS_WITH_STATS.stats);
        expect(without[0]).not.toHaveProperty('stats');

    });

    it('should render several tables as one array', () => {

        const parsed = JSON.parse(renderJson([USERS, ORDERS], createRenderOptions({ format: 'json' })));

        expect(parsed.map((table: { table: string }) => table.table)).toEqual(['users', 'orders']);

    });

});
