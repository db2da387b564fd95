import type { TableResult } from '../../../src/core/describe/types.js';

export const USERS: TableResult = {
    database: 'shop',
    table: 'users',
    columns: [
        { Field: 'id', Type: 'int(11)', Null: 'NO', Key: 'PRI', Default: null, Extra: 'auto_increment' },
        { Field: 'email', Type: 'varchar(64)', Null: 'YES', Key: '', Default: null, Extra: '' },
    ],
};

export const USERS_WITH_STATS: TableResult = {
    ...USERS,
    stats: {
        rowCount: 1200,
        sizeMb: 0.25,
        indexCount: 2,
        indexes: [
            { name: 'PRIMARY', unique: true, columns: ['id'] },
            { name: 'idx_email', unique: false, columns: ['email'] },
        ],
    },
};

export const ORDERS: TableResult = {
    database: 'shop',
    table: 'orders',
    columns: [
        { Field: 'id', Type: 'bigint', Null: 'NO', Key: 'PRI', Default: null, Extra: 'auto_increment' },
        { Field: 'status', Type: 'enum(\'new\',\'paid\')', Null: 'NO', Key: '', Default: 'new', Extra: '' },
    ],
};
