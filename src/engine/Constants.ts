export enum ColumnType {
    INT = 'INT',
    TEXT = 'TEXT'
}

export const AGGREGATE_FUNCTIONS = ['COUNT', 'SUM', 'AVG', 'MIN', 'MAX'] as const;

export const KEYWORDS: ReadonlySet<string> = new Set([
    'SELECT', 'FROM', 'WHERE',
    'INSERT', 'INTO', 'VALUES',
    'UPDATE', 'SET', 'DELETE',
    'CREATE', 'TABLE', 'ALTER', 'ADD', 'DROP', 'MODIFY',
    'ORDER', 'BY', 'ASC', 'DESC', 'GROUP', 'HAVING',
    'JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'CROSS', 'ON',
    'AND', 'OR',
    'INT', 'TEXT', 'NULL',
    ...AGGREGATE_FUNCTIONS
]);

// Integer literal shape accepted when writing into an INT column.
export const INTEGER_PATTERN = /^-?\d+$/;

// INT columns hold signed 64-bit integers.
export const INT_MIN = -(2n ** 63n);
export const INT_MAX = 2n ** 63n - 1n;

export const NULL_DISPLAY = 'NULL';

export const REPL_BANNER = 'relcore REPL v1.0';
export const REPL_PROMPT = 'relcore> ';
