/**
 * Base error for everything the engine rejects. `code` is stable and meant
 * for programmatic checks; `message` is what a driver prints.
 */
export class SqlError extends Error {
    constructor(
        public readonly code: string,
        message: string
    ) {
        super(message);
        this.name = 'SqlError';
    }
}

export type LexErrorCode = 'UNTERMINATED_STRING' | 'UNEXPECTED_CHAR';

/**
 * Statement text could not be tokenized.
 */
export class LexError extends SqlError {
    constructor(
        public override readonly code: LexErrorCode,
        public readonly position: number,
        message: string
    ) {
        super(code, message);
        this.name = 'LexError';
    }
}

export type ParseErrorCode =
    | 'UNKNOWN_STATEMENT'
    | 'UNEXPECTED_TOKEN'
    | 'UNEXPECTED_END'
    | 'ARITY'
    | 'MISSING_CLAUSE';

/**
 * Token stream does not form a valid statement.
 */
export class ParseError extends SqlError {
    constructor(
        public override readonly code: ParseErrorCode,
        message: string
    ) {
        super(code, message);
        this.name = 'ParseError';
    }
}

export type EngineErrorCode =
    | 'TABLE_EXISTS'
    | 'NO_SUCH_TABLE'
    | 'UNKNOWN_COLUMN'
    | 'AMBIGUOUS_COLUMN'
    | 'INVALID_PROJECTION'
    | 'TYPE_MISMATCH'
    | 'DUPLICATE_COLUMN'
    | 'ARITY'
    | 'MISPLACED_AGGREGATE';

/**
 * Statement is well-formed but cannot run against the current catalog.
 */
export class EngineError extends SqlError {
    constructor(
        public override readonly code: EngineErrorCode,
        message: string
    ) {
        super(code, message);
        this.name = 'EngineError';
    }
}
