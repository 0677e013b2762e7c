export * from "./engine/AST";
export { Catalog } from "./engine/Catalog";
export { ColumnType } from "./engine/Constants";
export { Database, executeStatement, type CountResult, type OkResult, type QueryResult, type RowsResult } from "./engine/Database";
export { EngineError, LexError, ParseError, SqlError } from "./engine/Errors";
export type { EngineErrorCode, LexErrorCode, ParseErrorCode } from "./engine/Errors";
export { formatResult } from "./engine/Format";
export { tokenize, type Token, type TokenKind } from "./engine/Lexer";
export { parse, Parser } from "./engine/Parser";
export { Table, type Row } from "./engine/Table";
export { coerce, convert, type Value } from "./engine/Value";
