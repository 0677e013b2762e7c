import type { AGGREGATE_FUNCTIONS, ColumnType } from "./Constants";

export interface ColumnDef {
    name: string;
    type: ColumnType;
}

export interface CreateStmt {
    type: 'CREATE';
    table: string;
    columns: ColumnDef[];
}

export interface DropStmt {
    type: 'DROP';
    table: string;
}

export type AlterAction =
    | { type: 'ADD_COLUMN'; column: ColumnDef }
    | { type: 'DROP_COLUMN'; name: string }
    | { type: 'MODIFY_COLUMN'; name: string; newType: ColumnType };

export interface AlterStmt {
    type: 'ALTER';
    table: string;
    action: AlterAction;
}

export interface InsertStmt {
    type: 'INSERT';
    table: string;
    columns?: string[]; // absent: values map onto the full schema in order
    values: LiteralExpr[][];
}

export interface UpdateStmt {
    type: 'UPDATE';
    table: string;
    assignments: { column: string; value: LiteralExpr }[];
    where?: Expr;
}

export interface DeleteStmt {
    type: 'DELETE';
    table: string;
    where?: Expr;
}

export type JoinKind = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL' | 'CROSS';

export interface JoinClause {
    kind: JoinKind;
    table: string;
    on?: Expr;
}

export type ProjectionItem = ColumnRefExpr | AggregateExpr;

export interface OrderItem {
    expr: ProjectionItem;
    descending: boolean;
}

export interface SelectStmt {
    type: 'SELECT';
    projection: '*' | ProjectionItem[];
    from: string;
    joins: JoinClause[];
    where?: Expr;
    groupBy?: ColumnRefExpr[];
    having?: Expr;
    orderBy?: OrderItem[];
}

export type Statement = CreateStmt | DropStmt | AlterStmt | InsertStmt | UpdateStmt | DeleteStmt | SelectStmt;

// Expression AST
export type ComparisonOp = '=' | '!=' | '<' | '>' | '<=' | '>=';
export type LogicalOp = 'AND' | 'OR';
export type BinaryOp = ComparisonOp | LogicalOp;
export type AggregateFunc = typeof AGGREGATE_FUNCTIONS[number];

export interface ColumnRefExpr {
    type: 'COLUMN';
    table?: string;
    name: string;
}

// Literal text stays raw until the engine knows the destination type.
export interface LiteralExpr {
    type: 'LITERAL';
    value: string | null;
}

export interface AggregateExpr {
    type: 'AGGREGATE';
    func: AggregateFunc;
    arg: ColumnRefExpr | '*';
}

export interface BinaryExpr {
    type: 'BINARY';
    op: BinaryOp;
    left: Expr;
    right: Expr;
}

export type Expr = ColumnRefExpr | LiteralExpr | AggregateExpr | BinaryExpr;
