import type { AggregateExpr, ColumnRefExpr, ComparisonOp, Expr } from "./AST";
import { ColumnType } from "./Constants";
import { EngineError } from "./Errors";
import type { Row, Table } from "./Table";
import { compareValues, typeLiteral, type Value } from "./Value";

export interface BoundColumn {
    table: string;
    name: string;
    type: ColumnType;
}

function refName(ref: ColumnRefExpr): string {
    return ref.table ? `${ref.table}.${ref.name}` : ref.name;
}

/**
 * Column layout of a (possibly joined) row set. Each position remembers
 * the table it came from so `table.column` and bare names both resolve.
 */
export class Scope {
    constructor(public readonly columns: readonly BoundColumn[]) { }

    static ofTable(table: Table): Scope {
        return new Scope(table.columns.map(c => ({ table: table.name, name: c.name, type: c.type })));
    }

    get width(): number {
        return this.columns.length;
    }

    join(right: Scope): Scope {
        return new Scope([...this.columns, ...right.columns]);
    }

    resolve(ref: ColumnRefExpr): number {
        const hits: number[] = [];
        this.columns.forEach((col, idx) => {
            if (col.name === ref.name && (ref.table === undefined || col.table === ref.table)) hits.push(idx);
        });
        const [first] = hits;
        if (first === undefined) throw new EngineError('UNKNOWN_COLUMN', `Unknown column ${refName(ref)}`);
        if (hits.length > 1) throw new EngineError('AMBIGUOUS_COLUMN', `Column ${refName(ref)} is ambiguous`);
        return first;
    }

    typeOf(ref: ColumnRefExpr): ColumnType {
        return this.columns[this.resolve(ref)]?.type ?? ColumnType.TEXT;
    }
}

export interface EvalContext {
    readonly scope: Scope;
    column(ref: ColumnRefExpr): Value;
    aggregate(call: AggregateExpr): Value;
}

// A single row: plain column lookups, no aggregates.
export class RowContext implements EvalContext {
    constructor(readonly scope: Scope, private row: Row) { }

    column(ref: ColumnRefExpr): Value {
        return this.row[this.scope.resolve(ref)] ?? null;
    }

    aggregate(call: AggregateExpr): Value {
        throw new EngineError('MISPLACED_AGGREGATE', `Aggregate ${call.func} is not allowed here`);
    }
}

/**
 * One group of rows. Bare columns must be grouping keys (their value is
 * shared by every row of the group); aggregates fold over the group.
 */
export class GroupContext implements EvalContext {
    constructor(
        readonly scope: Scope,
        private keys: readonly number[],
        private rows: readonly Row[]
    ) { }

    column(ref: ColumnRefExpr): Value {
        const idx = this.scope.resolve(ref);
        if (!this.keys.includes(idx)) throw notGrouped(ref);
        return this.rows[0]?.[idx] ?? null;
    }

    aggregate(call: AggregateExpr): Value {
        return computeAggregate(call, this.scope, this.rows);
    }
}

function notGrouped(ref: ColumnRefExpr): EngineError {
    return new EngineError('INVALID_PROJECTION', `Column ${refName(ref)} must appear in GROUP BY or inside an aggregate`);
}

export function computeAggregate(call: AggregateExpr, scope: Scope, rows: readonly Row[]): Value {
    if (call.arg === '*') {
        if (call.func !== 'COUNT') throw new EngineError('INVALID_PROJECTION', `${call.func}(*) is not supported`);
        return BigInt(rows.length);
    }

    const idx = scope.resolve(call.arg);
    const present = rows.map(r => r[idx] ?? null).filter(v => v !== null);
    const ints = present.filter((v): v is bigint => typeof v === 'bigint');
    const [first] = ints;
    const func = call.func;
    if (func === 'COUNT') return BigInt(present.length);
    if (first === undefined) return null;

    // Sums are exact; bigint division truncates toward zero.
    const sum = ints.reduce((a, b) => a + b, 0n);
    switch (func) {
        case 'SUM':
            return sum;
        case 'AVG':
            return sum / BigInt(ints.length);
        case 'MIN':
            return ints.reduce((a, b) => (b < a ? b : a), first);
        case 'MAX':
            return ints.reduce((a, b) => (b > a ? b : a), first);
    }
}

export function evaluate(expr: Expr, ctx: EvalContext): Value {
    switch (expr.type) {
        case 'LITERAL':
            return expr.value;
        case 'COLUMN':
            return ctx.column(expr);
        case 'AGGREGATE':
            return ctx.aggregate(expr);
        case 'BINARY':
            throw new EngineError('TYPE_MISMATCH', `Operator ${expr.op} does not produce a value`);
    }
}

/**
 * Truth of a predicate. Any comparison involving null is false;
 * incompatible values are unequal.
 */
export function matches(expr: Expr, ctx: EvalContext): boolean {
    if (expr.type !== 'BINARY') throw new EngineError('TYPE_MISMATCH', 'Expected a condition');

    if (expr.op === 'AND') return matches(expr.left, ctx) && matches(expr.right, ctx);
    if (expr.op === 'OR') return matches(expr.left, ctx) || matches(expr.right, ctx);

    const left = operand(expr.left, expr.right, ctx);
    const right = operand(expr.right, expr.left, ctx);
    if (left === null || right === null) return false;

    const cmp = compareValues(left, right);
    if (cmp === undefined) return expr.op === '!=';
    return applyComparison(expr.op, cmp);
}

// Declared type of an operand, where it has one. Aggregates always fold to INT.
function operandType(expr: Expr, scope: Scope): ColumnType | undefined {
    if (expr.type === 'COLUMN') return scope.typeOf(expr);
    if (expr.type === 'AGGREGATE') return ColumnType.INT;
    return undefined;
}

// A literal takes the type of whatever it is compared with.
function operand(expr: Expr, other: Expr, ctx: EvalContext): Value {
    if (expr.type !== 'LITERAL') return evaluate(expr, ctx);
    return typeLiteral(expr.value, operandType(other, ctx.scope) ?? ColumnType.TEXT);
}

function applyComparison(op: ComparisonOp, cmp: number): boolean {
    switch (op) {
        case '=': return cmp === 0;
        case '!=': return cmp !== 0;
        case '<': return cmp < 0;
        case '>': return cmp > 0;
        case '<=': return cmp <= 0;
        case '>=': return cmp >= 0;
    }
}

/**
 * Resolves every column an expression mentions against `scope` before any
 * row is touched, so unknown or ambiguous names fail even on empty tables.
 * When `groupKeys` is given, bare columns outside aggregates must be keys;
 * when it is omitted, aggregates are rejected.
 */
export function checkExpr(expr: Expr, scope: Scope, groupKeys?: readonly number[]): void {
    switch (expr.type) {
        case 'LITERAL':
            return;
        case 'COLUMN': {
            const idx = scope.resolve(expr);
            if (groupKeys && !groupKeys.includes(idx)) throw notGrouped(expr);
            return;
        }
        case 'AGGREGATE':
            if (!groupKeys) throw new EngineError('MISPLACED_AGGREGATE', `Aggregate ${expr.func} is not allowed here`);
            if (expr.arg !== '*') scope.resolve(expr.arg);
            return;
        case 'BINARY':
            checkExpr(expr.left, scope, groupKeys);
            checkExpr(expr.right, scope, groupKeys);
            return;
    }
}
