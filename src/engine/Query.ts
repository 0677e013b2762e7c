import type { ColumnRefExpr, Expr, JoinClause, ProjectionItem, SelectStmt } from "./AST";
import type { Catalog } from "./Catalog";
import { EngineError } from "./Errors";
import { checkExpr, evaluate, GroupContext, matches, RowContext, Scope, type EvalContext } from "./Evaluator";
import type { Row } from "./Table";
import { sortCompare, type Value } from "./Value";

export interface RowsResult {
    type: 'ROWS';
    columns: string[];
    rows: Row[];
}

interface Output {
    values: Row;
    ctx: EvalContext;
}

export function displayName(item: ProjectionItem): string {
    if (item.type === 'COLUMN') return item.table ? `${item.table}.${item.name}` : item.name;
    return `${item.func}(${item.arg === '*' ? '*' : displayName(item.arg)})`;
}

function hasAggregate(stmt: SelectStmt): boolean {
    const items = [...(stmt.projection === '*' ? [] : stmt.projection), ...(stmt.orderBy ?? []).map(o => o.expr)];
    return items.some(item => item.type === 'AGGREGATE');
}

function nulls(width: number): Row {
    return new Array<Value>(width).fill(null);
}

/**
 * Nested-loop join of the working row set with one more table. Combined
 * rows always lay out left columns first.
 */
function joinRows(join: JoinClause, scope: Scope, left: Row[], right: Row[], leftWidth: number, rightWidth: number): Row[] {
    const on = join.on;
    const test = (row: Row) => on === undefined || matches(on, new RowContext(scope, row));
    const out: Row[] = [];

    switch (join.kind) {
        case 'CROSS':
        case 'INNER':
            for (const l of left) {
                for (const r of right) {
                    const row = [...l, ...r];
                    if (join.kind === 'CROSS' || test(row)) out.push(row);
                }
            }
            return out;

        case 'LEFT':
        case 'FULL': {
            const matchedRight = new Set<number>();
            for (const l of left) {
                let matched = false;
                for (const [idx, r] of right.entries()) {
                    const row = [...l, ...r];
                    if (!test(row)) continue;
                    out.push(row);
                    matched = true;
                    matchedRight.add(idx);
                }
                if (!matched) out.push([...l, ...nulls(rightWidth)]);
            }
            if (join.kind === 'FULL') {
                right.forEach((r, idx) => {
                    if (!matchedRight.has(idx)) out.push([...nulls(leftWidth), ...r]);
                });
            }
            return out;
        }

        case 'RIGHT':
            for (const r of right) {
                let matched = false;
                for (const l of left) {
                    const row = [...l, ...r];
                    if (!test(row)) continue;
                    out.push(row);
                    matched = true;
                }
                if (!matched) out.push([...nulls(leftWidth), ...r]);
            }
            return out;
    }
}

// Integers and text stay distinct in group keys: 5 and '5' never share a group.
function groupKeyPart(value: Value): string | [string] | null {
    return typeof value === 'bigint' ? [value.toString()] : value;
}

function groupRows(rows: Row[], scope: Scope, keys: number[]): GroupContext[] {
    if (keys.length === 0) return [new GroupContext(scope, keys, rows)];

    const groups = new Map<string, Row[]>();
    for (const row of rows) {
        const key = JSON.stringify(keys.map(idx => groupKeyPart(row[idx] ?? null)));
        const bucket = groups.get(key);
        if (bucket) bucket.push(row);
        else groups.set(key, [row]);
    }
    return [...groups.values()].map(bucket => new GroupContext(scope, keys, bucket));
}

/**
 * SELECT pipeline: scan + join, WHERE, GROUP BY, HAVING, projection,
 * ORDER BY. Everything is materialized from the catalog's current state.
 */
export function executeSelect(catalog: Catalog, stmt: SelectStmt): RowsResult {
    const base = catalog.requireTable(stmt.from);
    let scope = Scope.ofTable(base);
    let rows = base.selectAll();

    // 1. Scan + join
    for (const join of stmt.joins) {
        const table = catalog.requireTable(join.table);
        const rightScope = Scope.ofTable(table);
        const combined = scope.join(rightScope);
        if (join.on) checkExpr(join.on, combined);
        rows = joinRows(join, combined, rows, table.selectAll(), scope.width, rightScope.width);
        scope = combined;
    }

    // 2. WHERE
    const where = stmt.where;
    if (where) {
        checkExpr(where, scope);
        rows = rows.filter(row => matches(where, new RowContext(scope, row)));
    }

    // 3-5. GROUP BY, HAVING, projection
    let outputs: Output[];
    let columns: string[];

    if (stmt.groupBy !== undefined || hasAggregate(stmt)) {
        if (stmt.projection === '*') {
            throw new EngineError('INVALID_PROJECTION', 'SELECT * cannot be combined with grouping or aggregates');
        }
        const projection = stmt.projection;
        const keys = (stmt.groupBy ?? []).map(ref => scope.resolve(ref));
        const checked: Expr[] = [...projection, ...(stmt.orderBy ?? []).map(o => o.expr)];
        if (stmt.having) checked.push(stmt.having);
        for (const expr of checked) checkExpr(expr, scope, keys);

        let groups = groupRows(rows, scope, keys);
        const having = stmt.having;
        if (having) groups = groups.filter(group => matches(having, group));

        outputs = groups.map(group => ({ ctx: group, values: projection.map(item => evaluate(item, group)) }));
        columns = projection.map(displayName);
    } else {
        const refs: ProjectionItem[] = stmt.projection === '*' ? starColumns(scope) : stmt.projection;
        for (const item of refs) checkExpr(item, scope);
        for (const item of stmt.orderBy ?? []) checkExpr(item.expr, scope);

        outputs = rows.map(row => {
            const ctx = new RowContext(scope, row);
            return { ctx, values: refs.map(item => evaluate(item, ctx)) };
        });
        columns = refs.map(displayName);
    }

    // 6. ORDER BY (Array.prototype.sort is stable)
    const orderBy = stmt.orderBy;
    if (orderBy && orderBy.length > 0) {
        const keyed = outputs.map(out => ({ out, keys: orderBy.map(item => evaluate(item.expr, out.ctx)) }));
        keyed.sort((a, b) => {
            for (let i = 0; i < orderBy.length; i++) {
                const cmp = sortCompare(a.keys[i] ?? null, b.keys[i] ?? null);
                if (cmp !== 0) return orderBy[i]?.descending ? -cmp : cmp;
            }
            return 0;
        });
        outputs = keyed.map(k => k.out);
    }

    return { type: 'ROWS', columns, rows: outputs.map(o => o.values) };
}

// `*` names a column plainly unless another joined table has the same name.
function starColumns(scope: Scope): ColumnRefExpr[] {
    return scope.columns.map((col): ColumnRefExpr => {
        const clash = scope.columns.some(other => other !== col && other.name === col.name);
        return clash ? { type: 'COLUMN', table: col.table, name: col.name } : { type: 'COLUMN', name: col.name };
    });
}
