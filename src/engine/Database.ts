import type { AlterStmt, CreateStmt, DeleteStmt, DropStmt, InsertStmt, Statement, UpdateStmt } from "./AST";
import { Catalog } from "./Catalog";
import { EngineError } from "./Errors";
import { checkExpr, matches, RowContext, Scope } from "./Evaluator";
import { Parser } from "./Parser";
import { executeSelect, type RowsResult } from "./Query";
import type { Row } from "./Table";
import { coerce, type Value } from "./Value";

export type { RowsResult };

export interface CountResult {
    type: 'COUNT';
    count: number;
    message: string;
}

export interface OkResult {
    type: 'OK';
    message: string;
}

export type QueryResult = RowsResult | CountResult | OkResult;

const rowsWord = (n: number) => (n === 1 ? 'row' : 'rows');

/**
 * Runs one parsed statement against the catalog. Statements either apply
 * fully or throw before changing anything.
 */
export function executeStatement(catalog: Catalog, stmt: Statement): QueryResult {
    switch (stmt.type) {
        case 'CREATE': return execCreate(catalog, stmt);
        case 'DROP': return execDrop(catalog, stmt);
        case 'ALTER': return execAlter(catalog, stmt);
        case 'INSERT': return execInsert(catalog, stmt);
        case 'UPDATE': return execUpdate(catalog, stmt);
        case 'DELETE': return execDelete(catalog, stmt);
        case 'SELECT': return executeSelect(catalog, stmt);
    }
}

function execCreate(catalog: Catalog, stmt: CreateStmt): OkResult {
    catalog.addTable(stmt.table, stmt.columns);
    return { type: 'OK', message: `Table ${stmt.table} created` };
}

function execDrop(catalog: Catalog, stmt: DropStmt): OkResult {
    catalog.removeTable(stmt.table);
    return { type: 'OK', message: `Table ${stmt.table} dropped` };
}

function execAlter(catalog: Catalog, stmt: AlterStmt): OkResult {
    const table = catalog.requireTable(stmt.table);
    const action = stmt.action;
    switch (action.type) {
        case 'ADD_COLUMN':
            table.addColumn(action.column);
            return { type: 'OK', message: `Added column ${action.column.name} to ${stmt.table}` };
        case 'DROP_COLUMN':
            table.dropColumn(action.name);
            return { type: 'OK', message: `Dropped column ${action.name} from ${stmt.table}` };
        case 'MODIFY_COLUMN':
            table.modifyColumn(action.name, action.newType);
            return { type: 'OK', message: `Modified column ${action.name} to ${action.newType} in ${stmt.table}` };
    }
}

function execInsert(catalog: Catalog, stmt: InsertStmt): CountResult {
    const table = catalog.requireTable(stmt.table);

    let positions: number[];
    if (stmt.columns) {
        const seen = new Set<string>();
        positions = stmt.columns.map(name => {
            if (seen.has(name)) throw new EngineError('DUPLICATE_COLUMN', `Column ${name} listed twice`);
            seen.add(name);
            return table.requireColumn(name);
        });
    } else {
        positions = table.columns.map((_, idx) => idx);
    }

    // Build and type every row before appending any of them.
    const rows: Row[] = stmt.values.map(tuple => {
        if (tuple.length !== positions.length) {
            throw new EngineError('ARITY', `Expected ${positions.length} values, got ${tuple.length}`);
        }
        const row: Row = table.columns.map(() => null);
        tuple.forEach((literal, i) => {
            const idx = positions[i];
            const col = idx === undefined ? undefined : table.columns[idx];
            if (idx === undefined || !col) return;
            row[idx] = coerce(col.type, literal.value, col.name);
        });
        return row;
    });

    for (const row of rows) table.insert(row);
    return { type: 'COUNT', count: rows.length, message: `Inserted ${rows.length} ${rowsWord(rows.length)}` };
}

function execUpdate(catalog: Catalog, stmt: UpdateStmt): CountResult {
    const table = catalog.requireTable(stmt.table);
    const scope = Scope.ofTable(table);

    const changes = new Map<number, Value>();
    for (const { column, value } of stmt.assignments) {
        const idx = table.requireColumn(column);
        if (changes.has(idx)) throw new EngineError('DUPLICATE_COLUMN', `Column ${column} assigned twice`);
        const col = table.columns[idx];
        if (col) changes.set(idx, coerce(col.type, value.value, col.name));
    }

    const where = stmt.where;
    if (where) checkExpr(where, scope);
    const updated = table.update(row => !where || matches(where, new RowContext(scope, row)), changes);
    return { type: 'COUNT', count: updated, message: `Updated ${updated} ${rowsWord(updated)}` };
}

function execDelete(catalog: Catalog, stmt: DeleteStmt): CountResult {
    const table = catalog.requireTable(stmt.table);
    const scope = Scope.ofTable(table);

    const where = stmt.where;
    if (where) checkExpr(where, scope);
    const deleted = table.delete(row => !where || matches(where, new RowContext(scope, row)));
    return { type: 'COUNT', count: deleted, message: `Deleted ${deleted} ${rowsWord(deleted)}` };
}

/**
 * Session facade: one catalog for the lifetime of the instance, fed one
 * statement of text at a time.
 */
export class Database {
    readonly catalog: Catalog;

    constructor(catalog: Catalog = new Catalog()) {
        this.catalog = catalog;
    }

    execute(sql: string): QueryResult {
        const ast = new Parser(sql).parse();
        return executeStatement(this.catalog, ast);
    }
}
