import type { ColumnDef } from "./AST";
import type { ColumnType } from "./Constants";
import { EngineError } from "./Errors";
import { convert, type Value } from "./Value";

export type { ColumnDef };

export type Row = Value[];

/**
 * Schema plus an append-only row store. Every row is as wide as the
 * schema; rows are copied on the way in and out so callers never alias
 * stored data.
 */
export class Table {
    private _columns: ColumnDef[];
    private rows: Row[] = [];

    constructor(public readonly name: string, columns: ColumnDef[]) {
        const seen = new Set<string>();
        for (const col of columns) {
            if (seen.has(col.name)) {
                throw new EngineError('DUPLICATE_COLUMN', `Duplicate column ${col.name} in table ${name}`);
            }
            seen.add(col.name);
        }
        this._columns = columns.map(c => ({ ...c }));
    }

    get columns(): readonly ColumnDef[] {
        return this._columns;
    }

    columnIndex(name: string): number {
        return this._columns.findIndex(c => c.name === name);
    }

    requireColumn(name: string): number {
        const idx = this.columnIndex(name);
        if (idx === -1) throw new EngineError('UNKNOWN_COLUMN', `Column ${name} not found in table ${this.name}`);
        return idx;
    }

    addColumn(column: ColumnDef): void {
        if (this.columnIndex(column.name) !== -1) {
            throw new EngineError('DUPLICATE_COLUMN', `Column ${column.name} already exists in table ${this.name}`);
        }
        this._columns.push({ ...column });
        for (const row of this.rows) row.push(null);
    }

    dropColumn(name: string): void {
        const idx = this.requireColumn(name);
        this._columns.splice(idx, 1);
        for (const row of this.rows) row.splice(idx, 1);
    }

    // Lossy: values that cannot be represented under the new type become null.
    modifyColumn(name: string, type: ColumnType): void {
        const idx = this.requireColumn(name);
        const col = this._columns[idx];
        if (!col || col.type === type) return;
        col.type = type;
        for (const row of this.rows) row[idx] = convert(row[idx] ?? null, type);
    }

    insert(row: Row): void {
        if (row.length !== this._columns.length) {
            throw new EngineError('ARITY', `Table ${this.name} has ${this._columns.length} columns, row has ${row.length}`);
        }
        this.rows.push([...row]);
    }

    selectAll(): Row[] {
        return this.rows.map(r => [...r]);
    }

    /**
     * Applies `changes` (column index → value) to every row accepted by
     * `match`, in place. Returns the number of rows touched.
     */
    update(match: (row: Row) => boolean, changes: ReadonlyMap<number, Value>): number {
        let updated = 0;
        for (const row of this.rows) {
            if (!match(row)) continue;
            for (const [idx, value] of changes) row[idx] = value;
            updated++;
        }
        return updated;
    }

    // Removes matching rows, keeping the survivors in their original order.
    delete(match: (row: Row) => boolean): number {
        const before = this.rows.length;
        this.rows = this.rows.filter(row => !match(row));
        return before - this.rows.length;
    }
}
