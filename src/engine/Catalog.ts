import type { ColumnDef } from "./AST";
import { EngineError } from "./Errors";
import { Table } from "./Table";

/**
 * Session-lifetime registry of tables, keyed by name. The only owner of
 * table data; statements borrow tables for the duration of one execution.
 */
export class Catalog {
    private tables: Map<string, Table> = new Map();

    addTable(name: string, columns: ColumnDef[]): Table {
        if (this.tables.has(name)) throw new EngineError('TABLE_EXISTS', `Table ${name} already exists`);
        const table = new Table(name, columns);
        this.tables.set(name, table);
        return table;
    }

    requireTable(name: string): Table {
        const table = this.tables.get(name);
        if (!table) throw new EngineError('NO_SUCH_TABLE', `Table ${name} not found`);
        return table;
    }

    removeTable(name: string): void {
        if (!this.tables.delete(name)) throw new EngineError('NO_SUCH_TABLE', `Table ${name} does not exist`);
    }
}
