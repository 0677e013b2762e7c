import type {
    AggregateExpr, AggregateFunc, AlterStmt, ColumnDef, ColumnRefExpr, ComparisonOp, CreateStmt, DeleteStmt,
    DropStmt, Expr, InsertStmt, JoinClause, JoinKind, LiteralExpr, OrderItem, ProjectionItem, SelectStmt,
    Statement, UpdateStmt
} from "./AST";
import { AGGREGATE_FUNCTIONS, ColumnType } from "./Constants";
import { ParseError } from "./Errors";
import { tokenize, type Token } from "./Lexer";

const COMPARISON_OPS: readonly string[] = ['=', '!=', '<', '>', '<=', '>='];
const JOIN_KINDS: readonly string[] = ['INNER', 'LEFT', 'RIGHT', 'FULL', 'CROSS'];

const isComparisonOp = (value: string): value is ComparisonOp => COMPARISON_OPS.includes(value);
const isJoinKind = (value: string): value is JoinKind => JOIN_KINDS.includes(value);
const AGGREGATES: readonly string[] = AGGREGATE_FUNCTIONS;
const isAggregateFunc = (value: string): value is AggregateFunc => AGGREGATES.includes(value);

function display(token: Token | undefined): string {
    if (!token) return 'end of input';
    return token.kind === 'STRING_LITERAL' ? `'${token.value}'` : `"${token.value}"`;
}

/**
 * Recursive-descent parser with one token of lookahead. Dispatches on the
 * leading keyword and produces exactly one statement.
 */
export class Parser {
    private pos = 0;
    private tokens: Token[];

    constructor(input: string | Token[]) {
        this.tokens = typeof input === 'string' ? tokenize(input) : input;
    }

    private peek(): Token | undefined {
        return this.tokens[this.pos];
    }

    private isKeyword(keyword: string): boolean {
        const token = this.peek();
        return token?.kind === 'KEYWORD' && token.value === keyword;
    }

    private isPunct(symbol: string): boolean {
        const token = this.peek();
        return token?.kind === 'PUNCTUATION' && token.value === symbol;
    }

    private unexpected(expected: string): ParseError {
        const token = this.peek();
        if (!token) return new ParseError('UNEXPECTED_END', `Expected ${expected}, found end of input`);
        return new ParseError('UNEXPECTED_TOKEN', `Expected ${expected}, found ${display(token)} at position ${token.position}`);
    }

    private keyword(keyword: string): void {
        if (!this.isKeyword(keyword)) throw this.unexpected(keyword);
        this.pos++;
    }

    private punct(symbol: string): void {
        if (!this.isPunct(symbol)) throw this.unexpected(`"${symbol}"`);
        this.pos++;
    }

    private acceptKeyword(keyword: string): boolean {
        if (!this.isKeyword(keyword)) return false;
        this.pos++;
        return true;
    }

    private acceptPunct(symbol: string): boolean {
        if (!this.isPunct(symbol)) return false;
        this.pos++;
        return true;
    }

    private identifier(what = 'identifier'): string {
        const token = this.peek();
        if (token?.kind !== 'IDENTIFIER') throw this.unexpected(what);
        this.pos++;
        return token.value;
    }

    parse(): Statement {
        const token = this.peek();
        if (!token) throw new ParseError('UNKNOWN_STATEMENT', 'Empty statement');

        let stmt: Statement;
        const leading = token.kind === 'KEYWORD' ? token.value : '';
        switch (leading) {
            case 'CREATE': stmt = this.parseCreate(); break;
            case 'ALTER': stmt = this.parseAlter(); break;
            case 'DROP': stmt = this.parseDrop(); break;
            case 'INSERT': stmt = this.parseInsert(); break;
            case 'UPDATE': stmt = this.parseUpdate(); break;
            case 'DELETE': stmt = this.parseDelete(); break;
            case 'SELECT': stmt = this.parseSelect(); break;
            default:
                throw new ParseError('UNKNOWN_STATEMENT', `Unknown command: ${token.value}`);
        }

        this.acceptPunct(';');
        const rest = this.peek();
        if (rest) {
            throw new ParseError('UNEXPECTED_TOKEN', `Unexpected ${display(rest)} at position ${rest.position}`);
        }
        return stmt;
    }

    private parseColumnType(): ColumnType {
        if (this.acceptKeyword('INT')) return ColumnType.INT;
        if (this.acceptKeyword('TEXT')) return ColumnType.TEXT;
        throw this.unexpected('column type INT or TEXT');
    }

    private parseCreate(): CreateStmt {
        this.keyword('CREATE');
        this.keyword('TABLE');
        const table = this.identifier('table name');
        this.punct('(');
        const columns: ColumnDef[] = [];
        do {
            const name = this.identifier('column name');
            columns.push({ name, type: this.parseColumnType() });
        } while (this.acceptPunct(','));
        this.punct(')');
        return { type: 'CREATE', table, columns };
    }

    private parseAlter(): AlterStmt {
        this.keyword('ALTER');
        this.keyword('TABLE');
        const table = this.identifier('table name');

        if (this.acceptKeyword('ADD')) {
            const name = this.identifier('column name');
            // ADD without a type declares a TEXT column
            const type = this.isKeyword('INT') || this.isKeyword('TEXT') ? this.parseColumnType() : ColumnType.TEXT;
            return { type: 'ALTER', table, action: { type: 'ADD_COLUMN', column: { name, type } } };
        }
        if (this.acceptKeyword('DROP')) {
            const name = this.identifier('column name');
            return { type: 'ALTER', table, action: { type: 'DROP_COLUMN', name } };
        }
        if (this.acceptKeyword('MODIFY')) {
            const name = this.identifier('column name');
            if (!this.isKeyword('INT') && !this.isKeyword('TEXT')) {
                throw new ParseError('MISSING_CLAUSE', `MODIFY ${name} requires a column type`);
            }
            return { type: 'ALTER', table, action: { type: 'MODIFY_COLUMN', name, newType: this.parseColumnType() } };
        }
        throw this.unexpected('ADD, DROP or MODIFY');
    }

    private parseDrop(): DropStmt {
        this.keyword('DROP');
        this.keyword('TABLE');
        return { type: 'DROP', table: this.identifier('table name') };
    }

    private parseInsert(): InsertStmt {
        this.keyword('INSERT');
        this.keyword('INTO');
        const table = this.identifier('table name');

        let columns: string[] | undefined;
        if (this.acceptPunct('(')) {
            columns = [];
            do {
                columns.push(this.identifier('column name'));
            } while (this.acceptPunct(','));
            this.punct(')');
        }

        this.keyword('VALUES');
        const values: LiteralExpr[][] = [];
        do {
            this.punct('(');
            const tuple: LiteralExpr[] = [];
            do {
                tuple.push(this.parseLiteral());
            } while (this.acceptPunct(','));
            this.punct(')');
            if (columns && tuple.length !== columns.length) {
                throw new ParseError('ARITY', `INSERT lists ${columns.length} columns but ${tuple.length} values`);
            }
            values.push(tuple);
        } while (this.acceptPunct(','));

        return columns ? { type: 'INSERT', table, columns, values } : { type: 'INSERT', table, values };
    }

    private parseUpdate(): UpdateStmt {
        this.keyword('UPDATE');
        const table = this.identifier('table name');
        this.keyword('SET');
        const assignments: UpdateStmt['assignments'] = [];
        do {
            const column = this.identifier('column name');
            this.punct('=');
            assignments.push({ column, value: this.parseLiteral() });
        } while (this.acceptPunct(','));

        const stmt: UpdateStmt = { type: 'UPDATE', table, assignments };
        if (this.acceptKeyword('WHERE')) stmt.where = this.parseExpr();
        return stmt;
    }

    private parseDelete(): DeleteStmt {
        this.keyword('DELETE');
        this.keyword('FROM');
        const stmt: DeleteStmt = { type: 'DELETE', table: this.identifier('table name') };
        if (this.acceptKeyword('WHERE')) stmt.where = this.parseExpr();
        return stmt;
    }

    private parseSelect(): SelectStmt {
        this.keyword('SELECT');

        let projection: SelectStmt['projection'];
        if (this.acceptPunct('*')) {
            projection = '*';
        } else {
            projection = [];
            do {
                projection.push(this.parseProjectionItem());
            } while (this.acceptPunct(','));
        }

        this.keyword('FROM');
        const stmt: SelectStmt = { type: 'SELECT', projection, from: this.identifier('table name'), joins: [] };

        let join: JoinClause | undefined;
        while ((join = this.parseJoin())) stmt.joins.push(join);

        if (this.acceptKeyword('WHERE')) stmt.where = this.parseExpr();

        if (this.acceptKeyword('GROUP')) {
            this.keyword('BY');
            const keys: ColumnRefExpr[] = [];
            do {
                keys.push(this.parseColumnRef());
            } while (this.acceptPunct(','));
            stmt.groupBy = keys;
        }

        if (this.isKeyword('HAVING')) {
            if (!stmt.groupBy) throw new ParseError('MISSING_CLAUSE', 'HAVING requires GROUP BY');
            this.pos++;
            stmt.having = this.parseExpr();
        }

        if (this.acceptKeyword('ORDER')) {
            this.keyword('BY');
            const items: OrderItem[] = [];
            do {
                const expr = this.parseProjectionItem();
                let descending = false;
                if (this.acceptKeyword('DESC')) descending = true;
                else this.acceptKeyword('ASC');
                items.push({ expr, descending });
            } while (this.acceptPunct(','));
            stmt.orderBy = items;
        }

        return stmt;
    }

    private parseJoin(): JoinClause | undefined {
        const token = this.peek();
        if (token?.kind !== 'KEYWORD') return undefined;

        let kind: JoinKind;
        if (token.value === 'JOIN') {
            kind = 'INNER';
        } else if (isJoinKind(token.value)) {
            kind = token.value;
            this.pos++;
        } else {
            return undefined;
        }
        this.keyword('JOIN');

        const table = this.identifier('table name');
        if (kind === 'CROSS') {
            if (this.isKeyword('ON')) throw this.unexpected('no ON clause after CROSS JOIN');
            return { kind, table };
        }
        if (!this.acceptKeyword('ON')) {
            throw new ParseError('MISSING_CLAUSE', `${kind} JOIN ${table} requires an ON clause`);
        }
        return { kind, table, on: this.parseExpr() };
    }

    private parseProjectionItem(): ProjectionItem {
        const token = this.peek();
        if (token?.kind === 'KEYWORD' && isAggregateFunc(token.value)) return this.parseAggregate(token.value);
        return this.parseColumnRef();
    }

    private parseAggregate(func: AggregateFunc): AggregateExpr {
        this.pos++;
        this.punct('(');
        let arg: AggregateExpr['arg'];
        if (this.isPunct('*')) {
            if (func !== 'COUNT') throw this.unexpected(`column name in ${func}()`);
            this.pos++;
            arg = '*';
        } else {
            arg = this.parseColumnRef();
        }
        this.punct(')');
        return { type: 'AGGREGATE', func, arg };
    }

    private parseColumnRef(): ColumnRefExpr {
        const first = this.identifier('column name');
        if (this.acceptPunct('.')) {
            return { type: 'COLUMN', table: first, name: this.identifier('column name') };
        }
        return { type: 'COLUMN', name: first };
    }

    private parseLiteral(): LiteralExpr {
        const token = this.peek();
        if (token?.kind === 'STRING_LITERAL' || token?.kind === 'INT_LITERAL') {
            this.pos++;
            return { type: 'LITERAL', value: token.value };
        }
        if (token?.kind === 'KEYWORD' && token.value === 'NULL') {
            this.pos++;
            return { type: 'LITERAL', value: null };
        }
        throw this.unexpected('literal value');
    }

    // Predicates: OR of ANDs of comparisons, AND binding tighter.
    private parseExpr(): Expr {
        return this.parseOr();
    }

    private parseOr(): Expr {
        let left = this.parseAnd();
        while (this.acceptKeyword('OR')) {
            const right = this.parseAnd();
            left = { type: 'BINARY', op: 'OR', left, right };
        }
        return left;
    }

    private parseAnd(): Expr {
        let left = this.parseComparison();
        while (this.acceptKeyword('AND')) {
            const right = this.parseComparison();
            left = { type: 'BINARY', op: 'AND', left, right };
        }
        return left;
    }

    private parseComparison(): Expr {
        if (this.acceptPunct('(')) {
            const inner = this.parseOr();
            this.punct(')');
            return inner;
        }
        const left = this.parseOperand();
        const token = this.peek();
        if (token?.kind !== 'PUNCTUATION' || !isComparisonOp(token.value)) {
            throw this.unexpected('comparison operator');
        }
        const op = token.value;
        this.pos++;
        const right = this.parseOperand();
        return { type: 'BINARY', op, left, right };
    }

    private parseOperand(): Expr {
        const token = this.peek();
        if (!token) throw this.unexpected('operand');
        if (token.kind === 'STRING_LITERAL' || token.kind === 'INT_LITERAL') return this.parseLiteral();
        if (token.kind === 'KEYWORD' && token.value === 'NULL') return this.parseLiteral();
        return this.parseProjectionItem();
    }
}

export function parse(input: string | Token[]): Statement {
    return new Parser(input).parse();
}
