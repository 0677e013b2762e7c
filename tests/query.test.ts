import { describe, expect, test } from "vitest";
import type { Database } from "../src/engine/Database";
import type { Row } from "../src/engine/Table";
import { errorOf, seededDatabase } from "./helpers";

function query(db: Database, sql: string): { columns: string[]; rows: Row[] } {
    const result = db.execute(sql);
    if (result.type !== 'ROWS') throw new Error(`Expected rows from: ${sql}`);
    return { columns: result.columns, rows: result.rows };
}

describe("SELECT: filter, project, order", () => {
    test("WHERE and projection", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT name, age FROM users WHERE age > 22 ORDER BY age")).toEqual({
            columns: ['name', 'age'],
            rows: [['Srijan', 25n], ['srishti', 30n]]
        });
    });

    test("ORDER BY text DESC uses code-unit order", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT name FROM users ORDER BY name DESC").rows).toEqual([['srishti'], ['mira'], ['Srijan']]);
    });

    test("ORDER BY a column that is not projected", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT name FROM users ORDER BY age").rows).toEqual([['mira'], ['Srijan'], ['srishti']]);
    });

    test("null sorts first ascending and last descending", () => {
        const db = seededDatabase();
        db.execute("INSERT INTO users (id, name) VALUES ('4', 'zed')");
        expect(query(db, "SELECT id FROM users ORDER BY age").rows).toEqual([[4n], [3n], [2n], [1n]]);
        expect(query(db, "SELECT id FROM users ORDER BY age DESC").rows).toEqual([[1n], [2n], [3n], [4n]]);
    });

    test("ORDER BY is stable for equal keys", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT order_id FROM orders ORDER BY user_id").rows).toEqual([[10n], [11n], [12n], [13n]]);
        expect(query(db, "SELECT order_id FROM orders ORDER BY user_id DESC").rows).toEqual([[13n], [12n], [10n], [11n]]);
    });

    test("literals take the type of the column they are compared with", () => {
        const db = seededDatabase();
        db.execute("CREATE TABLE codes (code TEXT)");
        db.execute("INSERT INTO codes VALUES ('9'), ('10')");
        expect(query(db, "SELECT code FROM codes WHERE code < '2'").rows).toEqual([['10']]);
        expect(query(db, "SELECT id FROM users WHERE age < 100").rows).toEqual([[1n], [2n], [3n]]);
        expect(query(db, "SELECT id FROM users WHERE '25' = age").rows).toEqual([[2n]]);
    });

    test("an INT column never equals a TEXT column", () => {
        const db = seededDatabase();
        db.execute("CREATE TABLE a (id INT)");
        db.execute("CREATE TABLE b (code TEXT)");
        db.execute("INSERT INTO a VALUES ('5')");
        db.execute("INSERT INTO b VALUES ('5')");
        expect(query(db, "SELECT * FROM a JOIN b ON a.id = b.code").rows).toEqual([]);
        expect(query(db, "SELECT * FROM a JOIN b ON a.id != b.code").rows).toEqual([[5n, '5']]);
    });

    test("incompatible comparisons are unequal", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT id FROM users WHERE age = 'abc'").rows).toEqual([]);
        expect(query(db, "SELECT id FROM users WHERE age != 'abc'").rows).toEqual([[1n], [2n], [3n]]);
    });

    test("unknown columns fail even when no row is scanned", () => {
        const db = seededDatabase();
        db.execute("CREATE TABLE empty (x INT)");
        expect(errorOf(() => db.execute("SELECT y FROM empty"))).toMatchObject({ code: 'UNKNOWN_COLUMN' });
        expect(errorOf(() => db.execute("SELECT x FROM empty WHERE y = 1"))).toMatchObject({ code: 'UNKNOWN_COLUMN' });
    });

    test("missing table", () => {
        const db = seededDatabase();
        expect(errorOf(() => db.execute("SELECT * FROM ghosts"))).toMatchObject({ code: 'NO_SUCH_TABLE' });
        expect(errorOf(() => db.execute("SELECT * FROM users JOIN ghosts ON users.id = ghosts.id"))).toMatchObject({ code: 'NO_SUCH_TABLE' });
    });
});

describe("SELECT: joins", () => {
    test("INNER JOIN", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT users.name, orders.amount FROM users JOIN orders ON users.id = orders.user_id")).toEqual({
            columns: ['users.name', 'orders.amount'],
            rows: [['srishti', 100n], ['srishti', 50n], ['Srijan', 70n]]
        });
    });

    test("LEFT JOIN pads unmatched rows with nulls", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT * FROM orders LEFT JOIN users ON users.id = orders.user_id")).toEqual({
            columns: ['order_id', 'user_id', 'amount', 'id', 'name', 'age'],
            rows: [
                [10n, 1n, 100n, 1n, 'srishti', 30n],
                [11n, 1n, 50n, 1n, 'srishti', 30n],
                [12n, 2n, 70n, 2n, 'Srijan', 25n],
                [13n, 4n, 20n, null, null, null]
            ]
        });
    });

    test("RIGHT JOIN is the mirror image", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT * FROM users RIGHT JOIN orders ON users.id = orders.user_id").rows).toEqual([
            [1n, 'srishti', 30n, 10n, 1n, 100n],
            [1n, 'srishti', 30n, 11n, 1n, 50n],
            [2n, 'Srijan', 25n, 12n, 2n, 70n],
            [null, null, null, 13n, 4n, 20n]
        ]);
    });

    test("FULL JOIN keeps both unmatched sides once", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT users.id, orders.order_id FROM users FULL JOIN orders ON users.id = orders.user_id").rows)
            .toEqual([[1n, 10n], [1n, 11n], [2n, 12n], [3n, null], [null, 13n]]);
    });

    test("CROSS JOIN is the full product", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT COUNT(*) FROM users CROSS JOIN orders")).toEqual({ columns: ['COUNT(*)'], rows: [[12n]] });
    });

    test("LEFT JOIN never loses left rows", () => {
        const db = seededDatabase();
        const { rows } = query(db, "SELECT users.id FROM users LEFT JOIN orders ON users.id = orders.user_id");
        expect(rows).toEqual([[1n], [1n], [2n], [3n]]);
    });

    test("WHERE applies after the join", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT order_id FROM orders LEFT JOIN users ON users.id = orders.user_id WHERE age > 26").rows)
            .toEqual([[10n], [11n]]);
    });

    test("shared column names need qualification", () => {
        const db = seededDatabase();
        db.execute("CREATE TABLE a (id INT)");
        db.execute("CREATE TABLE b (id INT)");
        db.execute("INSERT INTO a VALUES ('1')");
        db.execute("INSERT INTO b VALUES ('1'), ('2')");

        expect(errorOf(() => db.execute("SELECT id FROM a JOIN b ON a.id = b.id"))).toMatchObject({ code: 'AMBIGUOUS_COLUMN' });
        expect(errorOf(() => db.execute("SELECT * FROM a JOIN b ON id = b.id"))).toMatchObject({ code: 'AMBIGUOUS_COLUMN' });
        expect(query(db, "SELECT * FROM a CROSS JOIN b")).toEqual({ columns: ['a.id', 'b.id'], rows: [[1n, 1n], [1n, 2n]] });
    });
});

describe("SELECT: grouping and aggregates", () => {
    test("aggregates per group, groups in first-seen order", () => {
        const db = seededDatabase();
        const sql = "SELECT user_id, COUNT(*), SUM(amount), AVG(amount), MIN(amount), MAX(amount) FROM orders GROUP BY user_id";
        expect(query(db, sql)).toEqual({
            columns: ['user_id', 'COUNT(*)', 'SUM(amount)', 'AVG(amount)', 'MIN(amount)', 'MAX(amount)'],
            rows: [
                [1n, 2n, 150n, 75n, 50n, 100n],
                [2n, 1n, 70n, 70n, 70n, 70n],
                [4n, 1n, 20n, 20n, 20n, 20n]
            ]
        });
    });

    test("HAVING filters groups", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT user_id, COUNT(*) FROM orders GROUP BY user_id HAVING COUNT(*) > 1").rows).toEqual([[1n, 2n]]);
        expect(query(db, "SELECT user_id FROM orders GROUP BY user_id HAVING user_id >= 2 AND SUM(amount) < 50").rows)
            .toEqual([[4n]]);
    });

    test("aggregates without GROUP BY form one group", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT COUNT(*), AVG(age) FROM users")).toEqual({ columns: ['COUNT(*)', 'AVG(age)'], rows: [[3n, 25n]] });
    });

    test("the implicit group exists even when empty", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT COUNT(*), SUM(age) FROM users WHERE age > 100").rows).toEqual([[0n, null]]);
    });

    test("COUNT(col) skips nulls", () => {
        const db = seededDatabase();
        db.execute("INSERT INTO users (id) VALUES ('4')");
        expect(query(db, "SELECT COUNT(age), COUNT(*) FROM users").rows).toEqual([[3n, 4n]]);
    });

    test("null keys group together", () => {
        const db = seededDatabase();
        db.execute("INSERT INTO users (id) VALUES ('4'), ('5')");
        expect(query(db, "SELECT age, COUNT(*) FROM users GROUP BY age ORDER BY age").rows)
            .toEqual([[null, 2n], [22n, 1n], [25n, 1n], [30n, 1n]]);
    });

    test("ORDER BY an aggregate", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT user_id, COUNT(*) FROM orders GROUP BY user_id ORDER BY COUNT(*) DESC, user_id").rows)
            .toEqual([[1n, 2n], [2n, 1n], [4n, 1n]]);
    });

    test("group counts add up to the filtered row count", () => {
        const db = seededDatabase();
        const total = query(db, "SELECT COUNT(*) FROM orders WHERE amount > 30").rows[0]?.[0];
        const perGroup = query(db, "SELECT COUNT(*) FROM orders WHERE amount > 30 GROUP BY user_id").rows;
        expect(perGroup.reduce((sum, [count]) => sum + (typeof count === 'bigint' ? count : 0n), 0n)).toBe(total);
        expect(total).toBe(3n);
    });

    test("bare columns must be grouping keys", () => {
        const db = seededDatabase();
        expect(errorOf(() => db.execute("SELECT name, COUNT(*) FROM users"))).toMatchObject({ code: 'INVALID_PROJECTION' });
        expect(errorOf(() => db.execute("SELECT name FROM users GROUP BY age"))).toMatchObject({ code: 'INVALID_PROJECTION' });
        expect(errorOf(() => db.execute("SELECT * FROM users GROUP BY age"))).toMatchObject({ code: 'INVALID_PROJECTION' });
        expect(errorOf(() => db.execute("SELECT age FROM users GROUP BY age HAVING name = 'x'")))
            .toMatchObject({ code: 'INVALID_PROJECTION' });
    });

    test("aggregates are not allowed in WHERE or ON", () => {
        const db = seededDatabase();
        expect(errorOf(() => db.execute("SELECT * FROM users WHERE COUNT(*) > 1"))).toMatchObject({ code: 'MISPLACED_AGGREGATE' });
        expect(errorOf(() => db.execute("SELECT * FROM users JOIN orders ON COUNT(*) = 1")))
            .toMatchObject({ code: 'MISPLACED_AGGREGATE' });
    });

    test("AVG truncates toward zero", () => {
        const db = seededDatabase();
        db.execute("CREATE TABLE n (v INT)");
        db.execute("INSERT INTO n VALUES ('-7'), ('2')");
        expect(query(db, "SELECT AVG(v), SUM(v), MIN(v), MAX(v) FROM n").rows).toEqual([[-2n, -5n, -7n, 2n]]);
    });

    test("INT holds the full signed 64-bit range", () => {
        const db = seededDatabase();
        db.execute("CREATE TABLE big (v INT)");
        db.execute("INSERT INTO big VALUES ('9223372036854775807'), ('-9223372036854775808')");
        expect(query(db, "SELECT v FROM big ORDER BY v").rows).toEqual([[-9223372036854775808n], [9223372036854775807n]]);
        expect(query(db, "SELECT v FROM big WHERE v > 9223372036854775806").rows).toEqual([[9223372036854775807n]]);
        expect(errorOf(() => db.execute("INSERT INTO big VALUES ('9223372036854775808')"))).toMatchObject({ code: 'TYPE_MISMATCH' });
    });

    test("sums past 2^53 stay exact", () => {
        const db = seededDatabase();
        db.execute("CREATE TABLE big (v INT)");
        db.execute("INSERT INTO big VALUES ('9007199254740991'), ('2')");
        expect(query(db, "SELECT SUM(v), AVG(v) FROM big").rows).toEqual([[9007199254740993n, 4503599627370496n]]);
    });

    test("SUM ignores text values", () => {
        const db = seededDatabase();
        expect(query(db, "SELECT SUM(name), COUNT(name) FROM users").rows).toEqual([[null, 3n]]);
    });
});
