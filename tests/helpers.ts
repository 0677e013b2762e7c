import { Database } from "../src/engine/Database";

export function errorOf(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    throw new Error("Expected the call to throw");
}

// Fresh database with the users/orders fixtures most query tests share.
export function seededDatabase(): Database {
    const db = new Database();
    db.execute("CREATE TABLE users (id INT, name TEXT, age INT)");
    db.execute("INSERT INTO users (id, name, age) VALUES ('1', 'srishti', '30'), ('2', 'Srijan', '25'), ('3', 'mira', '22')");
    db.execute("CREATE TABLE orders (order_id INT, user_id INT, amount INT)");
    db.execute("INSERT INTO orders VALUES ('10', '1', '100'), ('11', '1', '50'), ('12', '2', '70'), ('13', '4', '20')");
    return db;
}
