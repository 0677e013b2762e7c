import { createInterface } from "node:readline";
import { REPL_BANNER, REPL_PROMPT } from "../engine/Constants";
import { Database } from "../engine/Database";
import { formatResult } from "../engine/Format";

const db = new Database();

console.log(REPL_BANNER);
console.log("Type 'exit' to quit.");

process.stdout.write(REPL_PROMPT);

const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: false });

for await (const line of rl) {
    const input = line.trim();
    if (input === 'exit' || input === 'quit') break;
    if (input === '') {
        process.stdout.write(REPL_PROMPT);
        continue;
    }

    try {
        const start = performance.now();
        const result = db.execute(input);
        const end = performance.now();
        console.log(formatResult(result));
        console.log(`[${(end - start).toFixed(2)}ms]`);
    } catch (e: unknown) {
        console.error("Error:", e instanceof Error ? e.message : String(e));
    }
    process.stdout.write(REPL_PROMPT);
}

rl.close();
