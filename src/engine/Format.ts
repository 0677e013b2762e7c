import type { QueryResult } from "./Database";
import { renderValue } from "./Value";

/**
 * Plain-text rendering for a terminal driver:
 *
 *     id | name
 *     ---------
 *     1 | ada
 *     (1 row)
 */
export function formatResult(result: QueryResult): string {
    if (result.type !== 'ROWS') return result.message;

    const header = result.columns.join(' | ');
    const lines = [header, '-'.repeat(header.length)];
    for (const row of result.rows) lines.push(row.map(renderValue).join(' | '));
    const n = result.rows.length;
    lines.push(`(${n} ${n === 1 ? 'row' : 'rows'})`);
    return lines.join('\n');
}
