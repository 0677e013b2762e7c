import { ColumnType, INT_MAX, INT_MIN, INTEGER_PATTERN, NULL_DISPLAY } from "./Constants";
import { EngineError } from "./Errors";

export type Value = bigint | string | null;

function parseInteger(text: string): bigint | undefined {
    if (!INTEGER_PATTERN.test(text)) return undefined;
    const n = BigInt(text);
    return n >= INT_MIN && n <= INT_MAX ? n : undefined;
}

/**
 * Types a raw literal for a column of the given type. Used on every write
 * path (INSERT, UPDATE); text that does not fit an INT column is rejected.
 */
export function coerce(type: ColumnType, raw: string | null, column = '?'): Value {
    if (raw === null) return null;
    switch (type) {
        case ColumnType.TEXT:
            return raw;
        case ColumnType.INT: {
            const n = parseInteger(raw);
            if (n === undefined) {
                throw new EngineError('TYPE_MISMATCH', `Value '${raw}' is not an INT (column ${column})`);
            }
            return n;
        }
    }
}

/**
 * Types a predicate literal against the operand it is compared with.
 * Unlike `coerce` this never fails: text that is not an integer stays
 * text, and the comparison then sees two different variants.
 */
export function typeLiteral(raw: string | null, type: ColumnType): Value {
    if (raw === null || type === ColumnType.TEXT) return raw;
    return parseInteger(raw) ?? raw;
}

/**
 * Best-effort reinterpretation of a stored value under a new column type
 * (ALTER TABLE ... MODIFY). Never throws; unrepresentable values become null.
 */
export function convert(value: Value, type: ColumnType): Value {
    if (value === null) return null;
    switch (type) {
        case ColumnType.TEXT:
            return value.toString();
        case ColumnType.INT:
            if (typeof value === 'bigint') return value;
            return parseInteger(value) ?? null;
    }
}

/**
 * Three-way comparison for predicates. Returns undefined when the two
 * values cannot be compared: either is null, or they are different
 * variants.
 */
export function compareValues(a: Value, b: Value): number | undefined {
    if (a === null || b === null) return undefined;
    if (typeof a === 'bigint') {
        if (typeof b !== 'bigint') return undefined;
        return a < b ? -1 : a > b ? 1 : 0;
    }
    if (typeof b !== 'string') return undefined;
    return a < b ? -1 : a > b ? 1 : 0;
}

function rank(value: Value): number {
    if (value === null) return 0;
    return typeof value === 'bigint' ? 1 : 2;
}

// Total order for ORDER BY: null, then integers, then text.
export function sortCompare(a: Value, b: Value): number {
    const ra = rank(a);
    const rb = rank(b);
    if (ra !== rb) return ra - rb;
    return compareValues(a, b) ?? 0;
}

export function renderValue(value: Value): string {
    return value === null ? NULL_DISPLAY : value.toString();
}
