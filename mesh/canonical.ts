/**
 * Mesh Client: Canonical Serialization
 *
 * Cache keys are derived from query text, so the same logical query must
 * always serialize to identical bytes.
 *
 * This module provides:
 * 1. Recursive key sorting for objects
 * 2. Stable JSON serialization (query hashing, request bodies)
 */

/**
 * Recursively sort object keys alphabetically.
 * Arrays are preserved in order. Object properties holding `undefined` are
 * dropped (an unset optional field and an absent one are the same query).
 *
 * Throws on functions, symbols, bigints and non-finite numbers.
 */
export function sortKeys(value: unknown): unknown {
    if (value === null || typeof value !== 'object') {
        if (typeof value === 'function') throw new Error('Value contains function (forbidden)');
        if (typeof value === 'symbol') throw new Error('Value contains symbol (forbidden)');
        if (typeof value === 'bigint') throw new Error('Value contains bigint (forbidden - use string)');
        if (typeof value === 'number') {
            if (!Number.isFinite(value)) throw new Error(`Value has non-finite number ${value} (forbidden)`);
            return Object.is(value, -0) ? 0 : value;
        }
        return value;
    }

    if (Array.isArray(value)) {
        return value.map((item) => (item === undefined ? null : sortKeys(item)));
    }

    if (value instanceof Uint8Array) {
        return value;
    }

    if (value instanceof Date) {
        return value.toISOString();
    }

    const sorted: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        if (val === undefined) continue;
        sorted[key] = sortKeys(val);
    }
    return sorted;
}

/**
 * Canonical JSON text: sorted keys, no whitespace.
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}
