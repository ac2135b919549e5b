// src/publish/stable_stringify.ts

/**
 * Canonical JSON: object keys sorted (UTF-16 code unit order), no whitespace.
 * bigint is written as a bare integer so nanosecond timestamps survive exactly.
 * Keys whose value is undefined are omitted, as JSON.stringify does.
 */
export function stableStringify(value: unknown): string {
    if (value === null) return "null";

    switch (typeof value) {
        case "number":
            if (!Number.isFinite(value)) throw new Error("UNSUPPORTED_JSON_NUMBER");
            return JSON.stringify(value);
        case "boolean":
        case "string":
            return JSON.stringify(value);
        case "bigint":
            return value.toString();
        case "object":
            break;
        default:
            // undefined, function, symbol
            throw new Error("UNSUPPORTED_JSON_TYPE");
    }

    if (Array.isArray(value)) {
        return "[" + value.map((v: unknown) => (v === undefined ? "null" : stableStringify(v))).join(",") + "]";
    }

    const record = value as Record<string, unknown>;
    const keys = Object.keys(record)
        .filter((k) => record[k] !== undefined)
        .sort();
    return "{" + keys.map((k) => JSON.stringify(k) + ":" + stableStringify(record[k])).join(",") + "}";
}
