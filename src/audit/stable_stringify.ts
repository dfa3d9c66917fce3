// src/audit/stable_stringify.ts

/**
 * Canonical JSON: object keys sorted, `undefined` members omitted.
 * Two structurally equal records always serialize to the same line.
 */
export function stableStringify(value: unknown): string {
    if (value === null) return "null";

    if (typeof value === "number") {
        if (!Number.isFinite(value)) throw new Error("UNSUPPORTED_JSON_NUMBER");
        return JSON.stringify(value);
    }
    if (typeof value === "boolean" || typeof value === "string") return JSON.stringify(value);

    if (Array.isArray(value)) {
        return "[" + value.map((v: unknown) => stableStringify(v)).join(",") + "]";
    }

    if (typeof value === "object") {
        const entries: Array<[string, unknown]> = Object.entries(value);
        const kept = entries
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)); // UTF-16 order like JS sort()
        return "{" + kept.map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v)).join(",") + "}";
    }

    // undefined, function, symbol, bigint
    throw new Error("UNSUPPORTED_JSON_TYPE");
}
