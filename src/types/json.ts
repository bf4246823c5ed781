/**
 * Core types for the ordered JSON tree that backs a loaded layout.
 *
 * Objects are Maps rather than plain records: a plain object moves
 * integer-like keys (group ids such as "10", "126") ahead of the others,
 * and layout files must keep their key order byte-stable across a rewrite.
 */

/**
 * A number read from a document, kept as its source text so that `1.0`,
 * `1e5` and integers beyond 2^53 are written back exactly as they were.
 */
export class JsonNumber {
    constructor(readonly text: string) {}

    get value(): number {
        return Number(this.text);
    }

    toJSON(): number {
        return this.value;
    }
}

export type JsonPrimitive = string | number | JsonNumber | boolean | null;

export interface JsonObject extends Map<string, JsonValue> {}

export type JsonArray = JsonValue[];

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return value instanceof Map;
}

export function isJsonArray(value: JsonValue | undefined): value is JsonArray {
    return Array.isArray(value);
}

/** Returns the child object under `key`, or undefined if absent or not an object. */
export function getObject(obj: JsonObject, key: string): JsonObject | undefined {
    const value = obj.get(key);
    return isJsonObject(value) ? value : undefined;
}

/** Returns the child array under `key`, or undefined if absent or not an array. */
export function getArray(obj: JsonObject, key: string): JsonArray | undefined {
    const value = obj.get(key);
    return isJsonArray(value) ? value : undefined;
}

/** Returns the string under `key`, or undefined if absent or not a string. */
export function getString(obj: JsonObject, key: string): string | undefined {
    const value = obj.get(key);
    return typeof value === 'string' ? value : undefined;
}

/**
 * Deep copies a tree. Maps are rebuilt in iteration order, so the copy
 * serializes identically to the source.
 */
export function cloneJson<T extends JsonValue>(value: T): T;
export function cloneJson(value: JsonValue): JsonValue {
    if (isJsonObject(value)) {
        const copy: JsonObject = new Map();
        for (const [key, child] of value) {
            copy.set(key, cloneJson(child));
        }
        return copy;
    }
    if (isJsonArray(value)) {
        return value.map((child) => cloneJson(child));
    }
    return value;
}

/**
 * Converts a plain JavaScript value (as produced by JSON.parse or written
 * inline in code) into an ordered tree. Key order follows the object's own
 * enumeration order.
 */
export function fromPlain(value: unknown): JsonValue {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (value instanceof JsonNumber) {
        return value;
    }
    if (Array.isArray(value)) {
        return value.map((child: unknown) => fromPlain(child));
    }
    if (typeof value === 'object') {
        const obj: JsonObject = new Map();
        for (const [key, child] of Object.entries(value)) {
            obj.set(key, fromPlain(child));
        }
        return obj;
    }
    throw new Error(`Value of type ${typeof value} cannot be represented as JSON`);
}

/**
 * Converts an ordered tree back into plain JavaScript values, for tool
 * responses and test assertions. Parsed numbers become JavaScript numbers.
 */
export function toPlain(value: JsonValue): unknown {
    if (isJsonObject(value)) {
        const out: Record<string, unknown> = {};
        for (const [key, child] of value) {
            out[key] = toPlain(child);
        }
        return out;
    }
    if (isJsonArray(value)) {
        return value.map((child) => toPlain(child));
    }
    if (value instanceof JsonNumber) {
        return value.value;
    }
    return value;
}

/**
 * Visits every string leaf below `node` (object values and array items, not
 * keys) and replaces it with `rewrite(leaf)`. Containers are updated in place.
 *
 * @returns The number of leaves whose text changed.
 */
export function rewriteStrings(node: JsonValue, rewrite: (text: string, path: string[]) => string, path: string[] = []): number {
    let changed = 0;
    if (isJsonObject(node)) {
        for (const [key, child] of node) {
            if (typeof child === 'string') {
                const next = rewrite(child, [...path, key]);
                if (next !== child) {
                    node.set(key, next);
                    changed++;
                }
            } else {
                changed += rewriteStrings(child, rewrite, [...path, key]);
            }
        }
    } else if (isJsonArray(node)) {
        for (let i = 0; i < node.length; i++) {
            const child = node[i];
            if (typeof child === 'string') {
                const next = rewrite(child, [...path, String(i)]);
                if (next !== child) {
                    node[i] = next;
                    changed++;
                }
            } else {
                changed += rewriteStrings(child, rewrite, [...path, String(i)]);
            }
        }
    }
    return changed;
}

/** Calls `visit` for every string leaf below `node` with its key path. */
export function visitStrings(node: JsonValue, visit: (text: string, path: string[]) => void, path: string[] = []): void {
    if (typeof node === 'string') {
        visit(node, path);
    } else if (isJsonObject(node)) {
        for (const [key, child] of node) {
            visitStrings(child, visit, [...path, key]);
        }
    } else if (isJsonArray(node)) {
        node.forEach((child, i) => visitStrings(child, visit, [...path, String(i)]));
    }
}
