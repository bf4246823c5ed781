import { parseTree, printParseErrorCode, type Node, type ParseError } from 'jsonc-parser';
import { type JsonObject, type JsonValue, JsonNumber, isJsonArray, isJsonObject } from '../types/json.js';

/**
 * Parses JSON text into an ordered tree. Unlike JSON.parse, object key
 * order is exactly the order in the text. Later duplicate keys win.
 * Numbers are read as {@link JsonNumber} and keep their spelling.
 *
 * @throws On any syntax error, with the first error's code and offset.
 */
export function parseJsonTree(text: string): JsonValue {
    const parseErrors: ParseError[] = [];
    const root = parseTree(text, parseErrors, { disallowComments: true, allowTrailingComma: false });

    if (parseErrors.length > 0) {
        const first = parseErrors[0];
        throw new Error(`${printParseErrorCode(first.error)} at offset ${String(first.offset)}`);
    }
    if (root === undefined) {
        throw new Error('Empty document');
    }
    return fromNode(root, text);
}

function fromNode(node: Node, text: string): JsonValue {
    switch (node.type) {
        case 'object': {
            const obj: JsonObject = new Map();
            for (const property of node.children ?? []) {
                const [keyNode, valueNode] = property.children ?? [];
                if (keyNode === undefined || valueNode === undefined) continue;
                obj.set(String(keyNode.value), fromNode(valueNode, text));
            }
            return obj;
        }
        case 'array':
            return (node.children ?? []).map((child) => fromNode(child, text));
        case 'string':
            return typeof node.value === 'string' ? node.value : String(node.value);
        case 'number':
            return new JsonNumber(text.slice(node.offset, node.offset + node.length));
        case 'boolean':
            return node.value === true;
        case 'null':
            return null;
        default:
            throw new Error(`Unexpected JSON node type: ${node.type}`);
    }
}

/**
 * Serializes a tree with tab indentation, one level per nesting depth,
 * `"key": value` pairs, and `{}` / `[]` for empty containers.
 * Non-ASCII characters are written as they are. Parsed numbers keep their
 * source text.
 */
export function serializeJsonTree(value: JsonValue, depth = 0): string {
    if (isJsonObject(value)) {
        if (value.size === 0) return '{}';
        const inner = '\t'.repeat(depth + 1);
        const lines: string[] = [];
        for (const [key, child] of value) {
            lines.push(`${inner}${JSON.stringify(key)}: ${serializeJsonTree(child, depth + 1)}`);
        }
        return `{\n${lines.join(',\n')}\n${'\t'.repeat(depth)}}`;
    }
    if (isJsonArray(value)) {
        if (value.length === 0) return '[]';
        const inner = '\t'.repeat(depth + 1);
        const lines = value.map((child) => `${inner}${serializeJsonTree(child, depth + 1)}`);
        return `[\n${lines.join(',\n')}\n${'\t'.repeat(depth)}]`;
    }
    if (value instanceof JsonNumber) {
        return value.text;
    }
    return JSON.stringify(value);
}
