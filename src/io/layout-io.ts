import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { type JsonObject, type JsonValue, getObject, isJsonObject } from '../types/json.js';
import { parseJsonTree, serializeJsonTree } from './json-tree.js';
import * as errors from '../errors.js';

/** A layout file as read from disk. */
export interface LayoutFile {
    root: JsonObject;
    /** Whether the text ended with a newline, restored on save. */
    trailingNewline: boolean;
}

/**
 * Validates that a tree is structurally a layout: an object root holding a
 * `controller_mappings` object. Everything below is looked up best-effort.
 */
function validateLayoutStructure(data: JsonValue): data is JsonObject {
    if (!isJsonObject(data)) return false;
    return getObject(data, 'controller_mappings') !== undefined;
}

/**
 * Loads a layout from a JSON file, keeping key order.
 *
 * @param filePath - Absolute path to the layout JSON file
 */
export async function loadLayoutFile(filePath: string): Promise<LayoutFile> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new Error(errors.layoutFileNotFound(filePath).content[0].text);
        }
        throw error;
    }

    let parsed: JsonValue;
    try {
        parsed = parseJsonTree(text);
    } catch (e: unknown) {
        throw new Error(errors.invalidLayoutFile(filePath, `Invalid JSON: ${errors.messageOf(e)}`).content[0].text);
    }

    if (!validateLayoutStructure(parsed)) {
        throw new Error(errors.invalidLayoutFile(filePath, "Expected 'controller_mappings' at root level.").content[0].text);
    }

    return { root: parsed, trailingNewline: text.endsWith('\n') };
}

/**
 * Serializes a layout tree and writes it to disk.
 */
export async function saveLayoutFile(filePath: string, root: JsonObject, trailingNewline = false): Promise<void> {
    const text = serializeJsonTree(root) + (trailingNewline ? '\n' : '');
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, text, 'utf8');
}

/**
 * Path of the backup written before overwriting `filePath`:
 * `<stem>_backup_before_<tag><ext>` next to the original.
 */
export function backupPathFor(filePath: string, tag: string): string {
    const ext = path.extname(filePath);
    const stem = path.basename(filePath, ext);
    const safeTag = tag.replace(/[^A-Za-z0-9_-]+/g, '_');
    return path.join(path.dirname(filePath), `${stem}_backup_before_${safeTag}${ext}`);
}

/**
 * Copies the file currently on disk to its backup path, byte for byte.
 *
 * @returns The backup path
 */
export async function writeBackupFile(filePath: string, tag: string): Promise<string> {
    const backupPath = backupPathFor(filePath, tag);
    await fs.copyFile(filePath, backupPath);
    return backupPath;
}
