import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { fileURLToPath } from 'url';
import { backupPathFor, loadLayoutFile, saveLayoutFile, writeBackupFile } from './layout-io.js';
import { type JsonObject, getObject, getString } from '../types/json.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES = path.join(__dirname, '__fixtures__');
const SAMPLE = path.join(FIXTURES, 'sample-layout.json');

function mappingsOf(root: JsonObject): JsonObject {
    const mappings = getObject(root, 'controller_mappings');
    if (mappings === undefined) throw new Error('controller_mappings missing');
    return mappings;
}

describe('layout-io', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'layout-io-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('loads the sample fixture', async () => {
        const file = await loadLayoutFile(SAMPLE);
        expect(getString(mappingsOf(file.root), 'title')).toBe('Sample Layout');
        expect(file.trailingNewline).toBe(true);
    });

    it('keeps action keys in file order', async () => {
        const file = await loadLayoutFile(SAMPLE);
        const mappings = mappingsOf(file.root);
        expect([...(getObject(mappings, 'actions')?.keys() ?? [])]).toEqual(['Default', 'Preset_1000001']);
    });

    it('writes back byte-identical text when nothing changed', async () => {
        const file = await loadLayoutFile(SAMPLE);
        const out = path.join(tempDir, 'out.json');
        await saveLayoutFile(out, file.root, file.trailingNewline);

        const original = await fs.readFile(SAMPLE, 'utf8');
        const written = await fs.readFile(out, 'utf8');
        expect(written).toBe(original);
    });

    it('omits the trailing newline when the source had none', async () => {
        const src = path.join(tempDir, 'bare.json');
        await fs.writeFile(src, '{\n\t"controller_mappings": {}\n}', 'utf8');
        const file = await loadLayoutFile(src);
        expect(file.trailingNewline).toBe(false);

        const out = path.join(tempDir, 'nested', 'dir', 'bare.json');
        await saveLayoutFile(out, file.root, file.trailingNewline);
        expect(await fs.readFile(out, 'utf8')).toBe('{\n\t"controller_mappings": {}\n}');
    });

    it('reports a missing file', async () => {
        const missing = path.join(tempDir, 'missing.json');
        await expect(loadLayoutFile(missing)).rejects.toThrow(`Layout file not found: ${missing}`);
    });

    it('reports malformed JSON', async () => {
        const bad = path.join(tempDir, 'bad.json');
        await fs.writeFile(bad, '{"controller_mappings": ', 'utf8');
        await expect(loadLayoutFile(bad)).rejects.toThrow(`Invalid layout file: ${bad}. Invalid JSON: `);
    });

    it('reports a document without controller_mappings', async () => {
        const other = path.join(tempDir, 'other.json');
        await fs.writeFile(other, '{"mappings": {}}', 'utf8');
        await expect(loadLayoutFile(other)).rejects.toThrow(
            `Invalid layout file: ${other}. Expected 'controller_mappings' at root level.`,
        );
    });

    it('names backups after the edit', () => {
        expect(backupPathFor(path.join('data', 'layout.json'), 'delete_Preset_1000001')).toBe(
            path.join('data', 'layout_backup_before_delete_Preset_1000001.json'),
        );
    });

    it('replaces unsafe characters in the backup tag', () => {
        expect(backupPathFor(path.join('data', 'layout.vdf.json'), 'rename a/b')).toBe(
            path.join('data', 'layout.vdf_backup_before_rename_a_b.json'),
        );
    });

    it('copies the file on disk to the backup path', async () => {
        const src = path.join(tempDir, 'layout.json');
        await fs.writeFile(src, 'original bytes', 'utf8');
        const backup = await writeBackupFile(src, 'save');
        expect(backup).toBe(path.join(tempDir, 'layout_backup_before_save.json'));
        expect(await fs.readFile(backup, 'utf8')).toBe('original bytes');
    });
});
