import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { WorkspaceClass } from '../classes/workspace.js';
import { handleLayoutTool } from './layout.js';
import { handleEditTool } from './edit.js';
import { type ToolResponse } from '../errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES = path.join(__dirname, '..', 'io', '__fixtures__');

function payload(res: ToolResponse): Record<string, unknown> {
  const parsed: Record<string, unknown> = JSON.parse(res.content[0].text);
  return parsed;
}

describe('layout editing end to end', () => {
  let tempDir: string;
  let layoutPath: string;
  let original: string;

  beforeEach(async () => {
    WorkspaceClass.reset();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'layout-e2e-'));
    layoutPath = path.join(tempDir, 'controller.json');
    original = await fs.readFile(path.join(FIXTURES, 'sample-layout.json'), 'utf8');
    await fs.writeFile(layoutPath, original, 'utf8');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('open → delete → save rewrites the file and keeps a backup', async () => {
    await handleLayoutTool({ action: 'open', path: layoutPath });

    const deleted = await handleEditTool({ action: 'delete_action_set', slot_key: 'Preset_1000001' });
    expect(payload(deleted).report).toEqual({
      target: { slot_key: 'Preset_1000001', title: 'Menu', runtime_id: 2, type: 'action_set' },
      layers_deleted: [{ slot_key: 'Preset_1000003', title: 'Map', runtime_id: 4 }],
      presets_deleted: ['Preset_1000001', 'Preset_1000003'],
      groups_deleted: ['10', '11'],
      groups_kept_shared: [],
      missing_groups: [],
      group_bindings_removed: 0,
      presets_renumbered: 1,
      runtime_id_remap: { '3': 2 },
      references_updated: 2,
    });

    const saved = await handleLayoutTool({ action: 'save' });
    const backupPath = path.join(tempDir, 'controller_backup_before_delete_Preset_1000001.json');
    expect(payload(saved)).toEqual({ message: 'Layout saved.', path: layoutPath, backup: backupPath });

    const expected = await fs.readFile(path.join(FIXTURES, 'sample-layout-without-menu.json'), 'utf8');
    expect(await fs.readFile(layoutPath, 'utf8')).toBe(expected);
    expect(await fs.readFile(backupPath, 'utf8')).toBe(original);
  });

  it('a dry run writes nothing', async () => {
    await handleLayoutTool({ action: 'open', path: layoutPath });
    await handleEditTool({ action: 'delete_action_set', slot_key: 'Preset_1000001', dry_run: true });
    await handleLayoutTool({ action: 'save' });

    expect(await fs.readFile(layoutPath, 'utf8')).toBe(original);
    expect((await fs.readdir(tempDir)).sort()).toEqual(['controller.json', 'controller_backup_before_save.json']);
  });

  it('converting to titles and back leaves the file unchanged', async () => {
    await handleLayoutTool({ action: 'open', path: layoutPath });
    await handleEditTool({ action: 'to_titles' });
    await handleEditTool({ action: 'to_ids' });

    const output = path.join(tempDir, 'roundtrip.json');
    await handleLayoutTool({ action: 'save', output });
    expect(await fs.readFile(output, 'utf8')).toBe(original);
  });

  it('undo before save restores the original text', async () => {
    await handleLayoutTool({ action: 'open', path: layoutPath });
    await handleEditTool({ action: 'delete_action_set', slot_key: 'Default' });
    await handleLayoutTool({ action: 'undo' });

    const output = path.join(tempDir, 'undone.json');
    await handleLayoutTool({ action: 'save', output });
    expect(await fs.readFile(output, 'utf8')).toBe(original);
  });

  it('opening a missing file reports it', async () => {
    const missing = path.join(tempDir, 'nope.json');
    const result = await handleLayoutTool({ action: 'open', path: missing });
    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe(`Layout file not found: ${missing}`);
  });
});
