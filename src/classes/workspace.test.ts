import { describe, it, expect, beforeEach, vi } from 'vitest';
import { WorkspaceClass, getWorkspace } from './workspace.js';
import { type JsonObject, type JsonValue, fromPlain } from '../types/json.js';
import { loadLayoutFile, saveLayoutFile, writeBackupFile } from '../io/layout-io.js';

vi.mock('../io/layout-io.js', () => ({
  loadLayoutFile: vi.fn(),
  saveLayoutFile: vi.fn(),
  writeBackupFile: vi.fn(),
}));

/** Minimal layout: two action sets, one layer under the second. */
function makeTestRoot(): JsonObject {
  return new Map<string, JsonValue>([
    [
      'controller_mappings',
      fromPlain({
        title: 'Mock Layout',
        actions: { P1: { title: 'Menu' }, P2: { title: 'Game' } },
        action_layers: { P3: { title: 'Aim', parent_set_name: 'P2' } },
        group: [],
        preset: [
          { id: '0', name: 'P1', group_source_bindings: {} },
          { id: '1', name: 'P2', group_source_bindings: {} },
          { id: '2', name: 'P3', group_source_bindings: {} },
        ],
      }),
    ],
  ]);
}

describe('WorkspaceClass', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    WorkspaceClass.reset();
    vi.mocked(loadLayoutFile).mockImplementation(async () => ({ root: makeTestRoot(), trailingNewline: true }));
    vi.mocked(saveLayoutFile).mockResolvedValue(undefined);
    vi.mocked(writeBackupFile).mockImplementation(async (filePath: string, tag: string) =>
      filePath.replace('.json', `_backup_before_${tag}.json`),
    );
  });

  it('returns the same singleton instance', () => {
    const a = WorkspaceClass.instance();
    const b = WorkspaceClass.instance();
    expect(a).toBe(b);
  });

  it('getWorkspace() returns the singleton', () => {
    const ws = getWorkspace();
    expect(ws).toBe(WorkspaceClass.instance());
  });

  it('reset clears the singleton', () => {
    const a = WorkspaceClass.instance();
    WorkspaceClass.reset();
    const b = WorkspaceClass.instance();
    expect(a).not.toBe(b);
  });

  it('throws when no layout is open', () => {
    const ws = WorkspaceClass.instance();
    expect(() => ws.getLayout()).toThrow('No layout loaded. Call layout open first.');
    expect(() => ws.applyEdit('x', (l) => l.info())).toThrow('No layout loaded');
  });

  it('opens a layout from disk', async () => {
    const ws = WorkspaceClass.instance();
    const layout = await ws.open('/mock/layout.json');

    expect(loadLayoutFile).toHaveBeenCalledWith('/mock/layout.json');
    expect(ws.layoutPath).toBe('/mock/layout.json');
    expect(layout.title).toBe('Mock Layout');
    expect(layout.trailingNewline).toBe(true);
    expect(ws.getLayout()).toBe(layout);
  });

  it('applyEdit records the edit for undo and redo', async () => {
    const ws = WorkspaceClass.instance();
    await ws.open('/mock/layout.json');

    const report = ws.applyEdit('delete_P1', (l) => l.deleteActionSet('P1'));
    expect(report.runtime_id_remap).toEqual({ '2': 1, '3': 2 });
    expect(ws.undoDepth).toBe(1);
    expect(ws.getLayout().actionKeys()).toEqual(['P2']);

    expect(ws.undo()).toBe('delete_P1');
    expect(ws.getLayout().actionKeys()).toEqual(['P1', 'P2']);
    expect(ws.redoDepth).toBe(1);

    expect(ws.redo()).toBe('delete_P1');
    expect(ws.getLayout().actionKeys()).toEqual(['P2']);
  });

  it('records nothing when the edit throws', async () => {
    const ws = WorkspaceClass.instance();
    await ws.open('/mock/layout.json');

    expect(() => ws.applyEdit('delete_Nope', (l) => l.deleteActionSet('Nope'))).toThrow("'Nope' not found");
    expect(ws.undoDepth).toBe(0);
    expect(ws.info().pendingEdits).toEqual([]);
  });

  it('previewEdit leaves the layout untouched', async () => {
    const ws = WorkspaceClass.instance();
    await ws.open('/mock/layout.json');

    const report = ws.previewEdit((l) => l.deleteActionSet('P2'));
    expect(report.layers_deleted).toEqual([{ slot_key: 'P3', title: 'Aim', runtime_id: 3 }]);
    expect(ws.getLayout().layerKeys()).toEqual(['P3']);
    expect(ws.getLayout().isDirty).toBe(false);
    expect(ws.undoDepth).toBe(0);
  });

  it('save backs up the opened file under the first pending edit', async () => {
    const ws = WorkspaceClass.instance();
    await ws.open('/mock/layout.json');
    ws.applyEdit('delete_P1', (l) => l.deleteActionSet('P1'));
    ws.applyEdit('to_titles', (l) => l.convertToTitles());

    const result = await ws.save();
    expect(writeBackupFile).toHaveBeenCalledWith('/mock/layout.json', 'delete_P1');
    expect(saveLayoutFile).toHaveBeenCalledWith('/mock/layout.json', expect.any(Map), true);
    expect(result).toEqual({
      path: '/mock/layout.json',
      backupPath: '/mock/layout_backup_before_delete_P1.json',
    });
    expect(ws.getLayout().isDirty).toBe(false);
    expect(ws.info().pendingEdits).toEqual([]);
  });

  it('save tags the backup "save" when nothing is pending', async () => {
    const ws = WorkspaceClass.instance();
    await ws.open('/mock/layout.json');
    await ws.save();
    expect(writeBackupFile).toHaveBeenCalledWith('/mock/layout.json', 'save');
  });

  it('save to another path writes no backup', async () => {
    const ws = WorkspaceClass.instance();
    await ws.open('/mock/layout.json');

    const result = await ws.save({ output: '/out/copy.json' });
    expect(writeBackupFile).not.toHaveBeenCalled();
    expect(saveLayoutFile).toHaveBeenCalledWith('/out/copy.json', expect.any(Map), true);
    expect(result).toEqual({ path: '/out/copy.json', backupPath: null });
  });

  it('every save over the opened file writes a backup first', async () => {
    const ws = WorkspaceClass.instance();
    await ws.open('/mock/layout.json');
    ws.applyEdit('rename_P1', (l) => l.rename('P1', 'Pause'));

    await ws.save();
    await ws.save();
    expect(vi.mocked(writeBackupFile).mock.calls).toEqual([
      ['/mock/layout.json', 'rename_P1'],
      ['/mock/layout.json', 'save'],
    ]);
    expect(saveLayoutFile).toHaveBeenCalledTimes(2);
  });

  it('save reports write failures', async () => {
    const ws = WorkspaceClass.instance();
    await ws.open('/mock/layout.json');
    vi.mocked(saveLayoutFile).mockRejectedValue(new Error('EACCES'));

    await expect(ws.save()).rejects.toThrow('Cannot write to path: /mock/layout.json');
  });

  it('save does not write the layout when the backup fails', async () => {
    const ws = WorkspaceClass.instance();
    await ws.open('/mock/layout.json');
    vi.mocked(writeBackupFile).mockRejectedValue(new Error('ENOSPC'));

    await expect(ws.save()).rejects.toThrow('Cannot write to path: /mock/layout.json');
    expect(saveLayoutFile).not.toHaveBeenCalled();
  });

  it('close reports unsaved changes and clears state', async () => {
    const ws = WorkspaceClass.instance();
    await ws.open('/mock/layout.json');
    ws.applyEdit('rename_P1', (l) => l.rename('P1', 'Pause'));

    expect(ws.close()).toEqual({ hadUnsavedChanges: true });
    expect(ws.layout).toBeNull();
    expect(ws.layoutPath).toBeNull();
    expect(ws.undoDepth).toBe(0);
  });

  it('opening again clears the history', async () => {
    const ws = WorkspaceClass.instance();
    await ws.open('/mock/layout.json');
    ws.applyEdit('delete_P1', (l) => l.deleteActionSet('P1'));

    await ws.open('/mock/layout.json');
    expect(ws.undoDepth).toBe(0);
    expect(ws.getLayout().actionKeys()).toEqual(['P1', 'P2']);
  });

  it('info summarizes the session', async () => {
    const ws = WorkspaceClass.instance();
    expect(ws.info()).toEqual({
      path: null,
      layout: null,
      pendingEdits: [],
      history: [],
      undoDepth: 0,
      redoDepth: 0,
    });

    await ws.open('/mock/layout.json');
    ws.applyEdit('shift_layer_ids', (l) => l.shiftLayerIds(1));
    expect(ws.info()).toEqual({
      path: '/mock/layout.json',
      layout: {
        title: 'Mock Layout',
        action_sets: 2,
        action_layers: 1,
        presets: 3,
        groups: 0,
        isDirty: false,
      },
      pendingEdits: ['shift_layer_ids'],
      history: ['shift_layer_ids'],
      undoDepth: 1,
      redoDepth: 0,
    });
  });
});
