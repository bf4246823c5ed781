import * as path from 'node:path';
import { loadLayoutFile, saveLayoutFile, writeBackupFile } from '../io/layout-io.js';
import { CommandHistory } from '../commands/command.js';
import { LayoutCommand } from '../commands/layout-command.js';
import { LayoutClass } from './layout.js';
import * as errors from '../errors.js';

export interface SaveOptions {
    /** Write here instead of over the opened file. */
    output?: string;
}

export interface SaveResult {
    path: string;
    backupPath: string | null;
}

/**
 * In-memory editing session singleton.
 * Holds the loaded layout, its file path and the undo/redo history.
 * Not persisted to disk; exists only for the duration of the server session.
 */
export class WorkspaceClass {
    private static _instance: WorkspaceClass | null = null;

    /** The loaded layout, or null if none is open. */
    public layout: LayoutClass | null = null;

    /** Absolute path the layout was opened from. */
    public layoutPath: string | null = null;

    /** Labels of edits applied since the last save, oldest first. */
    private _pendingEdits: string[] = [];

    /** Command history for undo/redo. */
    private _history = new CommandHistory();

    private constructor() {
        // Singleton; use WorkspaceClass.instance()
    }

    /**
     * Returns the singleton WorkspaceClass instance.
     */
    static instance(): WorkspaceClass {
        if (WorkspaceClass._instance === null) {
            WorkspaceClass._instance = new WorkspaceClass();
        }
        return WorkspaceClass._instance;
    }

    /**
     * Resets the singleton for testing. Clears all state.
     */
    static reset(): void {
        WorkspaceClass._instance = null;
    }

    // ------------------------------------------------------------------------
    // Layout Lifecycle
    // ------------------------------------------------------------------------

    /**
     * Returns the loaded layout. Throws if none is open.
     */
    getLayout(): LayoutClass {
        if (this.layout === null) {
            throw new Error(errors.noLayoutLoaded().content[0].text);
        }
        return this.layout;
    }

    /**
     * Loads a layout file, replacing whatever was open. History is cleared.
     */
    async open(filePath: string): Promise<LayoutClass> {
        const resolved = path.resolve(filePath);
        const file = await loadLayoutFile(resolved);
        this.layout = new LayoutClass(file.root, file.trailingNewline);
        this.layoutPath = resolved;
        this._pendingEdits = [];
        this._history.clear();
        return this.layout;
    }

    /**
     * Drops the loaded layout.
     * Returns whether it had unsaved changes (for warning the caller).
     */
    close(): { hadUnsavedChanges: boolean } {
        const layout = this.getLayout();
        const hadUnsavedChanges = layout.isDirty;
        this.layout = null;
        this.layoutPath = null;
        this._pendingEdits = [];
        this._history.clear();
        return { hadUnsavedChanges };
    }

    // ------------------------------------------------------------------------
    // Editing
    // ------------------------------------------------------------------------

    /**
     * Runs an edit against the loaded layout through the undo history and
     * returns its change record. If the edit throws, nothing is recorded.
     */
    applyEdit<R>(label: string, edit: (layout: LayoutClass) => R): R {
        const cmd = new LayoutCommand(this.getLayout(), label, edit);
        this._history.push(cmd);
        this._pendingEdits.push(label);
        return cmd.result;
    }

    /**
     * Runs an edit against a copy of the loaded layout. The workspace is
     * left untouched.
     */
    previewEdit<R>(edit: (layout: LayoutClass) => R): R {
        return edit(this.getLayout().clone());
    }

    /**
     * Undoes the last edit. Returns its label.
     */
    undo(): string {
        this.getLayout();
        return this._history.undo().label;
    }

    /**
     * Redoes the last undone edit. Returns its label.
     */
    redo(): string {
        this.getLayout();
        return this._history.redo().label;
    }

    /** Returns the current undo stack depth. */
    get undoDepth(): number {
        return this._history.undoDepth;
    }

    /** Returns the current redo stack depth. */
    get redoDepth(): number {
        return this._history.redoDepth;
    }

    // ------------------------------------------------------------------------
    // Persistence
    // ------------------------------------------------------------------------

    /**
     * Serializes the layout and writes it to disk, then clears the dirty flag.
     * When overwriting the opened file, the file as it is on disk is always
     * copied aside first; the copy is written before the layout is.
     */
    async save(options: SaveOptions = {}): Promise<SaveResult> {
        const layout = this.getLayout();
        const sourcePath = this.layoutPath ?? '';
        const target = options.output !== undefined ? path.resolve(options.output) : sourcePath;

        let backupPath: string | null = null;
        if (target === sourcePath) {
            const tag = this._pendingEdits[0] ?? 'save';
            try {
                backupPath = await writeBackupFile(sourcePath, tag);
            } catch (e: unknown) {
                throw new Error(errors.cannotWritePath(sourcePath).content[0].text, { cause: e });
            }
        }

        try {
            await saveLayoutFile(target, layout.toJSON(), layout.trailingNewline);
        } catch (e: unknown) {
            throw new Error(errors.cannotWritePath(target).content[0].text, { cause: e });
        }

        layout.isDirty = false;
        this._pendingEdits = [];
        return { path: target, backupPath };
    }

    // ------------------------------------------------------------------------
    // Session Info
    // ------------------------------------------------------------------------

    /**
     * Returns a summary of the current workspace state.
     * Matches the expected shape for the `layout info` MCP tool action.
     */
    info() {
        return {
            path: this.layoutPath,
            layout: this.layout ? this.layout.info() : null,
            pendingEdits: [...this._pendingEdits],
            history: this._history.labels,
            undoDepth: this.undoDepth,
            redoDepth: this.redoDepth,
        };
    }
}

/**
 * Module-level accessor for the workspace singleton.
 * Tool handlers import this function to get the workspace.
 */
export function getWorkspace(): WorkspaceClass {
    return WorkspaceClass.instance();
}
