import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getWorkspace } from '../classes/workspace.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `layout` tool.
 *
 * Uses a flat shape with an `action` enum discriminator.
 * - `open`: path required
 * - `references`: slot_key required
 * - `save`: optional output; overwriting the opened file always writes a backup first
 * - `info`, `list`, `close`, `undo`, `redo`: no additional args
 */
const layoutInputSchema = {
    action: z
        .enum(['open', 'info', 'list', 'references', 'save', 'close', 'undo', 'redo'])
        .describe(
            'Action to perform: open (load a layout JSON file), info (session state), list (action sets and layers with runtime IDs), references (bindings that reference a slot key), save, close, undo, redo',
        ),
    path: z.string().optional().describe('For open: path to the layout JSON file'),
    slot_key: z.string().optional().describe('For references: action set or layer slot key, e.g. "Preset_1000006"'),
    output: z
        .string()
        .optional()
        .describe(
            'For save: write to this path instead of over the opened file. Saving over the opened file always copies it to <name>_backup_before_<edit>.json first',
        ),
};

const layoutInput = z.object(layoutInputSchema);

export type LayoutToolArgs = z.infer<typeof layoutInput>;

/**
 * Registers the `layout` tool on the MCP server.
 */
export function registerLayoutTool(server: McpServer): void {
    server.registerTool(
        'layout',
        {
            title: 'Layout',
            description:
                'Open, inspect and save a controller layout file. Actions: open, info, list, references, save, close, undo, redo.',
            inputSchema: layoutInputSchema,
        },
        async (args) => handleLayoutTool(args),
    );
}

/**
 * Dispatches one `layout` tool call.
 */
export async function handleLayoutTool(args: LayoutToolArgs): Promise<errors.ToolResponse> {
    const workspace = getWorkspace();

    switch (args.action) {
        case 'open':
            return handleOpen(workspace, args.path);
        case 'info':
            return errors.jsonResponse(workspace.info());
        case 'list':
            return handleList(workspace);
        case 'references':
            return handleReferences(workspace, args.slot_key);
        case 'save':
            return handleSave(workspace, args.output);
        case 'close':
            return handleClose(workspace);
        case 'undo':
            return handleUndo(workspace);
        case 'redo':
            return handleRedo(workspace);
        default:
            return errors.invalidArgument(`Unknown layout action: ${String(args.action)}`);
    }
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

type Workspace = ReturnType<typeof getWorkspace>;

async function handleOpen(workspace: Workspace, filePath: string | undefined) {
    if (!filePath) {
        return errors.invalidArgument('layout open requires a "path" to the layout JSON file.');
    }

    try {
        const layout = await workspace.open(filePath);
        return errors.jsonResponse({
            message: 'Layout opened.',
            path: workspace.layoutPath,
            ...layout.info(),
        });
    } catch (e: unknown) {
        return errors.domainError(errors.messageOf(e));
    }
}

function handleList(workspace: Workspace) {
    if (!workspace.layout) {
        return errors.noLayoutLoaded();
    }
    return errors.jsonResponse({ entries: workspace.layout.entries() });
}

function handleReferences(workspace: Workspace, slotKey: string | undefined) {
    if (!workspace.layout) {
        return errors.noLayoutLoaded();
    }
    if (!slotKey) {
        return errors.invalidArgument('layout references requires "slot_key".');
    }
    try {
        const references = workspace.layout.findReferences(slotKey);
        return errors.jsonResponse({ slot_key: slotKey, count: references.length, references });
    } catch (e: unknown) {
        return errors.domainError(errors.messageOf(e));
    }
}

async function handleSave(workspace: Workspace, output: string | undefined) {
    if (!workspace.layout) {
        return errors.noLayoutLoaded();
    }
    try {
        const result = await workspace.save({ output });
        return errors.jsonResponse({
            message: 'Layout saved.',
            path: result.path,
            backup: result.backupPath,
        });
    } catch (e: unknown) {
        return errors.domainError(errors.messageOf(e));
    }
}

function handleClose(workspace: Workspace) {
    if (!workspace.layout) {
        return errors.noLayoutLoaded();
    }
    const result = workspace.close();
    return errors.jsonResponse({ message: 'Layout closed.', hadUnsavedChanges: result.hadUnsavedChanges });
}

function handleUndo(workspace: Workspace) {
    if (!workspace.layout) {
        return errors.noLayoutLoaded();
    }
    if (workspace.undoDepth === 0) {
        return errors.nothingToUndo();
    }
    const label = workspace.undo();
    return errors.jsonResponse({ message: `Undid ${label}.`, undoDepth: workspace.undoDepth, redoDepth: workspace.redoDepth });
}

function handleRedo(workspace: Workspace) {
    if (!workspace.layout) {
        return errors.noLayoutLoaded();
    }
    if (workspace.redoDepth === 0) {
        return errors.nothingToRedo();
    }
    const label = workspace.redo();
    return errors.jsonResponse({ message: `Redid ${label}.`, undoDepth: workspace.undoDepth, redoDepth: workspace.redoDepth });
}
