import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getWorkspace } from '../classes/workspace.js';
import { type LayoutClass } from '../classes/layout.js';
import { REFERENCE_VERBS } from '../algorithms/reference-rewrite.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `edit` tool.
 *
 * Every action accepts `dry_run`: the edit runs against a copy and the
 * change record is returned without touching the loaded layout.
 */
const editInputSchema = {
    action: z
        .enum([
            'delete_action_set',
            'duplicate_layer',
            'rename',
            'add_companion_action',
            'to_titles',
            'to_ids',
            'remap_ids',
            'shift_layer_ids',
        ])
        .describe('Structural edit to apply to the loaded layout'),
    slot_key: z
        .string()
        .optional()
        .describe('For delete_action_set, duplicate_layer, rename: the action set or layer slot key'),
    title: z.string().optional().describe('For rename: new title. For duplicate_layer: title of the copy'),
    group_policy: z
        .enum(['unconditional', 'preserve_shared'])
        .optional()
        .describe('For delete_action_set: whether groups still bound by a surviving preset are kept (default unconditional)'),
    source_ref: z.string().optional().describe('For add_companion_action: runtime ID or {{Title}} the existing bindings reference'),
    companion_ref: z.string().optional().describe('For add_companion_action: runtime ID or {{Title}} to add alongside it'),
    verbs: z
        .array(z.enum(REFERENCE_VERBS))
        .optional()
        .describe('For add_companion_action and remap_ids: which command verbs to touch'),
    mapping: z
        .record(z.string(), z.number().int().positive())
        .optional()
        .describe('For remap_ids: old runtime ID -> new runtime ID, e.g. {"12": 11}'),
    amount: z.number().int().optional().describe('For shift_layer_ids: how far to shift _layer references down'),
    dry_run: z.boolean().optional().describe('Report the change without applying it'),
};

const editInput = z.object(editInputSchema);

export type EditToolArgs = z.infer<typeof editInput>;

/**
 * Registers the `edit` tool on the MCP server.
 */
export function registerEditTool(server: McpServer): void {
    server.registerTool(
        'edit',
        {
            title: 'Edit',
            description:
                'Reference-consistent edits on the loaded layout. Actions: delete_action_set, duplicate_layer, rename, add_companion_action, to_titles, to_ids, remap_ids, shift_layer_ids. Set dry_run to preview.',
            inputSchema: editInputSchema,
        },
        async (args) => handleEditTool(args),
    );
}

/**
 * Dispatches one `edit` tool call.
 */
export async function handleEditTool(args: EditToolArgs): Promise<errors.ToolResponse> {
    const workspace = getWorkspace();
    if (!workspace.layout) {
        return errors.noLayoutLoaded();
    }

    const dryRun = args.dry_run ?? false;

    switch (args.action) {
        case 'delete_action_set': {
            const slotKey = args.slot_key;
            if (!slotKey) {
                return errors.invalidArgument('delete_action_set requires "slot_key".');
            }
            const policy = args.group_policy ?? 'unconditional';
            return run(`delete_${slotKey}`, dryRun, (layout) => layout.deleteActionSet(slotKey, policy));
        }
        case 'duplicate_layer': {
            const slotKey = args.slot_key;
            if (!slotKey) {
                return errors.invalidArgument('duplicate_layer requires "slot_key".');
            }
            const title = args.title;
            return run(`duplicate_${slotKey}`, dryRun, (layout) => layout.duplicateLayer(slotKey, title));
        }
        case 'rename': {
            const slotKey = args.slot_key;
            const title = args.title;
            if (!slotKey || title === undefined) {
                return errors.invalidArgument('rename requires "slot_key" and "title".');
            }
            if (title.trim() === '') {
                return errors.invalidArgument('title must not be empty.');
            }
            return run(`rename_${slotKey}`, dryRun, (layout) => layout.rename(slotKey, title));
        }
        case 'add_companion_action': {
            const sourceRef = args.source_ref;
            const companionRef = args.companion_ref;
            if (!sourceRef || !companionRef) {
                return errors.invalidArgument('add_companion_action requires "source_ref" and "companion_ref".');
            }
            const verbs = args.verbs ?? ['remove_layer'];
            return run('add_companion_action', dryRun, (layout) => layout.addCompanionAction(sourceRef, companionRef, verbs));
        }
        case 'to_titles':
            return run('to_titles', dryRun, (layout) => layout.convertToTitles());
        case 'to_ids':
            return run('to_ids', dryRun, (layout) => layout.convertToIds());
        case 'remap_ids': {
            if (args.mapping === undefined || Object.keys(args.mapping).length === 0) {
                return errors.invalidArgument('remap_ids requires a non-empty "mapping".');
            }
            const remap = new Map<number, number>();
            for (const [oldId, newId] of Object.entries(args.mapping)) {
                if (!/^[1-9]\d*$/.test(oldId)) {
                    return errors.invalidArgument(`mapping key '${oldId}' is not a runtime ID.`);
                }
                remap.set(Number(oldId), newId);
            }
            const verbs = args.verbs;
            return run('remap_ids', dryRun, (layout) => layout.remapIds(remap, verbs));
        }
        case 'shift_layer_ids': {
            const amount = args.amount;
            if (amount === undefined) {
                return errors.invalidArgument('shift_layer_ids requires "amount".');
            }
            return run('shift_layer_ids', dryRun, (layout) => layout.shiftLayerIds(amount));
        }
        default:
            return errors.invalidArgument(`Unknown edit action: ${String(args.action)}`);
    }
}

/**
 * Applies (or previews) an edit and wraps its change record. Errors thrown by
 * the layout come back as domain errors and leave the history untouched.
 */
function run<R>(label: string, dryRun: boolean, edit: (layout: LayoutClass) => R): errors.ToolResponse {
    const workspace = getWorkspace();
    try {
        if (dryRun) {
            const report = workspace.previewEdit(edit);
            return errors.jsonResponse({ dry_run: true, label, report });
        }
        const report = workspace.applyEdit(label, edit);
        return errors.jsonResponse({ dry_run: false, label, report, undoDepth: workspace.undoDepth });
    } catch (e: unknown) {
        return errors.domainError(errors.messageOf(e));
    }
}
