import {
    type JsonArray,
    type JsonObject,
    type JsonValue,
    cloneJson,
    getArray,
    getObject,
    getString,
    isJsonArray,
    isJsonObject,
    rewriteStrings,
    visitStrings,
} from '../types/json.js';
import {
    type CompanionReport,
    type ConversionReport,
    type DeletedEntry,
    type DeletionReport,
    type DuplicationReport,
    type GroupPolicy,
    type ReferenceHit,
    type RemapReport,
    type RenameReport,
    type RuntimeIdEntry,
    type ShiftReport,
} from '../types/layout.js';
import { computeRuntimeIds, deriveRemap, remapToRecord } from '../algorithms/runtime-ids.js';
import {
    LAYER_VERBS,
    companionBinding,
    remapRuntimeIds,
    renameTitleReferences,
    runtimeIdsToTitles,
    shiftLayerReferences,
    titlesToRuntimeIds,
} from '../algorithms/reference-rewrite.js';
import { parseBindingCommand, qualifiedTitle } from '../algorithms/binding-command.js';
import * as errors from '../errors.js';

const UNKNOWN_TITLE = 'Unknown';

/**
 * Stateful wrapper for a loaded controller layout.
 * Owns the ordered tree and implements every structural edit on it, keeping
 * runtime ID references, preset ids and group bindings consistent.
 */
export class LayoutClass {
    /** Tracks whether the layout has unsaved changes */
    public isDirty: boolean = false;

    /** Whether the source file ended with a newline */
    public readonly trailingNewline: boolean;

    /** The ordered JSON tree */
    private _root: JsonObject;

    constructor(root: JsonObject, trailingNewline: boolean = false) {
        if (getObject(root, 'controller_mappings') === undefined) {
            throw new Error("Expected 'controller_mappings' at root level.");
        }
        // Deep copy so callers keep their own tree
        this._root = cloneJson(root);
        this.trailingNewline = trailingNewline;
    }

    /** Returns a deep copy of the tree. */
    toJSON(): JsonObject {
        return cloneJson(this._root);
    }

    /** Returns an independent copy, used for dry runs. */
    clone(): LayoutClass {
        return new LayoutClass(this._root, this.trailingNewline);
    }

    /**
     * Replaces the whole tree. Used by LayoutCommand for undo/redo.
     * @internal
     */
    _restore(root: JsonObject): void {
        this._root = cloneJson(root);
        this.isDirty = true;
    }

    // ------------------------------------------------------------------------
    // Sections
    // ------------------------------------------------------------------------

    private get mappings(): JsonObject {
        const mappings = getObject(this._root, 'controller_mappings');
        if (mappings === undefined) {
            throw new Error("Expected 'controller_mappings' at root level.");
        }
        return mappings;
    }

    /** Returns a keyed section, attaching an empty one if absent. */
    private section(name: 'actions' | 'action_layers'): JsonObject {
        const existing = getObject(this.mappings, name);
        if (existing !== undefined) return existing;
        const created: JsonObject = new Map();
        this.mappings.set(name, created);
        return created;
    }

    /** Returns an array section, attaching an empty one if absent. */
    private list(name: 'preset' | 'group'): JsonArray {
        const existing = getArray(this.mappings, name);
        if (existing !== undefined) return existing;
        const created: JsonArray = [];
        this.mappings.set(name, created);
        return created;
    }

    private presets(): JsonObject[] {
        return (getArray(this.mappings, 'preset') ?? []).filter(isJsonObject);
    }

    private groups(): JsonObject[] {
        return (getArray(this.mappings, 'group') ?? []).filter(isJsonObject);
    }

    actionKeys(): string[] {
        return [...(getObject(this.mappings, 'actions')?.keys() ?? [])];
    }

    layerKeys(): string[] {
        return [...(getObject(this.mappings, 'action_layers')?.keys() ?? [])];
    }

    get title(): string | undefined {
        return getString(this.mappings, 'title');
    }

    /** Current runtime IDs, recomputed from document order. */
    runtimeIds(): Map<string, number> {
        return computeRuntimeIds(this.actionKeys(), this.layerKeys());
    }

    /**
     * Every action set and layer with runtime ID and qualified title.
     * `titleOverride` substitutes one entry's title, to preview a rename.
     */
    entries(titleOverride?: { slotKey: string; title: string }): RuntimeIdEntry[] {
        const actions = getObject(this.mappings, 'actions') ?? new Map<string, JsonValue>();
        const layers = getObject(this.mappings, 'action_layers') ?? new Map<string, JsonValue>();

        const titleOf = (key: string, entry: JsonValue | undefined): string => {
            if (titleOverride !== undefined && titleOverride.slotKey === key) return titleOverride.title;
            return (isJsonObject(entry) ? getString(entry, 'title') : undefined) ?? UNKNOWN_TITLE;
        };

        const result: RuntimeIdEntry[] = [];
        let runtimeId = 1;
        for (const [key, entry] of actions) {
            const title = titleOf(key, entry);
            result.push({ runtime_id: runtimeId++, slot_key: key, type: 'action_set', title, parent_set: null, qualified_title: title });
        }
        for (const [key, entry] of layers) {
            const title = titleOf(key, entry);
            const parent = isJsonObject(entry) ? getString(entry, 'parent_set_name') : undefined;
            const parentTitle = parent !== undefined && actions.has(parent) ? titleOf(parent, actions.get(parent)) : parent;
            result.push({
                runtime_id: runtimeId++,
                slot_key: key,
                type: 'action_layer',
                title,
                parent_set: parent ?? null,
                qualified_title: parentTitle !== undefined ? `${parentTitle}::${title}` : title,
            });
        }
        return result;
    }

    /**
     * Returns a summary of the layout for the `layout info` tool.
     */
    info() {
        return {
            title: this.title ?? null,
            action_sets: this.actionKeys().length,
            action_layers: this.layerKeys().length,
            presets: this.presets().length,
            groups: this.groups().length,
            isDirty: this.isDirty,
        };
    }

    private requireEntry(slotKey: string): RuntimeIdEntry {
        const entry = this.entries().find((e) => e.slot_key === slotKey);
        if (entry === undefined) {
            throw new Error(errors.slotKeyNotFound(slotKey, [...this.actionKeys(), ...this.layerKeys()]).content[0].text);
        }
        return entry;
    }

    // ------------------------------------------------------------------------
    // References
    // ------------------------------------------------------------------------

    /**
     * Finds every binding command that references `slotKey`, by runtime ID or
     * by qualified title.
     */
    findReferences(slotKey: string): ReferenceHit[] {
        const entry = this.requireEntry(slotKey);
        const hits: ReferenceHit[] = [];
        visitStrings(this._root, (text, path) => {
            const cmd = parseBindingCommand(text);
            if (cmd === null || cmd.verb === 'empty_binding') return;
            if (cmd.ref.kind === 'runtime_id' && cmd.ref.runtimeId === entry.runtime_id) {
                hits.push({ path: path.join('.'), binding: text, verb: cmd.verb, via: 'runtime_id' });
            } else if (cmd.ref.kind === 'title' && qualifiedTitle(cmd.ref) === entry.qualified_title) {
                hits.push({ path: path.join('.'), binding: text, verb: cmd.verb, via: 'title' });
            }
        });
        return hits;
    }

    // ------------------------------------------------------------------------
    // Deletion
    // ------------------------------------------------------------------------

    /**
     * Deletes an action set (or layer) with every layer parented to it, their
     * presets and the groups those presets bind, then renumbers preset ids
     * and rewrites every runtime ID reference that moved.
     *
     * Nothing is changed if `slotKey` is not found.
     */
    deleteActionSet(slotKey: string, groupPolicy: GroupPolicy = 'unconditional'): DeletionReport {
        const target = this.requireEntry(slotKey);
        const actions = this.section('actions');
        const layers = this.section('action_layers');
        const before = this.runtimeIds();
        const allEntries = this.entries();

        // Deletion set: target plus layers parented to anything in the set
        const deleted = new Set<string>([slotKey]);
        let grew = true;
        while (grew) {
            grew = false;
            for (const entry of allEntries) {
                if (entry.parent_set !== null && deleted.has(entry.parent_set) && !deleted.has(entry.slot_key)) {
                    deleted.add(entry.slot_key);
                    grew = true;
                }
            }
        }

        // Orphan candidates: groups bound by the deleted presets
        const presets = this.presets();
        const candidates = new Set<string>();
        for (const preset of presets) {
            const name = getString(preset, 'name');
            if (name === undefined || !deleted.has(name)) continue;
            for (const groupId of getObject(preset, 'group_source_bindings')?.keys() ?? []) {
                candidates.add(groupId);
            }
        }

        const survivors = presets.filter((p) => !deleted.has(getString(p, 'name') ?? ''));
        const keptShared: string[] = [];
        if (groupPolicy === 'preserve_shared') {
            for (const preset of survivors) {
                for (const groupId of getObject(preset, 'group_source_bindings')?.keys() ?? []) {
                    if (candidates.delete(groupId)) keptShared.push(groupId);
                }
            }
        }

        // Remove action set and layers
        const layersDeleted: DeletedEntry[] = [];
        if (target.type === 'action_set') {
            actions.delete(slotKey);
        }
        for (const entry of allEntries) {
            if (entry.type === 'action_layer' && deleted.has(entry.slot_key)) {
                layers.delete(entry.slot_key);
                if (entry.slot_key !== slotKey) {
                    layersDeleted.push({ slot_key: entry.slot_key, title: entry.title, runtime_id: entry.runtime_id });
                }
            }
        }

        const after = this.runtimeIds();
        const remap = deriveRemap(before, after, deleted);

        // Remove presets, keeping non-object entries where they are
        const presetsDeleted: string[] = [];
        const presetList = this.list('preset');
        this.mappings.set('preset', presetList.filter((p) => {
            const name = isJsonObject(p) ? getString(p, 'name') : undefined;
            if (name !== undefined && deleted.has(name)) {
                presetsDeleted.push(name);
                return false;
            }
            return true;
        }));

        // Remove groups
        const groupsDeleted: string[] = [];
        const groupList = this.list('group');
        this.mappings.set('group', groupList.filter((g) => {
            const id = isJsonObject(g) ? getString(g, 'id') : undefined;
            if (id !== undefined && candidates.has(id)) {
                groupsDeleted.push(id);
                return false;
            }
            return true;
        }));
        const missingGroups = [...candidates].filter((id) => !groupsDeleted.includes(id));

        // Strip bindings to deleted groups from surviving presets
        let bindingsRemoved = 0;
        for (const preset of this.presets()) {
            const bindings = getObject(preset, 'group_source_bindings');
            if (bindings === undefined) continue;
            for (const groupId of [...bindings.keys()]) {
                if (candidates.has(groupId)) {
                    bindings.delete(groupId);
                    bindingsRemoved++;
                }
            }
        }

        const presetsRenumbered = this.renumberPresets();

        let referencesUpdated = 0;
        if (remap.size > 0) {
            rewriteStrings(this._root, (text) => {
                const result = remapRuntimeIds(text, remap);
                referencesUpdated += result.replaced;
                return result.text;
            });
        }

        this.isDirty = true;
        return {
            target: { slot_key: target.slot_key, title: target.title, runtime_id: target.runtime_id, type: target.type },
            layers_deleted: layersDeleted,
            presets_deleted: presetsDeleted,
            groups_deleted: groupsDeleted,
            groups_kept_shared: keptShared,
            missing_groups: missingGroups,
            group_bindings_removed: bindingsRemoved,
            presets_renumbered: presetsRenumbered,
            runtime_id_remap: remapToRecord(remap),
            references_updated: referencesUpdated,
        };
    }

    /**
     * Overwrites each preset's `id` with its array position, stringified.
     * @returns How many ids changed
     */
    renumberPresets(): number {
        let changed = 0;
        this.presets().forEach((preset, i) => {
            if (getString(preset, 'id') !== String(i)) {
                preset.set('id', String(i));
                changed++;
            }
        });
        if (changed > 0) this.isDirty = true;
        return changed;
    }

    // ------------------------------------------------------------------------
    // Duplication
    // ------------------------------------------------------------------------

    /**
     * Clones a layer with its preset and the preset's groups under fresh ids,
     * appended at the end so no existing runtime ID moves.
     */
    duplicateLayer(sourceKey: string, newTitle?: string): DuplicationReport {
        const layers = this.section('action_layers');
        const source = layers.get(sourceKey);
        if (!isJsonObject(source)) {
            throw new Error(errors.layerNotFound(sourceKey).content[0].text);
        }

        const sourceTitle = getString(source, 'title') ?? UNKNOWN_TITLE;
        const sourceRuntimeId = this.runtimeIds().get(sourceKey) ?? 0;
        const title = newTitle ?? `${sourceTitle} (Copy)`;

        const maxSlot = [...this.actionKeys(), ...this.layerKeys()].reduce((max, key) => {
            const match = /^Preset_(\d+)$/.exec(key);
            return match !== null ? Math.max(max, Number(match[1])) : max;
        }, 0);
        const newSlotKey = `Preset_${String(maxSlot + 1)}`;

        const groups = this.groups();
        let maxGroupId = groups.reduce((max, g) => Math.max(max, numericId(getString(g, 'id'))), 0);
        const maxPresetId = this.presets().reduce((max, p) => Math.max(max, numericId(getString(p, 'id'))), 0);

        const sourcePreset = this.presets().find((p) => getString(p, 'name') === sourceKey);
        const sourceBindings = sourcePreset !== undefined ? getObject(sourcePreset, 'group_source_bindings') : undefined;

        const groupIdMapping: Record<string, string> = {};
        const missingGroups: string[] = [];
        const newGroups: JsonObject[] = [];
        const newBindings: JsonObject = new Map();
        for (const [oldId, descriptor] of sourceBindings ?? []) {
            const original = groups.find((g) => getString(g, 'id') === oldId);
            if (original === undefined) {
                missingGroups.push(oldId);
                newBindings.set(oldId, cloneJson(descriptor));
                continue;
            }
            const newId = String(++maxGroupId);
            groupIdMapping[oldId] = newId;
            const copy = cloneJson(original);
            copy.set('id', newId);
            newGroups.push(copy);
            newBindings.set(newId, cloneJson(descriptor));
        }

        const newPresetId = String(maxPresetId + 1);
        const newPreset: JsonObject = new Map<string, JsonValue>([
            ['id', newPresetId],
            ['name', newSlotKey],
            ['group_source_bindings', newBindings],
        ]);

        const newLayer = cloneJson(source);
        newLayer.set('title', title);

        layers.set(newSlotKey, newLayer);
        this.list('group').push(...newGroups);
        this.list('preset').push(newPreset);
        this.isDirty = true;

        return {
            source_slot_key: sourceKey,
            source_title: sourceTitle,
            source_runtime_id: sourceRuntimeId,
            new_slot_key: newSlotKey,
            new_title: title,
            new_runtime_id: this.runtimeIds().get(newSlotKey) ?? 0,
            new_preset_id: newPresetId,
            groups_duplicated: newGroups.length,
            group_id_mapping: groupIdMapping,
            missing_groups: missingGroups,
        };
    }

    // ------------------------------------------------------------------------
    // Titles
    // ------------------------------------------------------------------------

    /**
     * Renames an action set or layer and rewrites every `{{...}}` reference
     * whose qualified title changes as a result (for an action set, that
     * includes its layers' `{{Set::Layer}}` references).
     */
    rename(slotKey: string, newTitle: string): RenameReport {
        const current = this.requireEntry(slotKey);
        const beforeEntries = this.entries();
        const afterEntries = this.entries({ slotKey, title: newTitle });

        const renames = new Map<string, string>();
        afterEntries.forEach((entry, i) => {
            const old = beforeEntries[i];
            if (old.qualified_title === entry.qualified_title) return;
            // A renamed entry must not take a qualified title someone else holds
            const clash = afterEntries.some((other) => other.slot_key !== entry.slot_key && other.qualified_title === entry.qualified_title);
            if (clash) {
                throw new Error(errors.titleInUse(entry.qualified_title).content[0].text);
            }
            renames.set(old.qualified_title, entry.qualified_title);
        });

        const container = current.type === 'action_set' ? this.section('actions') : this.section('action_layers');
        const node = container.get(slotKey);
        if (isJsonObject(node)) {
            node.set('title', newTitle);
        }

        let referencesUpdated = 0;
        if (renames.size > 0) {
            rewriteStrings(this._root, (text) => {
                const result = renameTitleReferences(text, renames);
                referencesUpdated += result.replaced;
                return result.text;
            });
        }

        this.isDirty = true;
        return {
            slot_key: slotKey,
            old_title: current.title,
            new_title: newTitle,
            qualified_renames: Object.fromEntries(renames),
            references_updated: referencesUpdated,
        };
    }

    /**
     * Builds the runtime ID ⇄ qualified title tables. For title → ID the
     * later entry wins when a qualified title is used twice.
     */
    titleLookup(): { idToTitle: Map<number, string>; titleToId: Map<string, number>; duplicates: string[] } {
        const idToTitle = new Map<number, string>();
        const titleToId = new Map<string, number>();
        const duplicates: string[] = [];
        for (const entry of this.entries()) {
            idToTitle.set(entry.runtime_id, entry.qualified_title);
            if (titleToId.has(entry.qualified_title) && !duplicates.includes(entry.qualified_title)) {
                duplicates.push(entry.qualified_title);
            }
            titleToId.set(entry.qualified_title, entry.runtime_id);
        }
        return { idToTitle, titleToId, duplicates };
    }

    /** Rewrites numeric runtime ID references as `{{Title}}` references. */
    convertToTitles(): ConversionReport {
        const { idToTitle, duplicates } = this.titleLookup();
        let converted = 0;
        rewriteStrings(this._root, (text) => {
            const result = runtimeIdsToTitles(text, idToTitle);
            converted += result.replaced;
            return result.text;
        });
        if (converted > 0) this.isDirty = true;
        return this.conversionReport('to_titles', converted, [], duplicates);
    }

    /** Rewrites `{{Title}}` references back to numeric runtime IDs. */
    convertToIds(): ConversionReport {
        const { titleToId, duplicates } = this.titleLookup();
        let converted = 0;
        const unresolved = new Set<string>();
        rewriteStrings(this._root, (text) => {
            const result = titlesToRuntimeIds(text, titleToId);
            converted += result.replaced;
            result.unresolved.forEach((t) => unresolved.add(t));
            return result.text;
        });
        if (converted > 0) this.isDirty = true;
        return this.conversionReport('to_ids', converted, [...unresolved], duplicates);
    }

    private conversionReport(mode: ConversionReport['mode'], converted: number, unresolved: string[], duplicates: string[]): ConversionReport {
        return {
            mode,
            action_sets: this.actionKeys().length,
            layers: this.layerKeys().length,
            references_converted: converted,
            unresolved,
            duplicate_titles: duplicates,
        };
    }

    // ------------------------------------------------------------------------
    // Bulk reference edits
    // ------------------------------------------------------------------------

    /** Applies an explicit old → new runtime ID mapping, two-pass. */
    remapIds(remap: ReadonlyMap<number, number>, verbs: readonly string[] = LAYER_VERBS): RemapReport {
        let updated = 0;
        rewriteStrings(this._root, (text) => {
            const result = remapRuntimeIds(text, remap, verbs);
            updated += result.replaced;
            return result.text;
        });
        if (updated > 0) this.isDirty = true;
        return { remap: remapToRecord(remap), references_updated: updated };
    }

    /** Shifts every `_layer <n> 0 0` reference down by `amount`. */
    shiftLayerIds(amount: number): ShiftReport {
        let shifted = 0;
        rewriteStrings(this._root, (text) => {
            const result = shiftLayerReferences(text, amount);
            shifted += result.replaced;
            return result.text;
        });
        if (shifted > 0) this.isDirty = true;
        return { amount, references_shifted: shifted };
    }

    /**
     * For every `binding` value that references `sourceRef` through one of
     * `verbs`, inserts a companion binding referencing `companionRef` right
     * after it. A string binding becomes a two-element array.
     */
    addCompanionAction(sourceRef: string, companionRef: string, verbs: readonly string[] = ['remove_layer']): CompanionReport {
        let modified = 0;
        let added = 0;

        const visit = (node: JsonValue): void => {
            if (isJsonArray(node)) {
                node.forEach(visit);
                return;
            }
            if (!isJsonObject(node)) return;

            for (const [key, value] of node) {
                if (key !== 'binding') {
                    visit(value);
                    continue;
                }
                if (typeof value === 'string') {
                    const companion = companionBinding(value, sourceRef, companionRef, verbs);
                    if (companion !== null && companion !== value) {
                        node.set(key, [value, companion]);
                        modified++;
                        added++;
                    }
                } else if (isJsonArray(value)) {
                    const next: JsonArray = [];
                    let addedHere = 0;
                    for (const item of value) {
                        next.push(item);
                        if (typeof item !== 'string') continue;
                        const companion = companionBinding(item, sourceRef, companionRef, verbs);
                        if (companion !== null && !value.includes(companion) && !next.includes(companion)) {
                            next.push(companion);
                            addedHere++;
                        }
                    }
                    if (addedHere > 0) {
                        node.set(key, next);
                        modified++;
                        added += addedHere;
                    }
                }
            }
        };

        visit(this._root);
        if (added > 0) this.isDirty = true;
        return { source_ref: sourceRef, companion_ref: companionRef, bindings_modified: modified, companions_added: added };
    }
}

function numericId(id: string | undefined): number {
    if (id === undefined || !/^\d+$/.test(id)) return 0;
    return Number(id);
}
