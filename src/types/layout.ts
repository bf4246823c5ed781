/**
 * Core types for controller layout documents and the change records that
 * layout edits return.
 *
 * The document itself is held as an ordered JSON tree (see json.ts); these
 * types describe the views and reports built from it.
 *
 *   controller_mappings
 *     actions         slot key -> { title, ... }                 (action sets)
 *     action_layers   slot key -> { title, parent_set_name, ... } (layers)
 *     preset          [{ id, name, group_source_bindings }]
 *     group           [{ id, mode, inputs, ... }]
 */

export type EntryType = 'action_set' | 'action_layer';

/**
 * An action set or layer with its derived runtime ID.
 */
export interface RuntimeIdEntry {
    runtime_id: number;
    slot_key: string;
    type: EntryType;
    title: string;
    /** Parent action set slot key, for layers. */
    parent_set: string | null;
    /** `Title` for action sets, `ParentTitle::Title` for layers. */
    qualified_title: string;
}

/**
 * Whether a group referenced by a deleted preset may survive because another
 * preset still references it.
 * - `unconditional`: every group the deleted presets reference is deleted.
 * - `preserve_shared`: groups still referenced by a surviving preset are kept.
 */
export type GroupPolicy = 'unconditional' | 'preserve_shared';

export interface DeletedEntry {
    slot_key: string;
    title: string;
    runtime_id: number;
}

export interface DeletionReport {
    target: DeletedEntry & { type: EntryType };
    layers_deleted: DeletedEntry[];
    presets_deleted: string[];
    groups_deleted: string[];
    /** Groups spared under `preserve_shared`. */
    groups_kept_shared: string[];
    /** Groups referenced by a deleted preset but absent from the group array. */
    missing_groups: string[];
    group_bindings_removed: number;
    presets_renumbered: number;
    /** Old runtime ID -> new runtime ID, for IDs that moved. */
    runtime_id_remap: Record<string, number>;
    references_updated: number;
}

export interface DuplicationReport {
    source_slot_key: string;
    source_title: string;
    source_runtime_id: number;
    new_slot_key: string;
    new_title: string;
    new_runtime_id: number;
    new_preset_id: string;
    groups_duplicated: number;
    group_id_mapping: Record<string, string>;
    missing_groups: string[];
}

export interface RenameReport {
    slot_key: string;
    old_title: string;
    new_title: string;
    /** Old qualified title -> new qualified title. */
    qualified_renames: Record<string, string>;
    references_updated: number;
}

export interface CompanionReport {
    source_ref: string;
    companion_ref: string;
    bindings_modified: number;
    companions_added: number;
}

export interface ConversionReport {
    mode: 'to_titles' | 'to_ids';
    action_sets: number;
    layers: number;
    references_converted: number;
    /** Titles in command position with no runtime ID (to_ids only). */
    unresolved: string[];
    /** Qualified titles used by more than one entry. */
    duplicate_titles: string[];
}

export interface RemapReport {
    remap: Record<string, number>;
    references_updated: number;
}

export interface ShiftReport {
    amount: number;
    references_shifted: number;
}

export interface ReferenceHit {
    /** Dot-joined key path of the string in the document. */
    path: string;
    binding: string;
    verb: string;
    via: 'runtime_id' | 'title';
}
