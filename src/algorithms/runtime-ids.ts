/**
 * Runtime ID computation and old→new remap derivation.
 *
 * A runtime ID is not stored anywhere in a layout: it is the 1-based
 * position of an action set or action layer in the sequence
 * [all action sets in order, then all action layers in order].
 * Binding commands refer to sets and layers by that number, so any
 * structural edit that shifts positions has to be followed by a remap.
 */

/**
 * Assigns runtime IDs: 1..N to action sets in order, then N+1..M to layers.
 * Always recomputed from scratch; never patched.
 */
export function computeRuntimeIds(actionKeys: Iterable<string>, layerKeys: Iterable<string>): Map<string, number> {
    const ids = new Map<string, number>();
    let position = 1;
    for (const key of actionKeys) {
        ids.set(key, position++);
    }
    for (const key of layerKeys) {
        ids.set(key, position++);
    }
    return ids;
}

/**
 * Builds the old→new runtime ID table for every slot key that survived an
 * edit and whose ID moved. Unchanged IDs are omitted; deleted keys are never
 * a source and, since they are absent from `after`, never a destination.
 *
 * @throws If a key in `deleted` is still present in `after`.
 */
export function deriveRemap(
    before: ReadonlyMap<string, number>,
    after: ReadonlyMap<string, number>,
    deleted: ReadonlySet<string> = new Set(),
): Map<number, number> {
    for (const key of deleted) {
        if (after.has(key)) {
            throw new Error(`Deleted slot key '${key}' still has a runtime ID after the edit.`);
        }
    }

    const remap = new Map<number, number>();
    for (const [key, oldId] of before) {
        if (deleted.has(key)) continue;
        const newId = after.get(key);
        if (newId !== undefined && newId !== oldId) {
            remap.set(oldId, newId);
        }
    }
    return remap;
}

/** Plain-object form of a remap table, for tool responses. */
export function remapToRecord(remap: ReadonlyMap<number, number>): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [oldId, newId] of [...remap].sort((a, b) => a[0] - b[0])) {
        out[String(oldId)] = newId;
    }
    return out;
}
