/**
 * Bounded textual rewriting of action set / layer references inside binding
 * command strings.
 *
 * A reference is only ever rewritten where it sits in the shape
 *   controller_action <VERB> <REF> <n> <n>
 * so the verb keyword on the left and the two numeric parameters on the
 * right delimit the token. Rewrites that could chain (3→2 followed by 2→1)
 * go through unique placeholders in a first pass and are resolved in a
 * second, so every occurrence is rewritten at most once.
 */

/** Verbs whose first argument is a runtime ID or a `{{Title}}` reference. */
export const REFERENCE_VERBS = ['CHANGE_PRESET', 'add_layer', 'remove_layer', 'hold_layer'] as const;

export type ReferenceVerb = (typeof REFERENCE_VERBS)[number];

/** Verbs that address action layers only. */
export const LAYER_VERBS: readonly ReferenceVerb[] = ['add_layer', 'remove_layer', 'hold_layer'];

export interface RewriteResult {
    text: string;
    /** Number of references rewritten. */
    replaced: number;
}

export interface TitleResolveResult extends RewriteResult {
    /** Titles that matched the command shape but have no runtime ID. */
    unresolved: string[];
}

/**
 * Returns `stem`, lengthened with leading underscores until `text` does not
 * contain it, so placeholders built on it cannot collide with existing text.
 */
export function freeMarker(text: string, stem: string): string {
    let marker = stem;
    while (text.includes(marker)) {
        marker = `_${marker}`;
    }
    return marker;
}

export function runtimeIdPlaceholder(marker: string, oldId: number, newId: number): string {
    return `${marker}${String(oldId)}_TO_${String(newId)}__`;
}

export function titlePlaceholder(marker: string, runtimeId: number): string {
    return `${marker}${String(runtimeId)}__`;
}

/** Wraps a qualified title in the symbolic reference delimiter. */
export function symbolicRef(title: string): string {
    return `{{${title}}}`;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function boundedPattern(verb: string, refPattern: string): RegExp {
    return new RegExp(`(controller_action ${verb} )${refPattern}( \\d+ \\d+)`, 'g');
}

/**
 * Rewrites numeric runtime ID references according to `remap`, two-pass.
 * Remaps are visited in descending old ID; with the bounded pattern the
 * order does not affect the result.
 */
export function remapRuntimeIds(
    text: string,
    remap: ReadonlyMap<number, number>,
    verbs: readonly string[] = REFERENCE_VERBS,
): RewriteResult {
    if (remap.size === 0) {
        return { text, replaced: 0 };
    }

    const ordered = [...remap].sort((a, b) => b[0] - a[0]);
    const marker = freeMarker(text, '__RUNTIME_ID_');
    let result = text;
    let replaced = 0;

    // Pass 1: old ID -> placeholder carrying both IDs
    for (const [oldId, newId] of ordered) {
        const placeholder = runtimeIdPlaceholder(marker, oldId, newId);
        for (const verb of verbs) {
            result = result.replace(boundedPattern(verb, String(oldId)), (_match, prefix: string, suffix: string) => {
                replaced++;
                return `${prefix}${placeholder}${suffix}`;
            });
        }
    }

    if (replaced === 0) {
        return { text, replaced };
    }

    // Pass 2: placeholder -> new ID
    result = result.replace(
        new RegExp(`${escapeRegExp(marker)}\\d+_TO_(\\d+)__`, 'g'),
        (_match, newId: string) => newId,
    );

    return { text: result, replaced };
}

/**
 * Replaces numeric runtime IDs with `{{Title}}` references, two-pass.
 */
export function runtimeIdsToTitles(
    text: string,
    idToTitle: ReadonlyMap<number, string>,
    verbs: readonly string[] = REFERENCE_VERBS,
): RewriteResult {
    const ordered = [...idToTitle].sort((a, b) => b[0] - a[0]);
    const marker = freeMarker(text, '__TITLE_PLACEHOLDER_');
    let result = text;
    let replaced = 0;

    for (const [runtimeId] of ordered) {
        const placeholder = titlePlaceholder(marker, runtimeId);
        for (const verb of verbs) {
            result = result.replace(boundedPattern(verb, String(runtimeId)), (_match, prefix: string, suffix: string) => {
                replaced++;
                return `${prefix}${placeholder}${suffix}`;
            });
        }
    }

    if (replaced === 0) {
        return { text, replaced };
    }

    // Single replace: inserted titles are not scanned again
    result = result.replace(new RegExp(`${escapeRegExp(marker)}(\\d+)__`, 'g'), (match: string, runtimeId: string) => {
        const title = idToTitle.get(Number(runtimeId));
        return title === undefined ? match : symbolicRef(title);
    });

    return { text: result, replaced };
}

/**
 * Replaces `{{Title}}` references with numeric runtime IDs. A title with no
 * entry in `titleToId` is left as it is and reported in `unresolved`.
 * A title may contain `}`: the reference runs to the first `}}` followed by
 * the two numeric parameters.
 */
export function titlesToRuntimeIds(
    text: string,
    titleToId: ReadonlyMap<string, number>,
    verbs: readonly string[] = REFERENCE_VERBS,
): TitleResolveResult {
    let result = text;
    let replaced = 0;
    const unresolved: string[] = [];

    for (const verb of verbs) {
        const pattern = new RegExp(`(controller_action ${verb} )\\{\\{(.+?)\\}\\}( \\d+ \\d+)`, 'g');
        result = result.replace(pattern, (match: string, prefix: string, title: string, suffix: string) => {
            const runtimeId = titleToId.get(title);
            if (runtimeId === undefined) {
                unresolved.push(title);
                return match;
            }
            replaced++;
            return `${prefix}${String(runtimeId)}${suffix}`;
        });
    }

    return { text: result, replaced, unresolved };
}

/**
 * Renames `{{Old}}` references to `{{New}}` wherever they appear, two-pass
 * so that swapped titles do not collapse into one.
 */
export function renameTitleReferences(text: string, renames: ReadonlyMap<string, string>): RewriteResult {
    const entries = [...renames].filter(([from, to]) => from !== to);
    const marker = freeMarker(text, '__TITLE_RENAME_');
    let result = text;
    let replaced = 0;

    entries.forEach(([from], i) => {
        const needle = symbolicRef(from);
        const count = result.split(needle).length - 1;
        if (count > 0) {
            result = result.replaceAll(needle, () => `${marker}${String(i)}__`);
            replaced += count;
        }
    });

    if (replaced === 0) {
        return { text, replaced };
    }

    result = result.replace(new RegExp(`${escapeRegExp(marker)}(\\d+)__`, 'g'), (match: string, index: string) => {
        const entry = entries[Number(index)];
        return entry === undefined ? match : symbolicRef(entry[1]);
    });

    return { text: result, replaced };
}

/**
 * Shifts every `_layer <n> 0 0` reference down by `amount`, clamped at 0.
 * Only references whose number actually changes are counted.
 */
export function shiftLayerReferences(text: string, amount: number): RewriteResult {
    let replaced = 0;
    const result = text.replace(/_layer (\d+) 0 0/g, (match: string, digits: string) => {
        const next = Math.max(Number(digits) - amount, 0);
        if (String(next) === digits) {
            return match;
        }
        replaced++;
        return `_layer ${String(next)} 0 0`;
    });
    return { text: replaced > 0 ? result : text, replaced };
}

/**
 * Returns the companion of `binding`: the same command with `sourceRef`
 * swapped for `companionRef` wherever it is the reference of one of `verbs`.
 * Returns null if `binding` does not reference `sourceRef` that way.
 */
export function companionBinding(
    binding: string,
    sourceRef: string,
    companionRef: string,
    verbs: readonly string[] = ['remove_layer'],
): string | null {
    let matches = 0;
    let result = binding;
    for (const verb of verbs) {
        const pattern = new RegExp(`(controller_action ${verb} )${escapeRegExp(sourceRef)}(?=[ ,]|$)`, 'g');
        result = result.replace(pattern, (_match, prefix: string) => {
            matches++;
            return `${prefix}${companionRef}`;
        });
    }
    return matches > 0 ? result : null;
}
