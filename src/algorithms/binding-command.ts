import { REFERENCE_VERBS, type ReferenceVerb } from './reference-rewrite.js';

/**
 * Binding command grammar:
 *
 *   controller_action <VERB> <REF> <P1> <P2>[<rest>]
 *
 * REF is a decimal runtime ID or a symbolic `{{[Parent::]Title}}`; P1/P2
 * are small non-negative flags; `rest` (typically `, , ` or `, <extra>`)
 * is kept verbatim. `empty_binding` carries no reference.
 */

export const BINDING_VERBS = [...REFERENCE_VERBS, 'empty_binding'] as const;

export type BindingVerb = (typeof BINDING_VERBS)[number];

export type BindingRef =
    | { kind: 'runtime_id'; runtimeId: number }
    | { kind: 'title'; title: string; parentTitle?: string };

export interface ReferenceCommand {
    verb: ReferenceVerb;
    ref: BindingRef;
    /** Raw text of the reference token, kept so formatting is lossless. */
    refText: string;
    p1: string;
    p2: string;
    rest: string;
}

export interface EmptyCommand {
    verb: 'empty_binding';
    rest: string;
}

export type BindingCommand = ReferenceCommand | EmptyCommand;

const REFERENCE_PATTERN = new RegExp(
    `^controller_action (${REFERENCE_VERBS.join('|')}) (\\d+|\\{\\{.+?\\}\\}) (\\d+) (\\d+)(.*)$`,
    's',
);
const EMPTY_PATTERN = /^controller_action empty_binding(.*)$/s;

function isReferenceVerb(verb: string): verb is ReferenceVerb {
    return REFERENCE_VERBS.some((v) => v === verb);
}

/**
 * Parses a reference token: `12`, `{{Title}}` or `{{Parent::Title}}`.
 * Titles may contain `}`; the reference ends at the last `}}`.
 */
export function parseRef(refText: string): BindingRef | null {
    if (/^\d+$/.test(refText)) {
        return { kind: 'runtime_id', runtimeId: Number(refText) };
    }
    const symbolic = /^\{\{(.+)\}\}$/s.exec(refText);
    if (symbolic === null) {
        return null;
    }
    const qualified = symbolic[1];
    const sep = qualified.indexOf('::');
    if (sep === -1) {
        return { kind: 'title', title: qualified };
    }
    return { kind: 'title', parentTitle: qualified.slice(0, sep), title: qualified.slice(sep + 2) };
}

/**
 * Parses one binding string. Returns null for anything that is not a
 * `controller_action` of a known verb in the expected shape.
 */
export function parseBindingCommand(text: string): BindingCommand | null {
    const ref = REFERENCE_PATTERN.exec(text);
    if (ref !== null) {
        const [, verb, refText, p1, p2, rest] = ref;
        const parsedRef = parseRef(refText);
        if (!isReferenceVerb(verb) || parsedRef === null) {
            return null;
        }
        return { verb, ref: parsedRef, refText, p1, p2, rest };
    }

    const empty = EMPTY_PATTERN.exec(text);
    if (empty !== null) {
        return { verb: 'empty_binding', rest: empty[1] };
    }
    return null;
}

/** Formats a reference back into its token form. */
export function formatRef(ref: BindingRef): string {
    if (ref.kind === 'runtime_id') {
        return String(ref.runtimeId);
    }
    return ref.parentTitle !== undefined ? `{{${ref.parentTitle}::${ref.title}}}` : `{{${ref.title}}}`;
}

/**
 * Formats a command. Uses `refText` as written when present, so that
 * formatting a parsed command reproduces its input exactly.
 */
export function formatBindingCommand(cmd: BindingCommand): string {
    if (cmd.verb === 'empty_binding') {
        return `controller_action empty_binding${cmd.rest}`;
    }
    return `controller_action ${cmd.verb} ${cmd.refText} ${cmd.p1} ${cmd.p2}${cmd.rest}`;
}

/** Builds a reference command from structured parts. */
export function makeReferenceCommand(verb: ReferenceVerb, ref: BindingRef, p1 = '0', p2 = '0', rest = ''): ReferenceCommand {
    return { verb, ref, refText: formatRef(ref), p1, p2, rest };
}

/** Qualified title of a symbolic reference (`Parent::Title` or `Title`). */
export function qualifiedTitle(ref: Extract<BindingRef, { kind: 'title' }>): string {
    return ref.parentTitle !== undefined ? `${ref.parentTitle}::${ref.title}` : ref.title;
}
