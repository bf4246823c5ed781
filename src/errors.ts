/**
 * Shared Error Factory for layout domain errors.
 *
 * All functions are pure and return the structured MCP error response shape
 * directly, allowing tool handlers to do:
 *   return errors.slotKeyNotFound(key);
 * Classes throw `new Error(errors.x(...).content[0].text)` so that the
 * message a handler catches is the same text the caller would see.
 */

/**
 * The response shape every tool handler returns.
 */
export type ToolResponse = {
    isError?: true;
    content: Array<{ type: 'text'; text: string }>;
};

/**
 * The standard MCP error response shape for domain errors.
 * The LLM reads the text and can self-correct.
 */
export type DomainErrorResponse = ToolResponse & { isError: true };

/**
 * Wraps a JSON-serializable payload as a successful tool response.
 */
export function jsonResponse(payload: unknown): ToolResponse {
    return {
        content: [{ type: 'text', text: JSON.stringify(payload) }],
    };
}

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

/** Extracts the message text of a thrown value. */
export function messageOf(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

// ----------------------------------------------------------------------------
// layout
// ----------------------------------------------------------------------------

export function noLayoutLoaded(): DomainErrorResponse {
    return domainError('No layout loaded. Call layout open first.');
}

export function layoutFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Layout file not found: ${path}`);
}

export function invalidLayoutFile(path: string, detail: string): DomainErrorResponse {
    return domainError(`Invalid layout file: ${path}. ${detail}`);
}

export function cannotWritePath(path: string): DomainErrorResponse {
    return domainError(`Cannot write to path: ${path}`);
}

export function nothingToUndo(): DomainErrorResponse {
    return domainError('Nothing to undo.');
}

export function nothingToRedo(): DomainErrorResponse {
    return domainError('Nothing to redo.');
}

// ----------------------------------------------------------------------------
// edit
// ----------------------------------------------------------------------------

export function slotKeyNotFound(key: string, available: string[]): DomainErrorResponse {
    const list = available.length > 0 ? available.join(', ') : '(none)';
    return domainError(`Action set or layer '${key}' not found. Available: ${list}`);
}

export function layerNotFound(key: string): DomainErrorResponse {
    return domainError(`Action layer '${key}' not found in action_layers.`);
}

export function titleInUse(title: string): DomainErrorResponse {
    return domainError(`Title '${title}' is already used by another action set or layer.`);
}
