export class ThreadlogError extends Error {
    constructor(message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
        super(message);
        this.name = 'ThreadlogError';
    }
}

/**
 * A command line has too few fields, a quoted field without quotes, or an empty timestamp.
 */
export class MalformedCommandError extends ThreadlogError {
    constructor(message = 'Malformed command', details?: unknown) {
        super(message, 'MALFORMED_COMMAND', details);
        this.name = 'MalformedCommandError';
    }
}

export class UnknownCommandError extends ThreadlogError {
    constructor(public readonly keyword: string, details?: unknown) {
        super(`Unknown command: ${keyword}`, 'UNKNOWN_COMMAND', details);
        this.name = 'UnknownCommandError';
    }
}

/**
 * A comment or delete named a permalink that no stored document carries.
 */
export class UnresolvedReferenceError extends ThreadlogError {
    constructor(public readonly permalink: string, details?: unknown) {
        super(`No post or comment found with permalink: ${permalink}`, 'UNRESOLVED_REFERENCE', details);
        this.name = 'UnresolvedReferenceError';
    }
}

export class BackendUnavailableError extends ThreadlogError {
    constructor(message = 'Storage backend unavailable', details?: unknown) {
        super(message, 'BACKEND_UNAVAILABLE', details);
        this.name = 'BackendUnavailableError';
    }
}
