/** A single problem found while validating input or configuration. */
export interface ValidationIssue {
    readonly field: string;
    readonly message: string;
    readonly code: string;
}

/**
 * Base class of every error raised by the mdhash packages.
 * `_tag` and `code` discriminate the concrete error.
 */
export abstract class MdHashError extends Error {
    abstract readonly _tag: string;
    abstract readonly code: string;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Raised when a message or rendering does not belong to the expected alphabet. */
export class InvalidInputError extends MdHashError {
    readonly _tag = 'InvalidInputError' as const;
    readonly code = 'INVALID_INPUT' as const;
}

/** Raised at construction time when widths, rounds or the IV are unusable. */
export class InvalidConfigurationError extends MdHashError {
    readonly _tag = 'InvalidConfigurationError' as const;
    readonly code = 'INVALID_CONFIGURATION' as const;
    readonly issues: readonly ValidationIssue[];

    constructor(message: string, issues: readonly ValidationIssue[] = []) {
        super(message);
        this.issues = issues;
    }
}

/** Raised when an external source (a file) cannot be read to the end. */
export class SourceReadError extends MdHashError {
    readonly _tag = 'SourceReadError' as const;
    readonly code = 'SOURCE_READ_FAILED' as const;
    readonly path: string;

    constructor(path: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to read ${path}: ${reason}`, { cause });
        this.path = path;
    }
}

export function isMdHashError(value: unknown): value is MdHashError {
    return value instanceof MdHashError;
}
