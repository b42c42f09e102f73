/**
 * Error taxonomy for the launcher core.
 * Provides a structured hierarchy with machine-readable codes, preserving original causes, and
 * optional metadata identifying the offending mod, file, key or preset.
 *
 * Conventions:
 * - Class names are PascalCase.
 * - Error codes are SNAKE_CASE and globally unique.
 * - Each error includes `code`, optional `details`, and optional `cause` chain.
 * - Use specific subclasses instead of the base `AppError` wherever possible.
 */

/** Well-known application error codes. */
export const ERROR_CODES = {
    IO_ERROR: 'IO_ERROR',
    PARSE_ERROR: 'PARSE_ERROR',
    INVALID_KEY: 'INVALID_KEY',
    KEY_NOT_FOUND: 'KEY_NOT_FOUND',
    MERGE_CONFLICT: 'MERGE_CONFLICT',
    NOT_FOUND: 'NOT_FOUND',
    CONFIG_ERROR: 'CONFIG_ERROR',
    VALIDATION_ERROR: 'VALIDATION_ERROR',
} as const;

/** Union type of all known error code string literals. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Structured diagnostic metadata attached to an error. */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base application error carrying a machine code and structured details.
 */
export class AppError extends Error {
    /** Machine readable error code (SNAKE_CASE). */
    public readonly code: ErrorCode;
    /** Structured metadata for diagnostics (path, key, mod id...). */
    public readonly details?: ErrorDetails;
    /** Underlying cause error (if any). */
    public override readonly cause?: unknown;

    /**
     * Constructs a new AppError.
     * @param code ErrorCode - Machine error code (see ERROR_CODES)
     * @param message string - Human readable summary, shown to the user as is
     * @param details ErrorDetails|undefined - Additional structured context
     * @param cause unknown - Original error object or value
     */
    constructor(code: ErrorCode, message: string, details?: ErrorDetails, cause?: unknown) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        this.cause = cause;
        // Maintain proper prototype chain (TS/JS quirk)
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** IOError wraps a filesystem failure with the path it happened on. */
export class IOError extends AppError {
    public readonly path: string;

    constructor(message: string, path: string, cause?: unknown) {
        super(ERROR_CODES.IO_ERROR, message, { path }, cause);
        this.path = path;
    }
}

/** ParseError indicates content that could not be read as the expected format. */
export class ParseError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.PARSE_ERROR, message, details, cause);
    }
}

/** InvalidKeyError rejects a settings key that is not a printable ASCII identifier. */
export class InvalidKeyError extends AppError {
    public readonly key: string;

    constructor(key: string) {
        super(ERROR_CODES.INVALID_KEY, `Invalid settings key ${JSON.stringify(key)}`, { key });
        this.key = key;
    }
}

/** KeyNotFoundError when a settings document holds no line for the key. */
export class KeyNotFoundError extends AppError {
    public readonly key: string;

    constructor(key: string, path?: string) {
        super(
            ERROR_CODES.KEY_NOT_FOUND,
            path ? `Setting '${key}' not found in ${path}` : `Setting '${key}' not found`,
            { key, path },
        );
        this.key = key;
    }
}

/**
 * MergeConflictError blocks a launch: an enabled mod's fragment could not be read or parsed.
 */
export class MergeConflictError extends AppError {
    public readonly modId: string;
    public readonly file: string;
    public readonly line?: number;

    constructor(message: string, modId: string, file: string, line?: number, cause?: unknown) {
        super(ERROR_CODES.MERGE_CONFLICT, message, { modId, file, line }, cause);
        this.modId = modId;
        this.file = file;
        this.line = line;
    }
}

/** NotFoundError when a referenced mod or preset does not exist. */
export class NotFoundError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.NOT_FOUND, message, details);
    }
}

/** ConfigError when the launch command cannot be derived. */
export class ConfigError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.CONFIG_ERROR, message, details, cause);
    }
}

/** ValidationError indicates configuration or persisted state failed schema validation. */
export class ValidationError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.VALIDATION_ERROR, message, details);
    }
}

/**
 * Single-line text for front ends.
 * @example
 * FormatError(new NotFoundError(`Preset 'x' not found`)); // "NOT_FOUND: Preset 'x' not found"
 */
export function FormatError(err: unknown): string {
    if (err instanceof AppError) {
        return `${err.code}: ${err.message}`;
    }
    if (err instanceof Error) {
        return err.message;
    }
    return String(err);
}

/** Node system error code (ENOENT, EACCES...) or undefined. */
export function SystemErrorCode(err: unknown): string | undefined {
    if (err instanceof Error && `code` in err && typeof err.code === `string`) {
        return err.code;
    }
    return undefined;
}

/** Message of any thrown value. */
export function ErrorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
