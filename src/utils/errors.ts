/**
 * Error types shared across the healer.
 *
 * The core returns status values instead of throwing; these classes cover the
 * few places where a fault has to cross a function boundary (malformed input
 * text, configuration, disk writes) before it is turned into a status.
 */

export type HealerErrorCode =
    | 'MALFORMED_ENCODING'
    | 'INVALID_CONFIG'
    | 'ATOMIC_WRITE_FAILED';

export class HealerError extends Error {
    readonly code: HealerErrorCode;

    constructor(code: HealerErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'HealerError';
        this.code = code;
    }
}

/**
 * Raised by the lexical normalizer when the text still carries decode damage
 */
export class MalformedEncodingError extends HealerError {
    readonly line: number;

    constructor(line: number, detail: string) {
        super('MALFORMED_ENCODING', `Malformed encoding on line ${line + 1}: ${detail}`);
        this.name = 'MalformedEncodingError';
        this.line = line;
    }
}

export class ConfigValidationError extends HealerError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super('INVALID_CONFIG', `Invalid healer configuration: ${issues.join('; ')}`);
        this.name = 'ConfigValidationError';
        this.issues = issues;
    }
}

export class AtomicWriteError extends HealerError {
    readonly path: string;

    constructor(path: string, cause: unknown) {
        super('ATOMIC_WRITE_FAILED', `Atomic write failed for ${path}: ${describeError(cause)}`, { cause });
        this.name = 'AtomicWriteError';
        this.path = path;
    }
}

/**
 * Best-effort message for anything that was thrown
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}

export function truncateMessage(message: string, maxLength: number = 100): string {
    return message.length > maxLength ? message.slice(0, maxLength) : message;
}
