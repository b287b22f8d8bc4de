/**
 * Failure kinds reported by an update check.
 *
 * Input errors (`cant-get-current-version`, `invalid-input`) are raised before any
 * network activity. The rest are raised after the single request completes.
 */
export type CheckerErrorKind =
    | 'cant-get-current-version'
    | 'invalid-input'
    | 'network'
    | 'invalid-response'
    | 'no-releases'
    | 'decode'
    | 'comparison';

export interface CheckerErrorOptions {
    cause?: unknown;
    status?: number;
}

export class CheckerError extends Error {
    readonly kind: CheckerErrorKind;
    readonly cause: unknown;
    /** HTTP status for `invalid-response`, when the server sent one. */
    readonly status: number | null;

    constructor(kind: CheckerErrorKind, message: string, options: CheckerErrorOptions = {}) {
        super(message);
        this.name = 'CheckerError';
        this.kind = kind;
        this.cause = options.cause;
        this.status = options.status ?? null;
    }

    static cantGetCurrentVersion(): CheckerError {
        return new CheckerError('cant-get-current-version', 'Could not determine the current application version');
    }

    static invalidInput(detail: string): CheckerError {
        return new CheckerError('invalid-input', `Invalid repository locator: ${detail}`);
    }

    static network(cause: unknown): CheckerError {
        return new CheckerError('network', `Network request failed: ${describeError(cause)}`, { cause });
    }

    static invalidResponse(detail: string, status?: number): CheckerError {
        return new CheckerError('invalid-response', `Invalid response from release API: ${detail}`, { status });
    }

    static noReleases(repository: string): CheckerError {
        return new CheckerError('no-releases', `No releases published for ${repository}`);
    }

    static decode(detail: string, cause?: unknown): CheckerError {
        return new CheckerError('decode', `Could not decode release: ${detail}`, { cause });
    }

    static comparison(cause: unknown): CheckerError {
        return new CheckerError('comparison', `Version comparison failed: ${describeError(cause)}`, { cause });
    }
}

export function isCheckerError(value: unknown): value is CheckerError {
    return value instanceof CheckerError;
}

/**
 * Passes CheckerErrors through and wraps anything else as a transport failure.
 */
export function toCheckerError(error: unknown): CheckerError {
    return isCheckerError(error) ? error : CheckerError.network(error);
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
