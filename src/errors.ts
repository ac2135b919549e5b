/**
 * Error taxonomy for the backup kernel.
 *
 * Every failure the core raises is a KernelError carrying a machine-readable
 * code. Severity decides what a job does with it: FATAL aborts the run,
 * RECOVERABLE is folded into a rebuild decision.
 */

/* -------------------------------------------------------------------------- */
/* Codes                                                                      */
/* -------------------------------------------------------------------------- */

export const ERRORS = {
    IO_ERROR: 'IO_ERROR',
    STATE_CORRUPT: 'STATE_CORRUPT',
    INVALID_DOCUMENT: 'INVALID_DOCUMENT',
    ALREADY_STARTED: 'ALREADY_STARTED',
    RUN_NOT_FOUND: 'RUN_NOT_FOUND',
    STEP_NOT_FOUND: 'STEP_NOT_FOUND',
    INVALID_STATE_TRANSITION: 'INVALID_STATE_TRANSITION',
    LOCK_HELD: 'LOCK_HELD',
    INVALID_CONFIG: 'INVALID_CONFIG',
    COMMAND_FAILED: 'COMMAND_FAILED',
} as const;

export type ErrorCode = (typeof ERRORS)[keyof typeof ERRORS];

export type Severity = 'FATAL' | 'RECOVERABLE';

const RECOVERABLE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
    ERRORS.STATE_CORRUPT,
    ERRORS.INVALID_DOCUMENT,
]);

/* -------------------------------------------------------------------------- */
/* KernelError                                                                */
/* -------------------------------------------------------------------------- */

export class KernelError extends Error {
    readonly severity: Severity;

    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly details: Record<string, unknown> = {},
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'KernelError';
        this.severity = RECOVERABLE_CODES.has(code) ? 'RECOVERABLE' : 'FATAL';
    }
}

export function isKernelError(err: unknown, code?: ErrorCode): err is KernelError {
    if (!(err instanceof KernelError)) return false;
    return code === undefined || err.code === code;
}

/** Node system errors expose `code` (ENOENT, EACCES, ...). */
export function errnoOf(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'code' in err) {
        const code = (err as { code: unknown }).code;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}

export function messageOf(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}

/**
 * Wraps a filesystem failure as IO_ERROR, keeping the errno for operators.
 * ENOSPC is tagged separately since it is the one an operator acts on.
 */
export function ioError(message: string, err: unknown, details: Record<string, unknown> = {}): KernelError {
    if (isKernelError(err)) return err;
    const errno = errnoOf(err);
    return new KernelError(
        `${message}: ${messageOf(err)}`,
        ERRORS.IO_ERROR,
        { ...details, errno, disk_full: errno === 'ENOSPC' },
        err
    );
}
