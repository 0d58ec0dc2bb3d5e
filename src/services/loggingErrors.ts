/**
 * Logging failure taxonomy.
 *
 * Every user-facing failure of the logging engine is one variant of
 * `LoggingFailure`. Services return `LoggingResult<T>` rather than throwing,
 * and presentation code dispatches on `kind` with an exhaustive switch.
 */

export type ValidationFailure = {
    kind: 'validation_failed';
    messages: string[];
};

export type DuplicateConflict = {
    kind: 'duplicate_conflict';
    medicationName: string;
    conflictingTime: Date;
    /** Null when the conflict was found through a cached hint only */
    existingSessionId: string | null;
};

export type AtomicWriteFailure = {
    kind: 'atomic_write_failed';
    operation: string;
    message: string;
    /** Index of the batch that failed when a bulk write was chunked */
    chunkIndex?: number;
    /** Sessions durably written by earlier chunks of the same bulk write */
    committedSessionCount?: number;
};

export type QueueFullFailure = {
    kind: 'queue_full';
    capacity: number;
};

export type QueueWarning = {
    kind: 'queue_warning';
    size: number;
};

export type SyncFailure = {
    kind: 'sync_failed';
    failedCount: number;
};

export type ReconciliationEmpty = {
    kind: 'reconciliation_empty';
};

export type NoSchedulesFailure = {
    kind: 'no_schedules';
};

export type LoggingFailure =
    | ValidationFailure
    | DuplicateConflict
    | AtomicWriteFailure
    | QueueFullFailure
    | QueueWarning
    | SyncFailure
    | ReconciliationEmpty
    | NoSchedulesFailure;

export type LoggingFailureKind = LoggingFailure['kind'];

export type LoggingResult<T, F extends LoggingFailure = LoggingFailure> =
    | { ok: true; value: T }
    | { ok: false; failure: F };

export const succeed = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const fail = <F extends LoggingFailure>(failure: F): { ok: false; failure: F } => ({
    ok: false,
    failure,
});

export const validationFailure = (messages: string[]): ValidationFailure => ({
    kind: 'validation_failed',
    messages,
});

export const atomicWriteFailure = (
    operation: string,
    error: unknown,
    extra: Pick<AtomicWriteFailure, 'chunkIndex' | 'committedSessionCount'> = {},
): AtomicWriteFailure => ({
    kind: 'atomic_write_failed',
    operation,
    message: error instanceof Error ? error.message : String(error),
    ...extra,
});

const formatClockTime = (date: Date): string =>
    `${String(date.getHours()).padStart(2, '0')}:${String(date.getMinutes()).padStart(2, '0')}`;

/**
 * User-facing message for a failure.
 */
export function describeLoggingFailure(failure: LoggingFailure): string {
    switch (failure.kind) {
        case 'validation_failed':
            return failure.messages.length > 0
                ? failure.messages.join('\n')
                : 'Please check the entered values and try again.';
        case 'duplicate_conflict':
            return `${failure.medicationName} was already logged at ${formatClockTime(failure.conflictingTime)}. ` +
                'Update that entry instead?';
        case 'atomic_write_failed':
            return 'Unable to save your treatment. Please check your connection and try again.';
        case 'queue_full':
            return `Too many treatments waiting to sync (${failure.capacity}). ` +
                'This treatment was not saved. Reconnect to sync the waiting entries.';
        case 'queue_warning':
            return `${failure.size} treatments are waiting to sync. Connect to the internet soon.`;
        case 'sync_failed':
            return `${failure.failedCount} treatment${failure.failedCount === 1 ? '' : 's'} could not be synced. ` +
                'Tap to retry.';
        case 'reconciliation_empty':
            return 'All caught up! Everything scheduled for today is already logged.';
        case 'no_schedules':
            return 'No active schedules have reminders today.';
        default: {
            const unreachable: never = failure;
            return unreachable;
        }
    }
}

/**
 * HTTP status used when a failure crosses the API boundary.
 */
export function loggingFailureStatus(failure: LoggingFailure): number {
    switch (failure.kind) {
        case 'validation_failed':
            return 400;
        case 'duplicate_conflict':
            return 409;
        case 'atomic_write_failed':
        case 'sync_failed':
            return 503;
        case 'queue_full':
            return 507;
        case 'queue_warning':
        case 'reconciliation_empty':
            return 200;
        case 'no_schedules':
            return 422;
        default: {
            const unreachable: never = failure;
            return unreachable;
        }
    }
}

/**
 * JSON body for a failure. Dates are rendered as ISO strings.
 */
export function serializeLoggingFailure(failure: LoggingFailure): Record<string, unknown> {
    const base = { code: failure.kind, message: describeLoggingFailure(failure) };
    switch (failure.kind) {
        case 'duplicate_conflict':
            return {
                ...base,
                medicationName: failure.medicationName,
                conflictingTime: failure.conflictingTime.toISOString(),
                existingSessionId: failure.existingSessionId,
            };
        case 'validation_failed':
            return { ...base, details: failure.messages };
        case 'atomic_write_failed':
            return {
                ...base,
                operation: failure.operation,
                chunkIndex: failure.chunkIndex ?? null,
                committedSessionCount: failure.committedSessionCount ?? null,
            };
        default:
            return base;
    }
}
