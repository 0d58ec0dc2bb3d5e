/**
 * Offline Operation Queue
 *
 * Durable FIFO of logging operations whose write could not reach Firestore.
 * The whole queue is one JSON array under a fixed key of the local
 * key-value store. Replay is a deferred call of the live logging path.
 */

import { randomUUID } from 'crypto';
import * as functions from 'firebase-functions';
import { offlineQueueConfig } from '../config';
import { withRetry } from '../utils/retryUtils';
import { KeyValueStore } from './keyValueStore';
import {
    describeLoggingFailure,
    fail,
    LoggingFailure,
    LoggingResult,
    QueueFullFailure,
    QueueWarning,
    succeed,
    SyncFailure,
} from './loggingErrors';
import { NewQueuedOperation, QueuedOperation, queuedOperationSchema } from './queuedOperations';

/** What the queue needs from the logging service. */
export interface QueueReplayer {
    replay(operation: QueuedOperation): Promise<LoggingResult<unknown>>;
}

export type EnqueueOutcome = {
    operation: QueuedOperation;
    /** Set once the queue has reached its soft limit; the enqueue still succeeded */
    warning: QueueWarning | null;
};

export type DrainReport = {
    successCount: number;
    failureCount: number;
    failure: SyncFailure | null;
};

export type LogOrQueueOutcome =
    | { status: 'written'; value: unknown }
    | { status: 'queued'; operation: QueuedOperation; warning: QueueWarning | null };

export type OfflineQueueOptions = {
    clock?: () => Date;
    sleep?: (ms: number) => Promise<void>;
    newId?: () => string;
};

/** Thrown inside the retry loop so `withRetry` can decide on the failure kind. */
class ReplayFailedError extends Error {
    constructor(readonly failure: LoggingFailure) {
        super(describeLoggingFailure(failure));
        this.name = 'ReplayFailedError';
    }
}

const isRetryable = (error: unknown): boolean =>
    error instanceof ReplayFailedError && error.failure.kind === 'atomic_write_failed';

/**
 * Failures meaning the operation's effect is already in Firestore: the day
 * was caught up meanwhile, or the logged session itself is stored.
 */
function isAlreadyApplied(operation: QueuedOperation, failure: LoggingFailure): boolean {
    if (failure.kind === 'reconciliation_empty') {
        return true;
    }
    return (
        failure.kind === 'duplicate_conflict' &&
        operation.payload.kind === 'createMedication' &&
        failure.existingSessionId === operation.payload.session.id
    );
}

// Queue instances are created per request; mutations and drains are
// serialized per backing store.
const storeLocks = new WeakMap<KeyValueStore, Promise<void>>();
const storeDrains = new WeakMap<KeyValueStore, { scope: string; drain: Promise<DrainReport> }>();

const ALL_USERS = '*';

export class OfflineLoggingQueue {
    private readonly clock: () => Date;
    private readonly sleep?: (ms: number) => Promise<void>;
    private readonly newId: () => string;

    constructor(
        private readonly store: KeyValueStore,
        private readonly replayer: QueueReplayer,
        options: OfflineQueueOptions = {},
    ) {
        this.clock = options.clock ?? (() => new Date());
        this.sleep = options.sleep;
        this.newId = options.newId ?? randomUUID;
    }

    /** Runs queue mutations one at a time; the chain itself never rejects. */
    private withLock<T>(task: () => Promise<T>): Promise<T> {
        const run = (storeLocks.get(this.store) ?? Promise.resolve()).then(task);
        storeLocks.set(
            this.store,
            run.then(
                () => undefined,
                () => undefined,
            ),
        );
        return run;
    }

    private async load(): Promise<QueuedOperation[]> {
        const raw = await this.store.get(offlineQueueConfig.storageKey);
        if (raw === null) {
            return [];
        }

        let records: unknown;
        try {
            records = JSON.parse(raw);
        } catch (error) {
            functions.logger.warn('[OfflineQueue] Queue storage is unreadable; starting empty', {
                error: error instanceof Error ? error.message : String(error),
            });
            return [];
        }
        if (!Array.isArray(records)) {
            functions.logger.warn('[OfflineQueue] Queue storage is not a list; starting empty');
            return [];
        }

        const cutoff = this.clock().getTime() - offlineQueueConfig.ttlMs;
        const operations: QueuedOperation[] = [];
        let dropped = 0;
        let expired = 0;
        for (const record of records) {
            const parsed = queuedOperationSchema.safeParse(record);
            if (!parsed.success) {
                dropped += 1;
                continue;
            }
            if (parsed.data.enqueuedAt.getTime() < cutoff) {
                expired += 1;
                continue;
            }
            // a drain interrupted mid-flight leaves entries marked syncing
            operations.push(parsed.data.status === 'syncing' ? { ...parsed.data, status: 'pending' } : parsed.data);
        }

        if (dropped > 0) {
            functions.logger.warn('[OfflineQueue] Dropped unparsable queue entries', { dropped });
        }
        if (expired > 0) {
            functions.logger.info('[OfflineQueue] Purged expired queue entries', { expired });
        }
        return operations;
    }

    private async save(operations: QueuedOperation[]): Promise<void> {
        await this.store.set(offlineQueueConfig.storageKey, JSON.stringify(operations));
    }

    private update(id: string, change: (operation: QueuedOperation) => QueuedOperation | null): Promise<void> {
        return this.withLock(async () => {
            const operations = await this.load();
            const next: QueuedOperation[] = [];
            for (const operation of operations) {
                if (operation.id !== id) {
                    next.push(operation);
                    continue;
                }
                const changed = change(operation);
                if (changed) {
                    next.push(changed);
                }
            }
            await this.save(next);
        });
    }

    async enqueue(input: NewQueuedOperation): Promise<LoggingResult<EnqueueOutcome, QueueFullFailure>> {
        return this.withLock(async () => {
            const operations = await this.load();
            if (operations.length >= offlineQueueConfig.hardLimit) {
                functions.logger.warn('[OfflineQueue] Queue full; operation rejected', {
                    userId: input.userId,
                    kind: input.payload.kind,
                    capacity: offlineQueueConfig.hardLimit,
                });
                return fail<QueueFullFailure>({ kind: 'queue_full', capacity: offlineQueueConfig.hardLimit });
            }

            const operation: QueuedOperation = {
                ...input,
                id: this.newId(),
                status: 'pending',
                retryCount: 0,
                lastError: null,
                enqueuedAt: this.clock(),
            };
            operations.push(operation);
            await this.save(operations);

            const size = operations.length;
            functions.logger.info('[OfflineQueue] Operation queued', {
                operationId: operation.id,
                kind: operation.payload.kind,
                size,
            });

            const warning: QueueWarning | null =
                size >= offlineQueueConfig.softLimit ? { kind: 'queue_warning', size } : null;
            return succeed({ operation, warning });
        });
    }

    /**
     * Runs the live path now and queues the operation when the write itself
     * failed. Validation and duplicate failures are returned unchanged.
     */
    async logOrQueue(input: NewQueuedOperation): Promise<LoggingResult<LogOrQueueOutcome>> {
        const attempt: QueuedOperation = {
            ...input,
            id: this.newId(),
            status: 'syncing',
            retryCount: 0,
            lastError: null,
            enqueuedAt: this.clock(),
        };
        const result = await this.replayer.replay(attempt);
        if (result.ok) {
            return succeed({ status: 'written', value: result.value });
        }
        if (result.failure.kind !== 'atomic_write_failed') {
            return fail(result.failure);
        }

        const queued = await this.enqueue(input);
        if (!queued.ok) {
            return fail(queued.failure);
        }
        return succeed({ status: 'queued', operation: queued.value.operation, warning: queued.value.warning });
    }

    /**
     * Replays one entry with the backoff schedule. Resolves to true when the
     * entry was written and removed.
     */
    private async replayOne(operation: QueuedOperation): Promise<boolean> {
        await this.update(operation.id, (current) => ({ ...current, status: 'syncing' }));

        let attempts = 0;
        try {
            await withRetry(
                async (attempt) => {
                    attempts = attempt;
                    const result = await this.replayer.replay(operation);
                    if (result.ok) {
                        return;
                    }
                    if (!isAlreadyApplied(operation, result.failure)) {
                        throw new ReplayFailedError(result.failure);
                    }
                    functions.logger.info('[OfflineQueue] Operation already applied; removing', {
                        operationId: operation.id,
                        kind: operation.payload.kind,
                        reason: result.failure.kind,
                    });
                },
                {
                    maxAttempts: offlineQueueConfig.maxAttempts,
                    delaysMs: offlineQueueConfig.retryDelaysMs,
                    shouldRetry: isRetryable,
                    ...(this.sleep ? { sleep: this.sleep } : {}),
                    onRetry: (error, attempt, delayMs) =>
                        functions.logger.warn('[OfflineQueue] Replay failed; retrying', {
                            operationId: operation.id,
                            attempt,
                            delayMs,
                            error: error instanceof Error ? error.message : String(error),
                        }),
                },
            );
        } catch (error) {
            const lastError = error instanceof ReplayFailedError ? error.failure.kind : String(error);
            functions.logger.error('[OfflineQueue] Replay gave up', {
                operationId: operation.id,
                kind: operation.payload.kind,
                attempts,
                lastError,
            });
            await this.update(operation.id, (current) => ({
                ...current,
                status: 'failed',
                retryCount: current.retryCount + attempts,
                lastError,
            }));
            return false;
        }

        await this.update(operation.id, () => null);
        return true;
    }

    /**
     * Replays pending entries in FIFO order, only `userId`'s when given.
     * Concurrent calls for the same scope share one pass; a call for another
     * scope starts once the pass in flight has finished.
     */
    drainPending(userId?: string): Promise<DrainReport> {
        const scope = userId ?? ALL_USERS;
        const inFlight = storeDrains.get(this.store);
        if (inFlight && inFlight.scope === scope) {
            return inFlight.drain;
        }

        const previous = inFlight
            ? inFlight.drain.then(
                  () => undefined,
                  () => undefined,
              )
            : Promise.resolve();
        const drain: Promise<DrainReport> = previous
            .then(() => this.runDrain(userId))
            .finally(() => {
                if (storeDrains.get(this.store)?.drain === drain) {
                    storeDrains.delete(this.store);
                }
            });
        storeDrains.set(this.store, { scope, drain });
        return drain;
    }

    private async runDrain(userId?: string): Promise<DrainReport> {
        const pending = (await this.getPending()).filter(
            (operation) => userId === undefined || operation.userId === userId,
        );
        let successCount = 0;
        let failureCount = 0;

        for (const operation of pending) {
            if (await this.replayOne(operation)) {
                successCount += 1;
            } else {
                failureCount += 1;
            }
        }

        if (pending.length > 0) {
            functions.logger.info('[OfflineQueue] Drain complete', { successCount, failureCount });
        }
        return {
            successCount,
            failureCount,
            failure: failureCount > 0 ? { kind: 'sync_failed', failedCount: failureCount } : null,
        };
    }

    /** User-triggered retry of a failed entry. */
    async retry(operationId: string): Promise<boolean> {
        const operation = (await this.getFailed()).find((candidate) => candidate.id === operationId);
        if (!operation) {
            return false;
        }
        const reset: QueuedOperation = { ...operation, status: 'pending', lastError: null };
        await this.update(operationId, () => reset);
        return this.replayOne(reset);
    }

    private list(): Promise<QueuedOperation[]> {
        return this.withLock(() => this.load());
    }

    async getPending(): Promise<QueuedOperation[]> {
        return (await this.list()).filter((operation) => operation.status === 'pending');
    }

    async getFailed(): Promise<QueuedOperation[]> {
        return (await this.list()).filter((operation) => operation.status === 'failed');
    }

    async size(): Promise<number> {
        return (await this.list()).length;
    }

    async remove(operationId: string): Promise<boolean> {
        let removed = false;
        await this.update(operationId, () => {
            removed = true;
            return null;
        });
        return removed;
    }

    clearAll(): Promise<void> {
        return this.withLock(() => this.store.delete(offlineQueueConfig.storageKey));
    }
}
