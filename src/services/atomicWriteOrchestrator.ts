/**
 * Atomic Write Orchestrator
 *
 * Turns a session plus its summary update into Firestore batches:
 * auxiliary rollup reads first (in parallel), then one all-or-nothing batch
 * holding the event write and the three rollup merges. Bulk writes are split
 * at the batch ceiling; only the first batch carries the rollups.
 *
 * Failures come back as `AtomicWriteFailure` values; nothing here throws.
 */

import * as functions from 'firebase-functions';
import type { ScheduleTotals, TreatmentSession } from '../types/treatmentLogging';
import { captureException } from '../utils/sentry';
import { AtomicWriteFailure, atomicWriteFailure, fail, LoggingResult, succeed } from './loggingErrors';
import { BulkWriteError } from './repositories/common/errors';
import type {
    BulkWriteReport,
    RollupTarget,
    TreatmentWriteRepository,
} from './repositories/treatmentWrites/TreatmentWriteRepository';
import { hasUpdates, SummaryUpdateDto, withScheduleTotals } from './summaryUpdateDto';

export type WriteOutcome = {
    /** The update as written, after the schedule constants were resolved */
    dto: SummaryUpdateDto;
    rollupsWritten: boolean;
};

export type BulkWriteOutcome = WriteOutcome & BulkWriteReport;

export type BulkWriteFailure = {
    failure: AtomicWriteFailure;
    /** Sessions durably written by chunks before the failing one */
    committedSessionIds: string[];
};

export type BulkWriteResult =
    | { ok: true; value: BulkWriteOutcome }
    | { ok: false; failure: BulkWriteFailure };

export class AtomicWriteOrchestrator {
    constructor(private readonly repository: TreatmentWriteRepository) {}

    private reportFailure(operation: string, error: unknown, context: Record<string, unknown>): void {
        functions.logger.error(`[AtomicWrite] ${operation} failed`, {
            ...context,
            error: error instanceof Error ? error.message : String(error),
        });
        captureException(error, { operation, ...context });
    }

    /**
     * Writes one new or edited session with its rollups. `scheduleTotals`
     * are the day's constants, recorded only if the day has none yet. An
     * update with nothing to aggregate writes the session document alone.
     */
    async writeSessionWithRollups(
        operation: string,
        session: TreatmentSession,
        dto: SummaryUpdateDto,
        scheduleTotals: ScheduleTotals | null,
    ): Promise<LoggingResult<WriteOutcome, AtomicWriteFailure>> {
        const context = { userId: session.userId, petId: session.petId, sessionId: session.id };

        try {
            if (!hasUpdates(dto) && scheduleTotals === null) {
                await this.repository.writeSessionOnly(session);
                return succeed({ dto, rollupsWritten: false });
            }

            const aux = await this.repository.readAuxiliaryState({
                userId: session.userId,
                petId: session.petId,
                date: session.dateTime,
            });
            const resolved = scheduleTotals
                ? withScheduleTotals(dto, { alreadyRecorded: aux.scheduleTotalsRecorded, totals: scheduleTotals })
                : dto;

            await this.repository.writeSessionWithRollups(session, resolved, aux);
            return succeed({ dto: resolved, rollupsWritten: true });
        } catch (error) {
            this.reportFailure(operation, error, context);
            return fail(atomicWriteFailure(operation, error));
        }
    }

    async deleteSessionWithRollups(
        operation: string,
        session: TreatmentSession,
        dto: SummaryUpdateDto,
    ): Promise<LoggingResult<WriteOutcome, AtomicWriteFailure>> {
        const context = { userId: session.userId, petId: session.petId, sessionId: session.id };

        try {
            const aux = await this.repository.readAuxiliaryState({
                userId: session.userId,
                petId: session.petId,
                date: session.dateTime,
            });
            await this.repository.deleteSessionWithRollups(session, dto, aux);
            return succeed({ dto, rollupsWritten: true });
        } catch (error) {
            this.reportFailure(operation, error, context);
            return fail(atomicWriteFailure(operation, error));
        }
    }

    /**
     * Writes many sessions of one day. The rollup update is atomic with the
     * first chunk; a failure in a later chunk leaves earlier chunks in place
     * and reports which chunk failed.
     */
    async writeBulk(
        operation: string,
        target: RollupTarget,
        sessions: TreatmentSession[],
        dto: SummaryUpdateDto,
        scheduleTotals: ScheduleTotals | null,
    ): Promise<BulkWriteResult> {
        const context = { userId: target.userId, petId: target.petId, sessionCount: sessions.length };

        try {
            const aux = await this.repository.readAuxiliaryState(target);
            const resolved = scheduleTotals
                ? withScheduleTotals(dto, { alreadyRecorded: aux.scheduleTotalsRecorded, totals: scheduleTotals })
                : dto;
            const report = await this.repository.writeBulkSessions(target, sessions, resolved, aux);
            return succeed({ dto: resolved, rollupsWritten: true, ...report });
        } catch (error) {
            this.reportFailure(operation, error, context);
            if (error instanceof BulkWriteError) {
                return {
                    ok: false,
                    failure: {
                        failure: atomicWriteFailure(operation, error.failure, {
                            chunkIndex: error.chunkIndex,
                            committedSessionCount: error.committedSessionIds.length,
                        }),
                        committedSessionIds: error.committedSessionIds,
                    },
                };
            }
            return {
                ok: false,
                failure: { failure: atomicWriteFailure(operation, error), committedSessionIds: [] },
            };
        }
    }
}
