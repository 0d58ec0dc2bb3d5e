/**
 * Treatment Logging Service
 *
 * Entry points for recording medication and fluid sessions. A single log
 * runs, in order: validation, duplicate check (medication only), schedule
 * matching, summary update construction, the atomic write, and finally the
 * optimistic local cache update. Queued operations replay through the same
 * methods.
 */

import { randomUUID } from 'crypto';
import * as functions from 'firebase-functions';
import { treatmentLoggingConfig } from '../config';
import type {
    FluidSession,
    MedicationSession,
    Schedule,
    TreatmentSession,
} from '../types/treatmentLogging';
import { formatDayId, isSameDay, startOfDay } from '../utils/summaryDates';
import { AtomicWriteOrchestrator } from './atomicWriteOrchestrator';
import { DuplicateCandidate, findDuplicate } from './duplicateDetector';
import { dispatchAnalytics, LoggingAnalytics } from './loggingAnalytics';
import {
    atomicWriteFailure,
    fail,
    LoggingFailure,
    LoggingResult,
    succeed,
    validationFailure,
} from './loggingErrors';
import type { QueuedOperation } from './queuedOperations';
import { QuickLogSnapshot, reconcile, snapshotFromCache, snapshotFromSessions } from './quickLogReconciler';
import type { TreatmentSessionRepository } from './repositories/treatmentSessions/TreatmentSessionRepository';
import { applyScheduleMatch, matchSchedule } from './scheduleMatcher';
import { SessionValidator, validateSession, validateSessionEdit } from './sessionValidation';
import {
    applySessionFacts,
    cacheFactsFromSession,
    DailySummaryCache,
    emptyCacheEntry,
    sameCacheFacts,
    SummaryCacheService,
} from './summaryCacheService';
import { SummaryReadService } from './summaryReadService';
import {
    fromBulkSessions,
    fromDeletedSession,
    fromEditDelta,
    fromNewSession,
    scheduleTotalsForDay,
} from './summaryUpdateDto';

export type LogMedicationRequest = {
    session: MedicationSession;
    todaysSchedules: Schedule[];
    /** Recent sessions the caller already holds; merged with cache hints */
    recentSessions?: MedicationSession[];
};

export type LogFluidRequest = {
    session: FluidSession;
    todaysSchedules: Schedule[];
};

export type UpdateSessionRequest<T extends TreatmentSession> = {
    oldSession: T;
    newSession: T;
};

export type QuickLogRequest = {
    userId: string;
    petId: string;
    todaysSchedules: Schedule[];
};

export type QuickLogOutcome = {
    medicationSessions: MedicationSession[];
    fluidSessions: FluidSession[];
    chunkCount: number;
};

export type TreatmentLoggingDependencies = {
    orchestrator: AtomicWriteOrchestrator;
    sessionRepository: TreatmentSessionRepository;
    summaryCache: SummaryCacheService;
    summaryReads: SummaryReadService;
    analytics: LoggingAnalytics;
    validator: SessionValidator;
    clock?: () => Date;
};

const nextDay = (date: Date): Date => new Date(date.getFullYear(), date.getMonth(), date.getDate() + 1);

export class TreatmentLoggingService {
    private readonly clock: () => Date;

    constructor(private readonly deps: TreatmentLoggingDependencies) {
        this.clock = deps.clock ?? (() => new Date());
    }

    private track(failure: LoggingFailure, context: Record<string, unknown>): { ok: false; failure: LoggingFailure } {
        dispatchAnalytics(() => this.deps.analytics.trackLoggingFailure(failure.kind, context));
        return fail(failure);
    }

    private async validate(session: TreatmentSession, builtIn: string[]): Promise<string[]> {
        const extra = await this.deps.validator.validate(session);
        return [...builtIn, ...extra];
    }

    private invalidateReads(session: TreatmentSession): void {
        this.deps.summaryReads.invalidate(session.userId, session.petId, session.dateTime);
    }

    /**
     * Medication sessions logged on the calendar day of `day` for one
     * medication, newest first. Never fails: errors yield an empty list so
     * duplicate detection cannot block logging.
     */
    async getTodaysMedicationSessions(
        userId: string,
        petId: string,
        medicationName: string,
        day: Date = this.clock(),
    ): Promise<MedicationSession[]> {
        try {
            return await this.deps.sessionRepository.listMedicationSessionsByName(userId, petId, medicationName, {
                since: startOfDay(day),
                until: nextDay(day),
                limit: treatmentLoggingConfig.remoteDuplicateQueryLimit,
            });
        } catch (error) {
            functions.logger.warn('[TreatmentLogging] Duplicate lookup failed; continuing without it', {
                userId,
                petId,
                error: error instanceof Error ? error.message : String(error),
            });
            return [];
        }
    }

    private async duplicateCandidates(request: LogMedicationRequest): Promise<DuplicateCandidate[]> {
        const { session } = request;
        const candidates: DuplicateCandidate[] = [...(request.recentSessions ?? [])];

        const cache = isSameDay(session.dateTime, this.clock())
            ? await this.deps.summaryCache.get(session.userId, session.petId)
            : null;

        if (cache) {
            const hints = cache.medicationRecentTimes[session.medicationName] ?? [];
            candidates.push(
                ...hints.map((time) => ({ id: null, medicationName: session.medicationName, dateTime: new Date(time) })),
            );
        } else {
            candidates.push(
                ...(await this.getTodaysMedicationSessions(
                    session.userId,
                    session.petId,
                    session.medicationName,
                    session.dateTime,
                )),
            );
        }

        return candidates;
    }

    /**
     * Id of `session` when it is itself already stored. Resolves a conflict
     * found through a cache hint, which carries no id.
     */
    private async storedSessionId(session: MedicationSession): Promise<string | null> {
        try {
            const stored = await this.deps.sessionRepository.getById(
                session.userId,
                session.petId,
                'medication',
                session.id,
            );
            return stored ? stored.id : null;
        } catch (error) {
            functions.logger.warn('[TreatmentLogging] Stored session lookup failed', {
                userId: session.userId,
                petId: session.petId,
                sessionId: session.id,
                error: error instanceof Error ? error.message : String(error),
            });
            return null;
        }
    }

    async logMedicationSession(request: LogMedicationRequest): Promise<LoggingResult<MedicationSession>> {
        const operation = 'logMedicationSession';
        const context = { operation, userId: request.session.userId, petId: request.session.petId };

        const errors = await this.validate(request.session, validateSession(request.session, this.clock()));
        if (errors.length > 0) {
            return this.track(validationFailure(errors), context);
        }

        const duplicate = findDuplicate(request.session, await this.duplicateCandidates(request));
        if (duplicate) {
            return this.track(
                {
                    kind: 'duplicate_conflict',
                    medicationName: duplicate.medicationName,
                    conflictingTime: duplicate.dateTime,
                    existingSessionId: duplicate.id ?? (await this.storedSessionId(request.session)),
                },
                context,
            );
        }

        const session = applyScheduleMatch(request.session, matchSchedule(request.session, request.todaysSchedules));
        const written = await this.deps.orchestrator.writeSessionWithRollups(
            operation,
            session,
            fromNewSession(session),
            scheduleTotalsForDay(request.todaysSchedules, session.dateTime),
        );
        if (!written.ok) {
            return this.track(written.failure, context);
        }

        await this.deps.summaryCache.putAfterSession(session.userId, session.petId, cacheFactsFromSession(session));
        this.invalidateReads(session);
        dispatchAnalytics(() =>
            this.deps.analytics.trackFeatureUsed('medication_logged', {
                matchedSchedule: session.scheduleId !== null,
                completed: session.completed,
            }),
        );
        functions.logger.info('[TreatmentLogging] Logged medication session', {
            ...context,
            sessionId: session.id,
            scheduleId: session.scheduleId,
        });

        return succeed(session);
    }

    async logFluidSession(request: LogFluidRequest): Promise<LoggingResult<FluidSession>> {
        const operation = 'logFluidSession';
        const context = { operation, userId: request.session.userId, petId: request.session.petId };

        const errors = await this.validate(request.session, validateSession(request.session, this.clock()));
        if (errors.length > 0) {
            return this.track(validationFailure(errors), context);
        }

        const session = applyScheduleMatch(request.session, matchSchedule(request.session, request.todaysSchedules));
        const written = await this.deps.orchestrator.writeSessionWithRollups(
            operation,
            session,
            fromNewSession(session),
            scheduleTotalsForDay(request.todaysSchedules, session.dateTime),
        );
        if (!written.ok) {
            return this.track(written.failure, context);
        }

        await this.deps.summaryCache.putAfterSession(session.userId, session.petId, cacheFactsFromSession(session));
        this.invalidateReads(session);
        dispatchAnalytics(() =>
            this.deps.analytics.trackFeatureUsed('fluid_logged', {
                matchedSchedule: session.scheduleId !== null,
                volumeGiven: session.volumeGiven,
            }),
        );
        functions.logger.info('[TreatmentLogging] Logged fluid session', {
            ...context,
            sessionId: session.id,
            scheduleId: session.scheduleId,
        });

        return succeed(session);
    }

    private async updateSession<T extends TreatmentSession>(
        operation: string,
        request: UpdateSessionRequest<T>,
    ): Promise<LoggingResult<T>> {
        const { oldSession } = request;
        const context = { operation, userId: oldSession.userId, petId: oldSession.petId, sessionId: oldSession.id };

        const errors = await this.validate(
            request.newSession,
            validateSessionEdit(oldSession, request.newSession, this.clock()),
        );
        if (errors.length > 0) {
            return this.track(validationFailure(errors), context);
        }

        const newSession: T = { ...request.newSession, createdAt: oldSession.createdAt };
        const dto = fromEditDelta(oldSession, newSession);
        const written = await this.deps.orchestrator.writeSessionWithRollups(operation, newSession, dto, null);
        if (!written.ok) {
            return this.track(written.failure, context);
        }

        const oldFacts = cacheFactsFromSession(oldSession);
        const newFacts = cacheFactsFromSession(newSession);
        // a time-only edit writes no rollups but still moves the cached hints
        if (written.value.rollupsWritten || !sameCacheFacts(oldFacts, newFacts)) {
            await this.deps.summaryCache.putAfterEdit(oldSession.userId, oldSession.petId, oldFacts, newFacts);
        }
        if (written.value.rollupsWritten) {
            this.invalidateReads(newSession);
        }
        functions.logger.info('[TreatmentLogging] Updated session', {
            ...context,
            rollupsWritten: written.value.rollupsWritten,
        });

        return succeed(newSession);
    }

    updateMedicationSession(
        request: UpdateSessionRequest<MedicationSession>,
    ): Promise<LoggingResult<MedicationSession>> {
        return this.updateSession('updateMedicationSession', request);
    }

    updateFluidSession(request: UpdateSessionRequest<FluidSession>): Promise<LoggingResult<FluidSession>> {
        return this.updateSession('updateFluidSession', request);
    }

    /**
     * Deletes a session and reverses its rollup and cache contributions.
     */
    async deleteSession(session: TreatmentSession): Promise<LoggingResult<TreatmentSession>> {
        const operation = session.kind === 'medication' ? 'deleteMedicationSession' : 'deleteFluidSession';
        const context = { operation, userId: session.userId, petId: session.petId, sessionId: session.id };

        const written = await this.deps.orchestrator.deleteSessionWithRollups(
            operation,
            session,
            fromDeletedSession(session),
        );
        if (!written.ok) {
            return this.track(written.failure, context);
        }

        await this.deps.summaryCache.putAfterDeletion(session.userId, session.petId, cacheFactsFromSession(session));
        this.invalidateReads(session);
        functions.logger.info('[TreatmentLogging] Deleted session', context);

        return succeed(session);
    }

    /**
     * What is already logged today, from the local cache or, on a miss, from
     * a bounded read of today's sessions.
     */
    private async loadTodaySnapshot(
        userId: string,
        petId: string,
        now: Date,
    ): Promise<{ snapshot: QuickLogSnapshot; baseEntry: DailySummaryCache }> {
        const cached = await this.deps.summaryCache.get(userId, petId);
        if (cached) {
            return { snapshot: snapshotFromCache(cached), baseEntry: cached };
        }

        const range = { since: startOfDay(now), until: nextDay(now), limit: treatmentLoggingConfig.quickLogSnapshotQueryLimit };
        const [medicationSessions, fluidSessions] = await Promise.all([
            this.deps.sessionRepository.listMedicationSessions(userId, petId, range),
            this.deps.sessionRepository.listFluidSessions(userId, petId, range),
        ]);

        const chronological = [...medicationSessions, ...fluidSessions].sort(
            (a, b) => a.dateTime.getTime() - b.dateTime.getTime(),
        );
        const baseEntry = chronological.reduce(
            (entry, session) => applySessionFacts(entry, cacheFactsFromSession(session)),
            emptyCacheEntry(formatDayId(now)),
        );

        return { snapshot: snapshotFromSessions(medicationSessions, fluidSessions), baseEntry };
    }

    /**
     * Logs everything prescribed for today that is not logged yet, as one
     * bulk write.
     */
    async quickLogAllTreatments(request: QuickLogRequest): Promise<LoggingResult<QuickLogOutcome>> {
        const operation = 'quickLogAllTreatments';
        const { userId, petId } = request;
        const context = { operation, userId, petId };
        const now = this.clock();

        let today: { snapshot: QuickLogSnapshot; baseEntry: DailySummaryCache };
        try {
            today = await this.loadTodaySnapshot(userId, petId, now);
        } catch (error) {
            functions.logger.error('[TreatmentLogging] Quick-log snapshot read failed', {
                ...context,
                error: error instanceof Error ? error.message : String(error),
            });
            return this.track(atomicWriteFailure(operation, error), context);
        }

        const plan = reconcile({ userId, petId, schedules: request.todaysSchedules, snapshot: today.snapshot, now });
        if (!plan.ok) {
            if (plan.failure.kind === 'reconciliation_empty') {
                dispatchAnalytics(() => this.deps.analytics.trackFeatureUsed('quick_log_caught_up', {}));
                return fail(plan.failure);
            }
            return this.track(plan.failure, context);
        }

        const { medicationSessions, fluidSessions } = plan.value;
        const sessions: TreatmentSession[] = [...medicationSessions, ...fluidSessions];
        const errors: string[] = [];
        for (const session of sessions) {
            errors.push(...(await this.validate(session, validateSession(session, now))));
        }
        if (errors.length > 0) {
            return this.track(validationFailure([...new Set(errors)]), context);
        }

        const written = await this.deps.orchestrator.writeBulk(
            operation,
            { userId, petId, date: now },
            sessions,
            fromBulkSessions(medicationSessions, fluidSessions, null),
            scheduleTotalsForDay(request.todaysSchedules, now),
        );

        const committed = written.ok
            ? sessions
            : sessions.filter((session) => written.failure.committedSessionIds.includes(session.id));
        if (committed.length > 0) {
            await this.deps.summaryCache.putAfterBulk(
                userId,
                petId,
                committed.reduce(
                    (entry, session) => applySessionFacts(entry, cacheFactsFromSession(session)),
                    today.baseEntry,
                ),
            );
        }
        if (written.ok || committed.length > 0) {
            this.deps.summaryReads.invalidate(userId, petId, now);
        }

        if (!written.ok) {
            return this.track(written.failure.failure, context);
        }

        dispatchAnalytics(() =>
            this.deps.analytics.trackFeatureUsed('quick_log_all', {
                medicationCount: medicationSessions.length,
                fluidCount: fluidSessions.length,
            }),
        );
        functions.logger.info('[TreatmentLogging] Quick-log complete', {
            ...context,
            sessionCount: sessions.length,
            chunkCount: written.value.chunkCount,
        });

        return succeed({ medicationSessions, fluidSessions, chunkCount: written.value.chunkCount });
    }

    /**
     * Runs a queued operation through the live path. Quick-log requests are
     * only meaningful on the day they were made.
     */
    async replay(operation: QueuedOperation): Promise<LoggingResult<unknown>> {
        const { payload } = operation;
        switch (payload.kind) {
            case 'createMedication':
                return this.logMedicationSession({
                    session: payload.session,
                    todaysSchedules: payload.todaysSchedules,
                    recentSessions: payload.recentSessions,
                });
            case 'createFluid':
                return this.logFluidSession({ session: payload.session, todaysSchedules: payload.todaysSchedules });
            case 'updateMedication':
                return this.updateMedicationSession({ oldSession: payload.oldSession, newSession: payload.newSession });
            case 'updateFluid':
                return this.updateFluidSession({ oldSession: payload.oldSession, newSession: payload.newSession });
            case 'quickLogAll':
                if (!isSameDay(operation.enqueuedAt, this.clock())) {
                    return fail(validationFailure(['Quick-log request expired at the end of its day']));
                }
                return this.quickLogAllTreatments({
                    userId: operation.userId,
                    petId: operation.petId,
                    todaysSchedules: payload.todaysSchedules,
                });
            default: {
                const unreachable: never = payload;
                return unreachable;
            }
        }
    }

    /** Ids for sessions created by API callers that did not supply one. */
    static newSessionId(): string {
        return randomUUID();
    }
}
