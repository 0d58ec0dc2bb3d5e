/**
 * Treatment Logs Routes
 *
 * API endpoints for logging medication and fluid sessions, catching up a
 * day with quick-log, reading period summaries, and inspecting the offline
 * queue.
 */

import express, { NextFunction, Response } from 'express';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { AuthRequest, authenticatedUserId, requireAuth } from '../middlewares/auth';
import { bulkWriteLimiter } from '../middlewares/rateLimit';
import { createTreatmentLoggingContainer } from '../services/domain/serviceContainer';
import { LoggingFailure, LoggingResult, loggingFailureStatus, serializeLoggingFailure } from '../services/loggingErrors';
import type { QueuedOperationPayload } from '../services/queuedOperations';
import { medicationSessionSchema, scheduleSchema } from '../services/sessionCodec';
import { TreatmentLoggingService } from '../services/treatmentLoggingService';
import { FluidSession, INJECTION_SITES, MedicationSession } from '../types/treatmentLogging';

const router = express.Router();
const getDb = () => admin.firestore();
const getContainer = () => createTreatmentLoggingContainer({ db: getDb() });

// Validation schemas
const sharedSessionFields = {
    dateTime: z.coerce.date(),
    notes: z.string().max(500).nullable(),
    scheduleId: z.string().min(1).nullable(),
    scheduledTime: z.coerce.date().nullable(),
};

const medicationFieldsSchema = z.object({
    ...sharedSessionFields,
    medicationName: z.string(),
    dosageGiven: z.number(),
    dosageScheduled: z.number(),
    medicationUnit: z.string(),
    completed: z.boolean(),
});

const fluidFieldsSchema = z.object({
    ...sharedSessionFields,
    volumeGiven: z.number(),
    injectionSite: z.enum(INJECTION_SITES).nullable(),
    stressLevel: z.enum(['low', 'medium', 'high']).nullable(),
});

const newSessionOptions = {
    id: z.string().min(1).optional(),
    notes: sharedSessionFields.notes.default(null),
    scheduleId: sharedSessionFields.scheduleId.default(null),
    scheduledTime: sharedSessionFields.scheduledTime.default(null),
};

const logMedicationSchema = z.object({
    session: medicationFieldsSchema.extend(newSessionOptions),
    todaysSchedules: z.array(scheduleSchema).default([]),
    recentSessions: z.array(medicationSessionSchema).default([]),
    queueOnFailure: z.boolean().default(false),
});

const logFluidSchema = z.object({
    session: fluidFieldsSchema.extend({
        ...newSessionOptions,
        injectionSite: fluidFieldsSchema.shape.injectionSite.default(null),
        stressLevel: fluidFieldsSchema.shape.stressLevel.default(null),
    }),
    todaysSchedules: z.array(scheduleSchema).default([]),
    queueOnFailure: z.boolean().default(false),
});

const updateMedicationSchema = z.object({
    changes: medicationFieldsSchema.partial(),
    queueOnFailure: z.boolean().default(false),
});

const updateFluidSchema = z.object({
    changes: fluidFieldsSchema.partial(),
    queueOnFailure: z.boolean().default(false),
});

const quickLogSchema = z.object({
    todaysSchedules: z.array(scheduleSchema),
    queueOnFailure: z.boolean().default(false),
});

const summaryQuerySchema = z.object({
    date: z.coerce.date(),
});

const todaysSessionsQuerySchema = z.object({
    medicationName: z.string().min(1),
});

const sessionKindSchema = z.enum(['medication', 'fluid']);

const sendFailure = (res: Response, failure: LoggingFailure) => {
    res.status(loggingFailureStatus(failure)).json(serializeLoggingFailure(failure));
};

const pick = <T>(change: T | undefined, current: T): T => (change === undefined ? current : change);

/** Resolves the caller's uid, answering 401 when the token carried none. */
function requireUserId(req: AuthRequest, res: Response): string | null {
    const userId = authenticatedUserId(req);
    if (!userId) {
        res.status(401).json({ code: 'unauthorized', message: 'Authentication required' });
    }
    return userId;
}

/**
 * Runs a logging operation directly, or through the offline queue when the
 * caller asked for failed writes to be kept for later.
 */
async function runLogging(
    res: Response,
    options: { userId: string; petId: string; payload: QueuedOperationPayload; queueOnFailure: boolean },
    direct: () => Promise<LoggingResult<unknown>>,
    successStatus: number,
): Promise<void> {
    if (!options.queueOnFailure) {
        const result = await direct();
        if (!result.ok) {
            sendFailure(res, result.failure);
            return;
        }
        res.status(successStatus).json(result.value);
        return;
    }

    const { offlineQueue } = getContainer();
    const result = await offlineQueue.logOrQueue({
        userId: options.userId,
        petId: options.petId,
        payload: options.payload,
    });
    if (!result.ok) {
        sendFailure(res, result.failure);
        return;
    }
    if (result.value.status === 'written') {
        res.status(successStatus).json(result.value.value);
        return;
    }
    res.status(202).json({
        queued: true,
        operationId: result.value.operation.id,
        warning: result.value.warning ? serializeLoggingFailure(result.value.warning) : null,
    });
}

/**
 * POST /v1/treatment-logs/pets/:petId/medication
 * Log a medication session
 */
router.post('/pets/:petId/medication', requireAuth, async (req: AuthRequest, res, next: NextFunction) => {
    try {
        const userId = requireUserId(req, res);
        if (!userId) return;
        const { petId } = req.params;
        const data = logMedicationSchema.parse(req.body);

        const session: MedicationSession = {
            ...data.session,
            kind: 'medication',
            id: data.session.id ?? TreatmentLoggingService.newSessionId(),
            userId,
            petId,
            createdAt: new Date(),
            updatedAt: null,
        };
        const { loggingService } = getContainer();

        await runLogging(
            res,
            {
                userId,
                petId,
                payload: {
                    kind: 'createMedication',
                    session,
                    todaysSchedules: data.todaysSchedules,
                    recentSessions: data.recentSessions,
                },
                queueOnFailure: data.queueOnFailure,
            },
            () =>
                loggingService.logMedicationSession({
                    session,
                    todaysSchedules: data.todaysSchedules,
                    recentSessions: data.recentSessions,
                }),
            201,
        );
    } catch (error) {
        next(error);
    }
});

/**
 * POST /v1/treatment-logs/pets/:petId/fluid
 * Log a fluid session
 */
router.post('/pets/:petId/fluid', requireAuth, async (req: AuthRequest, res, next: NextFunction) => {
    try {
        const userId = requireUserId(req, res);
        if (!userId) return;
        const { petId } = req.params;
        const data = logFluidSchema.parse(req.body);

        const session: FluidSession = {
            ...data.session,
            kind: 'fluid',
            id: data.session.id ?? TreatmentLoggingService.newSessionId(),
            userId,
            petId,
            createdAt: new Date(),
            updatedAt: null,
        };
        const { loggingService } = getContainer();

        await runLogging(
            res,
            {
                userId,
                petId,
                payload: { kind: 'createFluid', session, todaysSchedules: data.todaysSchedules },
                queueOnFailure: data.queueOnFailure,
            },
            () => loggingService.logFluidSession({ session, todaysSchedules: data.todaysSchedules }),
            201,
        );
    } catch (error) {
        next(error);
    }
});

/**
 * PATCH /v1/treatment-logs/pets/:petId/medication/:sessionId
 * Edit a medication session; only changed aggregates touch the summaries
 */
router.patch(
    '/pets/:petId/medication/:sessionId',
    requireAuth,
    async (req: AuthRequest, res, next: NextFunction) => {
        try {
            const userId = requireUserId(req, res);
            if (!userId) return;
            const { petId, sessionId } = req.params;
            const { changes, queueOnFailure } = updateMedicationSchema.parse(req.body);
            const { sessionRepository, loggingService } = getContainer();

            const oldSession = await sessionRepository.getById(userId, petId, 'medication', sessionId);
            if (!oldSession || oldSession.kind !== 'medication') {
                res.status(404).json({ code: 'not_found', message: 'Medication session not found' });
                return;
            }

            const newSession: MedicationSession = {
                ...oldSession,
                dateTime: pick(changes.dateTime, oldSession.dateTime),
                notes: pick(changes.notes, oldSession.notes),
                scheduleId: pick(changes.scheduleId, oldSession.scheduleId),
                scheduledTime: pick(changes.scheduledTime, oldSession.scheduledTime),
                medicationName: pick(changes.medicationName, oldSession.medicationName),
                dosageGiven: pick(changes.dosageGiven, oldSession.dosageGiven),
                dosageScheduled: pick(changes.dosageScheduled, oldSession.dosageScheduled),
                medicationUnit: pick(changes.medicationUnit, oldSession.medicationUnit),
                completed: pick(changes.completed, oldSession.completed),
            };

            await runLogging(
                res,
                {
                    userId,
                    petId,
                    payload: { kind: 'updateMedication', oldSession, newSession },
                    queueOnFailure,
                },
                () => loggingService.updateMedicationSession({ oldSession, newSession }),
                200,
            );
        } catch (error) {
            next(error);
        }
    },
);

/**
 * PATCH /v1/treatment-logs/pets/:petId/fluid/:sessionId
 * Edit a fluid session
 */
router.patch('/pets/:petId/fluid/:sessionId', requireAuth, async (req: AuthRequest, res, next: NextFunction) => {
    try {
        const userId = requireUserId(req, res);
        if (!userId) return;
        const { petId, sessionId } = req.params;
        const { changes, queueOnFailure } = updateFluidSchema.parse(req.body);
        const { sessionRepository, loggingService } = getContainer();

        const oldSession = await sessionRepository.getById(userId, petId, 'fluid', sessionId);
        if (!oldSession || oldSession.kind !== 'fluid') {
            res.status(404).json({ code: 'not_found', message: 'Fluid session not found' });
            return;
        }

        const newSession: FluidSession = {
            ...oldSession,
            dateTime: pick(changes.dateTime, oldSession.dateTime),
            notes: pick(changes.notes, oldSession.notes),
            scheduleId: pick(changes.scheduleId, oldSession.scheduleId),
            scheduledTime: pick(changes.scheduledTime, oldSession.scheduledTime),
            volumeGiven: pick(changes.volumeGiven, oldSession.volumeGiven),
            injectionSite: pick(changes.injectionSite, oldSession.injectionSite),
            stressLevel: pick(changes.stressLevel, oldSession.stressLevel),
        };

        await runLogging(
            res,
            {
                userId,
                petId,
                payload: { kind: 'updateFluid', oldSession, newSession },
                queueOnFailure,
            },
            () => loggingService.updateFluidSession({ oldSession, newSession }),
            200,
        );
    } catch (error) {
        next(error);
    }
});

/**
 * DELETE /v1/treatment-logs/pets/:petId/:kind/:sessionId
 * Delete a session and reverse its summary contributions
 */
router.delete('/pets/:petId/:kind/:sessionId', requireAuth, async (req: AuthRequest, res, next: NextFunction) => {
    try {
        const userId = requireUserId(req, res);
        if (!userId) return;
        const { petId, sessionId } = req.params;
        const kind = sessionKindSchema.parse(req.params.kind);
        const { sessionRepository, loggingService } = getContainer();

        const session = await sessionRepository.getById(userId, petId, kind, sessionId);
        if (!session) {
            res.status(404).json({ code: 'not_found', message: 'Treatment session not found' });
            return;
        }

        const result = await loggingService.deleteSession(session);
        if (!result.ok) {
            sendFailure(res, result.failure);
            return;
        }
        res.status(204).send();
    } catch (error) {
        next(error);
    }
});

/**
 * POST /v1/treatment-logs/pets/:petId/quick-log
 * Log every treatment still outstanding today
 */
router.post(
    '/pets/:petId/quick-log',
    requireAuth,
    bulkWriteLimiter,
    async (req: AuthRequest, res, next: NextFunction) => {
        try {
            const userId = requireUserId(req, res);
            if (!userId) return;
            const { petId } = req.params;
            const { todaysSchedules, queueOnFailure } = quickLogSchema.parse(req.body);
            const { loggingService } = getContainer();

            await runLogging(
                res,
                { userId, petId, payload: { kind: 'quickLogAll', todaysSchedules }, queueOnFailure },
                () => loggingService.quickLogAllTreatments({ userId, petId, todaysSchedules }),
                201,
            );
        } catch (error) {
            next(error);
        }
    },
);

/**
 * GET /v1/treatment-logs/pets/:petId/medication/today
 * Today's sessions for one medication, newest first
 */
router.get('/pets/:petId/medication/today', requireAuth, async (req: AuthRequest, res, next: NextFunction) => {
    try {
        const userId = requireUserId(req, res);
        if (!userId) return;
        const { medicationName } = todaysSessionsQuerySchema.parse(req.query);
        const { loggingService } = getContainer();

        const sessions = await loggingService.getTodaysMedicationSessions(userId, req.params.petId, medicationName);
        res.json({ sessions });
    } catch (error) {
        next(error);
    }
});

/**
 * GET /v1/treatment-logs/pets/:petId/summaries/:period
 * Daily, weekly or monthly summary; `today` ignores the date query
 */
router.get('/pets/:petId/summaries/:period', requireAuth, async (req: AuthRequest, res, next: NextFunction) => {
    try {
        const userId = requireUserId(req, res);
        if (!userId) return;
        const { petId } = req.params;
        const period = z.enum(['today', 'daily', 'weekly', 'monthly']).parse(req.params.period);
        const { summaryReads } = getContainer();

        let summary: unknown;
        if (period === 'today') {
            summary = await summaryReads.getTodaySummary(userId, petId);
        } else {
            const { date } = summaryQuerySchema.parse(req.query);
            if (period === 'daily') {
                summary = await summaryReads.getDailySummary(userId, petId, date);
            } else if (period === 'weekly') {
                summary = await summaryReads.getWeeklySummary(userId, petId, date);
            } else {
                summary = await summaryReads.getMonthlySummary(userId, petId, date);
            }
        }

        res.json({ summary });
    } catch (error) {
        next(error);
    }
});

/**
 * GET /v1/treatment-logs/queue
 * The caller's queued operations
 */
router.get('/queue', requireAuth, async (req: AuthRequest, res, next: NextFunction) => {
    try {
        const userId = requireUserId(req, res);
        if (!userId) return;
        const { offlineQueue } = getContainer();

        const [pending, failed] = await Promise.all([offlineQueue.getPending(), offlineQueue.getFailed()]);
        const own = <T extends { userId: string }>(operations: T[]) =>
            operations.filter((operation) => operation.userId === userId);

        res.json({ pending: own(pending), failed: own(failed) });
    } catch (error) {
        next(error);
    }
});

/**
 * POST /v1/treatment-logs/queue/drain
 * Replay the caller's pending operations now
 */
router.post('/queue/drain', requireAuth, bulkWriteLimiter, async (req: AuthRequest, res, next: NextFunction) => {
    try {
        const userId = requireUserId(req, res);
        if (!userId) return;
        const { offlineQueue } = getContainer();
        const report = await offlineQueue.drainPending(userId);

        functions.logger.info('[TreatmentLogging] Queue drained on request', {
            userId,
            successCount: report.successCount,
            failureCount: report.failureCount,
        });

        res.json({
            successCount: report.successCount,
            failureCount: report.failureCount,
            failure: report.failure ? serializeLoggingFailure(report.failure) : null,
        });
    } catch (error) {
        next(error);
    }
});

async function findOwnOperation(userId: string, operationId: string) {
    const { offlineQueue } = getContainer();
    const [pending, failed] = await Promise.all([offlineQueue.getPending(), offlineQueue.getFailed()]);
    const operation = [...pending, ...failed].find(
        (candidate) => candidate.id === operationId && candidate.userId === userId,
    );
    return { offlineQueue, operation };
}

/**
 * POST /v1/treatment-logs/queue/:operationId/retry
 * Retry a failed operation
 */
router.post('/queue/:operationId/retry', requireAuth, async (req: AuthRequest, res, next: NextFunction) => {
    try {
        const userId = requireUserId(req, res);
        if (!userId) return;
        const { offlineQueue, operation } = await findOwnOperation(userId, req.params.operationId);
        if (!operation) {
            res.status(404).json({ code: 'not_found', message: 'Queued operation not found' });
            return;
        }

        const synced = await offlineQueue.retry(operation.id);
        res.json({ synced });
    } catch (error) {
        next(error);
    }
});

/**
 * DELETE /v1/treatment-logs/queue/:operationId
 * Discard a queued operation
 */
router.delete('/queue/:operationId', requireAuth, async (req: AuthRequest, res, next: NextFunction) => {
    try {
        const userId = requireUserId(req, res);
        if (!userId) return;
        const { offlineQueue, operation } = await findOwnOperation(userId, req.params.operationId);
        if (!operation) {
            res.status(404).json({ code: 'not_found', message: 'Queued operation not found' });
            return;
        }

        await offlineQueue.remove(operation.id);
        res.status(204).send();
    } catch (error) {
        next(error);
    }
});

export { router as treatmentLogsRouter };
export default router;
