/**
 * Replayable logging operations held by the offline queue. Each payload
 * carries everything the live write path needs to run it again.
 */

import { z } from 'zod';
import type { FluidSession, MedicationSession, Schedule } from '../types/treatmentLogging';
import { fluidSessionSchema, medicationSessionSchema, scheduleSchema } from './sessionCodec';

export type QueuedOperationPayload =
    | {
          kind: 'createMedication';
          session: MedicationSession;
          todaysSchedules: Schedule[];
          recentSessions: MedicationSession[];
      }
    | { kind: 'createFluid'; session: FluidSession; todaysSchedules: Schedule[] }
    | { kind: 'updateMedication'; oldSession: MedicationSession; newSession: MedicationSession }
    | { kind: 'updateFluid'; oldSession: FluidSession; newSession: FluidSession }
    | { kind: 'quickLogAll'; todaysSchedules: Schedule[] };

export type QueuedOperationKind = QueuedOperationPayload['kind'];

export type QueuedOperationStatus = 'pending' | 'syncing' | 'failed';

export type NewQueuedOperation = {
    userId: string;
    petId: string;
    payload: QueuedOperationPayload;
};

export type QueuedOperation = NewQueuedOperation & {
    id: string;
    status: QueuedOperationStatus;
    retryCount: number;
    lastError: string | null;
    enqueuedAt: Date;
};

const payloadSchema: z.ZodType<QueuedOperationPayload, z.ZodTypeDef, unknown> = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('createMedication'),
        session: medicationSessionSchema,
        todaysSchedules: z.array(scheduleSchema).default([]),
        recentSessions: z.array(medicationSessionSchema).default([]),
    }),
    z.object({
        kind: z.literal('createFluid'),
        session: fluidSessionSchema,
        todaysSchedules: z.array(scheduleSchema).default([]),
    }),
    z.object({
        kind: z.literal('updateMedication'),
        oldSession: medicationSessionSchema,
        newSession: medicationSessionSchema,
    }),
    z.object({
        kind: z.literal('updateFluid'),
        oldSession: fluidSessionSchema,
        newSession: fluidSessionSchema,
    }),
    z.object({
        kind: z.literal('quickLogAll'),
        todaysSchedules: z.array(scheduleSchema),
    }),
]);

export const queuedOperationSchema: z.ZodType<QueuedOperation, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    userId: z.string().min(1),
    petId: z.string().min(1),
    payload: payloadSchema,
    status: z.enum(['pending', 'syncing', 'failed']),
    retryCount: z.number().int().nonnegative(),
    lastError: z.string().nullable().default(null),
    enqueuedAt: z.coerce.date(),
});

export const newQueuedOperationSchema: z.ZodType<NewQueuedOperation, z.ZodTypeDef, unknown> = z.object({
    userId: z.string().min(1),
    petId: z.string().min(1),
    payload: payloadSchema,
});
