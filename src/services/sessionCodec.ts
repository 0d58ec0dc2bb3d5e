/**
 * Session and schedule serialization.
 *
 * Two formats are supported:
 * - the Firestore document shape (Timestamps, server-assigned `updatedAt`)
 * - plain JSON (ISO date strings) used by the HTTP API and the offline queue
 */

import * as admin from 'firebase-admin';
import { z } from 'zod';
import {
    FluidSession,
    INJECTION_SITES,
    InjectionSite,
    MedicationSession,
    Schedule,
    StressLevel,
    TreatmentSession,
} from '../types/treatmentLogging';

// ---------------------------------------------------------------------------
// JSON schemas
// ---------------------------------------------------------------------------

const dateValue = z.coerce.date();
const optionalDate = dateValue.nullable().default(null);
const optionalString = z.string().nullable().default(null);

const sessionBaseShape = {
    id: z.string().min(1),
    userId: z.string().min(1),
    petId: z.string().min(1),
    dateTime: dateValue,
    notes: optionalString,
    scheduleId: optionalString,
    scheduledTime: optionalDate,
    createdAt: dateValue,
    updatedAt: optionalDate,
};

export const medicationSessionSchema: z.ZodType<MedicationSession, z.ZodTypeDef, unknown> = z.object({
    ...sessionBaseShape,
    kind: z.literal('medication'),
    medicationName: z.string(),
    dosageGiven: z.number(),
    dosageScheduled: z.number(),
    medicationUnit: z.string(),
    completed: z.boolean(),
});

export const fluidSessionSchema: z.ZodType<FluidSession, z.ZodTypeDef, unknown> = z.object({
    ...sessionBaseShape,
    kind: z.literal('fluid'),
    volumeGiven: z.number(),
    injectionSite: z.enum(INJECTION_SITES).nullable().default(null),
    stressLevel: z.enum(['low', 'medium', 'high']).nullable().default(null),
});

export const treatmentSessionSchema: z.ZodType<TreatmentSession, z.ZodTypeDef, unknown> = z.union([
    medicationSessionSchema,
    fluidSessionSchema,
]);

export const scheduleSchema: z.ZodType<Schedule, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    treatmentType: z.enum(['medication', 'fluid']),
    frequency: z.enum(['onceDaily', 'twiceDaily', 'thriceDaily', 'everyOtherDay', 'every3Days']),
    reminderTimes: z.array(dateValue),
    isActive: z.boolean().default(true),
    createdAt: dateValue,
    medicationName: optionalString,
    targetDosage: z.number().nullable().default(null),
    medicationUnit: optionalString,
    targetVolume: z.number().nullable().default(null),
    preferredLocation: z.enum(INJECTION_SITES).nullable().default(null),
});

// ---------------------------------------------------------------------------
// Firestore mapping
// ---------------------------------------------------------------------------

const toTimestamp = (date: Date) => admin.firestore.Timestamp.fromDate(date);

/**
 * Reads a Firestore Timestamp (or anything exposing `toDate`) as a Date.
 */
export function toDateValue(value: unknown): Date | null {
    if (value instanceof Date) {
        return value;
    }
    if (typeof value === 'object' && value !== null && 'toDate' in value && typeof value.toDate === 'function') {
        const converted: unknown = value.toDate();
        return converted instanceof Date ? converted : null;
    }
    return null;
}

const readString = (value: unknown, fallback = ''): string => (typeof value === 'string' ? value : fallback);

const readNullableString = (value: unknown): string | null => (typeof value === 'string' ? value : null);

const readNumber = (value: unknown): number => (typeof value === 'number' && Number.isFinite(value) ? value : 0);

const isInjectionSite = (value: unknown): value is InjectionSite =>
    INJECTION_SITES.some((site) => site === value);

const isStressLevel = (value: unknown): value is StressLevel =>
    value === 'low' || value === 'medium' || value === 'high';

export function sessionToFirestore(session: TreatmentSession): FirebaseFirestore.DocumentData {
    const base = {
        id: session.id,
        userId: session.userId,
        petId: session.petId,
        dateTime: toTimestamp(session.dateTime),
        notes: session.notes,
        scheduleId: session.scheduleId,
        scheduledTime: session.scheduledTime ? toTimestamp(session.scheduledTime) : null,
        createdAt: toTimestamp(session.createdAt),
        updatedAt: admin.firestore.FieldValue.serverTimestamp(),
    };

    if (session.kind === 'medication') {
        return {
            ...base,
            medicationName: session.medicationName,
            dosageGiven: session.dosageGiven,
            dosageScheduled: session.dosageScheduled,
            medicationUnit: session.medicationUnit,
            completed: session.completed,
        };
    }

    return {
        ...base,
        volumeGiven: session.volumeGiven,
        injectionSite: session.injectionSite,
        stressLevel: session.stressLevel,
    };
}

function readSessionBase(id: string, data: FirebaseFirestore.DocumentData) {
    const dateTime = toDateValue(data.dateTime) ?? new Date(0);
    return {
        id: readString(data.id, id),
        userId: readString(data.userId),
        petId: readString(data.petId),
        dateTime,
        notes: readNullableString(data.notes),
        scheduleId: readNullableString(data.scheduleId),
        scheduledTime: toDateValue(data.scheduledTime),
        createdAt: toDateValue(data.createdAt) ?? dateTime,
        updatedAt: toDateValue(data.updatedAt),
    };
}

export function medicationSessionFromFirestore(
    id: string,
    data: FirebaseFirestore.DocumentData,
): MedicationSession {
    return {
        ...readSessionBase(id, data),
        kind: 'medication',
        medicationName: readString(data.medicationName),
        dosageGiven: readNumber(data.dosageGiven),
        dosageScheduled: readNumber(data.dosageScheduled),
        medicationUnit: readString(data.medicationUnit),
        completed: data.completed === true,
    };
}

export function fluidSessionFromFirestore(id: string, data: FirebaseFirestore.DocumentData): FluidSession {
    return {
        ...readSessionBase(id, data),
        kind: 'fluid',
        volumeGiven: readNumber(data.volumeGiven),
        injectionSite: isInjectionSite(data.injectionSite) ? data.injectionSite : null,
        stressLevel: isStressLevel(data.stressLevel) ? data.stressLevel : null,
    };
}
