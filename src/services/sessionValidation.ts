import { treatmentLoggingConfig } from '../config';
import { FluidSession, MedicationSession, TreatmentSession } from '../types/treatmentLogging';
import { isSameDay } from '../utils/summaryDates';

/**
 * Extra, feature-flagged checks layered on top of the built-in rules.
 * Returns the list of problems; an empty list means the session is accepted.
 */
export interface SessionValidator {
    validate(session: TreatmentSession): string[] | Promise<string[]>;
}

export const passThroughSessionValidator: SessionValidator = {
    validate: () => [],
};

function validateCommon(session: TreatmentSession, now: Date): string[] {
    const errors: string[] = [];

    if (!session.id.trim()) {
        errors.push('Session id is required');
    }
    if (!session.userId.trim() || !session.petId.trim()) {
        errors.push('Session must belong to a user and a pet');
    }
    if (Number.isNaN(session.dateTime.getTime())) {
        errors.push('Treatment time is invalid');
    } else if (session.dateTime.getTime() > now.getTime()) {
        errors.push('Treatment time cannot be in the future');
    }
    if ((session.scheduleId === null) !== (session.scheduledTime === null)) {
        errors.push('Schedule id and scheduled time must be set together');
    }

    return errors;
}

export function validateMedicationSession(session: MedicationSession, now: Date): string[] {
    const errors = validateCommon(session, now);
    const { minMedicationNameLength, maxMedicationDosage } = treatmentLoggingConfig;

    if (session.medicationName.trim().length < minMedicationNameLength) {
        errors.push(`Medication name must be at least ${minMedicationNameLength} characters`);
    }
    if (!session.medicationUnit.trim()) {
        errors.push('Medication unit is required');
    }
    if (!Number.isFinite(session.dosageGiven) || session.dosageGiven < 0) {
        errors.push('Dosage given cannot be negative');
    } else if (session.dosageGiven > maxMedicationDosage) {
        errors.push(`Dosage given cannot exceed ${maxMedicationDosage}`);
    }
    if (!Number.isFinite(session.dosageScheduled) || session.dosageScheduled <= 0) {
        errors.push('Scheduled dosage must be greater than zero');
    }

    return errors;
}

export function validateFluidSession(session: FluidSession, now: Date): string[] {
    const errors = validateCommon(session, now);
    const { minFluidVolumeMl, maxFluidVolumeMl } = treatmentLoggingConfig;

    if (
        !Number.isFinite(session.volumeGiven) ||
        session.volumeGiven < minFluidVolumeMl ||
        session.volumeGiven > maxFluidVolumeMl
    ) {
        errors.push(`Fluid volume must be between ${minFluidVolumeMl} and ${maxFluidVolumeMl} mL`);
    }

    return errors;
}

export function validateSession(session: TreatmentSession, now: Date): string[] {
    return session.kind === 'medication'
        ? validateMedicationSession(session, now)
        : validateFluidSession(session, now);
}

/**
 * Rules that only apply to edits: identity and calendar day are fixed once
 * a session has been written.
 */
export function validateSessionEdit(
    oldSession: TreatmentSession,
    newSession: TreatmentSession,
    now: Date,
): string[] {
    const errors = validateSession(newSession, now);

    if (oldSession.kind !== newSession.kind) {
        errors.push('Treatment type cannot be changed');
    }
    if (
        oldSession.id !== newSession.id ||
        oldSession.userId !== newSession.userId ||
        oldSession.petId !== newSession.petId
    ) {
        errors.push('Session identity cannot be changed');
    }
    if (!Number.isNaN(newSession.dateTime.getTime()) && !isSameDay(oldSession.dateTime, newSession.dateTime)) {
        errors.push('Treatment time cannot be moved to a different day');
    }

    return errors;
}
