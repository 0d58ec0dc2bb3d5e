/**
 * Summary Update DTO
 *
 * Expresses what one logging operation changes in the day/week/month
 * rollups. Counters are deltas applied with commutative increments so that
 * concurrent writers converge. Per-day schedule constants are carried
 * separately and only when the day has not recorded them yet.
 */

import {
    FluidSession,
    MedicationSession,
    Schedule,
    ScheduleTotals,
    TreatmentSession,
} from '../types/treatmentLogging';
import { reminderTimesOnDate } from './scheduleMatcher';

export type SummaryDeltaField =
    | 'medicationTotalDoses'
    | 'medicationMissedCount'
    | 'medicationSessionCount'
    | 'medicationTotalDosage'
    | 'fluidTotalVolume'
    | 'fluidSessionCount';

export const SUMMARY_DELTA_FIELDS: readonly SummaryDeltaField[] = [
    'medicationTotalDoses',
    'medicationMissedCount',
    'medicationSessionCount',
    'medicationTotalDosage',
    'fluidTotalVolume',
    'fluidSessionCount',
];

/** Only non-zero deltas are present. */
export type SummaryDeltas = Partial<Record<SummaryDeltaField, number>>;

export interface SummaryUpdateDto {
    deltas: SummaryDeltas;
    fluidTreatmentDone: boolean;
    /** Present only when the target day has not recorded its constants yet */
    scheduleTotals: ScheduleTotals | null;
}

function compactDeltas(values: Record<SummaryDeltaField, number>): SummaryDeltas {
    const deltas: SummaryDeltas = {};
    for (const field of SUMMARY_DELTA_FIELDS) {
        const value = values[field];
        if (value !== 0) {
            deltas[field] = value;
        }
    }
    return deltas;
}

const zeroDeltas = (): Record<SummaryDeltaField, number> => ({
    medicationTotalDoses: 0,
    medicationMissedCount: 0,
    medicationSessionCount: 0,
    medicationTotalDosage: 0,
    fluidTotalVolume: 0,
    fluidSessionCount: 0,
});

function accumulate(totals: Record<SummaryDeltaField, number>, session: TreatmentSession, sign: 1 | -1): void {
    if (session.kind === 'medication') {
        totals.medicationSessionCount += sign;
        totals.medicationTotalDosage += sign * session.dosageGiven;
        if (session.completed) {
            totals.medicationTotalDoses += sign;
        } else {
            totals.medicationMissedCount += sign;
        }
        return;
    }
    totals.fluidSessionCount += sign;
    totals.fluidTotalVolume += sign * session.volumeGiven;
}

export function hasDeltas(dto: SummaryUpdateDto): boolean {
    return Object.keys(dto.deltas).length > 0;
}

/** True when the operation has to touch the rollup documents at all. */
export function hasUpdates(dto: SummaryUpdateDto): boolean {
    return hasDeltas(dto) || dto.fluidTreatmentDone || dto.scheduleTotals !== null;
}

export function fromNewSession(session: TreatmentSession): SummaryUpdateDto {
    const totals = zeroDeltas();
    accumulate(totals, session, 1);
    return {
        deltas: compactDeltas(totals),
        fluidTreatmentDone: session.kind === 'fluid',
        scheduleTotals: null,
    };
}

/**
 * Delta between two versions of the same session. Session counts never move
 * on an edit; an edit that only touches notes or timing yields no updates.
 */
export function fromEditDelta(oldSession: TreatmentSession, newSession: TreatmentSession): SummaryUpdateDto {
    const totals = zeroDeltas();
    accumulate(totals, oldSession, -1);
    accumulate(totals, newSession, 1);
    return {
        deltas: compactDeltas(totals),
        fluidTreatmentDone: false,
        scheduleTotals: null,
    };
}

/** Reverses the contribution of a deleted session. */
export function fromDeletedSession(session: TreatmentSession): SummaryUpdateDto {
    const totals = zeroDeltas();
    accumulate(totals, session, -1);
    return {
        deltas: compactDeltas(totals),
        fluidTreatmentDone: false,
        scheduleTotals: null,
    };
}

export interface ScheduleTotalsResolution {
    /** Result of the auxiliary read of the daily rollup */
    alreadyRecorded: boolean;
    totals: ScheduleTotals;
}

/**
 * Combined update for a batch of sessions written in one unit. The
 * schedule constants are resolved once for the whole batch.
 */
export function fromBulkSessions(
    medicationSessions: readonly MedicationSession[],
    fluidSessions: readonly FluidSession[],
    resolution: ScheduleTotalsResolution | null,
): SummaryUpdateDto {
    const totals = zeroDeltas();
    for (const session of medicationSessions) {
        accumulate(totals, session, 1);
    }
    for (const session of fluidSessions) {
        accumulate(totals, session, 1);
    }
    return withScheduleTotals(
        {
            deltas: compactDeltas(totals),
            fluidTreatmentDone: fluidSessions.length > 0,
            scheduleTotals: null,
        },
        resolution,
    );
}

function isEmptyTotals(totals: ScheduleTotals): boolean {
    return (
        totals.medicationScheduledDoses === 0 &&
        totals.fluidScheduledSessions === 0 &&
        totals.fluidDailyGoalMl === 0
    );
}

/**
 * Attaches the day's constants unless the day already recorded them. A day
 * with no prescribed reminders records nothing, so a later write that does
 * know the schedules can still set them.
 */
export function withScheduleTotals(
    dto: SummaryUpdateDto,
    resolution: ScheduleTotalsResolution | null,
): SummaryUpdateDto {
    if (resolution === null || resolution.alreadyRecorded || isEmptyTotals(resolution.totals)) {
        return { ...dto, scheduleTotals: null };
    }
    return { ...dto, scheduleTotals: { ...resolution.totals } };
}

/**
 * Constants implied by the active schedules for the calendar day of `date`.
 */
export function scheduleTotalsForDay(schedules: readonly Schedule[], date: Date): ScheduleTotals {
    const totals: ScheduleTotals = {
        medicationScheduledDoses: 0,
        fluidScheduledSessions: 0,
        fluidDailyGoalMl: 0,
    };

    for (const schedule of schedules) {
        if (!schedule.isActive) {
            continue;
        }
        const remindersToday = reminderTimesOnDate(schedule, date).length;
        if (schedule.treatmentType === 'medication') {
            totals.medicationScheduledDoses += remindersToday;
        } else {
            totals.fluidScheduledSessions += remindersToday;
            totals.fluidDailyGoalMl += (schedule.targetVolume ?? 0) * remindersToday;
        }
    }

    return totals;
}
