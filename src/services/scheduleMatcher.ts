/**
 * Schedule Matcher
 *
 * Links a logged session to the closest prescribed reminder. Sessions with no
 * reminder inside the tolerance window are manual logs, which is a normal
 * outcome.
 */

import { treatmentLoggingConfig } from '../config';
import { Schedule, ScheduleFrequency, ScheduleMatch, TreatmentSession } from '../types/treatmentLogging';
import { atTimeOfDay, calendarDaysBetween } from '../utils/summaryDates';

const INTERVAL_DAYS: Partial<Record<ScheduleFrequency, number>> = {
    everyOtherDay: 2,
    every3Days: 3,
};

const NO_MATCH: ScheduleMatch = { scheduleId: null, scheduledTime: null };

/**
 * Reminder times of `schedule` projected onto the calendar day of `date`.
 * Interval schedules only produce reminders on days that are a whole number
 * of intervals after the schedule was created.
 */
export function reminderTimesOnDate(schedule: Schedule, date: Date): Date[] {
    const interval = INTERVAL_DAYS[schedule.frequency];
    if (interval !== undefined) {
        const daysSinceStart = calendarDaysBetween(schedule.createdAt, date);
        if (daysSinceStart < 0 || daysSinceStart % interval !== 0) {
            return [];
        }
    }
    return schedule.reminderTimes.map((reminder) => atTimeOfDay(date, reminder));
}

function isCandidate(session: TreatmentSession, schedule: Schedule): boolean {
    if (session.kind === 'medication') {
        return schedule.treatmentType === 'medication' && schedule.medicationName === session.medicationName;
    }
    return schedule.treatmentType === 'fluid';
}

export function matchSchedule(
    session: TreatmentSession,
    schedules: readonly Schedule[],
    toleranceMs: number = treatmentLoggingConfig.scheduleMatchToleranceMs,
): ScheduleMatch {
    let best: { scheduleId: string; scheduledTime: Date; difference: number } | null = null;

    for (const schedule of schedules) {
        if (!isCandidate(session, schedule)) {
            continue;
        }
        for (const reminder of schedule.reminderTimes) {
            const projected = atTimeOfDay(session.dateTime, reminder);
            const difference = Math.abs(session.dateTime.getTime() - projected.getTime());
            // strict comparison keeps the first reminder found on ties
            if (difference <= toleranceMs && (best === null || difference < best.difference)) {
                best = { scheduleId: schedule.id, scheduledTime: projected, difference };
            }
        }
    }

    return best ? { scheduleId: best.scheduleId, scheduledTime: best.scheduledTime } : NO_MATCH;
}

/** Returns a copy of the session carrying the match result. */
export function applyScheduleMatch<T extends TreatmentSession>(session: T, match: ScheduleMatch): T {
    return { ...session, scheduleId: match.scheduleId, scheduledTime: match.scheduledTime };
}
