/**
 * Quick-Log Reconciler
 *
 * Works out which of today's prescribed treatments are still outstanding and
 * synthesizes the sessions that would catch the day up. Pure: the snapshot of
 * what is already logged is supplied by the caller.
 */

import { randomUUID } from 'crypto';
import { treatmentLoggingConfig } from '../config';
import type {
    FluidSession,
    MedicationSession,
    Schedule,
} from '../types/treatmentLogging';
import { DailySummaryCache } from './summaryCacheService';
import { fail, LoggingResult, NoSchedulesFailure, ReconciliationEmpty, succeed } from './loggingErrors';
import { reminderTimesOnDate } from './scheduleMatcher';

export interface QuickLogSnapshot {
    /** Completed-dose times per medication name; reminder time when matched */
    medicationCompletedTimes: Record<string, Date[]>;
    fluidVolumeLogged: number;
}

export interface QuickLogPlan {
    medicationSessions: MedicationSession[];
    fluidSessions: FluidSession[];
}

export interface ReconcileInput {
    userId: string;
    petId: string;
    schedules: readonly Schedule[];
    snapshot: QuickLogSnapshot;
    now: Date;
    newId?: () => string;
}

export function snapshotFromCache(entry: DailySummaryCache): QuickLogSnapshot {
    const medicationCompletedTimes: Record<string, Date[]> = {};
    for (const [name, times] of Object.entries(entry.medicationCompletedTimes)) {
        medicationCompletedTimes[name] = times.map((time) => new Date(time));
    }
    return { medicationCompletedTimes, fluidVolumeLogged: entry.totalFluidVolumeGiven };
}

export function snapshotFromSessions(
    medicationSessions: readonly MedicationSession[],
    fluidSessions: readonly FluidSession[],
): QuickLogSnapshot {
    const medicationCompletedTimes: Record<string, Date[]> = {};
    for (const session of medicationSessions) {
        if (session.completed) {
            (medicationCompletedTimes[session.medicationName] ??= []).push(session.scheduledTime ?? session.dateTime);
        }
    }
    const fluidVolumeLogged = fluidSessions.reduce((total, session) => total + session.volumeGiven, 0);
    return { medicationCompletedTimes, fluidVolumeLogged };
}

/**
 * Removes and returns the completed time closest to `reminder` within the
 * match tolerance, so one logged dose never covers two reminders.
 */
function takeCoveringDose(pool: Date[], reminder: Date, toleranceMs: number): Date | null {
    let bestIndex = -1;
    let bestDifference = Number.POSITIVE_INFINITY;
    pool.forEach((time, index) => {
        const difference = Math.abs(time.getTime() - reminder.getTime());
        if (difference <= toleranceMs && difference < bestDifference) {
            bestIndex = index;
            bestDifference = difference;
        }
    });
    if (bestIndex === -1) {
        return null;
    }
    const [taken] = pool.splice(bestIndex, 1);
    return taken;
}

export function reconcile(
    input: ReconcileInput,
): LoggingResult<QuickLogPlan, ReconciliationEmpty | NoSchedulesFailure> {
    const { userId, petId, snapshot, now } = input;
    const newId = input.newId ?? randomUUID;
    const { scheduleMatchToleranceMs, minFluidVolumeMl, maxFluidVolumeMl } = treatmentLoggingConfig;

    const todaysSchedules = input.schedules
        .filter((schedule) => schedule.isActive)
        .map((schedule) => ({
            schedule,
            reminders: reminderTimesOnDate(schedule, now).sort((a, b) => a.getTime() - b.getTime()),
        }))
        .filter(({ reminders }) => reminders.length > 0);

    if (todaysSchedules.length === 0) {
        return fail({ kind: 'no_schedules' });
    }

    const completedPools = new Map<string, Date[]>();
    for (const [name, times] of Object.entries(snapshot.medicationCompletedTimes)) {
        completedPools.set(name, [...times]);
    }
    let unassignedFluidVolume = snapshot.fluidVolumeLogged;

    const medicationSessions: MedicationSession[] = [];
    const fluidSessions: FluidSession[] = [];

    for (const { schedule, reminders } of todaysSchedules) {
        if (schedule.treatmentType === 'medication') {
            const medicationName = schedule.medicationName;
            if (!medicationName) {
                continue;
            }
            const pool = completedPools.get(medicationName) ?? [];
            completedPools.set(medicationName, pool);

            for (const reminder of reminders) {
                if (takeCoveringDose(pool, reminder, scheduleMatchToleranceMs)) {
                    continue;
                }
                const dosage = schedule.targetDosage ?? 1;
                medicationSessions.push({
                    kind: 'medication',
                    id: newId(),
                    userId,
                    petId,
                    // a reminder later today is logged as given now
                    dateTime: reminder.getTime() > now.getTime() ? now : reminder,
                    medicationName,
                    dosageGiven: dosage,
                    dosageScheduled: dosage,
                    medicationUnit: schedule.medicationUnit ?? 'dose',
                    completed: true,
                    notes: null,
                    scheduleId: schedule.id,
                    scheduledTime: reminder,
                    createdAt: now,
                    updatedAt: null,
                });
            }
            continue;
        }

        const dailyGoal = (schedule.targetVolume ?? 0) * reminders.length;
        if (dailyGoal <= 0) {
            continue;
        }
        const covered = Math.min(unassignedFluidVolume, dailyGoal);
        unassignedFluidVolume -= covered;
        // one session per at most maxFluidVolumeMl of the outstanding goal
        let remaining = dailyGoal - covered;
        while (remaining > 0 && remaining >= minFluidVolumeMl) {
            const volumeGiven = Math.min(remaining, maxFluidVolumeMl);
            remaining -= volumeGiven;
            fluidSessions.push({
                kind: 'fluid',
                id: newId(),
                userId,
                petId,
                dateTime: now,
                volumeGiven,
                injectionSite: schedule.preferredLocation,
                stressLevel: null,
                notes: null,
                scheduleId: schedule.id,
                scheduledTime: reminders[0],
                createdAt: now,
                updatedAt: null,
            });
        }
    }

    if (medicationSessions.length === 0 && fluidSessions.length === 0) {
        return fail({ kind: 'reconciliation_empty' });
    }

    return succeed({ medicationSessions, fluidSessions });
}
