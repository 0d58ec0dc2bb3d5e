/**
 * Treatment Logging Types
 *
 * Shared shapes for logged treatment sessions, prescribed schedules and the
 * summary rollups derived from them.
 */

export type TreatmentType = 'medication' | 'fluid';

export type ScheduleFrequency =
    | 'onceDaily'
    | 'twiceDaily'
    | 'thriceDaily'
    | 'everyOtherDay'
    | 'every3Days';

export const INJECTION_SITES = [
    'shoulderBladeLeft',
    'shoulderBladeRight',
    'shoulderBladeMiddle',
    'hipBonesLeft',
    'hipBonesRight',
] as const;

export type InjectionSite = (typeof INJECTION_SITES)[number];

export type StressLevel = 'low' | 'medium' | 'high';

interface SessionBase {
    id: string;
    userId: string;
    petId: string;
    dateTime: Date;
    notes: string | null;
    scheduleId: string | null;
    scheduledTime: Date | null;
    createdAt: Date;
    /** Server-assigned; null until the store has echoed it back */
    updatedAt: Date | null;
}

export interface MedicationSession extends SessionBase {
    kind: 'medication';
    medicationName: string;
    dosageGiven: number;
    dosageScheduled: number;
    medicationUnit: string;
    completed: boolean;
}

export interface FluidSession extends SessionBase {
    kind: 'fluid';
    volumeGiven: number;
    injectionSite: InjectionSite | null;
    stressLevel: StressLevel | null;
}

export type TreatmentSession = MedicationSession | FluidSession;

export interface Schedule {
    id: string;
    treatmentType: TreatmentType;
    frequency: ScheduleFrequency;
    /** Only the wall-clock part of each entry is meaningful */
    reminderTimes: Date[];
    isActive: boolean;
    createdAt: Date;
    medicationName: string | null;
    targetDosage: number | null;
    medicationUnit: string | null;
    targetVolume: number | null;
    preferredLocation: InjectionSite | null;
}

export type ScheduleMatch =
    | { scheduleId: string; scheduledTime: Date }
    | { scheduleId: null; scheduledTime: null };

/**
 * Per-day constants derived from the prescribed schedules. Written once per
 * day and folded into the week and month exactly once.
 */
export interface ScheduleTotals {
    medicationScheduledDoses: number;
    fluidScheduledSessions: number;
    fluidDailyGoalMl: number;
}

export interface DailySummary {
    periodId: string;
    date: Date | null;
    medicationTotalDoses: number;
    medicationMissedCount: number;
    medicationSessionCount: number;
    medicationTotalDosage: number;
    medicationScheduledDoses: number;
    fluidTotalVolume: number;
    fluidSessionCount: number;
    fluidScheduledSessions: number;
    fluidDailyGoalMl: number;
    fluidTreatmentDone: boolean;
    scheduleTotalsRecorded: boolean;
    updatedAt: Date | null;
}

export interface WeeklySummary {
    periodId: string;
    startDate: Date | null;
    endDate: Date | null;
    medicationTotalDoses: number;
    medicationMissedCount: number;
    medicationSessionCount: number;
    medicationTotalDosage: number;
    medicationScheduledDoses: number;
    fluidTotalVolume: number;
    fluidSessionCount: number;
    fluidScheduledSessions: number;
    fluidScheduledVolume: number;
    fluidTreatmentDone: boolean;
    updatedAt: Date | null;
}

export interface MonthlySummary extends WeeklySummary {
    dailyVolumes: number[];
    dailyGoals: number[];
    dailyScheduledSessions: number[];
}
