import * as admin from 'firebase-admin';
import type {
  DailySummary,
  MonthlySummary,
  ScheduleTotals,
  WeeklySummary,
} from '../../../types/treatmentLogging';
import { toDateValue } from '../../sessionCodec';
import { SUMMARY_DELTA_FIELDS, SummaryUpdateDto } from '../../summaryUpdateDto';
import {
  daysInMonth,
  endOfIsoWeek,
  endOfMonth,
  formatMonthId,
  formatWeekId,
  startOfDay,
  startOfIsoWeek,
  startOfMonth,
} from '../../../utils/summaryDates';

/**
 * State read from the daily and monthly rollups before a write. Resolves
 * whether the day's constants are already recorded and seeds the absolute
 * per-day arrays of the monthly document.
 */
export type AuxiliaryRollupState = {
  scheduleTotalsRecorded: boolean;
  dailyFluidTotalVolume: number;
  dailyFluidSessionCount: number;
  dailyScheduleTotals: ScheduleTotals;
  monthlyDailyVolumes: number[];
  monthlyDailyGoals: number[];
  monthlyDailyScheduledSessions: number[];
};

export type RollupWrites = {
  daily: FirebaseFirestore.DocumentData;
  weekly: FirebaseFirestore.DocumentData;
  monthly: FirebaseFirestore.DocumentData;
};

const readNumber = (value: unknown): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : 0;

const readNumberArray = (value: unknown): number[] =>
  Array.isArray(value) ? value.map((entry) => readNumber(entry)) : [];

export function readAuxiliaryState(
  daily: FirebaseFirestore.DocumentData | undefined,
  monthly: FirebaseFirestore.DocumentData | undefined,
): AuxiliaryRollupState {
  return {
    scheduleTotalsRecorded: daily?.scheduleTotalsRecorded === true,
    dailyFluidTotalVolume: readNumber(daily?.fluidTotalVolume),
    dailyFluidSessionCount: readNumber(daily?.fluidSessionCount),
    dailyScheduleTotals: {
      medicationScheduledDoses: readNumber(daily?.medicationScheduledDoses),
      fluidScheduledSessions: readNumber(daily?.fluidScheduledSessions),
      fluidDailyGoalMl: readNumber(daily?.fluidDailyGoalMl),
    },
    monthlyDailyVolumes: readNumberArray(monthly?.dailyVolumes),
    monthlyDailyGoals: readNumberArray(monthly?.dailyGoals),
    monthlyDailyScheduledSessions: readNumberArray(monthly?.dailyScheduledSessions),
  };
}

/**
 * Returns a copy of `current` sized to `monthLength` (zero-padded or
 * truncated) with the slot for `dayOfMonth` set to `value`.
 */
export function updateDailyArrayValue(
  current: readonly number[],
  dayOfMonth: number,
  monthLength: number,
  value: number,
): number[] {
  const next = Array.from({ length: monthLength }, (_, index) => current[index] ?? 0);
  if (dayOfMonth >= 1 && dayOfMonth <= monthLength) {
    next[dayOfMonth - 1] = value;
  }
  return next;
}

function counterFields(dto: SummaryUpdateDto): FirebaseFirestore.DocumentData {
  const fields: FirebaseFirestore.DocumentData = {};
  for (const field of SUMMARY_DELTA_FIELDS) {
    const delta = dto.deltas[field];
    if (delta !== undefined) {
      fields[field] = admin.firestore.FieldValue.increment(delta);
    }
  }
  return fields;
}

function periodConstantIncrements(totals: ScheduleTotals | null): FirebaseFirestore.DocumentData {
  if (!totals) {
    return {};
  }
  return {
    medicationScheduledDoses: admin.firestore.FieldValue.increment(totals.medicationScheduledDoses),
    fluidScheduledSessions: admin.firestore.FieldValue.increment(totals.fluidScheduledSessions),
    fluidScheduledVolume: admin.firestore.FieldValue.increment(totals.fluidDailyGoalMl),
  };
}

/**
 * Builds the three merge payloads for one logging operation on `date`.
 * Every payload carries its period identity and a server timestamp so the
 * upsert works whether or not the document exists.
 */
export function buildRollupWrites(
  dto: SummaryUpdateDto,
  date: Date,
  aux: AuxiliaryRollupState,
): RollupWrites {
  const { Timestamp, FieldValue } = admin.firestore;
  const counters = counterFields(dto);
  const fluidDelta = dto.deltas.fluidTotalVolume ?? 0;
  const fluidSessionDelta = dto.deltas.fluidSessionCount ?? 0;

  const daily: FirebaseFirestore.DocumentData = {
    date: Timestamp.fromDate(startOfDay(date)),
    updatedAt: FieldValue.serverTimestamp(),
    ...counters,
  };
  if (dto.fluidTreatmentDone) {
    daily.fluidTreatmentDone = true;
  } else if (fluidSessionDelta < 0 && aux.dailyFluidSessionCount + fluidSessionDelta <= 0) {
    daily.fluidTreatmentDone = false;
  }
  if (dto.scheduleTotals) {
    daily.medicationScheduledDoses = dto.scheduleTotals.medicationScheduledDoses;
    daily.fluidScheduledSessions = dto.scheduleTotals.fluidScheduledSessions;
    daily.fluidDailyGoalMl = dto.scheduleTotals.fluidDailyGoalMl;
    daily.scheduleTotalsRecorded = true;
  }

  const weekly: FirebaseFirestore.DocumentData = {
    weekId: formatWeekId(date),
    startDate: Timestamp.fromDate(startOfIsoWeek(date)),
    endDate: Timestamp.fromDate(endOfIsoWeek(date)),
    updatedAt: FieldValue.serverTimestamp(),
    ...counters,
    ...periodConstantIncrements(dto.scheduleTotals),
    ...(dto.fluidTreatmentDone ? { fluidTreatmentDone: true } : {}),
  };

  const dayTotals = dto.scheduleTotals ?? aux.dailyScheduleTotals;
  const monthLength = daysInMonth(date);
  const dayOfMonth = date.getDate();

  const monthly: FirebaseFirestore.DocumentData = {
    monthId: formatMonthId(date),
    startDate: Timestamp.fromDate(startOfMonth(date)),
    endDate: Timestamp.fromDate(endOfMonth(date)),
    updatedAt: FieldValue.serverTimestamp(),
    ...counters,
    ...periodConstantIncrements(dto.scheduleTotals),
    ...(dto.fluidTreatmentDone ? { fluidTreatmentDone: true } : {}),
    dailyVolumes: updateDailyArrayValue(
      aux.monthlyDailyVolumes,
      dayOfMonth,
      monthLength,
      Math.max(0, aux.dailyFluidTotalVolume + fluidDelta),
    ),
    dailyGoals: updateDailyArrayValue(
      aux.monthlyDailyGoals,
      dayOfMonth,
      monthLength,
      dayTotals.fluidDailyGoalMl,
    ),
    dailyScheduledSessions: updateDailyArrayValue(
      aux.monthlyDailyScheduledSessions,
      dayOfMonth,
      monthLength,
      dayTotals.fluidScheduledSessions,
    ),
  };

  return { daily, weekly, monthly };
}

// ---------------------------------------------------------------------------
// Read mapping
// ---------------------------------------------------------------------------

function mapCounters(data: FirebaseFirestore.DocumentData) {
  return {
    medicationTotalDoses: readNumber(data.medicationTotalDoses),
    medicationMissedCount: readNumber(data.medicationMissedCount),
    medicationSessionCount: readNumber(data.medicationSessionCount),
    medicationTotalDosage: readNumber(data.medicationTotalDosage),
    medicationScheduledDoses: readNumber(data.medicationScheduledDoses),
    fluidTotalVolume: readNumber(data.fluidTotalVolume),
    fluidSessionCount: readNumber(data.fluidSessionCount),
    fluidScheduledSessions: readNumber(data.fluidScheduledSessions),
    fluidTreatmentDone: data.fluidTreatmentDone === true,
    updatedAt: toDateValue(data.updatedAt),
  };
}

export function mapDailySummary(periodId: string, data: FirebaseFirestore.DocumentData): DailySummary {
  return {
    periodId,
    date: toDateValue(data.date),
    ...mapCounters(data),
    fluidDailyGoalMl: readNumber(data.fluidDailyGoalMl),
    scheduleTotalsRecorded: data.scheduleTotalsRecorded === true,
  };
}

export function mapWeeklySummary(periodId: string, data: FirebaseFirestore.DocumentData): WeeklySummary {
  return {
    periodId,
    startDate: toDateValue(data.startDate),
    endDate: toDateValue(data.endDate),
    ...mapCounters(data),
    fluidScheduledVolume: readNumber(data.fluidScheduledVolume),
  };
}

export function mapMonthlySummary(periodId: string, data: FirebaseFirestore.DocumentData): MonthlySummary {
  return {
    ...mapWeeklySummary(periodId, data),
    dailyVolumes: readNumberArray(data.dailyVolumes),
    dailyGoals: readNumberArray(data.dailyGoals),
    dailyScheduledSessions: readNumberArray(data.dailyScheduledSessions),
  };
}
