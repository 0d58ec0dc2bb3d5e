import type { FluidSession, MedicationSession, Schedule } from '../../types/treatmentLogging';

export const USER_ID = 'user-1';
export const PET_ID = 'pet-1';

export function makeMedicationSession(overrides: Partial<MedicationSession> = {}): MedicationSession {
  return {
    kind: 'medication',
    id: 'med-session-1',
    userId: USER_ID,
    petId: PET_ID,
    dateTime: new Date('2025-10-01T08:05:00.000Z'),
    notes: null,
    scheduleId: null,
    scheduledTime: null,
    createdAt: new Date('2025-10-01T08:05:00.000Z'),
    updatedAt: null,
    medicationName: 'Benazepril',
    dosageGiven: 1,
    dosageScheduled: 1,
    medicationUnit: 'pill',
    completed: true,
    ...overrides,
  };
}

export function makeFluidSession(overrides: Partial<FluidSession> = {}): FluidSession {
  return {
    kind: 'fluid',
    id: 'fluid-session-1',
    userId: USER_ID,
    petId: PET_ID,
    dateTime: new Date('2025-10-01T09:00:00.000Z'),
    notes: null,
    scheduleId: null,
    scheduledTime: null,
    createdAt: new Date('2025-10-01T09:00:00.000Z'),
    updatedAt: null,
    volumeGiven: 100,
    injectionSite: null,
    stressLevel: null,
    ...overrides,
  };
}

/** Reminder times only carry a wall-clock time; the date part is ignored. */
export const reminderAt = (time: string): Date => new Date(`2025-01-01T${time}:00.000Z`);

export function makeMedicationSchedule(overrides: Partial<Schedule> = {}): Schedule {
  return {
    id: 'schedule-med-1',
    treatmentType: 'medication',
    frequency: 'twiceDaily',
    reminderTimes: [reminderAt('08:00'), reminderAt('20:00')],
    isActive: true,
    createdAt: new Date('2025-09-01T00:00:00.000Z'),
    medicationName: 'Benazepril',
    targetDosage: 1,
    medicationUnit: 'pill',
    targetVolume: null,
    preferredLocation: null,
    ...overrides,
  };
}

export function makeFluidSchedule(overrides: Partial<Schedule> = {}): Schedule {
  return {
    id: 'schedule-fluid-1',
    treatmentType: 'fluid',
    frequency: 'onceDaily',
    reminderTimes: [reminderAt('09:00')],
    isActive: true,
    createdAt: new Date('2025-09-01T00:00:00.000Z'),
    medicationName: null,
    targetDosage: null,
    medicationUnit: null,
    targetVolume: 300,
    preferredLocation: 'shoulderBladeLeft',
    ...overrides,
  };
}
