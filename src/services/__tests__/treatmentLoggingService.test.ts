import * as functions from 'firebase-functions';
import { createTreatmentLoggingContainer } from '../domain/serviceContainer';
import { InMemoryKeyValueStore } from '../keyValueStore';
import type { QueuedOperation } from '../queuedOperations';
import { FirestoreTreatmentWriteRepository } from '../repositories/treatmentWrites/FirestoreTreatmentWriteRepository';
import type { SessionValidator } from '../sessionValidation';
import { SummaryCacheService } from '../summaryCacheService';
import { SummaryMemoryCache } from '../summaryReadService';
import { FakeFirestore, PET_PATH } from '../../__tests__/helpers/fakeFirestore';
import {
  makeFluidSchedule,
  makeFluidSession,
  makeMedicationSchedule,
  makeMedicationSession,
  PET_ID,
  reminderAt,
  USER_ID,
} from '../../__tests__/helpers/fixtures';

const NOON = new Date('2025-10-01T12:00:00.000Z');
const DAILY_PATH = `${PET_PATH}/treatmentSummaries/daily/summaries/2025-10-01`;
const WEEKLY_PATH = `${PET_PATH}/treatmentSummaries/weekly/summaries/2025-W40`;
const SCHEDULES = [makeMedicationSchedule(), makeFluidSchedule()];

type HarnessOptions = {
  now?: Date;
  validator?: SessionValidator;
  maxBatchOperations?: number;
};

function createHarness(options: HarnessOptions = {}) {
  const now = options.now ?? NOON;
  const fake = new FakeFirestore();
  const analytics = { trackLoggingFailure: jest.fn(), trackFeatureUsed: jest.fn() };
  const summaryCache = new SummaryCacheService(new InMemoryKeyValueStore(), () => now);
  const container = createTreatmentLoggingContainer({
    db: fake.asFirestore(),
    summaryCache,
    summaryMemoryCache: new SummaryMemoryCache(),
    offlineQueueStore: new InMemoryKeyValueStore(),
    analytics,
    clock: () => now,
    ...(options.validator ? { validator: options.validator } : {}),
    ...(options.maxBatchOperations
      ? { writeRepository: new FirestoreTreatmentWriteRepository(fake.asFirestore(), options.maxBatchOperations) }
      : {}),
  });
  return { fake, analytics, summaryCache, container, service: container.loggingService };
}

const withoutServerTimestamp = (data: Record<string, unknown> | undefined): Record<string, unknown> => {
  const copy = { ...data };
  delete copy.updatedAt;
  return copy;
};

describe('TreatmentLoggingService', () => {
  describe('logMedicationSession', () => {
    it('matches the schedule, writes rollups and updates the local cache', async () => {
      const { fake, analytics, summaryCache, service } = createHarness();

      const result = await service.logMedicationSession({
        session: makeMedicationSession(),
        todaysSchedules: SCHEDULES,
      });

      expect(result.ok && [result.value.scheduleId, result.value.scheduledTime]).toEqual([
        'schedule-med-1',
        new Date('2025-10-01T08:00:00.000Z'),
      ]);
      expect(fake.getDoc(`${PET_PATH}/medicationSessions/med-session-1`)).toMatchObject({
        scheduleId: 'schedule-med-1',
        medicationName: 'Benazepril',
      });
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({
        medicationTotalDoses: 1,
        medicationSessionCount: 1,
        medicationScheduledDoses: 2,
        fluidScheduledSessions: 1,
        fluidDailyGoalMl: 300,
        scheduleTotalsRecorded: true,
      });
      await expect(summaryCache.get(USER_ID, PET_ID)).resolves.toEqual({
        date: '2025-10-01',
        medicationSessionCount: 1,
        fluidSessionCount: 0,
        medicationRecentTimes: { Benazepril: ['2025-10-01T08:05:00.000Z'] },
        medicationCompletedTimes: { Benazepril: ['2025-10-01T08:00:00.000Z'] },
        totalMedicationDosesGiven: 1,
        totalFluidVolumeGiven: 0,
      });
      expect(analytics.trackFeatureUsed).toHaveBeenCalledWith('medication_logged', {
        matchedSchedule: true,
        completed: true,
      });
    });

    it('records the scheduled dose count once however many doses are logged', async () => {
      const { fake, service } = createHarness({ now: new Date('2025-10-01T21:00:00.000Z') });

      for (const [id, time] of [
        ['dose-1', '07:00'],
        ['dose-2', '08:30'],
        ['dose-3', '19:30'],
      ]) {
        const session = makeMedicationSession({ id, dateTime: new Date(`2025-10-01T${time}:00.000Z`) });
        const result = await service.logMedicationSession({ session, todaysSchedules: SCHEDULES });
        expect(result.ok).toBe(true);
      }

      expect(fake.getDoc(DAILY_PATH)).toMatchObject({ medicationTotalDoses: 3, medicationScheduledDoses: 2 });
      expect(fake.getDoc(WEEKLY_PATH)).toMatchObject({ medicationTotalDoses: 3, medicationScheduledDoses: 2 });
    });

    it('produces the same rollups whichever order two doses are logged in', async () => {
      const morning = makeMedicationSession({ id: 'morning' });
      const evening = makeMedicationSession({
        id: 'evening',
        dosageGiven: 2,
        dateTime: new Date('2025-10-01T19:00:00.000Z'),
      });
      const now = new Date('2025-10-01T21:00:00.000Z');
      const first = createHarness({ now });
      const second = createHarness({ now });

      for (const session of [morning, evening]) {
        await first.service.logMedicationSession({ session, todaysSchedules: SCHEDULES });
      }
      for (const session of [evening, morning]) {
        await second.service.logMedicationSession({ session, todaysSchedules: SCHEDULES });
      }

      expect(withoutServerTimestamp(first.fake.getDoc(DAILY_PATH))).toEqual(
        withoutServerTimestamp(second.fake.getDoc(DAILY_PATH)),
      );
      expect(first.fake.getDoc(DAILY_PATH)).toMatchObject({ medicationTotalDoses: 2, medicationTotalDosage: 3 });
    });

    it('rejects a dose within the duplicate window of a cached one', async () => {
      const { fake, analytics, service } = createHarness();
      await service.logMedicationSession({ session: makeMedicationSession(), todaysSchedules: SCHEDULES });

      const result = await service.logMedicationSession({
        session: makeMedicationSession({ id: 'med-session-2', dateTime: new Date('2025-10-01T08:15:00.000Z') }),
        todaysSchedules: SCHEDULES,
      });

      expect(result).toEqual({
        ok: false,
        failure: {
          kind: 'duplicate_conflict',
          medicationName: 'Benazepril',
          conflictingTime: new Date('2025-10-01T08:05:00.000Z'),
          existingSessionId: null,
        },
      });
      expect(fake.getDoc(`${PET_PATH}/medicationSessions/med-session-2`)).toBeUndefined();
      expect(analytics.trackLoggingFailure).toHaveBeenCalledWith('duplicate_conflict', {
        operation: 'logMedicationSession',
        userId: USER_ID,
        petId: PET_ID,
      });
    });

    it('looks up stored sessions when the cache has no entry', async () => {
      const { container, service } = createHarness();
      await container.writeRepository.writeSessionOnly(makeMedicationSession());

      const result = await service.logMedicationSession({
        session: makeMedicationSession({ id: 'med-session-2', dateTime: new Date('2025-10-01T08:10:00.000Z') }),
        todaysSchedules: SCHEDULES,
      });

      expect(result.ok === false && result.failure).toMatchObject({
        kind: 'duplicate_conflict',
        existingSessionId: 'med-session-1',
      });
    });

    it('refuses to count a stored session again once the cache is gone', async () => {
      const { fake, summaryCache, service } = createHarness();
      await service.logMedicationSession({ session: makeMedicationSession(), todaysSchedules: SCHEDULES });
      await summaryCache.clear(USER_ID, PET_ID);

      const result = await service.logMedicationSession({ session: makeMedicationSession(), todaysSchedules: SCHEDULES });

      expect(result).toEqual({
        ok: false,
        failure: {
          kind: 'duplicate_conflict',
          medicationName: 'Benazepril',
          conflictingTime: new Date('2025-10-01T08:05:00.000Z'),
          existingSessionId: 'med-session-1',
        },
      });
      expect(fake.commits).toHaveLength(1);
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({ medicationTotalDoses: 1, medicationSessionCount: 1 });
    });

    it('names the stored session when a resend conflicts with a cache hint', async () => {
      const { service } = createHarness();
      await service.logMedicationSession({ session: makeMedicationSession(), todaysSchedules: SCHEDULES });

      const result = await service.logMedicationSession({ session: makeMedicationSession(), todaysSchedules: SCHEDULES });

      expect(result.ok === false && result.failure).toMatchObject({
        kind: 'duplicate_conflict',
        existingSessionId: 'med-session-1',
      });
    });

    it('does not treat a different medication as a duplicate', async () => {
      const { service } = createHarness();
      await service.logMedicationSession({ session: makeMedicationSession(), todaysSchedules: SCHEDULES });

      const result = await service.logMedicationSession({
        session: makeMedicationSession({ id: 'med-session-2', medicationName: 'Mirtazapine' }),
        todaysSchedules: SCHEDULES,
      });

      expect(result.ok).toBe(true);
    });

    it('returns a write failure and leaves the cache untouched when Firestore is unreachable', async () => {
      const { fake, summaryCache, service } = createHarness();
      fake.readFailure = new Error('unavailable');

      const result = await service.logMedicationSession({
        session: makeMedicationSession(),
        todaysSchedules: SCHEDULES,
      });

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'atomic_write_failed', operation: 'logMedicationSession', message: 'unavailable' },
      });
      expect(functions.logger.warn).toHaveBeenCalledWith(
        '[TreatmentLogging] Duplicate lookup failed; continuing without it',
        { userId: USER_ID, petId: PET_ID, error: 'unavailable' },
      );
      await expect(summaryCache.get(USER_ID, PET_ID)).resolves.toBeNull();
    });

    it('rejects invalid sessions before any I/O', async () => {
      const validator: SessionValidator = { validate: () => ['Dose needs vet approval'] };
      const { fake, service } = createHarness({ validator });

      const result = await service.logMedicationSession({
        session: makeMedicationSession({ dateTime: new Date('2025-10-01T13:00:00.000Z') }),
        todaysSchedules: SCHEDULES,
      });

      expect(result).toEqual({
        ok: false,
        failure: {
          kind: 'validation_failed',
          messages: ['Treatment time cannot be in the future', 'Dose needs vet approval'],
        },
      });
      expect(fake.commits).toEqual([]);
      expect(fake.directWrites).toEqual([]);
    });

    it('succeeds when analytics throws', async () => {
      const { analytics, service } = createHarness();
      analytics.trackFeatureUsed.mockImplementation(() => {
        throw new Error('analytics down');
      });

      const result = await service.logMedicationSession({
        session: makeMedicationSession(),
        todaysSchedules: SCHEDULES,
      });

      expect(result.ok).toBe(true);
      expect(functions.logger.warn).toHaveBeenCalledWith('[Analytics] Event dispatch failed', {
        error: 'analytics down',
      });
    });
  });

  describe('logFluidSession', () => {
    it('writes the session, marks fluid done and updates the cache', async () => {
      const { fake, analytics, summaryCache, service } = createHarness();

      const result = await service.logFluidSession({ session: makeFluidSession(), todaysSchedules: SCHEDULES });

      expect(result.ok && result.value.scheduleId).toBe('schedule-fluid-1');
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({
        fluidTotalVolume: 100,
        fluidSessionCount: 1,
        fluidTreatmentDone: true,
        fluidDailyGoalMl: 300,
      });
      await expect(summaryCache.get(USER_ID, PET_ID)).resolves.toMatchObject({
        fluidSessionCount: 1,
        totalFluidVolumeGiven: 100,
      });
      expect(analytics.trackFeatureUsed).toHaveBeenCalledWith('fluid_logged', {
        matchedSchedule: true,
        volumeGiven: 100,
      });
    });
  });

  describe('updates', () => {
    it('applies the dosage delta and keeps the original creation time', async () => {
      const { fake, summaryCache, service } = createHarness();
      const logged = await service.logMedicationSession({
        session: makeMedicationSession(),
        todaysSchedules: SCHEDULES,
      });
      if (!logged.ok) throw new Error('setup failed');

      const result = await service.updateMedicationSession({
        oldSession: logged.value,
        newSession: { ...logged.value, dosageGiven: 0.5, createdAt: NOON },
      });

      expect(result.ok && result.value.createdAt).toEqual(new Date('2025-10-01T08:05:00.000Z'));
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({
        medicationTotalDosage: 0.5,
        medicationSessionCount: 1,
        medicationTotalDoses: 1,
      });
      await expect(summaryCache.get(USER_ID, PET_ID)).resolves.toMatchObject({
        medicationSessionCount: 1,
        totalMedicationDosesGiven: 0.5,
      });
    });

    it('writes only the session document when nothing aggregable changed', async () => {
      const { fake, service } = createHarness();
      const logged = await service.logFluidSession({ session: makeFluidSession(), todaysSchedules: SCHEDULES });
      if (!logged.ok) throw new Error('setup failed');

      const result = await service.updateFluidSession({
        oldSession: logged.value,
        newSession: { ...logged.value, notes: 'calm today', stressLevel: 'low' },
      });

      expect(result.ok).toBe(true);
      expect(fake.commits).toHaveLength(1);
      expect(fake.directWrites).toEqual([`${PET_PATH}/fluidSessions/fluid-session-1`]);
      expect(fake.getDoc(`${PET_PATH}/fluidSessions/fluid-session-1`)).toMatchObject({
        notes: 'calm today',
        stressLevel: 'low',
      });
    });

    it('moves the cached hints when only the time changes', async () => {
      const { fake, summaryCache, service } = createHarness();
      const logged = await service.logMedicationSession({
        session: makeMedicationSession({ dateTime: new Date('2025-10-01T11:00:00.000Z') }),
        todaysSchedules: SCHEDULES,
      });
      if (!logged.ok) throw new Error('setup failed');

      const edited = await service.updateMedicationSession({
        oldSession: logged.value,
        newSession: { ...logged.value, dateTime: new Date('2025-10-01T06:00:00.000Z') },
      });
      expect(edited.ok).toBe(true);
      expect(fake.commits).toHaveLength(1);
      await expect(summaryCache.get(USER_ID, PET_ID)).resolves.toMatchObject({
        medicationSessionCount: 1,
        medicationRecentTimes: { Benazepril: ['2025-10-01T06:00:00.000Z'] },
        medicationCompletedTimes: { Benazepril: ['2025-10-01T06:00:00.000Z'] },
      });

      const next = await service.logMedicationSession({
        session: makeMedicationSession({ id: 'med-session-2', dateTime: new Date('2025-10-01T11:10:00.000Z') }),
        todaysSchedules: SCHEDULES,
      });

      expect(next.ok).toBe(true);
    });

    it('refuses to move a session to another day', async () => {
      const { fake, service } = createHarness();
      const session = makeMedicationSession();

      const result = await service.updateMedicationSession({
        oldSession: session,
        newSession: { ...session, dateTime: new Date('2025-09-30T08:05:00.000Z') },
      });

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'validation_failed', messages: ['Treatment time cannot be moved to a different day'] },
      });
      expect(fake.directWrites).toEqual([]);
    });
  });

  describe('deleteSession', () => {
    it('removes the session and reverses its contributions', async () => {
      const { fake, summaryCache, service } = createHarness();
      const logged = await service.logFluidSession({ session: makeFluidSession(), todaysSchedules: SCHEDULES });
      if (!logged.ok) throw new Error('setup failed');

      const result = await service.deleteSession(logged.value);

      expect(result.ok).toBe(true);
      expect(fake.getDoc(`${PET_PATH}/fluidSessions/fluid-session-1`)).toBeUndefined();
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({
        fluidTotalVolume: 0,
        fluidSessionCount: 0,
        fluidTreatmentDone: false,
      });
      await expect(summaryCache.get(USER_ID, PET_ID)).resolves.toMatchObject({
        fluidSessionCount: 0,
        totalFluidVolumeGiven: 0,
      });
    });
  });

  describe('quickLogAllTreatments', () => {
    it('logs only what is outstanding and reports all caught up afterwards', async () => {
      const { fake, analytics, summaryCache, service } = createHarness();
      await service.logMedicationSession({ session: makeMedicationSession(), todaysSchedules: SCHEDULES });

      const result = await service.quickLogAllTreatments({
        userId: USER_ID,
        petId: PET_ID,
        todaysSchedules: SCHEDULES,
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.chunkCount).toBe(1);
      expect(result.value.medicationSessions.map((session) => [session.dateTime, session.scheduledTime])).toEqual([
        [NOON, new Date('2025-10-01T20:00:00.000Z')],
      ]);
      expect(result.value.fluidSessions.map((session) => session.volumeGiven)).toEqual([300]);
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({
        medicationTotalDoses: 2,
        medicationScheduledDoses: 2,
        fluidTotalVolume: 300,
        fluidTreatmentDone: true,
      });
      await expect(summaryCache.get(USER_ID, PET_ID)).resolves.toMatchObject({
        medicationSessionCount: 2,
        fluidSessionCount: 1,
        totalFluidVolumeGiven: 300,
        medicationCompletedTimes: { Benazepril: ['2025-10-01T08:00:00.000Z', '2025-10-01T20:00:00.000Z'] },
      });
      expect(analytics.trackFeatureUsed).toHaveBeenCalledWith('quick_log_all', { medicationCount: 1, fluidCount: 1 });

      const again = await service.quickLogAllTreatments({
        userId: USER_ID,
        petId: PET_ID,
        todaysSchedules: SCHEDULES,
      });

      expect(again).toEqual({ ok: false, failure: { kind: 'reconciliation_empty' } });
      expect(analytics.trackFeatureUsed).toHaveBeenCalledWith('quick_log_caught_up', {});
      expect(analytics.trackLoggingFailure).not.toHaveBeenCalled();
    });

    it('reads stored sessions when the cache is empty', async () => {
      const { container, summaryCache, service } = createHarness();
      await container.writeRepository.writeSessionOnly(
        makeMedicationSession({ scheduleId: 'schedule-med-1', scheduledTime: new Date('2025-10-01T08:00:00.000Z') }),
      );
      await container.writeRepository.writeSessionOnly(makeFluidSession({ volumeGiven: 120 }));

      const result = await service.quickLogAllTreatments({
        userId: USER_ID,
        petId: PET_ID,
        todaysSchedules: SCHEDULES,
      });

      expect(result.ok && result.value.medicationSessions).toHaveLength(1);
      expect(result.ok && result.value.fluidSessions.map((session) => session.volumeGiven)).toEqual([180]);
      await expect(summaryCache.get(USER_ID, PET_ID)).resolves.toMatchObject({
        medicationSessionCount: 2,
        fluidSessionCount: 2,
        totalFluidVolumeGiven: 300,
      });
    });

    it('caches only the sessions committed before a failed chunk', async () => {
      const { fake, summaryCache, service } = createHarness({ maxBatchOperations: 4 });
      fake.failCommit = (index) => (index === 1 ? new Error('quota exceeded') : null);
      const schedules = [
        makeMedicationSchedule({
          frequency: 'thriceDaily',
          reminderTimes: [reminderAt('06:00'), reminderAt('07:00'), reminderAt('08:00')],
        }),
        makeFluidSchedule(),
      ];

      const result = await service.quickLogAllTreatments({ userId: USER_ID, petId: PET_ID, todaysSchedules: schedules });

      expect(result).toEqual({
        ok: false,
        failure: {
          kind: 'atomic_write_failed',
          operation: 'quickLogAllTreatments',
          message: 'quota exceeded',
          chunkIndex: 1,
          committedSessionCount: 1,
        },
      });
      await expect(summaryCache.get(USER_ID, PET_ID)).resolves.toMatchObject({
        medicationSessionCount: 1,
        fluidSessionCount: 0,
        medicationCompletedTimes: { Benazepril: ['2025-10-01T06:00:00.000Z'] },
      });
    });

    it('fails when no schedule has a reminder today', async () => {
      const { analytics, service } = createHarness();

      const result = await service.quickLogAllTreatments({ userId: USER_ID, petId: PET_ID, todaysSchedules: [] });

      expect(result).toEqual({ ok: false, failure: { kind: 'no_schedules' } });
      expect(analytics.trackLoggingFailure).toHaveBeenCalledWith('no_schedules', {
        operation: 'quickLogAllTreatments',
        userId: USER_ID,
        petId: PET_ID,
      });
    });
  });

  describe('replay', () => {
    const queued = (payload: QueuedOperation['payload'], enqueuedAt: Date): QueuedOperation => ({
      id: 'op-1',
      userId: USER_ID,
      petId: PET_ID,
      payload,
      status: 'syncing',
      retryCount: 0,
      lastError: null,
      enqueuedAt,
    });

    it('replays a queued fluid log through the live path', async () => {
      const { fake, service } = createHarness();

      const result = await service.replay(
        queued({ kind: 'createFluid', session: makeFluidSession(), todaysSchedules: SCHEDULES }, NOON),
      );

      expect(result.ok).toBe(true);
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({ fluidTotalVolume: 100 });
    });

    it('drains a queued quick-log cleanly after the day was caught up live', async () => {
      const { fake, container, service } = createHarness();
      await container.offlineQueue.enqueue({
        userId: USER_ID,
        petId: PET_ID,
        payload: { kind: 'quickLogAll', todaysSchedules: SCHEDULES },
      });
      await service.quickLogAllTreatments({ userId: USER_ID, petId: PET_ID, todaysSchedules: SCHEDULES });

      const report = await container.offlineQueue.drainPending();

      expect(report).toEqual({ successCount: 1, failureCount: 0, failure: null });
      await expect(container.offlineQueue.size()).resolves.toBe(0);
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({ medicationTotalDoses: 2, fluidTotalVolume: 300 });
    });

    it('drops a queued medication log whose write already committed', async () => {
      const { fake, container, service } = createHarness();
      await service.logMedicationSession({ session: makeMedicationSession(), todaysSchedules: SCHEDULES });
      await container.offlineQueue.enqueue({
        userId: USER_ID,
        petId: PET_ID,
        payload: {
          kind: 'createMedication',
          session: makeMedicationSession(),
          todaysSchedules: SCHEDULES,
          recentSessions: [],
        },
      });

      const report = await container.offlineQueue.drainPending();

      expect(report).toEqual({ successCount: 1, failureCount: 0, failure: null });
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({ medicationTotalDoses: 1 });
    });

    it('expires a quick-log request queued on an earlier day', async () => {
      const { fake, service } = createHarness();

      const result = await service.replay(
        queued({ kind: 'quickLogAll', todaysSchedules: SCHEDULES }, new Date('2025-09-30T22:00:00.000Z')),
      );

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'validation_failed', messages: ['Quick-log request expired at the end of its day'] },
      });
      expect(fake.commits).toEqual([]);
    });
  });
});
