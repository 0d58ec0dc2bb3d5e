import * as admin from 'firebase-admin';
import { ZodError } from 'zod';
import treatmentLogsRouter from '../treatmentLogs';
import { createTreatmentLoggingContainer } from '../../services/domain/serviceContainer';
import { resetLocalState } from '../../services/localState';
import { FakeFirestore, PET_PATH } from '../../__tests__/helpers/fakeFirestore';
import { makeFluidSchedule, makeMedicationSchedule, PET_ID, USER_ID } from '../../__tests__/helpers/fixtures';

type Method = 'get' | 'post' | 'patch' | 'delete';

type RouteLayer = {
  route?: {
    path: string;
    methods: Partial<Record<Method, boolean>>;
    stack: Array<{ handle: (req: unknown, res: unknown, next: jest.Mock) => Promise<void> }>;
  };
};

const NOW = new Date('2025-10-01T12:00:00.000Z');
const DAILY_PATH = `${PET_PATH}/treatmentSummaries/daily/summaries/2025-10-01`;
const SCHEDULES = [makeMedicationSchedule(), makeFluidSchedule()];

function createRequest(overrides: Record<string, unknown> = {}) {
  return {
    user: { uid: USER_ID },
    params: { petId: PET_ID },
    body: {},
    query: {},
    headers: {},
    ...overrides,
  };
}

function createResponse() {
  const res = {
    statusCode: 200,
    body: undefined as unknown,
    status(code: number) {
      res.statusCode = code;
      return res;
    },
    json(payload: unknown) {
      res.body = payload;
      return res;
    },
    send(payload?: unknown) {
      res.body = payload;
      return res;
    },
  };
  return res;
}

function getRouteHandler(method: Method, path: string) {
  const stack = (treatmentLogsRouter as unknown as { stack: RouteLayer[] }).stack;
  const route = stack.find((layer) => layer.route?.path === path && layer.route.methods[method])?.route;
  if (!route || route.stack.length === 0) {
    throw new Error(`Route not found: ${method.toUpperCase()} ${path}`);
  }
  return route.stack[route.stack.length - 1].handle;
}

async function call(method: Method, path: string, overrides: Record<string, unknown> = {}) {
  const req = createRequest(overrides);
  const res = createResponse();
  const next = jest.fn();
  await getRouteHandler(method, path)(req, res, next);
  return { res, next };
}

const medicationBody = (overrides: Record<string, unknown> = {}) => ({
  session: {
    id: 'med-session-1',
    dateTime: '2025-10-01T08:05:00.000Z',
    medicationName: 'Benazepril',
    dosageGiven: 1,
    dosageScheduled: 1,
    medicationUnit: 'pill',
    completed: true,
    ...overrides,
  },
  todaysSchedules: SCHEDULES,
});

const fluidBody = (overrides: Record<string, unknown> = {}) => ({
  session: { id: 'fluid-session-1', dateTime: '2025-10-01T09:00:00.000Z', volumeGiven: 100, ...overrides },
  todaysSchedules: SCHEDULES,
});

describe('treatment logs routes', () => {
  const firestoreMock = admin.firestore as unknown as jest.Mock;
  let fake: FakeFirestore;

  beforeEach(() => {
    jest.useFakeTimers({ now: NOW, doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
    resetLocalState();
    fake = new FakeFirestore();
    firestoreMock.mockImplementation(() => fake.asFirestore());
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('POST /pets/:petId/medication', () => {
    it('logs the session against the matching schedule', async () => {
      const { res } = await call('post', '/pets/:petId/medication', { body: medicationBody() });

      expect(res.statusCode).toBe(201);
      expect(res.body).toMatchObject({
        kind: 'medication',
        id: 'med-session-1',
        userId: USER_ID,
        petId: PET_ID,
        scheduleId: 'schedule-med-1',
        scheduledTime: new Date('2025-10-01T08:00:00.000Z'),
        createdAt: NOW,
      });
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({ medicationTotalDoses: 1, medicationScheduledDoses: 2 });
    });

    it('answers 409 with the conflicting dose', async () => {
      await call('post', '/pets/:petId/medication', { body: medicationBody() });

      const { res } = await call('post', '/pets/:petId/medication', {
        body: medicationBody({ id: 'med-session-2', dateTime: '2025-10-01T08:12:00.000Z' }),
      });

      expect(res.statusCode).toBe(409);
      expect(res.body).toEqual({
        code: 'duplicate_conflict',
        message: 'Benazepril was already logged at 08:05. Update that entry instead?',
        medicationName: 'Benazepril',
        conflictingTime: '2025-10-01T08:05:00.000Z',
        existingSessionId: null,
      });
    });

    it('answers 400 for a session in the future', async () => {
      const { res } = await call('post', '/pets/:petId/medication', {
        body: medicationBody({ dateTime: '2025-10-01T12:30:00.000Z' }),
      });

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({
        code: 'validation_failed',
        message: 'Treatment time cannot be in the future',
        details: ['Treatment time cannot be in the future'],
      });
    });

    it('passes malformed bodies to the error handler', async () => {
      const { res, next } = await call('post', '/pets/:petId/medication', {
        body: { session: { medicationName: 'Benazepril' } },
      });

      expect(next).toHaveBeenCalledWith(expect.any(ZodError));
      expect(res.body).toBeUndefined();
    });

    it('answers 401 when the request carries no user', async () => {
      const { res } = await call('post', '/pets/:petId/medication', { user: undefined, body: medicationBody() });

      expect(res.statusCode).toBe(401);
      expect(fake.commits).toEqual([]);
    });
  });

  describe('offline queue', () => {
    it('queues a failed write on request and replays it on drain', async () => {
      fake.readFailure = new Error('unavailable');

      const queued = await call('post', '/pets/:petId/fluid', { body: { ...fluidBody(), queueOnFailure: true } });

      expect(queued.res.statusCode).toBe(202);
      expect(queued.res.body).toMatchObject({ queued: true, warning: null });

      const listed = await call('get', '/queue');
      expect(listed.res.body).toMatchObject({
        pending: [{ userId: USER_ID, payload: { kind: 'createFluid' }, status: 'pending' }],
        failed: [],
      });

      fake.readFailure = null;
      const drained = await call('post', '/queue/drain');

      expect(drained.res.body).toEqual({ successCount: 1, failureCount: 0, failure: null });
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({ fluidTotalVolume: 100 });
      expect((await call('get', '/queue')).res.body).toEqual({ pending: [], failed: [] });
    });

    it('drains only the caller\'s queued operations', async () => {
      const { offlineQueue } = createTreatmentLoggingContainer({ db: fake.asFirestore() });
      await offlineQueue.enqueue({
        userId: 'user-2',
        petId: 'pet-2',
        payload: { kind: 'quickLogAll', todaysSchedules: SCHEDULES },
      });

      const drained = await call('post', '/queue/drain');

      expect(drained.res.body).toEqual({ successCount: 0, failureCount: 0, failure: null });
      expect((await offlineQueue.getPending()).map((operation) => operation.userId)).toEqual(['user-2']);
      expect(fake.commits).toEqual([]);
    });

    it('surfaces the write failure when queueing was not requested', async () => {
      fake.readFailure = new Error('unavailable');

      const { res } = await call('post', '/pets/:petId/fluid', { body: fluidBody() });

      expect(res.statusCode).toBe(503);
      expect(res.body).toEqual({
        code: 'atomic_write_failed',
        message: 'Unable to save your treatment. Please check your connection and try again.',
        operation: 'logFluidSession',
        chunkIndex: null,
        committedSessionCount: null,
      });
    });

    it('answers 404 for operations the caller does not own', async () => {
      const { res } = await call('delete', '/queue/:operationId', { params: { operationId: 'missing' } });

      expect(res.statusCode).toBe(404);
    });
  });

  describe('edits and deletes', () => {
    it('applies a partial fluid edit to the stored session', async () => {
      await call('post', '/pets/:petId/fluid', { body: fluidBody() });

      const { res } = await call('patch', '/pets/:petId/fluid/:sessionId', {
        params: { petId: PET_ID, sessionId: 'fluid-session-1' },
        body: { changes: { volumeGiven: 150 } },
      });

      expect(res.statusCode).toBe(200);
      expect(res.body).toMatchObject({ id: 'fluid-session-1', volumeGiven: 150, scheduleId: 'schedule-fluid-1' });
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({ fluidTotalVolume: 150 });
    });

    it('answers 404 when editing a session that does not exist', async () => {
      const { res } = await call('patch', '/pets/:petId/medication/:sessionId', {
        params: { petId: PET_ID, sessionId: 'missing' },
        body: { changes: { dosageGiven: 2 } },
      });

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({ code: 'not_found', message: 'Medication session not found' });
    });

    it('deletes a session and reverses its totals', async () => {
      await call('post', '/pets/:petId/medication', { body: medicationBody() });

      const { res } = await call('delete', '/pets/:petId/:kind/:sessionId', {
        params: { petId: PET_ID, kind: 'medication', sessionId: 'med-session-1' },
      });

      expect(res.statusCode).toBe(204);
      expect(fake.getDoc(`${PET_PATH}/medicationSessions/med-session-1`)).toBeUndefined();
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({ medicationTotalDoses: 0 });
    });
  });

  describe('POST /pets/:petId/quick-log', () => {
    it('logs everything outstanding for today', async () => {
      await call('post', '/pets/:petId/fluid', { body: fluidBody({ volumeGiven: 120 }) });

      const { res } = await call('post', '/pets/:petId/quick-log', { body: { todaysSchedules: SCHEDULES } });

      expect(res.statusCode).toBe(201);
      expect(res.body).toMatchObject({ chunkCount: 1 });
      expect(fake.getDoc(DAILY_PATH)).toMatchObject({
        medicationTotalDoses: 2,
        fluidTotalVolume: 300,
      });
    });

    it('reports all caught up with a 200', async () => {
      await call('post', '/pets/:petId/quick-log', { body: { todaysSchedules: SCHEDULES } });

      const { res } = await call('post', '/pets/:petId/quick-log', { body: { todaysSchedules: SCHEDULES } });

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({
        code: 'reconciliation_empty',
        message: 'All caught up! Everything scheduled for today is already logged.',
      });
    });
  });

  describe('reads', () => {
    it('returns today\'s summary', async () => {
      await call('post', '/pets/:petId/fluid', { body: fluidBody() });

      const { res } = await call('get', '/pets/:petId/summaries/:period', {
        params: { petId: PET_ID, period: 'today' },
      });

      expect(res.body).toMatchObject({
        summary: { periodId: '2025-10-01', fluidTotalVolume: 100, fluidTreatmentDone: true },
      });
    });

    it('returns null for a month with no data', async () => {
      const { res } = await call('get', '/pets/:petId/summaries/:period', {
        params: { petId: PET_ID, period: 'monthly' },
        query: { date: '2025-08-15' },
      });

      expect(res.body).toEqual({ summary: null });
    });

    it('lists today\'s sessions for one medication', async () => {
      await call('post', '/pets/:petId/medication', { body: medicationBody() });

      const { res } = await call('get', '/pets/:petId/medication/today', { query: { medicationName: 'Benazepril' } });

      expect(res.body).toMatchObject({ sessions: [{ id: 'med-session-1', medicationName: 'Benazepril' }] });
    });
  });
});
