import { AtomicWriteOrchestrator } from '../atomicWriteOrchestrator';
import type { KeyValueStore } from '../keyValueStore';
import { getLocalState } from '../localState';
import { LoggerLoggingAnalytics, LoggingAnalytics } from '../loggingAnalytics';
import { OfflineLoggingQueue } from '../offlineLoggingQueue';
import { FirestoreTreatmentSessionRepository } from '../repositories/treatmentSessions/FirestoreTreatmentSessionRepository';
import type { TreatmentSessionRepository } from '../repositories/treatmentSessions/TreatmentSessionRepository';
import { FirestoreTreatmentSummaryRepository } from '../repositories/treatmentSummaries/FirestoreTreatmentSummaryRepository';
import type { TreatmentSummaryRepository } from '../repositories/treatmentSummaries/TreatmentSummaryRepository';
import { FirestoreTreatmentWriteRepository } from '../repositories/treatmentWrites/FirestoreTreatmentWriteRepository';
import type { TreatmentWriteRepository } from '../repositories/treatmentWrites/TreatmentWriteRepository';
import { passThroughSessionValidator, SessionValidator } from '../sessionValidation';
import { SummaryCacheService } from '../summaryCacheService';
import { SummaryMemoryCache, SummaryReadService } from '../summaryReadService';
import { TreatmentLoggingService } from '../treatmentLoggingService';

export type TreatmentLoggingContainer = {
  sessionRepository: TreatmentSessionRepository;
  summaryRepository: TreatmentSummaryRepository;
  writeRepository: TreatmentWriteRepository;
  summaryCache: SummaryCacheService;
  summaryReads: SummaryReadService;
  orchestrator: AtomicWriteOrchestrator;
  loggingService: TreatmentLoggingService;
  offlineQueue: OfflineLoggingQueue;
};

export type CreateTreatmentLoggingContainerOptions = {
  db: FirebaseFirestore.Firestore;
  sessionRepository?: TreatmentSessionRepository;
  summaryRepository?: TreatmentSummaryRepository;
  writeRepository?: TreatmentWriteRepository;
  summaryCache?: SummaryCacheService;
  summaryMemoryCache?: SummaryMemoryCache;
  offlineQueueStore?: KeyValueStore;
  analytics?: LoggingAnalytics;
  validator?: SessionValidator;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export function createTreatmentLoggingContainer(
  options: CreateTreatmentLoggingContainerOptions,
): TreatmentLoggingContainer {
  const local = getLocalState();
  const sessionRepository =
    options.sessionRepository ?? new FirestoreTreatmentSessionRepository(options.db);
  const summaryRepository =
    options.summaryRepository ?? new FirestoreTreatmentSummaryRepository(options.db);
  const writeRepository =
    options.writeRepository ?? new FirestoreTreatmentWriteRepository(options.db);
  const summaryCache = options.summaryCache ?? local.summaryCache;
  const summaryReads = new SummaryReadService(
    summaryRepository,
    options.summaryMemoryCache ?? local.summaryMemoryCache,
    options.clock,
  );
  const orchestrator = new AtomicWriteOrchestrator(writeRepository);
  const loggingService = new TreatmentLoggingService({
    orchestrator,
    sessionRepository,
    summaryCache,
    summaryReads,
    analytics: options.analytics ?? new LoggerLoggingAnalytics(),
    validator: options.validator ?? passThroughSessionValidator,
    clock: options.clock,
  });

  return {
    sessionRepository,
    summaryRepository,
    writeRepository,
    summaryCache,
    summaryReads,
    orchestrator,
    loggingService,
    offlineQueue: new OfflineLoggingQueue(
      options.offlineQueueStore ?? local.offlineQueueStore,
      loggingService,
      { clock: options.clock, sleep: options.sleep },
    ),
  };
}
