/**
 * Configuration for the treatment logging functions
 * Reads from environment variables (process.env)
 *
 * Optional environment variables:
 * - SUMMARY_CACHE_FILE: JSON file backing the local summary cache (in-memory when unset)
 * - OFFLINE_QUEUE_FILE: JSON file backing the offline operation queue (in-memory when unset)
 * - QUEUE_DRAIN_SCHEDULE: Cron/interval expression for the queue drain trigger
 * - ALLOWED_ORIGINS: Comma-separated list of allowed CORS origins
 * - SENTRY_DSN: Enables error reporting (see utils/sentry.ts)
 */

export const localStoreConfig = {
  summaryCacheFile: process.env.SUMMARY_CACHE_FILE || '',
  offlineQueueFile: process.env.OFFLINE_QUEUE_FILE || '',
};

export const triggerConfig = {
  queueDrainSchedule: process.env.QUEUE_DRAIN_SCHEDULE || 'every 5 minutes',
  cacheCleanupSchedule: 'every day 00:05',
};

export const corsConfig = {
  // Example: "https://app.example.com,https://portal.example.com"
  allowedOrigins: process.env.ALLOWED_ORIGINS || '',
  isDevelopment: process.env.NODE_ENV !== 'production',
};

const MINUTE_MS = 60 * 1000;

export const treatmentLoggingConfig = {
  /** Hard ceiling of operations per Firestore batch */
  maxBatchOperations: 500,
  /** Rollup writes carried by the first unit of every logging batch */
  rollupWritesPerUnit: 3,
  scheduleMatchToleranceMs: 2 * 60 * MINUTE_MS,
  duplicateWindowMs: 15 * MINUTE_MS,
  remoteDuplicateQueryLimit: 10,
  quickLogSnapshotQueryLimit: 200,
  cacheRingSize: 8,
  minMedicationNameLength: 2,
  maxMedicationDosage: 100,
  minFluidVolumeMl: 1,
  maxFluidVolumeMl: 500,
};

export const offlineQueueConfig = {
  storageKey: 'treatment_logging_queue',
  softLimit: 50,
  hardLimit: 200,
  maxAttempts: 5,
  retryDelaysMs: [1000, 2000, 4000, 8000, 30000],
  ttlMs: 30 * 24 * 60 * MINUTE_MS,
};

export const summaryCacheConfig = {
  keyPrefix: 'treatment_summary_cache',
  dailyTtlMs: 5 * MINUTE_MS,
  weeklyTtlMs: 15 * MINUTE_MS,
  monthlyTtlMs: 15 * MINUTE_MS,
};
