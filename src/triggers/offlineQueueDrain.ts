/**
 * Offline Queue Drain
 *
 * Scheduled replay of logging operations queued while Firestore writes were
 * failing. Entries that keep failing end in `failed` and wait for a manual
 * retry through the API.
 */

import { onSchedule } from 'firebase-functions/v2/scheduler';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { triggerConfig } from '../config';
import { createTreatmentLoggingContainer } from '../services/domain/serviceContainer';
import type { DrainReport, OfflineLoggingQueue } from '../services/offlineLoggingQueue';
import { captureException, flushSentry } from '../utils/sentry';

export async function runOfflineQueueDrain(
    queue: OfflineLoggingQueue = createTreatmentLoggingContainer({ db: admin.firestore() }).offlineQueue,
): Promise<DrainReport> {
    const size = await queue.size();
    if (size === 0) {
        functions.logger.debug('[OfflineQueue] Nothing to drain');
        return { successCount: 0, failureCount: 0, failure: null };
    }

    functions.logger.info('[OfflineQueue] Starting scheduled drain', { size });
    const report = await queue.drainPending();

    if (report.failure) {
        functions.logger.warn('[OfflineQueue] Scheduled drain left failed entries', {
            failedCount: report.failure.failedCount,
            successCount: report.successCount,
        });
    }
    return report;
}

export const offlineQueueDrain = onSchedule(
    {
        region: 'us-central1',
        schedule: triggerConfig.queueDrainSchedule,
        memory: '256MiB',
        timeoutSeconds: 300,
        maxInstances: 1,
    },
    async () => {
        try {
            await runOfflineQueueDrain();
        } catch (error) {
            captureException(error, { trigger: 'offlineQueueDrain' });
            throw error;
        } finally {
            await flushSentry();
        }
    },
);
