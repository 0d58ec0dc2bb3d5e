/**
 * Summary Cache Cleanup
 *
 * Purges local summary cache entries left over from previous days.
 */

import { onSchedule } from 'firebase-functions/v2/scheduler';
import * as functions from 'firebase-functions';
import { triggerConfig } from '../config';
import { getLocalState } from '../services/localState';
import type { SummaryCacheService } from '../services/summaryCacheService';

export async function runSummaryCacheCleanup(
    cache: SummaryCacheService = getLocalState().summaryCache,
): Promise<number> {
    const removed = await cache.invalidateExpired();
    functions.logger.info('[SummaryCache] Expired entries purged', { removed });
    return removed;
}

export const summaryCacheCleanup = onSchedule(
    {
        region: 'us-central1',
        schedule: triggerConfig.cacheCleanupSchedule,
        timeZone: 'UTC',
        memory: '256MiB',
        timeoutSeconds: 60,
        maxInstances: 1,
    },
    async () => {
        await runSummaryCacheCleanup();
    },
);
