import * as functions from 'firebase-functions';
import { InMemoryKeyValueStore } from '../../services/keyValueStore';
import { cacheFactsFromSession, SummaryCacheService } from '../../services/summaryCacheService';
import { makeMedicationSession, PET_ID, USER_ID } from '../../__tests__/helpers/fixtures';
import { runSummaryCacheCleanup } from '../summaryCacheCleanup';

describe('runSummaryCacheCleanup', () => {
  it('purges entries from previous days and keeps today\'s', async () => {
    const store = new InMemoryKeyValueStore();
    const yesterday = new SummaryCacheService(store, () => new Date('2025-10-01T12:00:00.000Z'));
    await yesterday.putAfterSession(USER_ID, PET_ID, cacheFactsFromSession(makeMedicationSession()));
    await store.set('unrelated', 'kept');

    const today = new SummaryCacheService(store, () => new Date('2025-10-02T09:00:00.000Z'));
    await today.putAfterSession(
      USER_ID,
      'pet-2',
      cacheFactsFromSession(makeMedicationSession({ petId: 'pet-2', dateTime: new Date('2025-10-02T08:00:00.000Z') })),
    );

    const removed = await runSummaryCacheCleanup(today);

    expect(removed).toBe(1);
    expect((await store.keys()).sort()).toEqual(['treatment_summary_cache:user-1:pet-2', 'unrelated']);
    expect(functions.logger.info).toHaveBeenCalledWith('[SummaryCache] Expired entries purged', { removed: 1 });
  });
});
