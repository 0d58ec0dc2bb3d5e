import { localStoreConfig } from '../config';
import { FileKeyValueStore, InMemoryKeyValueStore, KeyValueStore } from './keyValueStore';
import { SummaryCacheService } from './summaryCacheService';
import { SummaryMemoryCache } from './summaryReadService';

/**
 * Process-wide local state shared by every request handled by this
 * instance. Stores are file-backed when a path is configured.
 */
type LocalState = {
  summaryCacheStore: KeyValueStore;
  offlineQueueStore: KeyValueStore;
  summaryCache: SummaryCacheService;
  summaryMemoryCache: SummaryMemoryCache;
};

let state: LocalState | null = null;

const createStore = (filePath: string): KeyValueStore =>
  filePath ? new FileKeyValueStore(filePath) : new InMemoryKeyValueStore();

export function getLocalState(): LocalState {
  if (!state) {
    const summaryCacheStore = createStore(localStoreConfig.summaryCacheFile);
    state = {
      summaryCacheStore,
      offlineQueueStore: createStore(localStoreConfig.offlineQueueFile),
      summaryCache: new SummaryCacheService(summaryCacheStore),
      summaryMemoryCache: new SummaryMemoryCache(),
    };
  }
  return state;
}

/** Test helper: drops all local state so the next access starts empty. */
export function resetLocalState(): void {
  state = null;
}
