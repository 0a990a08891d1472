import { SessionKey } from '../entities/Session';

/**
 * Runs synchronously inside the cache's eviction callback,
 * after the evicted session has been released
 */
export interface ISessionEvictionHook {
  onSessionEvicted(key: SessionKey): void;
}
