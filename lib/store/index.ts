import { CONFIG } from '../config';
import logger from '../logger';
import { getRedisClient } from '../redisAdapter';
import { FileSubdomainStore } from './fileStore';
import { RedisSubdomainStore } from './redisStore';

/**
 * Per-domain persisted set of previously observed subdomains.
 * All methods reject with `PersistenceError`.
 */
export interface SubdomainStore {
  /** Stored set, or null when the domain has never been saved. */
  load(domain: string): Promise<Set<string> | null>;
  save(domain: string, subdomains: ReadonlySet<string>): Promise<void>;
  /** Deleting an absent entry succeeds. */
  delete(domain: string): Promise<void>;
}

/**
 * Pick the store backend: Redis when REDIS_URL is set and reachable, otherwise
 * one JSON file per domain under DATA_DIR.
 */
export async function createDefaultStore(): Promise<SubdomainStore> {
  if (CONFIG.REDIS_URL) {
    const client = await getRedisClient();
    if (client) {
      logger.info({ prefix: CONFIG.STORE_KEY_PREFIX }, 'using Redis subdomain store');
      return new RedisSubdomainStore(client, CONFIG.STORE_KEY_PREFIX);
    }
    logger.warn('Redis unavailable, falling back to file subdomain store');
  }
  logger.info({ dir: CONFIG.DATA_DIR }, 'using file subdomain store');
  return new FileSubdomainStore(CONFIG.DATA_DIR);
}

export { FileSubdomainStore, RedisSubdomainStore };
