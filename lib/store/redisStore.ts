import { PersistenceError, errorMessage } from '../errors';
import { decodeSubdomains, encodeSubdomains } from './codec';
import type { SubdomainStore } from './index';

/** The slice of the ioredis client this store uses. */
export interface RedisKeyValue {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

/**
 * One key per domain holding the JSON payload. SET replaces the value
 * atomically, so a reader never sees a partial set.
 */
export class RedisSubdomainStore implements SubdomainStore {
  constructor(private readonly client: RedisKeyValue, private readonly prefix = 'ctw:') {}

  private key(domain: string) {
    return `${this.prefix}known:${domain}`;
  }

  async load(domain: string): Promise<Set<string> | null> {
    let raw: string | null;
    try {
      raw = await this.client.get(this.key(domain));
    } catch (err) {
      throw new PersistenceError('load', domain, `redis GET failed: ${errorMessage(err)}`, err);
    }
    if (raw == null) return null;
    try {
      return decodeSubdomains(raw);
    } catch (err) {
      throw new PersistenceError('load', domain, `malformed stored value for ${domain}: ${errorMessage(err)}`, err);
    }
  }

  async save(domain: string, subdomains: ReadonlySet<string>): Promise<void> {
    try {
      await this.client.set(this.key(domain), encodeSubdomains(domain, subdomains));
    } catch (err) {
      throw new PersistenceError('save', domain, `redis SET failed: ${errorMessage(err)}`, err);
    }
  }

  async delete(domain: string): Promise<void> {
    try {
      await this.client.del(this.key(domain));
    } catch (err) {
      throw new PersistenceError('delete', domain, `redis DEL failed: ${errorMessage(err)}`, err);
    }
  }
}

export default RedisSubdomainStore;
