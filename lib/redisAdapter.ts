/**
 * Redis connection for the optional Redis-backed subdomain store.
 *
 * `getRedisClient()` returns a connected client or `null` when `REDIS_URL` is not set
 * or the first ping fails; callers fall back to the file store on `null`.
 */

import Redis from 'ioredis';
import { CONFIG } from './config';
import logger from './logger';

let client: Redis | null = null;

export async function getRedisClient(): Promise<Redis | null> {
  if (client) return client;

  const url = CONFIG.REDIS_URL;
  if (!url) return null;

  const candidate = new Redis(url, {
    password: process.env.REDIS_PASSWORD || undefined,
    lazyConnect: true,
    maxRetriesPerRequest: 2,
  });

  try {
    await candidate.connect();
    await candidate.ping();
    client = candidate;
    return client;
  } catch (err) {
    candidate.disconnect();
    logger.warn({ err }, 'Redis not available');
    return null;
  }
}

/** Close the shared client, if any. */
export async function closeRedisClient(): Promise<void> {
  if (!client) return;
  const c = client;
  client = null;
  await c.quit();
}
