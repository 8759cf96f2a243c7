import { CONFIG } from '../config';
import logger from '../logger';
import { QueryError } from '../errors';
import { queryCertificates, QueryResult } from '../sources/crtsh';
import { sleep as defaultSleep } from './sleep';
import type { ScanResult } from '../types';

export interface RetryOptions {
  attempts?: number; // total attempts
  baseDelayMs?: number; // wait before the 2nd attempt, doubled after
  maxDelayMs?: number; // cap, also applied to Retry-After
  query?: (domain: string) => Promise<QueryResult>;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Delay before attempt `attempt` (2-based): base, base*2, base*4, ...
 * A rate-limit Retry-After stretches the wait but never past `maxDelayMs`.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, error?: QueryError): number {
  const computed = baseDelayMs * Math.pow(2, attempt - 2);
  const hinted = error?.retryAfterMs ?? 0;
  return Math.min(maxDelayMs, Math.max(computed, hinted));
}

/**
 * Run one CT query for `domain` under the bounded retry policy.
 * Only retryable errors are retried; the store is never touched here.
 */
export async function executeScan(domain: string, opts?: RetryOptions): Promise<ScanResult> {
  const attempts = Math.max(1, opts?.attempts ?? CONFIG.RETRY.ATTEMPTS);
  const base = opts?.baseDelayMs ?? CONFIG.RETRY.BASE_DELAY_MS;
  const max = opts?.maxDelayMs ?? CONFIG.RETRY.MAX_DELAY_MS;
  const query = opts?.query ?? ((d: string) => queryCertificates(d));
  const wait = opts?.sleep ?? defaultSleep;

  let lastError: QueryError | undefined;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (attempt > 1) {
      const delay = backoffDelay(attempt, base, max, lastError);
      logger.info({ domain, attempt, delay, kind: lastError?.kind }, 'retrying CT query after backoff');
      await wait(delay);
    }

    const res = await query(domain);
    if (res.ok) {
      return { domain, fetched: res.subdomains, timestamp: new Date().toISOString(), outcome: 'success', attempts: attempt };
    }

    lastError = res.error;
    if (!res.error.retryable) {
      logger.warn({ domain, attempt, kind: res.error.kind }, 'CT query failed permanently');
      return {
        domain,
        fetched: new Set(),
        timestamp: new Date().toISOString(),
        outcome: 'fatal_failure',
        attempts: attempt,
        error: res.error,
      };
    }
    logger.warn({ domain, attempt, attempts, kind: res.error.kind }, 'CT query failed, retryable');
  }

  return {
    domain,
    fetched: new Set(),
    timestamp: new Date().toISOString(),
    outcome: 'retryable_failure',
    attempts,
    error: lastError,
  };
}

export default executeScan;
