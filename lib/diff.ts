import logger from './logger';
import type { SubdomainStore } from './store';
import type { AlertEvent, SubdomainSet } from './types';

export interface SubdomainDiff {
  newSubdomains: string[]; // fetched − stored, sorted
  updated: Set<string>; // stored ∪ fetched
  changed: boolean; // updated !== stored
}

export interface DiffOutcome extends SubdomainDiff {
  domain: string;
  firstScan: boolean;
  written: boolean;
  alert: AlertEvent | null;
}

/**
 * Set difference and union. The stored set never shrinks: names that vanish
 * from later scans stay known.
 */
export function diffSubdomains(stored: SubdomainSet, fetched: SubdomainSet): SubdomainDiff {
  const updated = new Set(stored);
  const fresh: string[] = [];
  for (const host of fetched) {
    if (!updated.has(host)) {
      updated.add(host);
      fresh.push(host);
    }
  }
  fresh.sort();
  return { newSubdomains: fresh, updated, changed: fresh.length > 0 };
}

// Per-domain chain of pending operations; serializes diff+write for one domain
const inFlightMap = new Map<string, Promise<unknown>>();

function withDomainLock<T>(domain: string, fn: () => Promise<T>): Promise<T> {
  const prev = inFlightMap.get(domain) ?? Promise.resolve();
  const op: Promise<T> = prev
    .catch(() => undefined)
    .then(fn)
    .finally(() => {
      // Only clear if we are still the latest operation
      if (inFlightMap.get(domain) === op) inFlightMap.delete(domain);
    });
  inFlightMap.set(domain, op);
  return op;
}

/**
 * Diff a successful scan against the stored set and write back the union.
 *
 * A first scan (nothing stored) only seeds the store. The alert is produced
 * only after the write succeeded; a failed load or save rejects with
 * `PersistenceError` and yields no alert, so the same names are reported on
 * the next pass instead.
 */
export function applyScan(store: SubdomainStore, domain: string, fetched: SubdomainSet): Promise<DiffOutcome> {
  return withDomainLock(domain, async () => {
    const stored = await store.load(domain);
    const firstScan = stored === null;
    const diff = diffSubdomains(stored ?? new Set<string>(), fetched);

    const shouldWrite = firstScan || diff.changed;
    if (shouldWrite) {
      await store.save(domain, diff.updated);
    }

    if (firstScan) {
      logger.info({ domain, count: diff.updated.size }, 'seeded known subdomains');
      return { ...diff, newSubdomains: [], domain, firstScan, written: shouldWrite, alert: null };
    }

    const alert: AlertEvent | null = diff.newSubdomains.length
      ? { type: 'alert', domain, newSubdomains: diff.newSubdomains, timestamp: new Date().toISOString() }
      : null;
    if (alert) {
      logger.info({ domain, count: alert.newSubdomains.length }, 'new subdomains detected');
    }
    return { ...diff, domain, firstScan, written: shouldWrite, alert };
  });
}

/** Drop everything stored for `domain`, after any in-flight scan of it. */
export function forgetDomain(store: SubdomainStore, domain: string): Promise<void> {
  return withDomainLock(domain, () => store.delete(domain));
}
