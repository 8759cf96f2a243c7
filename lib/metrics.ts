/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `ct_watcher_scans_total{outcome}` (Counter)
 * - `ct_watcher_query_attempts_total{result}` (Counter)
 * - `ct_watcher_new_subdomains_total` (Counter)
 * - `ct_watcher_alerts_total` (Counter)
 * - `ct_watcher_notification_failures_total` (Counter)
 * - `ct_watcher_persistence_errors_total` (Counter)
 * - `ct_watcher_monitored_domains` (Gauge)
 * - `ct_watcher_query_latency_seconds` (Histogram)
 *
 * `register.metrics()` is served on `/metrics` by the entry point when METRICS_PORT is set.
 */

import { Counter, Gauge, Histogram, register } from 'prom-client';
import type { ScanOutcome } from './types';

export const scansTotal = new Counter({
  name: 'ct_watcher_scans_total',
  help: 'Domain scans completed, by outcome',
  labelNames: ['outcome'] as const,
});

export const queryAttemptsTotal = new Counter({
  name: 'ct_watcher_query_attempts_total',
  help: 'CT log queries issued, by result (ok or error kind)',
  labelNames: ['result'] as const,
});

export const newSubdomainsTotal = new Counter({
  name: 'ct_watcher_new_subdomains_total',
  help: 'Subdomains reported as new',
});

export const alertsTotal = new Counter({
  name: 'ct_watcher_alerts_total',
  help: 'Alert events produced',
});

export const notificationFailuresTotal = new Counter({
  name: 'ct_watcher_notification_failures_total',
  help: 'Notifications the sink failed to deliver',
});

export const persistenceErrorsTotal = new Counter({
  name: 'ct_watcher_persistence_errors_total',
  help: 'Failed reads or writes of stored subdomain sets',
});

export const monitoredDomains = new Gauge({
  name: 'ct_watcher_monitored_domains',
  help: 'Number of domains currently monitored',
});

export const queryLatency = new Histogram({
  name: 'ct_watcher_query_latency_seconds',
  help: 'Histogram of CT log query latency in seconds',
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 20, 30, 60],
});

export function incScan(outcome: ScanOutcome): void {
  scansTotal.inc({ outcome });
}

export function incQueryAttempt(result: string): void {
  queryAttemptsTotal.inc({ result });
}

export function incAlert(newCount: number): void {
  alertsTotal.inc();
  if (newCount > 0) newSubdomainsTotal.inc(newCount);
}

export function incNotificationFailure(): void {
  notificationFailuresTotal.inc();
}

export function incPersistenceError(): void {
  persistenceErrorsTotal.inc();
}

export function setMonitoredDomains(count: number): void {
  monitoredDomains.set(count);
}

/**
 * Observe query latency in seconds.
 */
export function observeQueryLatency(seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  queryLatency.observe(seconds);
}

export { register };
