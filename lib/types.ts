import type { QueryError, QueryErrorKind } from './errors';

export type Domain = string;

/** Normalized hostnames observed for one domain. */
export type SubdomainSet = ReadonlySet<string>;

export type ScanOutcome = 'success' | 'retryable_failure' | 'fatal_failure';

export interface ScanResult {
  domain: Domain;
  fetched: SubdomainSet;
  timestamp: string; // ISO timestamp
  outcome: ScanOutcome;
  attempts: number;
  error?: QueryError;
}

export interface AlertEvent {
  type: 'alert';
  domain: Domain;
  newSubdomains: string[]; // sorted, never empty
  timestamp: string;
}

export interface ErrorEvent {
  type: 'error';
  domain: Domain;
  kind: QueryErrorKind | 'PersistenceError';
  cause: string;
  timestamp: string;
}

/** Sent after a full pass that found nothing new. */
export interface PassSummaryEvent {
  type: 'pass';
  domains: Domain[];
  nextScanInMs: number;
  timestamp: string;
}

export type MonitorEvent = AlertEvent | ErrorEvent | PassSummaryEvent;

export type MonitoringState = 'running' | 'stopped';

/** Outbound channel for notifications; resolves false when delivery failed. */
export interface NotificationSink {
  send(text: string): Promise<boolean>;
}
