import pLimit from 'p-limit';
import { CONFIG } from './config';
import logger from './logger';
import { applyScan } from './diff';
import { EventDispatcher } from './dispatcher';
import { PersistenceError, errorMessage } from './errors';
import { incPersistenceError, incScan } from './metrics';
import { executeScan } from './net/retry';
import { sleep } from './net/sleep';
import { MonitorState } from './state';
import type { SubdomainStore } from './store';
import type { Domain, ScanOutcome, ScanResult } from './types';

export interface SchedulerOptions {
  intervalMs?: number; // wait between passes
  domainDelayMs?: number; // wait between domains within a pass
  concurrency?: number; // domains scanned at once
  notifyQuietPasses?: boolean;
  /** Runs the CT query with retries; defaults to `executeScan`. */
  scan?: (domain: Domain) => Promise<ScanResult>;
}

export interface DomainScanReport {
  domain: Domain;
  outcome: ScanOutcome | 'persistence_failure' | 'skipped';
  newSubdomains: string[];
}

export interface PassReport {
  startedAt: string;
  finishedAt: string;
  completed: boolean; // false when stopped mid-pass
  scans: DomainScanReport[];
}

export interface SchedulerStatus {
  state: 'running' | 'stopped';
  domains: number;
  intervalMs: number;
  passes: number;
  lastPass?: PassReport;
}

/**
 * Repeating scan loop: one pass over a snapshot of the monitored domains,
 * then a wait of `intervalMs`. `stop()` aborts the wait at once and ends a
 * pass after the in-flight domain.
 */
export class Scheduler {
  private readonly intervalMs: number;
  private readonly domainDelayMs: number;
  private readonly concurrency: number;
  private readonly notifyQuietPasses: boolean;
  private readonly scan: (domain: Domain) => Promise<ScanResult>;

  private controller: AbortController | null = null;
  private loop: Promise<void> = Promise.resolve();
  private passes = 0;
  private lastPass?: PassReport;

  constructor(
    private readonly state: MonitorState,
    private readonly store: SubdomainStore,
    private readonly dispatcher: EventDispatcher,
    opts?: SchedulerOptions,
  ) {
    this.intervalMs = opts?.intervalMs ?? CONFIG.SCAN_INTERVAL_MS;
    this.domainDelayMs = opts?.domainDelayMs ?? CONFIG.DOMAIN_DELAY_MS;
    this.concurrency = Math.max(1, opts?.concurrency ?? CONFIG.SCAN_CONCURRENCY);
    this.notifyQuietPasses = opts?.notifyQuietPasses ?? CONFIG.NOTIFY_QUIET_PASSES;
    this.scan = opts?.scan ?? ((d) => executeScan(d));
  }

  /** stopped -> running. Returns false when already running. */
  start(): boolean {
    if (this.state.setState('running') === 'running') return false;

    const controller = new AbortController();
    this.controller = controller;
    // a previous loop may still be finishing its in-flight domain
    this.loop = this.loop.then(() => this.run(controller.signal));
    return true;
  }

  /** running -> stopped. Returns false when already stopped. */
  stop(): boolean {
    if (this.state.setState('stopped') === 'stopped') return false;
    this.controller?.abort();
    this.controller = null;
    return true;
  }

  /** Resolves once the current loop (if any) has exited. */
  whenStopped(): Promise<void> {
    return this.loop;
  }

  status(): SchedulerStatus {
    return {
      state: this.state.state,
      domains: this.state.snapshot().length,
      intervalMs: this.intervalMs,
      passes: this.passes,
      lastPass: this.lastPass,
    };
  }

  private async run(signal: AbortSignal): Promise<void> {
    logger.info({ intervalMs: this.intervalMs }, 'monitoring loop started');
    try {
      while (!signal.aborted) {
        await this.runPass(signal);
        if (signal.aborted) break;
        await sleep(this.intervalMs, signal);
      }
    } catch (err) {
      // runPass isolates per-domain failures, so this is a bug; leave the loop stopped
      logger.error({ err }, 'monitoring loop crashed');
      if (!signal.aborted) this.stop();
    }
    logger.info('monitoring loop finished');
  }

  /**
   * One pass over a snapshot of the monitored list. Domains added meanwhile
   * wait for the next pass; domains removed meanwhile are skipped.
   */
  async runPass(signal?: AbortSignal): Promise<PassReport> {
    const domains = this.state.snapshot();
    const startedAt = new Date().toISOString();
    const limit = pLimit(this.concurrency);
    const scans: DomainScanReport[] = [];
    logger.info({ domains: domains.length }, 'scan pass started');

    await Promise.all(
      domains.map((domain, i) =>
        limit(async () => {
          if (signal?.aborted) return;
          if (i > 0 && this.domainDelayMs > 0) {
            const waited = await sleep(this.domainDelayMs, signal);
            if (!waited) return;
          }
          scans.push(await this.scanDomain(domain));
        }),
      ),
    );

    const completed = !signal?.aborted;
    const report: PassReport = { startedAt, finishedAt: new Date().toISOString(), completed, scans };
    this.passes++;
    this.lastPass = report;

    const newCount = scans.reduce((n, s) => n + s.newSubdomains.length, 0);
    logger.info({ scanned: scans.length, newCount, completed }, 'scan pass finished');

    if (completed && this.notifyQuietPasses && domains.length > 0 && newCount === 0) {
      await this.dispatcher.dispatch({
        type: 'pass',
        domains,
        nextScanInMs: this.intervalMs,
        timestamp: report.finishedAt,
      });
    }
    return report;
  }

  /**
   * Scan one monitored domain now: query with retries, diff, store, notify.
   * Query and store failures become error notifications, not rejections.
   */
  async scanDomain(domain: Domain): Promise<DomainScanReport> {
    if (!this.state.hasDomain(domain)) {
      return { domain, outcome: 'skipped', newSubdomains: [] };
    }

    const result = await this.scan(domain);
    incScan(result.outcome);

    if (result.outcome !== 'success') {
      await this.dispatcher.dispatch({
        type: 'error',
        domain,
        kind: result.error?.kind ?? 'NetworkUnreachable',
        cause: result.error?.message ?? 'unknown failure',
        timestamp: result.timestamp,
      });
      return { domain, outcome: result.outcome, newSubdomains: [] };
    }

    // removed while the query was running: do not recreate its stored set
    if (!this.state.hasDomain(domain)) {
      return { domain, outcome: 'skipped', newSubdomains: [] };
    }

    try {
      const diff = await applyScan(this.store, domain, result.fetched);
      if (diff.alert) await this.dispatcher.dispatch(diff.alert);
      return { domain, outcome: 'success', newSubdomains: diff.alert?.newSubdomains ?? [] };
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      incPersistenceError();
      logger.error({ domain, op: err.op, err: err.message }, 'subdomain store update failed');
      await this.dispatcher.dispatch({
        type: 'error',
        domain,
        kind: 'PersistenceError',
        cause: errorMessage(err),
        timestamp: new Date().toISOString(),
      });
      return { domain, outcome: 'persistence_failure', newSubdomains: [] };
    }
  }
}

export default Scheduler;
