import logger from '../lib/logger';
import { forgetDomain } from '../lib/diff';
import { PersistenceError, errorMessage } from '../lib/errors';
import { formatInterval } from '../lib/format';
import { Scheduler } from '../lib/scheduler';
import { MonitorState } from '../lib/state';
import type { SubdomainStore } from '../lib/store';
import type { DomainListFile } from '../lib/store/domainList';
import { parseMonitoredDomain } from '../lib/subdomain';

export interface CommandReply {
  ok: boolean;
  text: string;
}

const HELP = [
  'Commands:',
  '/add <domain> - start watching a domain',
  '/remove <domain> - stop watching a domain and forget its subdomains',
  '/list - show watched domains',
  '/scan <domain> - scan one watched domain now',
  '/start - start monitoring',
  '/stop - stop monitoring',
  '/status - show monitoring status',
].join('\n');

/**
 * Command intents from the chat surface. Shares `MonitorState` with the
 * scheduler; list changes are persisted when a `DomainListFile` is given.
 */
export class MonitorCommands {
  constructor(
    private readonly state: MonitorState,
    private readonly scheduler: Scheduler,
    private readonly store: SubdomainStore,
    private readonly domainList?: DomainListFile,
  ) {}

  async addDomain(name: string): Promise<CommandReply> {
    const domain = parseMonitoredDomain(name);
    if (!domain) return { ok: false, text: `Invalid domain: ${name.trim() || '(empty)'}` };

    if (!this.state.addDomain(domain)) {
      return { ok: true, text: `${domain} is already monitored.` };
    }
    logger.info({ domain }, 'domain added');
    const saveError = await this.persistList();
    if (saveError) {
      return { ok: false, text: `Added ${domain}, but the domain list could not be saved, so it is lost on restart: ${saveError}` };
    }
    return { ok: true, text: `Added ${domain}. It will be scanned on the next pass.` };
  }

  async removeDomain(name: string): Promise<CommandReply> {
    const domain = parseMonitoredDomain(name) ?? name.trim().toLowerCase();
    if (!this.state.removeDomain(domain)) {
      return { ok: true, text: `${domain} is not monitored.` };
    }
    logger.info({ domain }, 'domain removed');
    const saveError = await this.persistList();
    try {
      await forgetDomain(this.store, domain);
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      logger.error({ domain, err: err.message }, 'failed to delete stored subdomains');
      return { ok: false, text: `Removed ${domain}, but its stored subdomains could not be deleted: ${err.message}` };
    }
    if (saveError) {
      return { ok: false, text: `Removed ${domain}, but the domain list could not be saved, so it returns on restart: ${saveError}` };
    }
    return { ok: true, text: `Removed ${domain}.` };
  }

  listDomains(): string[] {
    return this.state.snapshot();
  }

  start(): CommandReply {
    return this.scheduler.start()
      ? { ok: true, text: 'Monitoring started.' }
      : { ok: true, text: 'Monitoring is already running.' };
  }

  stop(): CommandReply {
    return this.scheduler.stop()
      ? { ok: true, text: 'Monitoring stopped.' }
      : { ok: true, text: 'Monitoring is already stopped.' };
  }

  async scanNow(name: string): Promise<CommandReply> {
    const domain = parseMonitoredDomain(name);
    if (!domain || !this.state.hasDomain(domain)) {
      return { ok: false, text: `${domain ?? name.trim()} is not monitored. Add it first.` };
    }
    const report = await this.scheduler.scanDomain(domain);
    switch (report.outcome) {
      case 'success':
        return {
          ok: true,
          text: report.newSubdomains.length
            ? `Scan of ${domain} found ${report.newSubdomains.length} new subdomain(s).`
            : `Scan of ${domain} found nothing new.`,
        };
      case 'skipped':
        return { ok: true, text: `${domain} was removed before the scan finished.` };
      default:
        return { ok: false, text: `Scan of ${domain} failed (${report.outcome}).` };
    }
  }

  status(): CommandReply {
    const s = this.scheduler.status();
    const lines = [
      `Monitoring: ${s.state}`,
      `Domains: ${s.domains}`,
      `Scan interval: ${formatInterval(s.intervalMs)}`,
      `Passes: ${s.passes}`,
    ];
    if (s.lastPass) {
      lines.push(`Last pass finished: ${s.lastPass.finishedAt}`);
    }
    return { ok: true, text: lines.join('\n') };
  }

  /**
   * Map one chat message to an intent, e.g. "/add example.com".
   */
  async handleText(text: string): Promise<CommandReply> {
    const [rawCmd = '', ...args] = text.trim().split(/\s+/);
    // "/add@MyBot example.com" in group chats
    const cmd = rawCmd.toLowerCase().replace(/@.*$/, '');
    const arg = args.join(' ');

    switch (cmd) {
      case '/add':
        return arg ? this.addDomain(arg) : { ok: false, text: 'Usage: /add <domain>' };
      case '/remove':
        return arg ? this.removeDomain(arg) : { ok: false, text: 'Usage: /remove <domain>' };
      case '/scan':
        return arg ? this.scanNow(arg) : { ok: false, text: 'Usage: /scan <domain>' };
      case '/list': {
        const domains = this.listDomains();
        if (!domains.length) return { ok: true, text: 'No domains are currently monitored.' };
        return { ok: true, text: ['Monitored domains:', ...domains.map((d, i) => `${i + 1}. ${d}`)].join('\n') };
      }
      case '/start':
        return this.start();
      case '/stop':
        return this.stop();
      case '/status':
        return this.status();
      case '/help':
        return { ok: true, text: HELP };
      default:
        return { ok: false, text: `Unknown command.\n${HELP}` };
    }
  }

  /** Saves the list; resolves to the failure message, or null. */
  private async persistList(): Promise<string | null> {
    if (!this.domainList) return null;
    try {
      await this.domainList.save(this.state.snapshot());
      return null;
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'failed to persist domain list');
      return errorMessage(err);
    }
  }
}

export default MonitorCommands;
