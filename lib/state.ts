import { setMonitoredDomains } from './metrics';
import type { Domain, MonitoringState } from './types';

/**
 * Shared state owned by the command surface and the scheduler: the monitored
 * domain list and the running flag. Every method is synchronous, so each call
 * runs to completion on the event loop without interleaving with another.
 */
export class MonitorState {
  private readonly domains: Domain[] = [];
  private running: MonitoringState = 'stopped';

  constructor(initial: Iterable<Domain> = []) {
    for (const d of initial) this.addDomain(d);
  }

  /** Returns false when the domain was already monitored. */
  addDomain(domain: Domain): boolean {
    if (this.domains.includes(domain)) return false;
    this.domains.push(domain);
    setMonitoredDomains(this.domains.length);
    return true;
  }

  /** Returns false when the domain was not monitored. */
  removeDomain(domain: Domain): boolean {
    const i = this.domains.indexOf(domain);
    if (i === -1) return false;
    this.domains.splice(i, 1);
    setMonitoredDomains(this.domains.length);
    return true;
  }

  hasDomain(domain: Domain): boolean {
    return this.domains.includes(domain);
  }

  /** Copy of the list in insertion order; later mutations do not affect it. */
  snapshot(): Domain[] {
    return [...this.domains];
  }

  get state(): MonitoringState {
    return this.running;
  }

  setState(next: MonitoringState): MonitoringState {
    const prev = this.running;
    this.running = next;
    return prev;
  }
}

export default MonitorState;
