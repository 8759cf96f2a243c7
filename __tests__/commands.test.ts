import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { MonitorCommands } from '../app/commands';
import { createMonitor, initialDomains } from '../app/main';
import { CONFIG } from '../lib/config';
import { EventDispatcher } from '../lib/dispatcher';
import { PersistenceError } from '../lib/errors';
import { Scheduler } from '../lib/scheduler';
import { MonitorState } from '../lib/state';
import { DomainListFile } from '../lib/store/domainList';
import type { ScanResult } from '../lib/types';
import { MemoryStore, RecordingSink } from './support/fakes';

class UnwritableList extends DomainListFile {
  async save(): Promise<void> {
    throw new PersistenceError('save', '*', 'cannot write domains.json: read-only file system');
  }
}

function setup(domains: string[] = [], domainList?: DomainListFile) {
  const state = new MonitorState(domains);
  const store = new MemoryStore();
  const sink = new RecordingSink();
  const scan = jest.fn(
    async (d: string): Promise<ScanResult> => ({
      domain: d,
      fetched: new Set([`www.${d}`, `api.${d}`]),
      timestamp: new Date().toISOString(),
      outcome: 'success',
      attempts: 1,
    }),
  );
  const scheduler = new Scheduler(state, store, new EventDispatcher(sink), {
    intervalMs: 60 * 60 * 1000,
    domainDelayMs: 0,
    notifyQuietPasses: false,
    scan,
  });
  const commands = new MonitorCommands(state, scheduler, store, domainList);
  return { state, store, sink, scan, scheduler, commands };
}

describe('MonitorCommands', () => {
  test('addDomain normalizes and rejects invalid names', async () => {
    const { commands } = setup();

    expect(await commands.addDomain('Example.COM')).toEqual({
      ok: true,
      text: 'Added example.com. It will be scanned on the next pass.',
    });
    expect((await commands.addDomain('no dots')).ok).toBe(false);
    expect((await commands.addDomain('')).text).toBe('Invalid domain: (empty)');
    expect(commands.listDomains()).toEqual(['example.com']);
  });

  test('adding a duplicate is a no-op', async () => {
    const { commands } = setup(['example.com']);

    const reply = await commands.addDomain('example.com');

    expect(reply).toEqual({ ok: true, text: 'example.com is already monitored.' });
    expect(commands.listDomains()).toEqual(['example.com']);
  });

  test('removeDomain drops the domain and its stored set', async () => {
    const { commands, store } = setup(['example.com', 'example.org']);
    store.data.set('example.com', new Set(['www.example.com']));

    expect(await commands.removeDomain('example.com')).toEqual({ ok: true, text: 'Removed example.com.' });
    expect(commands.listDomains()).toEqual(['example.org']);
    expect(store.data.has('example.com')).toBe(false);
    expect(await commands.removeDomain('example.com')).toEqual({ ok: true, text: 'example.com is not monitored.' });
  });

  test('add and remove persist the domain list', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ctw-cmd-'));
    try {
      const list = new DomainListFile(dir);
      const { commands } = setup([], list);

      await commands.addDomain('example.com');
      await commands.addDomain('example.org');
      await commands.removeDomain('example.com');

      expect(await list.load()).toEqual(['example.org']);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  test('add and remove report a domain list that could not be saved', async () => {
    const { commands } = setup(['example.org'], new UnwritableList('/unused'));

    expect(await commands.addDomain('example.com')).toEqual({
      ok: false,
      text: 'Added example.com, but the domain list could not be saved, so it is lost on restart: cannot write domains.json: read-only file system',
    });
    expect(await commands.removeDomain('example.org')).toEqual({
      ok: false,
      text: 'Removed example.org, but the domain list could not be saved, so it returns on restart: cannot write domains.json: read-only file system',
    });
    expect(commands.listDomains()).toEqual(['example.com']);
  });

  test('start and stop toggle monitoring', async () => {
    const { commands, scheduler, state } = setup();

    expect(commands.start().text).toBe('Monitoring started.');
    expect(commands.start().text).toBe('Monitoring is already running.');
    expect(state.state).toBe('running');
    expect(commands.stop().text).toBe('Monitoring stopped.');
    expect(commands.stop().text).toBe('Monitoring is already stopped.');
    await scheduler.whenStopped();
  });

  test('scanNow probes a monitored domain immediately', async () => {
    const { commands, store, scan } = setup(['example.com']);
    store.data.set('example.com', new Set(['www.example.com']));

    const reply = await commands.scanNow('example.com');

    expect(reply).toEqual({ ok: true, text: 'Scan of example.com found 1 new subdomain(s).' });
    expect(scan).toHaveBeenCalledWith('example.com');
  });

  test('scanNow refuses unmonitored domains', async () => {
    const { commands, scan } = setup();

    const reply = await commands.scanNow('example.com');

    expect(reply).toEqual({ ok: false, text: 'example.com is not monitored. Add it first.' });
    expect(scan).not.toHaveBeenCalled();
  });
});

describe('MonitorCommands.handleText', () => {
  test('routes chat commands', async () => {
    const { commands } = setup();

    expect((await commands.handleText('/add example.com')).ok).toBe(true);
    expect((await commands.handleText('/add@WatcherBot example.org')).ok).toBe(true);
    expect(await commands.handleText('/list')).toEqual({
      ok: true,
      text: 'Monitored domains:\n1. example.com\n2. example.org',
    });
    expect((await commands.handleText('/remove example.org')).text).toBe('Removed example.org.');
  });

  test('explains usage and unknown commands', async () => {
    const { commands } = setup();

    expect(await commands.handleText('/add')).toEqual({ ok: false, text: 'Usage: /add <domain>' });
    expect(await commands.handleText('/list')).toEqual({ ok: true, text: 'No domains are currently monitored.' });
    const unknown = await commands.handleText('hello');
    expect(unknown.ok).toBe(false);
    expect(unknown.text.startsWith('Unknown command.\nCommands:')).toBe(true);
  });

  test('status reports state, size and interval', async () => {
    const { commands } = setup(['example.com']);

    expect((await commands.handleText('/status')).text).toBe(
      'Monitoring: stopped\nDomains: 1\nScan interval: 1 hour\nPasses: 0',
    );
  });
});

describe('initialDomains', () => {
  test('prefers the saved list and drops invalid or duplicate entries', () => {
    expect(initialDomains(['Example.com', 'bad name', 'example.com'], ['ignored.org'])).toEqual(['example.com']);
    expect(initialDomains(null, ['example.org', 'nodot'])).toEqual(['example.org']);
  });
});

describe('createMonitor', () => {
  test('starts with monitoring stopped until a start command', async () => {
    const { state, scheduler, commands } = createMonitor(['example.com'], new MemoryStore(), new RecordingSink());

    expect(state.state).toBe('stopped');
    expect(scheduler.status()).toEqual({ state: 'stopped', domains: 1, intervalMs: CONFIG.SCAN_INTERVAL_MS, passes: 0 });
    expect(commands.listDomains()).toEqual(['example.com']);
  });
});
