#!/usr/bin/env node
import http from 'http';
import { CONFIG } from '../lib/config';
import logger from '../lib/logger';
import { EventDispatcher, LogSink } from '../lib/dispatcher';
import { register } from '../lib/metrics';
import { closeRedisClient } from '../lib/redisAdapter';
import { Scheduler } from '../lib/scheduler';
import { MonitorState } from '../lib/state';
import { createDefaultStore } from '../lib/store';
import { DomainListFile } from '../lib/store/domainList';
import { parseMonitoredDomain } from '../lib/subdomain';
import type { SubdomainStore } from '../lib/store';
import type { NotificationSink } from '../lib/types';
import { MonitorCommands } from './commands';
import { TelegramClient, pollCommands } from './telegram';

/**
 * Validate configured domains, dropping (and logging) the unusable ones.
 */
export function initialDomains(saved: string[] | null, fromEnv: string[]): string[] {
  const out: string[] = [];
  for (const raw of saved ?? fromEnv) {
    const domain = parseMonitoredDomain(raw);
    if (!domain) {
      logger.warn({ domain: raw }, 'ignoring invalid domain');
      continue;
    }
    if (!out.includes(domain)) out.push(domain);
  }
  return out;
}

export interface Monitor {
  state: MonitorState;
  scheduler: Scheduler;
  commands: MonitorCommands;
}

/**
 * Wire state, scheduler and commands. Monitoring starts stopped and only
 * a start command sets it running.
 */
export function createMonitor(
  domains: string[],
  store: SubdomainStore,
  sink: NotificationSink,
  domainList?: DomainListFile,
): Monitor {
  const state = new MonitorState(domains);
  const scheduler = new Scheduler(state, store, new EventDispatcher(sink));
  const commands = new MonitorCommands(state, scheduler, store, domainList);
  return { state, scheduler, commands };
}

function startMetricsServer(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url !== '/metrics') {
      res.writeHead(404).end();
      return;
    }
    register
      .metrics()
      .then((body) => {
        res.writeHead(200, { 'Content-Type': register.contentType }).end(body);
      })
      .catch((err: unknown) => {
        logger.error({ err }, 'metrics collection failed');
        res.writeHead(500).end();
      });
  });
  server.listen(port, () => logger.info({ port }, 'metrics endpoint listening'));
  return server;
}

export async function main(): Promise<void> {
  const domainList = new DomainListFile(CONFIG.DATA_DIR);
  // a malformed list aborts startup instead of being overwritten
  const domains = initialDomains(await domainList.load(), CONFIG.MONITOR_DOMAINS);
  const store = await createDefaultStore();

  let sink: NotificationSink = new LogSink();
  let telegram: TelegramClient | null = null;
  if (CONFIG.TELEGRAM.BOT_TOKEN && CONFIG.TELEGRAM.ADMIN_CHAT_ID) {
    telegram = new TelegramClient({ token: CONFIG.TELEGRAM.BOT_TOKEN, chatId: CONFIG.TELEGRAM.ADMIN_CHAT_ID });
    sink = telegram;
  } else {
    logger.warn('TELEGRAM_BOT_TOKEN / TELEGRAM_ADMIN_CHAT_ID not set, notifications go to the log only');
  }

  const { state, scheduler, commands } = createMonitor(domains, store, sink, domainList);

  const shutdown = new AbortController();
  const polling = telegram
    ? pollCommands(telegram, (text) => commands.handleText(text), shutdown.signal)
    : Promise.resolve();
  const metricsServer = CONFIG.METRICS_PORT ? startMetricsServer(CONFIG.METRICS_PORT) : null;

  logger.info({ domains: state.snapshot(), state: state.state }, 'subdomain watcher ready, send /start to begin');

  await new Promise<void>((resolve) => {
    const onSignal = (sig: NodeJS.Signals) => {
      logger.info({ signal: sig }, 'shutting down');
      resolve();
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });

  scheduler.stop();
  shutdown.abort();
  await Promise.all([scheduler.whenStopped(), polling]);
  metricsServer?.close();
  await closeRedisClient();
  logger.info('stopped');
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.fatal({ err }, 'subdomain watcher failed to start');
    process.exit(1);
  });
}
