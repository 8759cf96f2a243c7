// Centralized runtime configuration for scan timing, retries, storage and notifications.
// Values are read from env with sane defaults and can be overridden in tests.

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function envBool(name: string, fallback: boolean): boolean {
  const v = process.env[name];
  if (!v) return fallback;
  return !['false', '0', 'no', 'off'].includes(v.trim().toLowerCase());
}

function envList(name: string): string[] {
  const v = process.env[name];
  if (!v) return [];
  return v.split(/[,\s]+/).map((s) => s.trim()).filter(Boolean);
}

export const CONFIG = {
  SCAN_INTERVAL_MS: envInt('SCAN_INTERVAL_MS', 1000 * 60 * 60), // 1h
  DOMAIN_DELAY_MS: envInt('DOMAIN_DELAY_MS', 10_000),
  SCAN_CONCURRENCY: envInt('SCAN_CONCURRENCY', 1),

  HTTP_TIMEOUT_MS: envInt('HTTP_TIMEOUT_MS', 15_000),
  CRTSH_BASE_URL: process.env.CRTSH_BASE_URL || 'https://crt.sh/',
  USER_AGENT: process.env.USER_AGENT || 'ct-subdomain-watcher/0.1',

  RETRY: {
    ATTEMPTS: envInt('RETRY_ATTEMPTS', 3),
    BASE_DELAY_MS: envInt('RETRY_BASE_DELAY_MS', 5_000),
    MAX_DELAY_MS: envInt('RETRY_MAX_DELAY_MS', 1000 * 60 * 5), // 5m
  },

  DATA_DIR: process.env.DATA_DIR || './data',
  REDIS_URL: process.env.REDIS_URL || '',
  STORE_KEY_PREFIX: process.env.STORE_KEY_PREFIX || 'ctw:',

  MONITOR_DOMAINS: envList('MONITOR_DOMAINS'),
  NOTIFY_QUIET_PASSES: envBool('NOTIFY_QUIET_PASSES', true),

  TELEGRAM: {
    BOT_TOKEN: process.env.TELEGRAM_BOT_TOKEN || '',
    ADMIN_CHAT_ID: process.env.TELEGRAM_ADMIN_CHAT_ID || '',
    API_URL: process.env.TELEGRAM_API_URL || 'https://api.telegram.org',
    POLL_TIMEOUT_S: envInt('TELEGRAM_POLL_TIMEOUT_S', 30),
  },

  METRICS_PORT: envInt('METRICS_PORT', 0),
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export default CONFIG;
