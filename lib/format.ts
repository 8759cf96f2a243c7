import type { AlertEvent, ErrorEvent, MonitorEvent, PassSummaryEvent } from './types';

// Telegram legacy Markdown: only _ * ` [ are special
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

function code(text: string): string {
  return '`' + text.replace(/`/g, "'") + '`';
}

function plural(n: number, unit: string): string {
  return `${n} ${unit}${n === 1 ? '' : 's'}`;
}

/**
 * Human-readable duration: "1 hour, 5 minutes", "30 seconds", "0 seconds".
 */
export function formatInterval(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  const parts: string[] = [];
  if (hours > 0) parts.push(plural(hours, 'hour'));
  if (minutes > 0) parts.push(plural(minutes, 'minute'));
  if (secs > 0 || parts.length === 0) parts.push(plural(secs, 'second'));
  return parts.join(', ');
}

export function formatAlert(event: AlertEvent): string {
  return [
    `🚨 *New subdomains detected on ${escapeMarkdown(event.domain)}*`,
    '',
    `📊 *Total found: ${event.newSubdomains.length}*`,
    '',
    ...event.newSubdomains.map(code),
  ].join('\n');
}

export function formatError(event: ErrorEvent): string {
  return [
    `⚠️ *Scan error for ${escapeMarkdown(event.domain)}*`,
    '',
    `Kind: ${code(event.kind)}`,
    code(event.cause),
  ].join('\n');
}

export function formatPassSummary(event: PassSummaryEvent): string {
  return [
    '✅ *Scan Complete*',
    '',
    '🔍 Checked all monitored domains:',
    ...event.domains.map((d) => `• *${escapeMarkdown(d)}*`),
    '',
    '✨ No new subdomains detected this cycle.',
    '',
    `⏰ *Next scan in:* ${formatInterval(event.nextScanInMs)}`,
  ].join('\n');
}

export function formatEvent(event: MonitorEvent): string {
  switch (event.type) {
    case 'alert':
      return formatAlert(event);
    case 'error':
      return formatError(event);
    case 'pass':
      return formatPassSummary(event);
  }
}
