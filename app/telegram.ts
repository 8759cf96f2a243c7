import { CONFIG } from '../lib/config';
import logger from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { sleep } from '../lib/net/sleep';
import type { NotificationSink } from '../lib/types';
import type { CommandReply } from './commands';

interface TelegramUpdate {
  update_id: number;
  message?: {
    chat: { id: number };
    text?: string;
  };
}

export interface TelegramOptions {
  token: string;
  chatId: string;
  apiUrl?: string;
  timeoutMs?: number;
}

/**
 * Minimal Telegram Bot API client: `sendMessage` for notifications and
 * `getUpdates` long polling for admin commands.
 */
export class TelegramClient implements NotificationSink {
  private readonly base: string;
  private readonly timeoutMs: number;

  constructor(private readonly opts: TelegramOptions) {
    this.base = `${(opts.apiUrl ?? CONFIG.TELEGRAM.API_URL).replace(/\/+$/, '')}/bot${opts.token}`;
    this.timeoutMs = opts.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS;
  }

  get chatId(): string {
    return this.opts.chatId;
  }

  /** Sends Markdown text to the admin chat; false when Telegram did not accept it. */
  async send(text: string): Promise<boolean> {
    return this.sendMessage(text, 'Markdown');
  }

  async sendMessage(text: string, parseMode?: 'Markdown'): Promise<boolean> {
    try {
      const body = await this.call('sendMessage', {
        chat_id: this.opts.chatId,
        text,
        ...(parseMode ? { parse_mode: parseMode } : {}),
        disable_web_page_preview: true,
      }, this.timeoutMs);
      return isOkEnvelope(body);
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, 'telegram sendMessage failed');
      return false;
    }
  }

  async getUpdates(offset: number, pollTimeoutS: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const body = await this.call(
      'getUpdates',
      { offset, timeout: pollTimeoutS, allowed_updates: ['message'] },
      (pollTimeoutS + 10) * 1000,
      signal,
    );
    if (!isOkEnvelope(body)) throw new Error('telegram getUpdates returned an error');
    const result: unknown = Reflect.get(body, 'result');
    if (!Array.isArray(result)) throw new Error('telegram getUpdates returned no result list');
    return result.filter(isUpdate);
  }

  private async call(method: string, payload: Record<string, unknown>, timeoutMs: number, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const id = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const res = await fetch(`${this.base}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      return await res.json();
    } finally {
      clearTimeout(id);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function isOkEnvelope(body: unknown): body is { ok: true } {
  return typeof body === 'object' && body !== null && Reflect.get(body, 'ok') === true;
}

function isUpdate(u: unknown): u is TelegramUpdate {
  return typeof u === 'object' && u !== null && typeof Reflect.get(u, 'update_id') === 'number';
}

/**
 * Long-poll loop feeding admin chat messages to `handle` and replying with
 * its text. Messages from any other chat are ignored. Commands run without
 * holding up the next poll, so a slow `/scan` does not delay `/stop`.
 * Ends when `signal` aborts, after the pending replies are sent.
 */
export async function pollCommands(
  client: TelegramClient,
  handle: (text: string) => Promise<CommandReply>,
  signal: AbortSignal,
  pollTimeoutS = CONFIG.TELEGRAM.POLL_TIMEOUT_S,
): Promise<void> {
  const pending = new Set<Promise<void>>();
  let offset = 0;
  while (!signal.aborted) {
    let updates: TelegramUpdate[];
    try {
      updates = await client.getUpdates(offset, pollTimeoutS, signal);
    } catch (err) {
      if (signal.aborted) break;
      logger.warn({ err: errorMessage(err) }, 'telegram polling failed, retrying');
      await sleep(5_000, signal);
      continue;
    }

    for (const update of updates) {
      offset = Math.max(offset, update.update_id + 1);
      const msg = update.message;
      if (!msg?.text || !msg.chat) continue;
      if (String(msg.chat.id) !== client.chatId) {
        logger.warn({ chatId: msg.chat.id }, 'ignoring message from unauthorized chat');
        continue;
      }
      const task: Promise<void> = respond(client, handle, msg.text).finally(() => pending.delete(task));
      pending.add(task);
    }
  }
  await Promise.all(pending);
}

async function respond(
  client: TelegramClient,
  handle: (text: string) => Promise<CommandReply>,
  text: string,
): Promise<void> {
  let reply: CommandReply;
  try {
    reply = await handle(text);
  } catch (err) {
    logger.error({ err: errorMessage(err), command: text }, 'command failed');
    reply = { ok: false, text: `Command failed: ${errorMessage(err)}` };
  }
  await client.sendMessage(reply.text);
}
