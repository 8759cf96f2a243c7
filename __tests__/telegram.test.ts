import { TelegramClient, pollCommands } from '../app/telegram';
import { response } from './support/fakes';

const mockFetch = global.fetch as jest.MockedFunction<typeof fetch>;

function requestBody(call: number): Record<string, unknown> {
  const init = mockFetch.mock.calls[call][1];
  return JSON.parse(String(init?.body));
}

describe('TelegramClient', () => {
  beforeEach(() => mockFetch.mockReset());

  const client = () => new TelegramClient({ token: 'test-token', chatId: '42', apiUrl: 'https://tg.test/' });

  test('send posts Markdown to the admin chat', async () => {
    mockFetch.mockResolvedValueOnce(response(200, '{"ok":true,"result":{}}'));

    const delivered = await client().send('*hello*');

    expect(delivered).toBe(true);
    expect(mockFetch.mock.calls[0][0]).toBe('https://tg.test/bottest-token/sendMessage');
    expect(requestBody(0)).toEqual({
      chat_id: '42',
      text: '*hello*',
      parse_mode: 'Markdown',
      disable_web_page_preview: true,
    });
  });

  test('send reports false when Telegram rejects the message', async () => {
    mockFetch.mockResolvedValueOnce(response(400, '{"ok":false,"description":"Bad Request"}'));

    expect(await client().send('x')).toBe(false);
  });

  test('send reports false when the request fails', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    expect(await client().send('x')).toBe(false);
  });
});

describe('pollCommands', () => {
  beforeEach(() => mockFetch.mockReset());

  test('answers the admin chat and ignores others', async () => {
    const tg = new TelegramClient({ token: 'test-token', chatId: '42', apiUrl: 'https://tg.test' });
    const controller = new AbortController();
    const handle = jest.fn(async (text: string) => ({ ok: true, text: `echo ${text}` }));

    mockFetch.mockImplementation(async (url) => {
      const method = String(url).split('/').pop();
      if (method === 'sendMessage') return response(200, '{"ok":true,"result":{}}');
      if (mockFetch.mock.calls.filter(([u]) => String(u).endsWith('/getUpdates')).length === 1) {
        return response(
          200,
          JSON.stringify({
            ok: true,
            result: [
              { update_id: 7, message: { chat: { id: 99 }, text: '/list' } },
              { update_id: 8, message: { chat: { id: 42 }, text: '/status' } },
            ],
          }),
        );
      }
      controller.abort();
      return response(200, '{"ok":true,"result":[]}');
    });

    await pollCommands(tg, handle, controller.signal, 1);

    expect(handle).toHaveBeenCalledTimes(1);
    expect(handle).toHaveBeenCalledWith('/status');
    const sends = mockFetch.mock.calls.map(([u], i) => [String(u), i]).filter(([u]) => String(u).endsWith('/sendMessage'));
    expect(sends).toHaveLength(1);
    expect(requestBody(Number(sends[0][1]))).toEqual({
      chat_id: '42',
      text: 'echo /status',
      disable_web_page_preview: true,
    });
    const secondPoll = mockFetch.mock.calls.filter(([u]) => String(u).endsWith('/getUpdates'))[1];
    expect(JSON.parse(String(secondPoll[1]?.body)).offset).toBe(9);
  });

  test('keeps polling while a slow command is still running', async () => {
    const tg = new TelegramClient({ token: 'test-token', chatId: '42', apiUrl: 'https://tg.test' });
    const controller = new AbortController();
    let finishScan: () => void = () => undefined;
    const scanDone = new Promise<void>((resolve) => {
      finishScan = resolve;
    });
    const handle = jest.fn(async (text: string) => {
      if (text.startsWith('/scan')) await scanDone;
      return { ok: true, text: `done ${text}` };
    });
    let polls = 0;
    let handledDuringScan: string[] = [];

    mockFetch.mockImplementation(async (url) => {
      if (String(url).endsWith('/sendMessage')) return response(200, '{"ok":true,"result":{}}');
      polls++;
      if (polls === 1) {
        return response(200, JSON.stringify({ ok: true, result: [{ update_id: 1, message: { chat: { id: 42 }, text: '/scan example.com' } }] }));
      }
      if (polls === 2) {
        return response(200, JSON.stringify({ ok: true, result: [{ update_id: 2, message: { chat: { id: 42 }, text: '/list' } }] }));
      }
      handledDuringScan = handle.mock.calls.map(([t]) => t);
      finishScan();
      controller.abort();
      return response(200, '{"ok":true,"result":[]}');
    });

    await pollCommands(tg, handle, controller.signal, 1);

    expect(polls).toBe(3);
    expect(handledDuringScan).toEqual(['/scan example.com', '/list']);
    const replies = mockFetch.mock.calls
      .filter(([u]) => String(u).endsWith('/sendMessage'))
      .map(([, init]) => JSON.parse(String(init?.body)).text)
      .sort();
    expect(replies).toEqual(['done /list', 'done /scan example.com']);
  });
});
