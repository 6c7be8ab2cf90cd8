import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import { silentLogger } from '@/services/logger';
import { ConfigError } from '@/utils/errors';
import type { ChatCommand } from './dispatcher';
import { TelegramTransport, parseCommand, type TelegramMessage } from './telegram';

function message(id: number, text: string, commandLength?: number): TelegramMessage {
  return {
    message_id: id,
    chat: { id: 10 },
    text,
    entities: commandLength === undefined ? undefined : [{ type: 'bot_command', offset: 0, length: commandLength }],
  };
}

interface RecordedCall {
  method: string;
  body: unknown;
}

interface FakeTelegramOptions {
  /** One getUpdates answer per poll; a thrown Error fails that poll. */
  polls: Array<unknown[] | Error>;
  sendReply?: (body: unknown) => unknown;
  /** Fired once every poll has been answered. */
  done: AbortController;
}

function fakeTelegram({ polls, sendReply, done }: FakeTelegramOptions) {
  const calls: RecordedCall[] = [];
  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const method = config.url?.split('/').pop() ?? '';
    const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
    calls.push({ method, body });

    let data: unknown = { ok: true, result: true };
    if (method === 'getUpdates') {
      const next = polls.shift();
      if (next instanceof Error) {
        throw new AxiosError(next.message, 'ECONNRESET', config);
      }
      if (next === undefined) done.abort();
      data = { ok: true, result: next ?? [] };
    } else if (sendReply) {
      data = sendReply(body);
    }
    return { data, status: 200, statusText: 'OK', headers: {}, config };
  };
  return { calls, http: axios.create({ adapter }) };
}

function transport(http: ReturnType<typeof axios.create>) {
  return new TelegramTransport({
    token: 'test-token',
    apiUrl: 'https://telegram.test/',
    pollTimeoutSec: 5,
    retryDelayMs: 0,
    http,
    logger: silentLogger(),
  });
}

const echo = async (cmd: ChatCommand) => `${cmd.command}:${cmd.args}`;

describe('parseCommand', () => {
  it('reads the command and its arguments', () => {
    expect(parseCommand(message(1, '/info Paris', 5))).toEqual({
      chatId: 10,
      messageId: 1,
      command: 'info',
      args: 'Paris',
    });
  });

  it('drops a bot mention from the command', () => {
    expect(parseCommand(message(2, '/info@mybot Paris', 11))).toMatchObject({ command: 'info', args: 'Paris' });
  });

  it('keeps multi-word arguments', () => {
    expect(parseCommand(message(3, '/info   New York ', 5))).toMatchObject({ command: 'info', args: 'New York' });
  });

  it('gives empty arguments for a bare command', () => {
    expect(parseCommand(message(4, '/stat', 5))).toMatchObject({ command: 'stat', args: '' });
  });

  it('ignores messages that do not start with a command', () => {
    expect(parseCommand(message(5, 'hello'))).toBeNull();
    expect(parseCommand({ ...message(6, 'see /info', 5), entities: [{ type: 'bot_command', offset: 4, length: 5 }] })).toBeNull();
    expect(parseCommand({ message_id: 7, chat: { id: 10 } })).toBeNull();
  });
});

describe('TelegramTransport', () => {
  it('refuses to start without a bot token', () => {
    expect(() => new TelegramTransport({ token: '', logger: silentLogger() })).toThrow(ConfigError);
  });

  it('answers each command as a reply and advances the offset', async () => {
    const done = new AbortController();
    const { calls, http } = fakeTelegram({
      done,
      polls: [
        [
          { update_id: 1, message: message(100, '/info Paris', 5) },
          { update_id: 2, message: message(101, 'just chatting') },
          { update_id: 3 },
        ],
        [{ update_id: 4, message: message(103, '/help', 5) }],
      ],
    });

    await transport(http).listen(echo, done.signal);

    expect(calls.filter((c) => c.method === 'getUpdates').map((c) => c.body)).toEqual([
      { offset: 0, timeout: 5, allowed_updates: ['message'] },
      { offset: 4, timeout: 5, allowed_updates: ['message'] },
      { offset: 5, timeout: 5, allowed_updates: ['message'] },
    ]);
    expect(calls.filter((c) => c.method === 'sendMessage').map((c) => c.body)).toEqual([
      { chat_id: 10, text: 'info:Paris', reply_parameters: { message_id: 100 } },
      { chat_id: 10, text: 'help:', reply_parameters: { message_id: 103 } },
    ]);
  });

  it('dispatches commands one at a time in update order', async () => {
    const done = new AbortController();
    const { http } = fakeTelegram({
      done,
      polls: [
        [
          { update_id: 1, message: message(1, '/info Oslo', 5) },
          { update_id: 2, message: message(2, '/info Rome', 5) },
        ],
      ],
    });
    const seen: string[] = [];
    let active = 0;
    let maxActive = 0;
    const handler = async (cmd: ChatCommand) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setImmediate(resolve));
      seen.push(cmd.args);
      active--;
      return 'ok';
    };

    await transport(http).listen(handler, done.signal);

    expect(seen).toEqual(['Oslo', 'Rome']);
    expect(maxActive).toBe(1);
  });

  it('retries after a failed poll', async () => {
    const done = new AbortController();
    const { calls, http } = fakeTelegram({
      done,
      polls: [new Error('socket hang up'), [{ update_id: 9, message: message(9, '/start', 6) }]],
    });

    await transport(http).listen(echo, done.signal);

    expect(calls.map((c) => c.method)).toEqual(['getUpdates', 'getUpdates', 'sendMessage', 'getUpdates']);
  });

  it('keeps going when a reply cannot be sent', async () => {
    const done = new AbortController();
    const sendReply = vi.fn(() => ({ ok: false, description: 'Bad Request: chat not found' }));
    const { http } = fakeTelegram({
      done,
      sendReply,
      polls: [
        [
          { update_id: 1, message: message(1, '/start', 6) },
          { update_id: 2, message: message(2, '/help', 5) },
        ],
      ],
    });

    await transport(http).listen(echo, done.signal);

    expect(sendReply).toHaveBeenCalledTimes(2);
  });

  it('skips a command whose handler throws', async () => {
    const done = new AbortController();
    const { calls, http } = fakeTelegram({
      done,
      polls: [
        [
          { update_id: 1, message: message(1, '/info Oslo', 5) },
          { update_id: 2, message: message(2, '/help', 5) },
        ],
      ],
    });
    const handler = async (cmd: ChatCommand) => {
      if (cmd.command === 'info') throw new Error('boom');
      return 'help text';
    };

    await transport(http).listen(handler, done.signal);

    expect(calls.filter((c) => c.method === 'sendMessage').map((c) => c.body)).toEqual([
      { chat_id: 10, text: 'help text', reply_parameters: { message_id: 2 } },
    ]);
  });

  it('stops dispatching the rest of a batch once the signal fires', async () => {
    const done = new AbortController();
    const { calls, http } = fakeTelegram({
      done,
      polls: [
        [
          { update_id: 1, message: message(1, '/info Oslo', 5) },
          { update_id: 2, message: message(2, '/info Oslo', 5) },
          { update_id: 3, message: message(3, '/info Oslo', 5) },
        ],
      ],
    });
    const handled: number[] = [];
    const handler = async (cmd: ChatCommand) => {
      handled.push(cmd.messageId);
      done.abort();
      return 'internal error, try again';
    };

    await transport(http).listen(handler, done.signal);

    expect(handled).toEqual([1]);
    expect(calls.map((c) => c.method)).toEqual(['getUpdates']);
  });

  it('does not poll once the signal has fired', async () => {
    const done = new AbortController();
    const { calls, http } = fakeTelegram({ done, polls: [] });
    done.abort();

    await transport(http).listen(echo, done.signal);

    expect(calls).toEqual([]);
  });

  it('builds method URLs from the API base and token', async () => {
    const done = new AbortController();
    const urls: Array<string | undefined> = [];
    const http = axios.create({
      adapter: async (config) => {
        urls.push(config.url);
        done.abort();
        return { data: { ok: true, result: [] }, status: 200, statusText: 'OK', headers: {}, config };
      },
    });

    await transport(http).listen(echo, done.signal);

    expect(urls).toEqual(['https://telegram.test/bottest-token/getUpdates']);
  });
});
