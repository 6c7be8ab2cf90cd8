/**
 * Telegram Bot API transport: long-polls getUpdates and answers each command
 * with sendMessage, one update at a time.
 *
 * https://core.telegram.org/bots/api#getupdates
 */
import { setTimeout as delay } from 'node:timers/promises';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AppLogger } from '@/services/logger';
import { ConfigError, errorMessage } from '@/utils/errors';
import type { ChatCommand } from './dispatcher';

export const DEFAULT_TELEGRAM_URL = 'https://api.telegram.org';

const entitySchema = z.object({
  type: z.string(),
  offset: z.number().int(),
  length: z.number().int(),
});

const messageSchema = z.object({
  message_id: z.number().int(),
  chat: z.object({ id: z.number().int() }),
  text: z.string().optional(),
  entities: z.array(entitySchema).optional(),
});

const updateSchema = z.object({
  update_id: z.number().int(),
  message: messageSchema.optional(),
});

const getUpdatesSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), result: z.array(updateSchema) }),
  z.object({ ok: z.literal(false), description: z.string().optional() }),
]);

const sendMessageSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export type TelegramMessage = z.infer<typeof messageSchema>;
export type TelegramUpdate = z.infer<typeof updateSchema>;

export type CommandHandler = (cmd: ChatCommand, signal: AbortSignal) => Promise<string>;

/**
 * Reads a command from a message that starts with a bot_command entity.
 * `/info@mybot Paris` gives command `info` with args `Paris`.
 */
export function parseCommand(message: TelegramMessage): ChatCommand | null {
  const text = message.text;
  const entity = message.entities?.[0];
  if (!text || !entity || entity.type !== 'bot_command' || entity.offset !== 0) {
    return null;
  }

  const command = text.slice(1, entity.length).split('@')[0];
  return {
    chatId: message.chat.id,
    messageId: message.message_id,
    command,
    args: text.slice(entity.length).trim(),
  };
}

export interface TelegramTransportOptions {
  token: string;
  logger: AppLogger;
  apiUrl?: string;
  /** Long-poll timeout passed to getUpdates. */
  pollTimeoutSec?: number;
  /** Pause after a failed poll. */
  retryDelayMs?: number;
  /** Logs every raw update. */
  debug?: boolean;
  http?: AxiosInstance;
}

export class TelegramTransport {
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly pollTimeoutSec: number;
  private readonly retryDelayMs: number;
  private readonly debug: boolean;
  private readonly http: AxiosInstance;
  private readonly logger: AppLogger;

  constructor(options: TelegramTransportOptions) {
    if (!options.token) {
      throw new ConfigError([{ path: 'token', message: 'Missing Telegram bot token' }]);
    }
    this.token = options.token;
    this.apiUrl = (options.apiUrl ?? DEFAULT_TELEGRAM_URL).replace(/\/+$/, '');
    this.pollTimeoutSec = options.pollTimeoutSec ?? 60;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.debug = options.debug ?? false;
    this.http = options.http ?? axios.create();
    this.logger = options.logger.getSubLogger({ name: 'telegram' });
  }

  /** Polls and dispatches until `signal` fires. */
  async listen(handler: CommandHandler, signal: AbortSignal): Promise<void> {
    let offset = 0;
    this.logger.info('telegram:listening', { pollTimeoutSec: this.pollTimeoutSec });

    while (!signal.aborted) {
      let updates: TelegramUpdate[];
      try {
        updates = await this.getUpdates(offset, signal);
      } catch (err) {
        if (signal.aborted) break;
        this.logger.warn('telegram:poll_failed', { offset, error: errorMessage(err) });
        await pause(this.retryDelayMs, signal);
        continue;
      }

      for (const update of updates) {
        // Unhandled updates stay unconfirmed and are redelivered after restart.
        if (signal.aborted) break;
        offset = Math.max(offset, update.update_id + 1);
        if (this.debug) {
          this.logger.info('telegram:update', { update });
        }

        const cmd = update.message ? parseCommand(update.message) : null;
        if (!cmd) continue;

        let reply: string;
        try {
          reply = await handler(cmd, signal);
        } catch (err) {
          this.logger.error('telegram:handler_failed', { command: cmd.command, error: errorMessage(err) });
          continue;
        }
        if (signal.aborted) {
          this.logger.info('telegram:reply_dropped', { chatId: cmd.chatId, messageId: cmd.messageId });
          break;
        }
        await this.reply(cmd, reply);
      }
    }

    this.logger.info('telegram:stopped', { offset });
  }

  /** Sends `text` as a reply to the command's message; failures are logged. */
  async reply(cmd: ChatCommand, text: string): Promise<void> {
    try {
      const { data } = await this.http.post<unknown>(this.methodUrl('sendMessage'), {
        chat_id: cmd.chatId,
        text,
        reply_parameters: { message_id: cmd.messageId },
      });
      const body = sendMessageSchema.parse(data);
      if (!body.ok) {
        throw new Error(body.description ?? 'sendMessage refused');
      }
    } catch (err) {
      this.logger.error('telegram:send_failed', {
        chatId: cmd.chatId,
        messageId: cmd.messageId,
        error: errorMessage(err),
      });
    }
  }

  private async getUpdates(offset: number, signal: AbortSignal): Promise<TelegramUpdate[]> {
    const { data } = await this.http.post<unknown>(
      this.methodUrl('getUpdates'),
      { offset, timeout: this.pollTimeoutSec, allowed_updates: ['message'] },
      // Leave the server room to close the long poll itself.
      { timeout: (this.pollTimeoutSec + 10) * 1000, signal },
    );
    const body = getUpdatesSchema.parse(data);
    if (!body.ok) {
      throw new Error(body.description ?? 'getUpdates refused');
    }
    return body.result;
  }

  private methodUrl(method: string): string {
    return `${this.apiUrl}/bot${this.token}/${method}`;
  }
}

async function pause(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
}
