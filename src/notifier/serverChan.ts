import type { AxiosInstance } from 'axios';
import { createHttpClient, postForm, type HttpResult } from '../core/http.js';
import { JsonLogger, type Logger } from '../core/logger.js';
import { InvalidNotificationError } from '../core/errors.js';
import { maskSendKey, redactSendKey, resolveEndpoint, validateSendKey } from './endpoint.js';
import { templates } from './templates.js';
import {
  SHORT_MAX_LENGTH,
  TITLE_MAX_LENGTH,
  serverChanResponseSchema,
  type PushPayload,
  type PushResult,
  type SendOptions
} from './types.js';

export interface ServerChanNotifierOptions {
  defaultChannel?: string;
  /** Default for `SendOptions.noip`. */
  noip?: boolean;
  timeoutMs?: number;
  logger?: Logger;
  http?: AxiosInstance;
  /** Overrides the endpoint derived from the send key. */
  endpoint?: string;
}

const DEFAULT_TIMEOUT_MS = 10000;

// Counts code points so emoji and CJK titles are not split mid-character.
const truncate = (text: string, max: number): string => {
  const chars = Array.from(text);
  return chars.length > max ? chars.slice(0, max).join('') : text;
};

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

const toFormFields = (payload: PushPayload): Record<string, string> => {
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (typeof value === 'string') fields[key] = value;
  }
  return fields;
};

export class ServerChanNotifier {
  readonly endpoint: string;
  private readonly sendKey: string;
  private readonly defaultChannel?: string;
  private readonly noip: boolean;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly http: AxiosInstance;

  constructor(sendKey: string, options: ServerChanNotifierOptions = {}) {
    this.sendKey = validateSendKey(sendKey);
    this.endpoint = options.endpoint ?? resolveEndpoint(this.sendKey);
    this.defaultChannel = options.defaultChannel;
    this.noip = options.noip ?? false;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? new JsonLogger();
    this.http = options.http ?? createHttpClient(this.timeoutMs);
  }

  get maskedSendKey(): string {
    return maskSendKey(this.sendKey);
  }

  buildPayload(title: string, content?: string, options: SendOptions = {}): PushPayload {
    const trimmed = truncate(title.trim(), TITLE_MAX_LENGTH);
    if (trimmed === '') {
      throw new InvalidNotificationError('Notification title is empty');
    }
    const payload: PushPayload = { title: trimmed };
    if (content) payload.desp = content;
    if (options.short) payload.short = truncate(options.short, SHORT_MAX_LENGTH);
    const channel = options.channel ?? this.defaultChannel;
    if (channel) payload.channel = channel;
    if (options.noip ?? this.noip) payload.noip = '1';
    if (options.openid) payload.openid = options.openid;
    return payload;
  }

  /**
   * Send one notification and report the outcome. Transport and service
   * failures resolve with `ok: false`; only invalid input rejects.
   */
  async push(title: string, content?: string, options: SendOptions = {}): Promise<PushResult> {
    const payload = this.buildPayload(title, content, options);
    return this.deliver(payload, options.timeoutMs ?? this.timeoutMs);
  }

  async send(title: string, content?: string, options: SendOptions = {}): Promise<boolean> {
    const result = await this.push(title, content, options);
    return result.ok;
  }

  /**
   * Fire-and-forget variant of `send`. Input is validated before returning;
   * the delivery outcome is only logged.
   */
  sendAsync(title: string, content?: string, options: SendOptions = {}): void {
    const payload = this.buildPayload(title, content, options);
    this.deliver(payload, options.timeoutMs ?? this.timeoutMs).catch((err: unknown) => {
      this.logger.error('Background ServerChan push failed', {
        title: payload.title,
        error: redactSendKey(errorMessage(err), this.sendKey)
      });
    });
  }

  async notifySuccess(
    taskName: string,
    executionTime?: number,
    details?: string,
    options?: SendOptions
  ): Promise<boolean> {
    const { title, content } = templates.success(taskName, executionTime, details);
    return this.send(title, content, options);
  }

  async notifyError(
    taskName: string,
    error: string,
    executionTime?: number,
    options?: SendOptions
  ): Promise<boolean> {
    const { title, content } = templates.error(taskName, error, executionTime);
    return this.send(title, content, options);
  }

  async notifyCompletion(
    taskName: string,
    success: boolean,
    executionTime?: number,
    message?: string,
    options?: SendOptions
  ): Promise<boolean> {
    if (success) return this.notifySuccess(taskName, executionTime, message, options);
    return this.notifyError(taskName, message || 'Unknown error', executionTime, options);
  }

  private async deliver(payload: PushPayload, timeoutMs: number): Promise<PushResult> {
    try {
      const response = await postForm(this.http, this.endpoint, toFormFields(payload), timeoutMs);
      return this.interpret(payload.title, response);
    } catch (err) {
      const message = redactSendKey(errorMessage(err), this.sendKey);
      this.logger.error('ServerChan request failed', { title: payload.title, error: message });
      return { ok: false, code: -1, message: `Network error: ${message}` };
    }
  }

  private interpret(title: string, { status, data }: HttpResult<unknown>): PushResult {
    const parsed = serverChanResponseSchema.safeParse(data);

    if (status < 200 || status >= 300) {
      const detail = parsed.success && parsed.data.message ? `: ${parsed.data.message}` : '';
      const message = `HTTP ${status}${detail}`;
      this.logger.error('ServerChan request rejected', { title, status, error: message });
      return { ok: false, code: -1, message, status };
    }

    if (!parsed.success) {
      this.logger.error('ServerChan returned an unexpected body', { title, status });
      return { ok: false, code: -1, message: 'Unexpected response body', status };
    }

    const { code, message, data: info } = parsed.data;
    if (code !== 0) {
      this.logger.warn('ServerChan push rejected', { title, code, error: message });
      return { ok: false, code, message, status };
    }

    const pushId = info?.pushid === undefined ? undefined : String(info.pushid);
    this.logger.info('ServerChan push delivered', { title, pushId });
    return { ok: true, code, message, pushId, readKey: info?.readkey, status };
  }
}

/** One-off send with a throwaway notifier. */
export const quickNotify = async (
  sendKey: string,
  title: string,
  message = '',
  options: ServerChanNotifierOptions = {}
): Promise<boolean> => {
  const notifier = new ServerChanNotifier(sendKey, options);
  return notifier.send(title, message);
};
