import { z } from 'zod';

export const TITLE_MAX_LENGTH = 32;
export const SHORT_MAX_LENGTH = 64;

export interface SendOptions {
  /** Card summary shown in the message list (truncated to 64 characters). */
  short?: string;
  /** Overrides the notifier's default channel, e.g. `9|66`. */
  channel?: string;
  /** Hide the caller's IP from the message. */
  noip?: boolean;
  /** openid(s) to copy the message to. */
  openid?: string;
  timeoutMs?: number;
}

/** Form fields as posted to the service. */
export interface PushPayload {
  title: string;
  desp?: string;
  short?: string;
  channel?: string;
  noip?: '1';
  openid?: string;
}

export interface PushResult {
  ok: boolean;
  /** Service code; -1 when the failure happened before a usable response. */
  code: number;
  message: string;
  pushId?: string;
  readKey?: string;
  status?: number;
}

export const serverChanResponseSchema = z
  .object({
    code: z.number(),
    message: z.string().default(''),
    data: z
      .object({
        pushid: z.union([z.string(), z.number()]).optional(),
        readkey: z.string().optional(),
        error: z.string().optional(),
        errno: z.number().optional()
      })
      .passthrough()
      .nullish()
  })
  .passthrough();

export type ServerChanResponse = z.infer<typeof serverChanResponseSchema>;
