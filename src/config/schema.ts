import { z } from 'zod';

const parseBoolean = (v: unknown, fallback: boolean): boolean => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.toLowerCase());
};

const parseNumber = (v: unknown, fallback: number): number => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fallback;
};

const optionalString = (v: string | undefined): string | undefined => {
  const trimmed = v?.trim();
  return trimmed ? trimmed : undefined;
};

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  SERVERCHAN_SENDKEY: z.string().optional(),
  SERVERCHAN_CHANNEL: z.string().optional(),
  SERVERCHAN_NOIP: z.string().optional(),
  SERVERCHAN_TIMEOUT_MS: z.string().optional()
});

export const configSchema = rawSchema.transform((raw) => ({
  nodeEnv: raw.NODE_ENV,
  logLevel: raw.LOG_LEVEL,

  serverChan: {
    sendKey: optionalString(raw.SERVERCHAN_SENDKEY),
    defaultChannel: optionalString(raw.SERVERCHAN_CHANNEL),
    noip: parseBoolean(raw.SERVERCHAN_NOIP, false),
    timeoutMs: parseNumber(raw.SERVERCHAN_TIMEOUT_MS, 10000)
  }
}));
