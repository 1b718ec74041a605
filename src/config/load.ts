import dotenv from 'dotenv';
import { configSchema } from './schema.js';
import type { AppConfig } from './types.js';
import { ConfigError } from '../core/errors.js';

/**
 * Parse configuration. Without an explicit `env`, `.env` (or the file named by
 * `DOTENV_CONFIG_PATH`) is loaded into `process.env` first.
 */
export const loadConfig = (env?: NodeJS.ProcessEnv): AppConfig => {
  if (env === undefined) {
    dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || '.env' });
  }
  const parsed = configSchema.safeParse(env ?? process.env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Config validation failed: ${details}`, { issues: parsed.error.issues.length });
  }
  return parsed.data;
};
