import { loadConfig } from '../config/load.js';
import type { AppConfig } from '../config/types.js';
import { ConfigError } from '../core/errors.js';
import { JsonLogger } from '../core/logger.js';
import { ServerChanNotifier, type ServerChanNotifierOptions } from './serverChan.js';

export const createNotifierFromConfig = (
  config: AppConfig,
  overrides: ServerChanNotifierOptions = {}
): ServerChanNotifier => {
  const { sendKey, defaultChannel, noip, timeoutMs } = config.serverChan;
  if (!sendKey) {
    throw new ConfigError('SERVERCHAN_SENDKEY is not set');
  }
  return new ServerChanNotifier(sendKey, {
    defaultChannel,
    noip,
    timeoutMs,
    logger: new JsonLogger(config.logLevel),
    ...overrides
  });
};

export const createNotifierFromEnv = (
  env?: NodeJS.ProcessEnv,
  overrides: ServerChanNotifierOptions = {}
): ServerChanNotifier => createNotifierFromConfig(loadConfig(env), overrides);
