export { ServerChanNotifier, quickNotify, type ServerChanNotifierOptions } from './notifier/serverChan.js';
export { withTaskNotification, taskNotifier, type TaskTarget, type TaskWrapper } from './notifier/taskNotifier.js';
export {
  NotifierRegistry,
  initGlobalNotifier,
  getGlobalNotifier,
  resetGlobalNotifier
} from './notifier/registry.js';
export { createNotifierFromConfig, createNotifierFromEnv } from './notifier/factory.js';
export { templates, formatTimestamp, formatDuration, type NotificationTemplate } from './notifier/templates.js';
export { DEFAULT_API_BASE, maskSendKey, resolveEndpoint, validateSendKey } from './notifier/endpoint.js';
export {
  SHORT_MAX_LENGTH,
  TITLE_MAX_LENGTH,
  type PushPayload,
  type PushResult,
  type SendOptions
} from './notifier/types.js';
export { loadConfig } from './config/load.js';
export type { AppConfig, ServerChanConfig } from './config/types.js';
export { JsonLogger, type Logger, type LogLevel } from './core/logger.js';
export {
  AppError,
  ConfigError,
  InvalidNotificationError,
  InvalidSendKeyError,
  NotifierNotInitializedError
} from './core/errors.js';
