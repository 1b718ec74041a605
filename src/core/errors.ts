export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', details);
  }
}

export class InvalidSendKeyError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_SENDKEY', details);
  }
}

export class InvalidNotificationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_NOTIFICATION', details);
  }
}

export class NotifierNotInitializedError extends AppError {
  constructor() {
    super('Global notifier is not initialized; call initGlobalNotifier() first', 'NOTIFIER_NOT_INITIALIZED');
  }
}
