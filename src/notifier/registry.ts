import { NotifierNotInitializedError } from '../core/errors.js';
import { ServerChanNotifier, type ServerChanNotifierOptions } from './serverChan.js';

/**
 * Holds the notifier shared by one process or one application context.
 * Prefer passing a registry (or the notifier itself) to callers; the
 * module-level functions below exist for scripts that want a single slot.
 */
export class NotifierRegistry {
  private current: ServerChanNotifier | undefined;

  init(sendKey: string, options?: ServerChanNotifierOptions): ServerChanNotifier {
    this.current = new ServerChanNotifier(sendKey, options);
    return this.current;
  }

  set(notifier: ServerChanNotifier): void {
    this.current = notifier;
  }

  get(): ServerChanNotifier {
    if (!this.current) throw new NotifierNotInitializedError();
    return this.current;
  }

  isInitialized(): boolean {
    return this.current !== undefined;
  }

  reset(): void {
    this.current = undefined;
  }
}

const defaultRegistry = new NotifierRegistry();

export const initGlobalNotifier = (sendKey: string, options?: ServerChanNotifierOptions): ServerChanNotifier =>
  defaultRegistry.init(sendKey, options);

export const getGlobalNotifier = (): ServerChanNotifier => defaultRegistry.get();

export const resetGlobalNotifier = (): void => defaultRegistry.reset();
