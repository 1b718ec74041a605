import { ServerChanNotifier, type ServerChanNotifierOptions } from './serverChan.js';

export type TaskTarget = string | ServerChanNotifier;

const elapsedSeconds = (startedAt: number): number => (Date.now() - startedAt) / 1000;

const describeError = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Run `task`, then report how it went. A failure sends exactly one error
 * notification before the original error is rethrown.
 */
export const withTaskNotification = async <T>(
  notifier: ServerChanNotifier,
  taskName: string,
  task: () => T | Promise<T>,
  functionName: string = taskName
): Promise<Awaited<T>> => {
  const startedAt = Date.now();
  let result: Awaited<T>;
  try {
    result = await task();
  } catch (err) {
    await notifier.notifyError(taskName, describeError(err), elapsedSeconds(startedAt));
    throw err;
  }
  await notifier.notifySuccess(taskName, elapsedSeconds(startedAt), `Function ${functionName} completed`);
  return result;
};

export type TaskWrapper = <This, A extends unknown[], R>(
  fn: (this: This, ...args: A) => R
) => (this: This, ...args: A) => Promise<Awaited<R>>;

/**
 * Wrap functions so every call is reported. A send key target builds one
 * notifier up front, so a bad key fails at wrap time rather than per call.
 * The wrapper forwards `this`, so it can stand in for a method.
 *
 * @example
 * const nightly = taskNotifier(process.env.SERVERCHAN_SENDKEY ?? '', 'nightly backup')(runBackup);
 * await nightly('/var/backups');
 */
export function taskNotifier(target: ServerChanNotifier, taskName?: string): TaskWrapper;
export function taskNotifier(target: string, taskName?: string, options?: ServerChanNotifierOptions): TaskWrapper;
export function taskNotifier(target: TaskTarget, taskName?: string, options?: ServerChanNotifierOptions): TaskWrapper {
  if (typeof target !== 'string' && options !== undefined) {
    throw new TypeError('taskNotifier options only apply to a send key target');
  }
  const notifier = typeof target === 'string' ? new ServerChanNotifier(target, options) : target;
  return <This, A extends unknown[], R>(fn: (this: This, ...args: A) => R) => {
    const name = taskName || fn.name || 'task';
    return function (this: This, ...args: A): Promise<Awaited<R>> {
      return withTaskNotification<R>(notifier, name, () => fn.apply(this, args), fn.name || name);
    };
  };
}
