import { TimeoutError } from '../shared/errors.js';

/**
 * Run `task` with an abort signal that fires after `timeoutMs`.
 * The returned promise rejects with TimeoutError as soon as the budget is spent,
 * whether or not the task reacts to the signal.
 */
export function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const err = new TimeoutError(label, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (err) {
      clearTimeout(timer);
      reject(err);
      return;
    }

    pending.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
