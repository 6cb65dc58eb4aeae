/**
 * Abortable sleeps and bounded poll loops
 *
 * Every blocking wait in the orchestrator goes through these helpers so a
 * single AbortSignal unblocks all of them.
 */
import { CancelledError, OperationTimeoutError } from '../errors.js';

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfAborted(signal);
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface PollOptions {
  /** Name used in the timeout error */
  operation: string;
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
  now?: () => number;
}

/**
 * Call `check` until it returns a value other than undefined, or fail with
 * OperationTimeoutError once `timeoutMs` has elapsed. The first check runs
 * immediately.
 */
export async function pollUntil<T>(
  check: () => Promise<T | undefined>,
  options: PollOptions
): Promise<T> {
  const now = options.now ?? Date.now;
  const deadline = now() + options.timeoutMs;

  for (;;) {
    throwIfAborted(options.signal);
    const value = await check();
    if (value !== undefined) {
      return value;
    }

    const remaining = deadline - now();
    if (remaining <= 0) {
      throw new OperationTimeoutError(options.operation, options.timeoutMs);
    }
    await sleep(Math.min(options.intervalMs, remaining), options.signal);
  }
}

/**
 * Combine a caller's signal with a per-call timeout.
 */
export function withTimeout(
  timeoutMs: number,
  signal?: AbortSignal
): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * Settle with `work`, or reject once the caller's signal fires
 * (CancelledError) or `timeoutMs` passes (OperationTimeoutError). For
 * library calls that take no signal of their own; the call itself keeps
 * running in the background.
 */
export function withDeadline<T>(
  work: Promise<T>,
  options: { operation: string; timeoutMs: number; signal?: AbortSignal }
): Promise<T> {
  const { operation, timeoutMs, signal } = options;
  const deadline = withTimeout(timeoutMs, signal);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(
        signal?.aborted
          ? new CancelledError()
          : new OperationTimeoutError(operation, timeoutMs)
      );
    };
    if (deadline.aborted) {
      onAbort();
    } else {
      deadline.addEventListener('abort', onAbort, { once: true });
    }
    work.then(
      (value) => {
        deadline.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        deadline.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Fixed startup delay for scheduled jobs, which are all triggered on the
 * same minute boundary.
 */
export async function applyStartupJitter(
  delayMs: number,
  signal?: AbortSignal
): Promise<number> {
  if (delayMs <= 0) return 0;
  await sleep(delayMs, signal);
  return delayMs;
}
