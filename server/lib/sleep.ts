import { buildAbortError } from './errors.js';

/**
 * Resolve after `ms`, or reject with an AbortError as soon as `signal` aborts.
 * A zero or negative delay still yields to the event loop once.
 */
export function sleepWithAbort(ms: number, signal?: AbortSignal | null): Promise<void> {
  const waitMs = Math.max(0, Math.ceil(Number(ms) || 0));
  return new Promise((resolve, reject) => {
    let settled = false;
    const done = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      fn();
    };
    const onAbort = () => done(() => reject(buildAbortError('Aborted while waiting')));
    const timer = setTimeout(() => done(resolve), waitMs);
    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

export type SleepFn = (ms: number, signal?: AbortSignal | null) => Promise<void>;
