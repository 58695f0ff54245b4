import { TimeoutError } from '../errors';

interface WithTimeoutInput<T> {
  /** `null`/`undefined` wait without a bound. */
  timeoutMs: number | null | undefined;
  label: string;
  /** Receives a signal that aborts once the result is no longer wanted. */
  run: (abandoned: AbortSignal) => Promise<T>;
  signal?: AbortSignal;
  onTimeout?: (timeoutMs: number) => Error;
  onAbort?: (reason: unknown) => Error;
}

export async function withTimeout<T>(input: WithTimeoutInput<T>): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let abortListener: (() => void) | undefined;
  const { signal } = input;
  const abandon = new AbortController();

  const contenders: Promise<T>[] = [input.run(abandon.signal)];

  if (input.timeoutMs !== null && input.timeoutMs !== undefined) {
    const timeoutMs = input.timeoutMs;
    contenders.push(new Promise<T>((_, reject) => {
      timer = setTimeout(() => {
        const error = input.onTimeout?.(timeoutMs) ?? new TimeoutError(input.label, timeoutMs);
        abandon.abort(error);
        reject(error);
      }, timeoutMs);
    }));
  }

  if (signal !== undefined) {
    contenders.push(new Promise<T>((_, reject) => {
      const abort = () => {
        const reason = input.onAbort?.(signal.reason) ?? signal.reason;
        abandon.abort(reason);
        reject(reason);
      };
      if (signal.aborted) {
        abort();
        return;
      }

      abortListener = abort;
      signal.addEventListener('abort', abort, { once: true });
    }));
  }

  try {
    return await Promise.race(contenders);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    if (signal !== undefined && abortListener !== undefined) {
      signal.removeEventListener('abort', abortListener);
    }
  }
}

/**
 * Smallest of the given bounds, ignoring absent ones. `null` when every
 * bound is absent.
 */
export function lowestBound(...bounds: Array<number | null | undefined>): number | null {
  let lowest: number | null = null;
  for (const bound of bounds) {
    if (bound === null || bound === undefined) {
      continue;
    }
    if (lowest === null || bound < lowest) {
      lowest = bound;
    }
  }

  return lowest;
}
