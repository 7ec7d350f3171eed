import { TimeoutError } from '../errors.js';

export const DEFAULT_LOOKUP_TIMEOUT_MS = 2000;

/**
 * Run `operation` with its own AbortSignal, rejecting with TimeoutError once
 * `timeoutMs` passes. The signal aborts on timeout and whenever `parent` aborts,
 * so the operation can stop its own I/O.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: { timeoutMs: number; label: string; parent?: AbortSignal },
): Promise<T> {
  const { timeoutMs, label, parent } = options;
  parent?.throwIfAborted();

  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(label, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
