/**
 * Shared Async Utilities
 *
 * Cancellable waits, signal linking and bounded-concurrency mapping used by
 * the upstream clients and the handlers that fan out to them.
 */

// =============================================================================
// Cancellation
// =============================================================================

/**
 * Thrown by `sleep` when its signal aborts. Clients translate it into their
 * own error kind, so it never reaches the wire.
 */
export class AbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof AbortedError ||
    (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError'))
  );
}

/**
 * Sleep for `ms`, or reject with AbortedError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new AbortedError());
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface LinkedSignal {
  signal: AbortSignal;
  /** Detach listeners from the source signals. */
  dispose(): void;
}

/**
 * Combine a per-attempt timeout with an optional caller signal. The linked
 * signal aborts with the reason of whichever source fires first.
 */
export function linkAbortSignals(timeoutMs: number, parent?: AbortSignal): LinkedSignal {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new AbortedError(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

// =============================================================================
// Concurrency
// =============================================================================

/**
 * Index generator for mapConcurrent workers.
 *
 * The check-and-increment runs in one synchronous block, so no two workers
 * can claim the same index on the event loop.
 */
function createIndexGenerator(length: number): () => number | null {
  let currentIndex = 0;

  return (): number | null => {
    if (currentIndex >= length) {
      return null;
    }
    return currentIndex++;
  };
}

/**
 * Map items through `fn` with at most `concurrency` calls in flight.
 * Results keep input order. The first rejection rejects the whole map:
 * no further items are started and the signal handed to `fn` aborts, so
 * calls already in flight can stop early. The signal also follows `parent`.
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  fn: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  concurrency: number,
  parent?: AbortSignal
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const getNextIndex = createIndexGenerator(items.length);
  const controller = new AbortController();
  let failed = false;

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  async function worker(): Promise<void> {
    let index: number | null;
    while (!failed && (index = getNextIndex()) !== null) {
      try {
        results[index] = await fn(items[index], index, controller.signal);
      } catch (error) {
        if (!failed) {
          failed = true;
          controller.abort(error);
        }
        throw error;
      }
    }
  }

  const workers: Promise<void>[] = [];
  const workerCount = Math.min(Math.max(1, concurrency), items.length);
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }

  try {
    await Promise.all(workers);
  } finally {
    parent?.removeEventListener('abort', onParentAbort);
  }
  return results;
}
