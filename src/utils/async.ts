/**
 * Async Utility Functions
 *
 * Per-file timeouts, the emitter's write lock, cooperative cancellation and
 * bounded-concurrency mapping.
 *
 * @module
 */

// =============================================================================
// Timeout
// =============================================================================

/**
 * Settles with `promise`, or rejects with the error built by `onTimeout` if
 * `ms` elapse first. The timer is cleared either way.
 */
export async function timeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Yields to the event loop so pending timers (such as a timeout) can fire
 * between chunks of synchronous work.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// =============================================================================
// Mutex
// =============================================================================

/**
 * FIFO lock. Callers run one at a time, in the order they asked.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * Read side of a cancellation: work checks it at safe points.
 */
export class CancellationToken {
  protected reason: string | null = null;

  /** @throws Error carrying the cancellation reason */
  throwIfCancelled(): void {
    if (this.reason !== null) {
      throw new Error(this.reason);
    }
  }
}

class CancellableToken extends CancellationToken {
  cancel(reason: string): void {
    this.reason ??= reason;
  }
}

/**
 * Owns a token and decides when it is cancelled.
 */
export class CancellationTokenSource {
  private readonly source = new CancellableToken();

  get token(): CancellationToken {
    return this.source;
  }

  cancel(reason = "Operation cancelled"): void {
    this.source.cancel(reason);
  }
}

/** Token for callers with nothing to cancel */
export const NEVER_CANCELLED: CancellationToken = new CancellationToken();

// =============================================================================
// Concurrency
// =============================================================================

/**
 * Maps `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep the order of `items`.
 */
export async function mapConcurrent<T, U>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<U>,
  concurrency: number
): Promise<U[]> {
  const results: U[] = new Array<U>(items.length);
  // Workers pull from one shared iterator, so each index is taken once
  const iterator = items.entries();

  async function worker(): Promise<void> {
    for (const [index, item] of iterator) {
      results[index] = await fn(item, index);
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
