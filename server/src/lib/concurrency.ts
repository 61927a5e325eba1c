export type ConcurrencyLimiter = <T>(task: () => Promise<T>) => Promise<T>;

export interface LimiterStats {
  active: number;
  queued: number;
  limit: number;
}

/**
 * Bounded worker pool: at most `limit` tasks run at once, the rest wait in
 * FIFO order. A released slot is handed straight to the next waiter.
 */
export function createConcurrencyLimiter(limit: number): ConcurrencyLimiter & { stats(): LimiterStats } {
  const max = Math.max(1, Math.floor(limit));
  let active = 0;
  const queue: Array<() => void> = [];

  const release = () => {
    const next = queue.shift();
    if (next) {
      next();
      return;
    }
    active = Math.max(0, active - 1);
  };

  async function runLimited<T>(task: () => Promise<T>): Promise<T> {
    if (active >= max) {
      await new Promise<void>((resolve) => queue.push(resolve));
    } else {
      active += 1;
    }
    try {
      return await task();
    } finally {
      release();
    }
  }

  return Object.assign(runLimited, {
    stats: (): LimiterStats => ({ active, queued: queue.length, limit: max }),
  });
}
