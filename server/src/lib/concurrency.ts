/**
 * Runs at most `limit` tasks at once; the rest wait in FIFO order.
 */
export function createConcurrencyLimiter(limit: number) {
  const max = Math.max(1, Math.floor(limit));
  let active = 0;
  const queue: Array<() => void> = [];

  const release = () => {
    active = Math.max(0, active - 1);
    const next = queue.shift();
    if (next) next();
  };

  return async function runLimited<T>(task: () => Promise<T>): Promise<T> {
    if (active >= max) {
      await new Promise<void>((resolve) => queue.push(resolve));
    }
    active += 1;
    try {
      return await task();
    } finally {
      release();
    }
  };
}

export type ConcurrencyLimiter = ReturnType<typeof createConcurrencyLimiter>;
