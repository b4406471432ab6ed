export const DEFAULT_CONCURRENCY_LIMIT = 5;

export type ConcurrencyLimiter = <TArgs extends unknown[], TResult>(
  operation: (...args: TArgs) => Promise<TResult>
) => (...args: TArgs) => Promise<TResult>;

/**
 * Returns a wrapper that lets at most `limit` calls run at once across every
 * function it wraps. A slot is released whether the call resolves or throws.
 */
export const limitConcurrency = (limit = DEFAULT_CONCURRENCY_LIMIT): ConcurrencyLimiter => {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}.`);
  }

  let active = 0;
  const waiting: Array<() => void> = [];

  const acquire = async (): Promise<void> => {
    if (active < limit) {
      active += 1;
      return;
    }
    await new Promise<void>((resolve) => {
      waiting.push(resolve);
    });
  };

  const release = (): void => {
    const next = waiting.shift();
    if (next) {
      // slot passes straight to the next waiter
      next();
      return;
    }
    active -= 1;
  };

  return (operation) =>
    async (...args) => {
      await acquire();
      try {
        return await operation(...args);
      } finally {
        release();
      }
    };
};
