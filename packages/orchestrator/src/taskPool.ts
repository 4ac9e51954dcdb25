/** Bounded async executor: at most `concurrency` tasks run at once, the rest wait in order. */
export interface TaskPool {
  readonly concurrency: number;
  /** Tasks currently running. */
  readonly active: number;
  /** Tasks waiting for a slot. */
  readonly pending: number;
  run<T>(task: () => Promise<T>): Promise<T>;
}

export const createTaskPool = (concurrency: number): TaskPool => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Pool concurrency must be a positive integer, received ${concurrency}`);
  }

  let active = 0;
  const waiting: Array<() => void> = [];

  const acquire = async (): Promise<void> => {
    if (active < concurrency) {
      active += 1;
      return;
    }
    // The releasing task hands its slot over, so `active` is unchanged.
    await new Promise<void>((resolve) => waiting.push(resolve));
  };

  const release = (): void => {
    const next = waiting.shift();
    if (next) {
      next();
    } else {
      active -= 1;
    }
  };

  return {
    concurrency,
    get active() {
      return active;
    },
    get pending() {
      return waiting.length;
    },
    async run<T>(task: () => Promise<T>): Promise<T> {
      await acquire();
      try {
        return await task();
      } finally {
        release();
      }
    },
  };
};
