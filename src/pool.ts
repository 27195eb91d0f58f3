// src/pool.ts

export type WorkerPool = {
  submit: <T>(job: () => Promise<T>) => Promise<T>;
  idle: () => Promise<void>;
  size: number;
  pending: () => number;
  active: () => number;
};

/**
 * Bounded FIFO executor. At most `size` jobs run at once; the rest wait in
 * submission order. A rejected job rejects its own promise only.
 */
export const createWorkerPool = (size: number): WorkerPool => {
  if (!Number.isInteger(size) || size < 1) throw new RangeError(`worker count must be >= 1, got ${size}`);

  const queue: Array<() => void> = [];
  const idleWaiters: Array<() => void> = [];
  let running = 0;

  const settle = (): void => {
    running -= 1;
    const next = queue.shift();
    if (next) return next();
    if (running === 0) idleWaiters.splice(0).forEach((wake) => wake());
  };

  const submit = <T>(job: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const start = (): void => {
        running += 1;
        void Promise.resolve()
          .then(job)
          .then(resolve, reject)
          .finally(settle);
      };
      if (running < size) start();
      else queue.push(start);
    });

  return {
    submit,
    idle: () =>
      running === 0 && queue.length === 0
        ? Promise.resolve()
        : new Promise<void>((resolve) => idleWaiters.push(resolve)),
    size,
    pending: () => queue.length,
    active: () => running,
  };
};
