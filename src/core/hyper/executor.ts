// src/core/hyper/executor.ts
// Execution engines for parallel iteration. The coordinator only sees the
// WorkExecutor contract; any engine with a bounded number of slots fits.

/**
 * WorkExecutor: Runs tasks, at most `degree` at a time.
 */
export interface WorkExecutor {
  readonly degree: number;
  run<T>(task: () => Promise<T>): Promise<T>;
}

/**
 * Promise pool: tasks beyond `degree` wait in FIFO order for a free slot.
 */
export function createPoolExecutor(degree: number): WorkExecutor {
  if (!Number.isInteger(degree) || degree < 1) {
    throw new RangeError(`Executor degree must be a positive integer, got ${degree}`);
  }

  let active = 0;
  const waiting: Array<() => void> = [];

  const release = (): void => {
    active--;
    const next = waiting.shift();
    if (next) next();
  };

  return {
    degree,
    run<T>(task: () => Promise<T>): Promise<T> {
      return new Promise<T>((resolve, reject) => {
        const start = (): void => {
          active++;
          void Promise.resolve()
            .then(task)
            .then(
              (value) => {
                release();
                resolve(value);
              },
              (error: unknown) => {
                release();
                reject(error);
              }
            );
        };
        if (active < degree) {
          start();
        } else {
          waiting.push(start);
        }
      });
    },
  };
}

/**
 * One task at a time, in submission order.
 */
export function createSerialExecutor(): WorkExecutor {
  return createPoolExecutor(1);
}
