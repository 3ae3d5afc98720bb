/**
 * Concurrency Limiter
 *
 * Caps the number of in-flight tasks. Tasks start in submission order as
 * slots free up; results and rejections go back to each caller unchanged.
 */

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

export const DEFAULT_CONCURRENCY = 4;

export function createLimiter(concurrency = DEFAULT_CONCURRENCY): Limiter {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const release = (): void => {
    active--;
    const next = queue.shift();
    if (next) next();
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const start = (): void => {
        active++;
        let result: Promise<T>;
        try {
          result = task();
        } catch (error) {
          result = Promise.reject(error);
        }
        void result.then(resolve, reject).finally(release);
      };

      if (active < concurrency) {
        start();
      } else {
        queue.push(start);
      }
    });
}
