/**
 * Bounded worker pool for fan-out work (one task per city).
 * Usage:
 *   const pool = createLimiter(4);
 *   await Promise.all(cities.map((c) => pool.run(() => processCity(c))));
 */
export type Limiter = {
  run: <T>(task: () => Promise<T>) => Promise<T>;
  active: () => number;
  queued: () => number;
};

export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const start = queue.shift();
    if (!start) return;
    active += 1;
    start();
  };

  const run = <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        } finally {
          active -= 1;
          next();
        }
      });
      next();
    });

  return {
    run,
    active: () => active,
    queued: () => queue.length
  };
};
