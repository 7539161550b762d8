import { performance } from "perf_hooks";
import { CancelledError } from "../../core/errors/pipeline.errors";

export type RateLimiterOptions = {
  maxConcurrent: number;
  maxRequestsPerWindow: number;
  windowMs: number;
  now?: () => number;
};

export type Permit = {
  readonly cityId: string;
  release: () => void;
};

export type RateLimiter = {
  acquire: (cityId: string, signal?: AbortSignal) => Promise<Permit>;
  run: <T>(cityId: string, task: () => Promise<T>, signal?: AbortSignal) => Promise<T>;
  inFlight: () => number;
  pending: () => number;
};

type Waiter = {
  cityId: string;
  grant: (permit: Permit) => void;
};

const assertPositiveInteger = (name: string, value: number) => {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be an integer >= 1`);
  }
};

/**
 * Global permit pool shared by every city of a run.
 *
 * A permit is granted when fewer than `maxConcurrent` permits are held and fewer
 * than `maxRequestsPerWindow` permits were granted over the trailing `windowMs`.
 * Waiters are served in arrival order. State only changes inside synchronous
 * sections, so no interleaving can observe a half-updated counter.
 */
export const createRateLimiter = (opts: RateLimiterOptions): RateLimiter => {
  assertPositiveInteger("maxConcurrent", opts.maxConcurrent);
  assertPositiveInteger("maxRequestsPerWindow", opts.maxRequestsPerWindow);
  assertPositiveInteger("windowMs", opts.windowMs);

  const now = opts.now ?? (() => performance.now());
  const waiters: Waiter[] = [];
  const grantedAt: number[] = [];
  let active = 0;
  let wakeTimer: NodeJS.Timeout | undefined;

  const pruneWindow = (at: number) => {
    while (grantedAt.length > 0 && grantedAt[0] <= at - opts.windowMs) {
      grantedAt.shift();
    }
  };

  const armWakeTimer = (at: number) => {
    if (wakeTimer) return;
    const oldest = grantedAt[0] ?? at;
    const waitMs = Math.max(1, Math.ceil(oldest + opts.windowMs - at));
    wakeTimer = setTimeout(() => {
      wakeTimer = undefined;
      dispatch();
    }, waitMs);
  };

  const createPermit = (cityId: string): Permit => {
    let released = false;
    return {
      cityId,
      release: () => {
        if (released) return;
        released = true;
        active -= 1;
        dispatch();
      }
    };
  };

  const dispatch = () => {
    while (waiters.length > 0) {
      if (active >= opts.maxConcurrent) return;

      const at = now();
      pruneWindow(at);
      if (grantedAt.length >= opts.maxRequestsPerWindow) {
        armWakeTimer(at);
        return;
      }

      const waiter = waiters.shift();
      if (!waiter) return;
      active += 1;
      grantedAt.push(at);
      waiter.grant(createPermit(waiter.cityId));
    }
  };

  const acquire = (cityId: string, signal?: AbortSignal): Promise<Permit> =>
    new Promise<Permit>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError({ stage: "schedule", context: { cityId }, cause: signal.reason }));
        return;
      }

      const onAbort = () => {
        const index = waiters.indexOf(waiter);
        if (index >= 0) waiters.splice(index, 1);
        reject(new CancelledError({ stage: "schedule", context: { cityId }, cause: signal?.reason }));
      };

      const waiter: Waiter = {
        cityId,
        grant: (permit) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(permit);
        }
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      waiters.push(waiter);
      dispatch();
    });

  const run = async <T>(cityId: string, task: () => Promise<T>, signal?: AbortSignal): Promise<T> => {
    const permit = await acquire(cityId, signal);
    try {
      return await task();
    } finally {
      permit.release();
    }
  };

  return {
    acquire,
    run,
    inFlight: () => active,
    pending: () => waiters.length
  };
};
