import { CancelledError, type PipelineStage } from "../../core/errors/pipeline.errors";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type BackoffPolicy = {
  maxAttempts: number;      // total attempts, first try included
  baseDelayMs: number;      // delay before the first retry
  maxDelayMs: number;       // cap applied after jitter
};

export type RetryOptions = BackoffPolicy & {
  shouldRetry: (err: unknown) => RetryDecision;
  onAttempt?: (attempt: number) => void;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  signal?: AbortSignal;
  stage?: PipelineStage;
};

/** Delay before retry `n` (0-based) without jitter. */
export const baseBackoffDelay = (n: number, policy: Pick<BackoffPolicy, "baseDelayMs" | "maxDelayMs">): number =>
  Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, n));

/** `d0 * 2^n * j` with `j` in [0.5, 1.5), capped at `maxDelayMs`. */
export const jitteredBackoffDelay = (
  n: number,
  policy: Pick<BackoffPolicy, "baseDelayMs" | "maxDelayMs">,
  randomFn: () => number = Math.random
): number => {
  const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
  const jitter = 0.5 + normalizedRandom;
  return Math.min(policy.maxDelayMs, Math.floor(policy.baseDelayMs * Math.pow(2, n) * jitter));
};

export const sleep = (ms: number, signal?: AbortSignal, stage: PipelineStage = "schedule"): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError({ stage, cause: signal.reason }));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError({ stage, cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const retry = async <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    maxAttempts,
    shouldRetry,
    onAttempt,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    signal,
    stage = "schedule"
  } = opts;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error("maxAttempts must be an integer >= 1");
  }

  let attempt = 1;
  while (true) {
    if (signal?.aborted) {
      throw new CancelledError({ stage, cause: signal.reason });
    }

    onAttempt?.(attempt);
    try {
      return await fn(attempt);
    } catch (err) {
      if (err instanceof CancelledError) throw err;

      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= maxAttempts || !normalized.retry) {
        onGiveUp?.({ attempt, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const waitMs = customDelayMs != null
        ? Math.min(opts.maxDelayMs, customDelayMs)
        : jitteredBackoffDelay(attempt - 1, opts, randomFn);
      onRetry?.({ attempt, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs, signal, stage);
      attempt += 1;
    }
  }
};
