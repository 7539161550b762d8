import type { PageResult, VendorApiClient } from "../../ports/VendorApiClient";
import type { RateLimiter } from "../../shared/concurrency/rateLimiter";
import { retry, type BackoffPolicy, type RetryDecision } from "../../shared/retry/retry";
import { FetchError } from "../../core/errors/pipeline.errors";

export type FetchCityVendorsDeps = {
  client: VendorApiClient;
  limiter: RateLimiter;
  policy: BackoffPolicy;
  pageSize: number;
  randomFn?: () => number;
};

export type FetchCityVendorsParams = {
  cityId: string;
  cursor?: string;
  signal?: AbortSignal;
  onAttempt?: (attempt: number) => void;
};

export const shouldRetryFetch = (err: unknown): RetryDecision => {
  if (!(err instanceof FetchError)) return false;
  if (err.kind === "rate_limited") return { retry: true, delayMs: err.retryDelayMs };
  return err.kind === "transient";
};

const logFields = (error: unknown) =>
  error instanceof FetchError
    ? { kind: error.kind, status: error.status ?? null, url: error.context.requestUrl ?? null }
    : { kind: null, status: null, url: null };

/**
 * Fetches one page for a city. Each attempt holds one rate-limiter permit;
 * rate-limited and transient failures are retried with backoff.
 */
export const fetchCityVendors = (deps: FetchCityVendorsDeps, params: FetchCityVendorsParams): Promise<PageResult> => {
  const { cityId, cursor, signal } = params;

  return retry(
    () =>
      deps.limiter.run(
        cityId,
        () => deps.client.fetchPage({ cityId, cursor, limit: deps.pageSize, signal }),
        signal
      ),
    {
      ...deps.policy,
      signal,
      stage: "fetch",
      randomFn: deps.randomFn,
      shouldRetry: shouldRetryFetch,
      onAttempt: params.onAttempt,
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "http.retry",
          cityId,
          cursor: cursor ?? null,
          ...logFields(error),
          attempt,
          maxAttempts,
          delayMs
        }));
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "http.give_up",
          cityId,
          cursor: cursor ?? null,
          ...logFields(error),
          attempt,
          maxAttempts
        }));
      }
    }
  );
};
