import type { BackoffPolicy } from "../../shared/retry/retry";

export type UploadMode = "overwrite" | "create-only";

export type PipelineConfig = {
  cities: readonly string[];
  maxConcurrent: number;
  maxRequestsPerWindow: number;
  rateWindowMs: number;
  pageSize: number;
  maxPages: number;
  maxDroppedFraction: number;
  uploadMode: UploadMode;
  retry: Readonly<BackoffPolicy>;
};

export type PipelineConfigInput = Partial<Omit<PipelineConfig, "retry">> & {
  retry?: Partial<BackoffPolicy>;
};

export const defaultRetryPolicy: BackoffPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 30000
};

export const defaultPipelineConfig: PipelineConfig = {
  cities: [],
  maxConcurrent: 4,
  maxRequestsPerWindow: 10,
  rateWindowMs: 1000,
  pageSize: 48,
  maxPages: 1000,
  maxDroppedFraction: 0.5,
  uploadMode: "overwrite",
  retry: defaultRetryPolicy
};

export const pipelineCaps = {
  maxConcurrent: { min: 1, max: 50 },
  maxRequestsPerWindow: { min: 1, max: 10000 },
  rateWindowMs: { min: 1, max: 600000 },
  pageSize: { min: 1, max: 500 },
  maxPages: { min: 1, max: 100000 },
  maxAttempts: { min: 1, max: 20 },
  baseDelayMs: { min: 1, max: 60000 },
  maxDelayMs: { min: 1, max: 600000 }
} as const;

export const CITY_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validatePipelineConfig = (config: PipelineConfig): PipelineConfig => {
  if (config.cities.length === 0) {
    throw new Error("at least one city id must be configured");
  }
  for (const cityId of config.cities) {
    if (!CITY_ID_PATTERN.test(cityId)) {
      throw new Error(`city id '${cityId}' must match ${CITY_ID_PATTERN.source}`);
    }
  }
  if (new Set(config.cities).size !== config.cities.length) {
    throw new Error("city ids must be unique");
  }

  assertIntegerInRange("maxConcurrent", config.maxConcurrent, pipelineCaps.maxConcurrent.min, pipelineCaps.maxConcurrent.max);
  assertIntegerInRange(
    "maxRequestsPerWindow",
    config.maxRequestsPerWindow,
    pipelineCaps.maxRequestsPerWindow.min,
    pipelineCaps.maxRequestsPerWindow.max
  );
  assertIntegerInRange("rateWindowMs", config.rateWindowMs, pipelineCaps.rateWindowMs.min, pipelineCaps.rateWindowMs.max);
  assertIntegerInRange("pageSize", config.pageSize, pipelineCaps.pageSize.min, pipelineCaps.pageSize.max);
  assertIntegerInRange("maxPages", config.maxPages, pipelineCaps.maxPages.min, pipelineCaps.maxPages.max);
  assertIntegerInRange("retry.maxAttempts", config.retry.maxAttempts, pipelineCaps.maxAttempts.min, pipelineCaps.maxAttempts.max);
  assertIntegerInRange("retry.baseDelayMs", config.retry.baseDelayMs, pipelineCaps.baseDelayMs.min, pipelineCaps.baseDelayMs.max);
  assertIntegerInRange("retry.maxDelayMs", config.retry.maxDelayMs, pipelineCaps.maxDelayMs.min, pipelineCaps.maxDelayMs.max);
  if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
    throw new Error("retry.maxDelayMs must be >= retry.baseDelayMs");
  }

  if (!Number.isFinite(config.maxDroppedFraction) || config.maxDroppedFraction < 0 || config.maxDroppedFraction > 1) {
    throw new Error(`maxDroppedFraction=${String(config.maxDroppedFraction)} is out of allowed range [0..1]`);
  }
  if (config.uploadMode !== "overwrite" && config.uploadMode !== "create-only") {
    throw new Error(`uploadMode must be 'overwrite' or 'create-only'`);
  }

  return config;
};

/** Validated config, frozen down to the city list and retry policy. */
export const resolvePipelineConfig = (input: PipelineConfigInput = {}): Readonly<PipelineConfig> => {
  const config = validatePipelineConfig({
    ...defaultPipelineConfig,
    ...input,
    cities: (input.cities ?? defaultPipelineConfig.cities).map((cityId) => cityId.trim()),
    retry: { ...defaultRetryPolicy, ...input.retry }
  });
  return Object.freeze({
    ...config,
    cities: Object.freeze([...config.cities]),
    retry: Object.freeze({ ...config.retry })
  });
};
