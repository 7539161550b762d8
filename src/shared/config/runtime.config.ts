import {
  defaultPipelineConfig,
  pipelineCaps,
  resolvePipelineConfig,
  type PipelineConfig,
  type UploadMode
} from "../../application/extract-vendors/pipeline.config";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 120000 }
} as const;

export type RuntimeConfig = {
  pipelineConfig: Readonly<PipelineConfig>;
  timeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalFraction = (env: NodeJS.ProcessEnv, name: string): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`${name}=${raw} is out of allowed range [0..1]`);
  }

  return value;
};

const parseCities = (raw: string | undefined): string[] =>
  (raw ?? "")
    .split(",")
    .map((cityId) => cityId.trim())
    .filter((cityId) => cityId !== "");

const parseUploadMode = (raw: string | undefined): UploadMode | undefined => {
  if (raw == null || raw.trim() === "") return undefined;
  const normalized = raw.trim();
  if (normalized === "overwrite" || normalized === "create-only") return normalized;
  throw new Error(`PIPELINE_UPLOAD_MODE=${raw} must be 'overwrite' or 'create-only'`);
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const defaults = defaultPipelineConfig;
  const pipelineConfig = resolvePipelineConfig({
    cities: parseCities(env.PIPELINE_CITIES),
    maxConcurrent: parseOptionalIntInRange(env, "PIPELINE_MAX_CONCURRENT", pipelineCaps.maxConcurrent) ?? defaults.maxConcurrent,
    maxRequestsPerWindow:
      parseOptionalIntInRange(env, "PIPELINE_MAX_REQUESTS_PER_WINDOW", pipelineCaps.maxRequestsPerWindow) ??
      defaults.maxRequestsPerWindow,
    rateWindowMs: parseOptionalIntInRange(env, "PIPELINE_RATE_WINDOW_MS", pipelineCaps.rateWindowMs) ?? defaults.rateWindowMs,
    pageSize: parseOptionalIntInRange(env, "PIPELINE_PAGE_SIZE", pipelineCaps.pageSize) ?? defaults.pageSize,
    maxPages: parseOptionalIntInRange(env, "PIPELINE_MAX_PAGES", pipelineCaps.maxPages) ?? defaults.maxPages,
    maxDroppedFraction: parseOptionalFraction(env, "PIPELINE_MAX_DROPPED_FRACTION") ?? defaults.maxDroppedFraction,
    uploadMode: parseUploadMode(env.PIPELINE_UPLOAD_MODE) ?? defaults.uploadMode,
    retry: {
      maxAttempts: parseOptionalIntInRange(env, "RETRY_MAX_ATTEMPTS", pipelineCaps.maxAttempts) ?? defaults.retry.maxAttempts,
      baseDelayMs: parseOptionalIntInRange(env, "RETRY_BASE_DELAY_MS", pipelineCaps.baseDelayMs) ?? defaults.retry.baseDelayMs,
      maxDelayMs: parseOptionalIntInRange(env, "RETRY_MAX_DELAY_MS", pipelineCaps.maxDelayMs) ?? defaults.retry.maxDelayMs
    }
  });

  const timeoutMs =
    parseOptionalIntInRange(env, "REQUEST_TIMEOUT_MS", {
      min: runtimeCaps.timeoutMs.min,
      max: runtimeCaps.timeoutMs.max
    }) ?? 8000;

  return { pipelineConfig, timeoutMs };
};
