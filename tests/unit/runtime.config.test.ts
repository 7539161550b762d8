import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";
import { resolvePipelineConfig } from "../../src/application/extract-vendors/pipeline.config";

describe("loadRuntimeConfigFromEnv", () => {
  it("uses defaults when only cities are set", () => {
    const runtime = loadRuntimeConfigFromEnv({ PIPELINE_CITIES: "69036" });

    expect(runtime).toEqual({
      pipelineConfig: {
        cities: ["69036"],
        maxConcurrent: 4,
        maxRequestsPerWindow: 10,
        rateWindowMs: 1000,
        pageSize: 48,
        maxPages: 1000,
        maxDroppedFraction: 0.5,
        uploadMode: "overwrite",
        retry: { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 30000 }
      },
      timeoutMs: 8000
    });
    expect(Object.isFrozen(runtime.pipelineConfig)).toBe(true);
  });

  it("parses every override", () => {
    const runtime = loadRuntimeConfigFromEnv({
      PIPELINE_CITIES: " 1, 2 ,,3 ",
      PIPELINE_MAX_CONCURRENT: "8",
      PIPELINE_MAX_REQUESTS_PER_WINDOW: "20",
      PIPELINE_RATE_WINDOW_MS: "2000",
      PIPELINE_PAGE_SIZE: "100",
      PIPELINE_MAX_PAGES: "50",
      PIPELINE_MAX_DROPPED_FRACTION: "0.25",
      PIPELINE_UPLOAD_MODE: "create-only",
      RETRY_MAX_ATTEMPTS: "3",
      RETRY_BASE_DELAY_MS: "200",
      RETRY_MAX_DELAY_MS: "5000",
      REQUEST_TIMEOUT_MS: "15000"
    });

    expect(runtime).toEqual({
      pipelineConfig: {
        cities: ["1", "2", "3"],
        maxConcurrent: 8,
        maxRequestsPerWindow: 20,
        rateWindowMs: 2000,
        pageSize: 100,
        maxPages: 50,
        maxDroppedFraction: 0.25,
        uploadMode: "create-only",
        retry: { maxAttempts: 3, baseDelayMs: 200, maxDelayMs: 5000 }
      },
      timeoutMs: 15000
    });
  });

  it("requires at least one city", () => {
    expect(() => loadRuntimeConfigFromEnv({})).toThrow("at least one city id must be configured");
    expect(() => loadRuntimeConfigFromEnv({ PIPELINE_CITIES: " , " })).toThrow("at least one city id must be configured");
  });

  it.each([
    ["PIPELINE_MAX_CONCURRENT", "0", "PIPELINE_MAX_CONCURRENT=0 is out of allowed range [1..50]"],
    ["PIPELINE_PAGE_SIZE", "1.5", "PIPELINE_PAGE_SIZE=1.5 is out of allowed range [1..500]"],
    ["RETRY_MAX_ATTEMPTS", "abc", "RETRY_MAX_ATTEMPTS=abc is out of allowed range [1..20]"],
    ["REQUEST_TIMEOUT_MS", "500", "REQUEST_TIMEOUT_MS=500 is out of allowed range [1000..120000]"],
    ["PIPELINE_MAX_DROPPED_FRACTION", "1.5", "PIPELINE_MAX_DROPPED_FRACTION=1.5 is out of allowed range [0..1]"],
    ["PIPELINE_UPLOAD_MODE", "append", "PIPELINE_UPLOAD_MODE=append must be 'overwrite' or 'create-only'"]
  ])("rejects %s=%s", (name, value, message) => {
    expect(() => loadRuntimeConfigFromEnv({ PIPELINE_CITIES: "1", [name]: value })).toThrow(message);
  });

  it("rejects a backoff cap below the base delay", () => {
    expect(() =>
      loadRuntimeConfigFromEnv({ PIPELINE_CITIES: "1", RETRY_BASE_DELAY_MS: "5000", RETRY_MAX_DELAY_MS: "1000" })
    ).toThrow("retry.maxDelayMs must be >= retry.baseDelayMs");
  });
});

describe("resolvePipelineConfig", () => {
  it("rejects duplicate and malformed city ids", () => {
    expect(() => resolvePipelineConfig({ cities: ["1", "1"] })).toThrow("city ids must be unique");
    expect(() => resolvePipelineConfig({ cities: ["a/b"] })).toThrow("city id 'a/b' must match ^[A-Za-z0-9_-]+$");
  });

  it("merges partial retry overrides onto the defaults", () => {
    expect(resolvePipelineConfig({ cities: ["1"], retry: { maxAttempts: 2 } }).retry).toEqual({
      maxAttempts: 2,
      baseDelayMs: 1000,
      maxDelayMs: 30000
    });
  });

  it("freezes the nested city list and retry policy", () => {
    const config = resolvePipelineConfig({ cities: [" 1 ", "2"], retry: { maxAttempts: 2 } });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.cities)).toBe(true);
    expect(Object.isFrozen(config.retry)).toBe(true);
    expect(config.cities).toEqual(["1", "2"]);
  });

  it("does not share the caller's city array", () => {
    const cities = ["1"];
    const config = resolvePipelineConfig({ cities });
    cities.push("2");

    expect(config.cities).toEqual(["1"]);
  });
});
