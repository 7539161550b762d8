import type { ColumnarWriter } from "../../ports/ColumnarWriter";
import type { ObjectStore } from "../../ports/ObjectStore";
import type { PageResult, VendorApiClient } from "../../ports/VendorApiClient";
import { createLimiter } from "../../shared/concurrency/limiter";
import { createRateLimiter, type RateLimiter } from "../../shared/concurrency/rateLimiter";
import { createCityJob, failCityJob, transitionCityJob, type CityJob } from "../../core/jobs/CityJob";
import { formatRunTimestamp, partitionKeyFor } from "../../core/partition/partitionKey";
import { transformVendor } from "../../core/vendor/transformVendor";
import type { VendorRow } from "../../core/vendor/vendor.types";
import { CancelledError } from "../../core/errors/pipeline.errors";
import { fetchCityVendors } from "./fetchCityVendors";
import { uploadPartition } from "./uploadPartition";
import { resolvePipelineConfig, type PipelineConfig, type PipelineConfigInput } from "./pipeline.config";
import {
  assertDropFraction,
  buildRecordDroppedLog,
  summarizeJobs,
  type PipelineSummary
} from "./pipeline.error-handler";

export type RunPipelineDeps = {
  client: VendorApiClient;
  writer: ColumnarWriter;
  store: ObjectStore;
  config: PipelineConfigInput;
  limiter?: RateLimiter;
  now?: () => Date;
  randomFn?: () => number;
  signal?: AbortSignal;
};

type RunContext = {
  deps: RunPipelineDeps;
  config: Readonly<PipelineConfig>;
  limiter: RateLimiter;
  runStartedAt: Date;
  runTimestamp: string;
};

const fetchAllPages = async (ctx: RunContext, job: CityJob): Promise<PageResult[]> => {
  const { deps, config, limiter } = ctx;
  const pages: PageResult[] = [];
  let cursor: string | undefined;

  // Pages are fetched strictly in cursor order: each cursor comes from the previous page.
  while (true) {
    if (pages.length >= config.maxPages) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "pipeline.max_pages_reached",
        cityId: job.cityId,
        maxPages: config.maxPages,
        nextCursor: cursor ?? null
      }));
      break;
    }

    const page = await fetchCityVendors(
      { client: deps.client, limiter, policy: config.retry, pageSize: config.pageSize, randomFn: deps.randomFn },
      {
        cityId: job.cityId,
        cursor,
        signal: deps.signal,
        onAttempt: () => {
          job.attemptCount += 1;
        }
      }
    );
    pages.push(page);
    job.pagesFetched += 1;

    if (page.nextCursor == null) break;
    cursor = page.nextCursor;
  }

  return pages;
};

const transformPages = (ctx: RunContext, job: CityJob, pages: PageResult[]): VendorRow[] => {
  const rows: VendorRow[] = [];

  pages.forEach((page, pageIndex) => {
    let droppedOnPage = 0;

    page.items.forEach((raw, index) => {
      const result = transformVendor(raw, { cityId: job.cityId, fetchedAt: page.fetchedAt });
      if (result.ok) {
        rows.push(result.row);
        return;
      }

      droppedOnPage += 1;
      job.droppedRecords += 1;
      const log = buildRecordDroppedLog(result.error, {
        cityId: job.cityId,
        page: pageIndex + 1,
        index,
        droppedCount: job.droppedRecords,
        raw
      });
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify(log));
    });

    assertDropFraction(droppedOnPage, page.items.length, ctx.config.maxDroppedFraction, {
      cityId: job.cityId,
      page: pageIndex + 1
    });
  });

  return rows;
};

const processCity = async (ctx: RunContext, job: CityJob): Promise<void> => {
  const { deps, config } = ctx;

  try {
    if (deps.signal?.aborted) {
      throw new CancelledError({ stage: "schedule", context: { cityId: job.cityId }, cause: deps.signal.reason });
    }

    transitionCityJob(job, "fetching");
    const pages = await fetchAllPages(ctx, job);

    transitionCityJob(job, "transforming");
    const rows = transformPages(ctx, job, pages);
    const file = await deps.writer.write(rows, { cityId: job.cityId, runTimestamp: ctx.runTimestamp });
    job.rowsWritten = file.rowCount;

    transitionCityJob(job, "uploading");
    job.object = await uploadPartition(
      { store: deps.store, limiter: ctx.limiter, policy: config.retry, mode: config.uploadMode, randomFn: deps.randomFn },
      {
        file,
        partition: partitionKeyFor(job.cityId, ctx.runStartedAt),
        runTimestamp: ctx.runTimestamp,
        signal: deps.signal,
        onAttempt: () => {
          job.uploadAttemptCount += 1;
        }
      }
    );

    transitionCityJob(job, "done");
    console.log(JSON.stringify({
      event: "pipeline.city_done",
      cityId: job.cityId,
      rows: job.rowsWritten,
      droppedRecords: job.droppedRecords,
      pages: job.pagesFetched,
      attempts: job.attemptCount,
      object: job.object.uri
    }));
  } catch (err) {
    failCityJob(job, err);
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({
      event: "pipeline.city_failed",
      cityId: job.cityId,
      attempts: job.attemptCount,
      droppedRecords: job.droppedRecords,
      error: job.lastError
    }));
  }
};

/**
 * Runs every configured city through fetch, transform, write and upload.
 * Cities are independent: a failed city never cancels its siblings, and the
 * summary is computed only once every job is `done` or `failed`.
 */
export const runPipeline = async (deps: RunPipelineDeps): Promise<PipelineSummary> => {
  const config = resolvePipelineConfig(deps.config);
  const runStartedAt = (deps.now ?? (() => new Date()))();
  const ctx: RunContext = {
    deps,
    config,
    limiter:
      deps.limiter ??
      createRateLimiter({
        maxConcurrent: config.maxConcurrent,
        maxRequestsPerWindow: config.maxRequestsPerWindow,
        windowMs: config.rateWindowMs
      }),
    runStartedAt,
    runTimestamp: formatRunTimestamp(runStartedAt)
  };

  const pool = createLimiter(config.maxConcurrent);
  const jobs = config.cities.map(createCityJob);
  await Promise.all(jobs.map((job) => pool.run(() => processCity(ctx, job))));

  const summary = summarizeJobs(jobs);
  console.log(JSON.stringify({ event: "pipeline.completed", runTimestamp: ctx.runTimestamp, ...summary }));
  return summary;
};
