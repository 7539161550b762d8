import type { CityJob, CityJobError, CityJobStatus } from "../../core/jobs/CityJob";
import type { ObjectLocation } from "../../core/partition/partitionKey";
import { ExcessiveDropsError, type TransformError } from "../../core/errors/pipeline.errors";

export type RecordDroppedLog = {
  event: "pipeline.record_dropped";
  cityId: string;
  page: number;
  index: number;
  code: TransformError["kind"];
  field: string;
  reason: string;
  droppedCount: number;
  vendorId?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Best-effort vendor id for logs; the record itself is already known to be invalid. */
export const extractVendorIdForLog = (raw: unknown): string | undefined => {
  if (!isRecord(raw)) return undefined;
  const id = raw.code ?? raw.id;
  if (typeof id === "string" && id.trim() !== "") return id.trim();
  if (typeof id === "number" && Number.isSafeInteger(id)) return String(id);
  return undefined;
};

export const buildRecordDroppedLog = (
  error: TransformError,
  context: { cityId: string; page: number; index: number; droppedCount: number; raw: unknown }
): RecordDroppedLog => {
  const log: RecordDroppedLog = {
    event: "pipeline.record_dropped",
    cityId: context.cityId,
    page: context.page,
    index: context.index,
    code: error.kind,
    field: error.field,
    reason: error.message,
    droppedCount: context.droppedCount
  };
  const vendorId = extractVendorIdForLog(context.raw);
  if (vendorId != null) log.vendorId = vendorId;
  return log;
};

/**
 * A page that drops more than `maxFraction` of its records fails the whole city
 * job. Empty pages never trip the guard.
 */
export const assertDropFraction = (
  dropped: number,
  pageSize: number,
  maxFraction: number,
  context: { cityId: string; page: number }
): void => {
  if (pageSize === 0) return;
  if (dropped / pageSize > maxFraction) {
    throw new ExcessiveDropsError({ dropped, pageSize, maxFraction, context });
  }
};

export type CityJobReport = {
  cityId: string;
  status: CityJobStatus;
  attempts: number;
  uploadAttempts: number;
  pages: number;
  rows: number;
  droppedRecords: number;
  object?: ObjectLocation;
  error?: CityJobError;
};

export type PipelineSummary = {
  succeeded: number;
  failed: number;
  droppedRecords: number;
  rows: number;
  exitCode: 0 | 1;
  cities: CityJobReport[];
};

export const toCityJobReport = (job: CityJob): CityJobReport => {
  const report: CityJobReport = {
    cityId: job.cityId,
    status: job.status,
    attempts: job.attemptCount,
    uploadAttempts: job.uploadAttemptCount,
    pages: job.pagesFetched,
    rows: job.rowsWritten,
    droppedRecords: job.droppedRecords
  };
  if (job.object) report.object = job.object;
  if (job.lastError) report.error = job.lastError;
  return report;
};

export const summarizeJobs = (jobs: CityJob[]): PipelineSummary => {
  const cities = jobs.map(toCityJobReport);
  const succeeded = cities.filter((city) => city.status === "done").length;
  const failed = cities.length - succeeded;

  return {
    succeeded,
    failed,
    droppedRecords: cities.reduce((sum, city) => sum + city.droppedRecords, 0),
    rows: cities.reduce((sum, city) => sum + city.rows, 0),
    exitCode: failed === 0 ? 0 : 1,
    cities
  };
};
