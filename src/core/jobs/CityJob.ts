import type { ObjectLocation } from "../partition/partitionKey";
import { PipelineError, toErrorMessage, type PipelineStage } from "../errors/pipeline.errors";

export type CityJobStatus = "pending" | "fetching" | "transforming" | "uploading" | "done" | "failed";

export type CityJobError = {
  stage: PipelineStage;
  name: string;
  code: string;
  kind?: string;
  message: string;
  status?: number;
};

export type CityJob = {
  cityId: string;
  status: CityJobStatus;
  attemptCount: number;
  uploadAttemptCount: number;
  pagesFetched: number;
  rowsWritten: number;
  droppedRecords: number;
  lastError?: CityJobError;
  object?: ObjectLocation;
};

const transitions: Record<CityJobStatus, CityJobStatus[]> = {
  pending: ["fetching", "failed"],
  fetching: ["transforming", "failed"],
  transforming: ["uploading", "failed"],
  uploading: ["done", "failed"],
  done: [],
  failed: []
};

export const isTerminal = (status: CityJobStatus): boolean => transitions[status].length === 0;

export const createCityJob = (cityId: string): CityJob => ({
  cityId,
  status: "pending",
  attemptCount: 0,
  uploadAttemptCount: 0,
  pagesFetched: 0,
  rowsWritten: 0,
  droppedRecords: 0
});

export const transitionCityJob = (job: CityJob, next: CityJobStatus): void => {
  if (!transitions[job.status].includes(next)) {
    throw new Error(`Illegal city job transition ${job.status} -> ${next} (city ${job.cityId})`);
  }
  job.status = next;
};

const stageOf = (status: CityJobStatus): PipelineStage => {
  switch (status) {
    case "fetching":
      return "fetch";
    case "transforming":
      return "transform";
    case "uploading":
      return "upload";
    default:
      return "schedule";
  }
};

export const describeJobError = (err: unknown, status: CityJobStatus): CityJobError => {
  if (err instanceof PipelineError) {
    const described: CityJobError = {
      stage: err.stage,
      name: err.name,
      code: err.code,
      message: err.message
    };
    if ("kind" in err && typeof err.kind === "string") described.kind = err.kind;
    if ("status" in err && typeof err.status === "number") described.status = err.status;
    return described;
  }

  return {
    stage: stageOf(status),
    name: err instanceof Error ? err.name || "Error" : "Error",
    code: "unexpected",
    message: toErrorMessage(err)
  };
};

/** Moves a non-terminal job to `failed` and records the error. */
export const failCityJob = (job: CityJob, err: unknown): void => {
  const error = describeJobError(err, job.status);
  if (!isTerminal(job.status)) {
    transitionCityJob(job, "failed");
  }
  job.lastError = error;
};
