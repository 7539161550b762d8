import { readFile } from "fs/promises";
import type { FileHandle } from "../../ports/ColumnarWriter";
import type { ObjectStore } from "../../ports/ObjectStore";
import type { RateLimiter } from "../../shared/concurrency/rateLimiter";
import { retry, type BackoffPolicy, type RetryDecision } from "../../shared/retry/retry";
import { objectKeyFor, type ObjectLocation, type PartitionKey } from "../../core/partition/partitionKey";
import { UploadError, WriteError, toErrorMessage } from "../../core/errors/pipeline.errors";
import type { UploadMode } from "./pipeline.config";

export type UploadPartitionDeps = {
  store: ObjectStore;
  limiter: RateLimiter;
  policy: BackoffPolicy;
  mode: UploadMode;
  randomFn?: () => number;
};

export type UploadPartitionParams = {
  file: FileHandle;
  partition: PartitionKey;
  runTimestamp: string;
  signal?: AbortSignal;
  onAttempt?: (attempt: number) => void;
};

export const shouldRetryUpload = (err: unknown): RetryDecision =>
  err instanceof UploadError && (err.kind === "transient" || err.kind === "unacknowledged");

/**
 * Uploads a local columnar file under its partition key. Success requires the
 * store to acknowledge the write with an ETag. The local file is left in place
 * whatever the outcome.
 */
export const uploadPartition = async (
  deps: UploadPartitionDeps,
  params: UploadPartitionParams
): Promise<ObjectLocation> => {
  const { file, partition, runTimestamp, signal } = params;
  const key = objectKeyFor(partition, runTimestamp, file.extension);
  const context = { cityId: partition.cityId, key };

  let body: Buffer;
  try {
    body = await readFile(file.path);
  } catch (err) {
    throw new WriteError({
      kind: "io",
      message: `Cannot read columnar file ${file.path}: ${toErrorMessage(err)}`,
      context: { ...context, path: file.path },
      cause: err
    });
  }

  const ack = await retry(
    () =>
      deps.limiter.run(
        partition.cityId,
        async () => {
          const res = await deps.store.putObject({
            key,
            body,
            contentType: file.contentType,
            signal,
            ifNoneMatch: deps.mode === "create-only" ? "*" : undefined
          });
          if (!res.etag) {
            throw new UploadError({
              kind: "unacknowledged",
              message: `Object store did not acknowledge ${key}`,
              context
            });
          }
          return { etag: res.etag, versionId: res.versionId };
        },
        signal
      ),
    {
      ...deps.policy,
      signal,
      stage: "upload",
      randomFn: deps.randomFn,
      shouldRetry: shouldRetryUpload,
      onAttempt: params.onAttempt,
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "upload.retry",
          cityId: partition.cityId,
          key,
          kind: error instanceof UploadError ? error.kind : null,
          status: error instanceof UploadError ? error.status ?? null : null,
          attempt,
          maxAttempts,
          delayMs
        }));
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "upload.give_up",
          cityId: partition.cityId,
          key,
          kind: error instanceof UploadError ? error.kind : null,
          attempt,
          maxAttempts,
          localPath: file.path
        }));
      }
    }
  );

  const location: ObjectLocation = {
    bucket: deps.store.bucket,
    key,
    uri: `s3://${deps.store.bucket}/${key}`,
    etag: ack.etag
  };
  if (ack.versionId) location.versionId = ack.versionId;
  return location;
};
