import { HeadBucketCommand, PutObjectCommand, S3Client, S3ServiceException } from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import type { ObjectStore, PutObjectAck, PutObjectParams } from "../../ports/ObjectStore";
import { CancelledError, UploadError, toErrorMessage } from "../../core/errors/pipeline.errors";

export type S3ObjectStoreOptions = {
  bucket: string;
  region: string;
  endpoint?: string;
  credentials?: { accessKeyId: string; secretAccessKey: string };
  forcePathStyle?: boolean;
  timeoutMs?: number;
  multipartThresholdBytes?: number;
};

const MIB = 1024 * 1024;
// S3 rejects multipart parts under 5 MiB (except the last one)
export const MIN_PART_SIZE_BYTES = 5 * MIB;
export const DEFAULT_MULTIPART_THRESHOLD_BYTES = 8 * MIB;

export const createS3Client = (opts: S3ObjectStoreOptions): S3Client =>
  new S3Client({
    region: opts.region,
    endpoint: opts.endpoint,
    credentials: opts.credentials,
    forcePathStyle: opts.forcePathStyle ?? true,
    // the pipeline applies its own retry policy around each put
    maxAttempts: 1
  });

const statusOf = (err: unknown): number | undefined => {
  if (err instanceof S3ServiceException) return err.$metadata.httpStatusCode;
  return undefined;
};

/**
 * S3-compatible store (AWS S3, MinIO). One `putObject` call is one attempt.
 * Bodies above the multipart threshold go up in parts of that size, one part at a time.
 */
export class S3ObjectStore implements ObjectStore {
  readonly bucket: string;
  private readonly timeoutMs: number;
  private readonly multipartThresholdBytes: number;

  constructor(
    private readonly client: S3Client,
    opts: Pick<S3ObjectStoreOptions, "bucket" | "timeoutMs" | "multipartThresholdBytes">
  ) {
    const threshold = opts.multipartThresholdBytes ?? DEFAULT_MULTIPART_THRESHOLD_BYTES;
    if (!Number.isInteger(threshold) || threshold < MIN_PART_SIZE_BYTES) {
      throw new Error(`multipartThresholdBytes must be an integer >= ${MIN_PART_SIZE_BYTES}`);
    }
    this.bucket = opts.bucket;
    this.timeoutMs = opts.timeoutMs ?? 30000;
    this.multipartThresholdBytes = threshold;
  }

  async verifyBucket(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (err) {
      throw new UploadError({
        kind: "permanent",
        message: `Cannot access bucket '${this.bucket}': ${toErrorMessage(err)}`,
        status: statusOf(err),
        cause: err
      });
    }
  }

  async putObject(params: PutObjectParams): Promise<PutObjectAck> {
    const context = { key: params.key };
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onRunAbort = () => controller.abort();
    params.signal?.addEventListener("abort", onRunAbort, { once: true });

    try {
      if (params.signal?.aborted) controller.abort();
      const input = {
        Bucket: this.bucket,
        Key: params.key,
        Body: params.body,
        ContentType: params.contentType,
        IfNoneMatch: params.ifNoneMatch
      };
      const res =
        params.body.byteLength > this.multipartThresholdBytes
          ? await new Upload({
              client: this.client,
              params: input,
              partSize: this.multipartThresholdBytes,
              queueSize: 1,
              leavePartsOnError: false,
              abortController: controller
            }).done()
          : await this.client.send(new PutObjectCommand(input), { abortSignal: controller.signal });
      return { etag: res.ETag, versionId: res.VersionId };
    } catch (err) {
      if (params.signal?.aborted) {
        throw new CancelledError({ stage: "upload", context, cause: err });
      }
      if (timedOut) {
        throw new UploadError({
          kind: "transient",
          message: `Object upload timeout after ${this.timeoutMs}ms`,
          context,
          cause: err
        });
      }

      const status = statusOf(err);
      const transient = status == null || status === 429 || status >= 500;
      throw new UploadError({
        kind: transient ? "transient" : "permanent",
        message: `Object upload failed${status != null ? `: ${status}` : ""}: ${toErrorMessage(err)}`,
        status,
        context,
        cause: err
      });
    } finally {
      clearTimeout(timeout);
      params.signal?.removeEventListener("abort", onRunAbort);
    }
  }
}
