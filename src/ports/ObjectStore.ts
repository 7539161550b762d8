export type PutObjectParams = {
  key: string;
  body: Uint8Array;
  contentType: string;
  signal?: AbortSignal;
  ifNoneMatch?: "*";
};

export type PutObjectAck = {
  etag?: string;
  versionId?: string;
};

/**
 * S3-compatible object storage. `putObject` performs a single attempt and throws
 * `UploadError` (or `CancelledError`) on failure.
 */
export interface ObjectStore {
  readonly bucket: string;
  putObject(params: PutObjectParams): Promise<PutObjectAck>;
  verifyBucket(): Promise<void>;
}
