import { runPipeline } from "../application/extract-vendors/runPipeline.usecase";
import type { PipelineSummary } from "../application/extract-vendors/pipeline.error-handler";
import { VendorApiHttpClient } from "../infrastructure/vendor-api/VendorApiHttpClient";
import { ParquetVendorWriter } from "../infrastructure/parquet/ParquetVendorWriter";
import { createS3Client, S3ObjectStore } from "../infrastructure/s3/S3ObjectStore";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export const runExtract = async (signal?: AbortSignal): Promise<PipelineSummary> => {
  const env = loadEnv();
  const { pipelineConfig, timeoutMs } = loadRuntimeConfigFromEnv();

  const client = new VendorApiHttpClient({
    baseUrl: env.VENDOR_API_BASE_URL,
    apiKey: env.VENDOR_API_KEY,
    headers: env.VENDOR_API_HEADERS,
    query: env.VENDOR_API_QUERY,
    timeoutMs
  });
  const writer = new ParquetVendorWriter(env.PIPELINE_SCRATCH_DIR);
  const s3 = createS3Client({
    bucket: env.S3_BUCKET,
    region: env.S3_REGION,
    endpoint: env.S3_ENDPOINT,
    credentials: env.S3_CREDENTIALS,
    forcePathStyle: env.S3_FORCE_PATH_STYLE
  });
  const store = new S3ObjectStore(s3, {
    bucket: env.S3_BUCKET,
    timeoutMs,
    multipartThresholdBytes: env.S3_MULTIPART_THRESHOLD_MB * 1024 * 1024
  });

  try {
    if (env.S3_VERIFY_BUCKET) {
      await store.verifyBucket();
    }
    return await runPipeline({ client, writer, store, config: pipelineConfig, signal });
  } finally {
    s3.destroy();
  }
};
