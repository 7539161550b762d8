export type Env = {
  VENDOR_API_BASE_URL: string;
  VENDOR_API_KEY: string;
  VENDOR_API_HEADERS: Record<string, string>;
  VENDOR_API_QUERY: Record<string, string>;
  S3_ENDPOINT?: string;
  S3_REGION: string;
  S3_BUCKET: string;
  S3_CREDENTIALS?: { accessKeyId: string; secretAccessKey: string };
  S3_FORCE_PATH_STYLE: boolean;
  S3_VERIFY_BUCKET: boolean;
  S3_MULTIPART_THRESHOLD_MB: number;
  PIPELINE_SCRATCH_DIR: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const parseStringMap = (name: string, raw: string | undefined): Record<string, string> => {
  if (raw == null || raw.trim() === "") return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`${name} must be a JSON object of string values`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${name} must be a JSON object of string values`);
  }

  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== "string") {
      throw new Error(`${name}.${key} must be a string`);
    }
    out[key] = value;
  }
  return out;
};

const parseBoolean = (name: string, raw: string | undefined, fallback: boolean): boolean => {
  if (raw == null || raw.trim() === "") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false") return false;
  throw new Error(`${name} must be true/false/1/0. Received: ${raw}`);
};

const parseIntInRange = (name: string, raw: string | undefined, fallback: number, min: number, max: number): number => {
  if (raw == null || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${raw} is out of allowed range [${min}..${max}]`);
  }
  return value;
};

const nonBlank = (raw: string | undefined): string | undefined => (raw?.trim() ? raw.trim() : undefined);

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const VENDOR_API_BASE_URL = validateHttpUrl(
    "VENDOR_API_BASE_URL",
    env.VENDOR_API_BASE_URL ?? "https://disco.deliveryhero.io/listing/api/v1/pandora"
  );
  const endpoint = nonBlank(env.S3_ENDPOINT);

  const accessKeyId = nonBlank(env.S3_ACCESS_KEY_ID);
  const secretAccessKey = nonBlank(env.S3_SECRET_ACCESS_KEY);
  if ((accessKeyId == null) !== (secretAccessKey == null)) {
    throw new Error("S3_ACCESS_KEY_ID and S3_SECRET_ACCESS_KEY must be set together");
  }

  return {
    VENDOR_API_BASE_URL,
    VENDOR_API_KEY: env.VENDOR_API_KEY ?? "",
    VENDOR_API_HEADERS: parseStringMap("VENDOR_API_HEADERS", env.VENDOR_API_HEADERS),
    VENDOR_API_QUERY: parseStringMap("VENDOR_API_QUERY", env.VENDOR_API_QUERY),
    S3_ENDPOINT: endpoint != null ? validateHttpUrl("S3_ENDPOINT", endpoint) : undefined,
    S3_REGION: nonBlank(env.S3_REGION) ?? "us-east-1",
    S3_BUCKET: nonBlank(env.S3_BUCKET) ?? "vendors",
    S3_CREDENTIALS: accessKeyId != null && secretAccessKey != null ? { accessKeyId, secretAccessKey } : undefined,
    S3_FORCE_PATH_STYLE: parseBoolean("S3_FORCE_PATH_STYLE", env.S3_FORCE_PATH_STYLE, true),
    S3_VERIFY_BUCKET: parseBoolean("S3_VERIFY_BUCKET", env.S3_VERIFY_BUCKET, true),
    // S3 caps an object at 10000 parts and a part at 5 GiB
    S3_MULTIPART_THRESHOLD_MB: parseIntInRange("S3_MULTIPART_THRESHOLD_MB", env.S3_MULTIPART_THRESHOLD_MB, 8, 5, 5120),
    PIPELINE_SCRATCH_DIR: nonBlank(env.PIPELINE_SCRATCH_DIR) ?? "output"
  };
};
