export type PipelineStage = "fetch" | "transform" | "write" | "upload" | "schedule";

export type PipelineErrorContext = Partial<{
  cityId: string;
  page: number;
  cursor: string;
  index: number;
  vendorId: string;
  field: string;
  key: string;
  path: string;
  requestUrl: string;
}>;

export class PipelineError extends Error {
  readonly code: string;
  readonly stage: PipelineStage;
  readonly context: PipelineErrorContext;
  readonly cause?: unknown;

  constructor(args: {
    code: string;
    stage: PipelineStage;
    message: string;
    context?: PipelineErrorContext;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "PipelineError";
    this.code = args.code;
    this.stage = args.stage;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type FetchErrorKind = "rate_limited" | "transient" | "permanent";

export class FetchError extends PipelineError {
  readonly kind: FetchErrorKind;
  readonly status?: number;
  readonly retryDelayMs?: number;

  constructor(args: {
    kind: FetchErrorKind;
    message: string;
    status?: number;
    retryDelayMs?: number;
    context?: PipelineErrorContext;
    cause?: unknown;
  }) {
    super({ code: `fetch_${args.kind}`, stage: "fetch", message: args.message, context: args.context, cause: args.cause });
    this.name = "FetchError";
    this.kind = args.kind;
    this.status = args.status;
    this.retryDelayMs = args.retryDelayMs;
  }
}

export type TransformErrorKind = "missing_required_field" | "malformed_value";

export class TransformError extends PipelineError {
  readonly kind: TransformErrorKind;
  readonly field: string;

  constructor(args: { kind: TransformErrorKind; field: string; message: string; context?: PipelineErrorContext }) {
    super({
      code: args.kind,
      stage: "transform",
      message: args.message,
      context: { ...args.context, field: args.field }
    });
    this.name = "TransformError";
    this.kind = args.kind;
    this.field = args.field;
  }
}

/**
 * Raised when a single page drops more records than the configured fraction
 * allows; the whole city job fails instead of shipping a near-empty partition.
 */
export class ExcessiveDropsError extends PipelineError {
  readonly dropped: number;
  readonly pageSize: number;

  constructor(args: { dropped: number; pageSize: number; maxFraction: number; context?: PipelineErrorContext }) {
    super({
      code: "excessive_drops",
      stage: "transform",
      message: `Dropped ${args.dropped}/${args.pageSize} records on one page (max fraction ${args.maxFraction})`,
      context: args.context
    });
    this.name = "ExcessiveDropsError";
    this.dropped = args.dropped;
    this.pageSize = args.pageSize;
  }
}

export type WriteErrorKind = "encoding" | "io";

export class WriteError extends PipelineError {
  readonly kind: WriteErrorKind;

  constructor(args: { kind: WriteErrorKind; message: string; context?: PipelineErrorContext; cause?: unknown }) {
    super({ code: `write_${args.kind}`, stage: "write", message: args.message, context: args.context, cause: args.cause });
    this.name = "WriteError";
    this.kind = args.kind;
  }
}

export type UploadErrorKind = "transient" | "permanent" | "unacknowledged";

export class UploadError extends PipelineError {
  readonly kind: UploadErrorKind;
  readonly status?: number;

  constructor(args: {
    kind: UploadErrorKind;
    message: string;
    status?: number;
    context?: PipelineErrorContext;
    cause?: unknown;
  }) {
    super({ code: `upload_${args.kind}`, stage: "upload", message: args.message, context: args.context, cause: args.cause });
    this.name = "UploadError";
    this.kind = args.kind;
    this.status = args.status;
  }
}

export class CancelledError extends PipelineError {
  constructor(args: { stage: PipelineStage; message?: string; context?: PipelineErrorContext; cause?: unknown }) {
    super({
      code: "cancelled",
      stage: args.stage,
      message: args.message ?? "Run cancelled",
      context: args.context,
      cause: args.cause
    });
    this.name = "CancelledError";
  }
}

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
