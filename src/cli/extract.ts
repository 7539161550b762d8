#!/usr/bin/env node
import { runExtract } from "../composition/root";
import { PipelineError, type PipelineErrorContext, type PipelineStage } from "../core/errors/pipeline.errors";

// request URLs and causes may carry credentials or payloads; only locators are printed
type EnvelopeContext = Pick<PipelineErrorContext, "cityId" | "key" | "path" | "page">;

type CliErrorEnvelope = {
  event: "pipeline.failed";
  name: string;
  message: string;
  code?: string;
  stage?: PipelineStage;
  context?: EnvelopeContext;
  status?: number;
  stack?: string;
};

const readString = (source: object, field: string): string | undefined => {
  const value: unknown = Reflect.get(source, field);
  return typeof value === "string" ? value : undefined;
};

const readFiniteNumber = (source: object, field: string): number | undefined => {
  const value: unknown = Reflect.get(source, field);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
};

const pickContext = (source: object): EnvelopeContext | undefined => {
  const raw: unknown = Reflect.get(source, "context");
  if (typeof raw !== "object" || raw === null) return undefined;

  const context: EnvelopeContext = {
    cityId: readString(raw, "cityId"),
    key: readString(raw, "key"),
    path: readString(raw, "path"),
    page: readFiniteNumber(raw, "page")
  };
  return Object.values(context).some((value) => value !== undefined) ? context : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean =>
  ["1", "true"].includes(env.DEBUG?.trim().toLowerCase() ?? "");

/** Undefined fields are dropped when the envelope is serialized. */
export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const source: object = typeof err === "object" && err !== null ? err : {};
  const envelope: CliErrorEnvelope = {
    event: "pipeline.failed",
    name: err instanceof Error ? err.name || "Error" : "Error",
    message: err instanceof Error ? err.message : String(err),
    code: readString(source, "code"),
    stage: err instanceof PipelineError ? err.stage : undefined,
    context: pickContext(source),
    status: readFiniteNumber(source, "status")
  };

  if (includeStack && err instanceof Error && err.stack) {
    envelope.stack = err.stack;
  }
  return envelope;
};

/**
 * Exit codes: 0 when every city succeeded, 1 when any city failed or the run
 * could not start. SIGINT/SIGTERM cancel in-flight work; cancelled cities fail.
 */
export const executeExtractCli = async (): Promise<void> => {
  const controller = new AbortController();
  const cancel = () => controller.abort(new Error("shutdown signal received"));
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);

  let exitCode: number;
  try {
    const summary = await runExtract(controller.signal);
    exitCode = summary.exitCode;
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    exitCode = 1;
  } finally {
    process.removeListener("SIGINT", cancel);
    process.removeListener("SIGTERM", cancel);
  }

  process.exit(exitCode);
};

if (require.main === module) {
  void executeExtractCli();
}
