describe("extract CLI", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("builds a controlled error envelope without stack by default", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/extract");

    const error = Object.assign(new Error("bucket unreachable"), {
      name: "UploadError",
      code: "upload_permanent",
      context: {
        cityId: "69036",
        key: "city_id=69036/year=2026/month=10/day=18/vendors_20261018T070405006Z.parquet",
        page: 2,
        requestUrl: "http://vendors.test/vendors?city_id=69036",
        unsafe: "ignored"
      },
      status: 403,
      cause: { raw: "secret payload" }
    });

    const envelope = buildCliErrorEnvelope(error, false);

    expect(envelope).toEqual({
      event: "pipeline.failed",
      name: "UploadError",
      message: "bucket unreachable",
      code: "upload_permanent",
      context: {
        cityId: "69036",
        key: "city_id=69036/year=2026/month=10/day=18/vendors_20261018T070405006Z.parquet",
        page: 2
      },
      status: 403
    });
    expect(envelope).not.toHaveProperty("stack");
    expect(JSON.stringify(envelope)).not.toContain("secret payload");
  });

  it("includes stack only when debug mode is enabled", async () => {
    const { buildCliErrorEnvelope, isDebugMode } = await import("../../src/cli/extract");

    const envelope = buildCliErrorEnvelope(new Error("boom"), true);
    expect(envelope.stack).toContain("Error: boom");
    expect(isDebugMode({ DEBUG: "TRUE" })).toBe(true);
    expect(isDebugMode({ DEBUG: "0" })).toBe(false);
    expect(isDebugMode({})).toBe(false);
  });

  it("reports the failing stage of pipeline errors", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/extract");
    const { UploadError } = await import("../../src/core/errors/pipeline.errors");

    const envelope = buildCliErrorEnvelope(
      new UploadError({ kind: "permanent", message: "Cannot access bucket 'vendors': NotFound", status: 404 }),
      false
    );

    expect(envelope).toEqual({
      event: "pipeline.failed",
      name: "UploadError",
      message: "Cannot access bucket 'vendors': NotFound",
      code: "upload_permanent",
      stage: "upload",
      status: 404
    });
    expect(JSON.parse(JSON.stringify(envelope))).not.toHaveProperty("context");
  });

  it("wraps non-error throwables", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/extract");

    expect(buildCliErrorEnvelope("plain failure", false)).toEqual({
      event: "pipeline.failed",
      name: "Error",
      message: "plain failure"
    });
  });

  it("exits with the summary exit code when the run completes", async () => {
    const runExtract = jest.fn().mockResolvedValue({ succeeded: 2, failed: 1, droppedRecords: 0, rows: 10, exitCode: 1, cities: [] });
    jest.doMock("../../src/composition/root", () => ({ runExtract }));

    const exitSpy = jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeExtractCli } = await import("../../src/cli/extract");
    await expect(executeExtractCli()).rejects.toThrow("EXIT:1");

    expect(runExtract).toHaveBeenCalledWith(expect.any(AbortSignal));
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("exits 0 when every city succeeded", async () => {
    const runExtract = jest.fn().mockResolvedValue({ succeeded: 1, failed: 0, droppedRecords: 0, rows: 3, exitCode: 0, cities: [] });
    jest.doMock("../../src/composition/root", () => ({ runExtract }));

    const exitSpy = jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeExtractCli } = await import("../../src/cli/extract");
    await expect(executeExtractCli()).rejects.toThrow("EXIT:0");
    expect(exitSpy).toHaveBeenCalledWith(0);
  });

  it("logs a sanitized envelope and exits with code 1 when the run cannot start", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };

    const runExtract = jest.fn().mockRejectedValue(Object.assign(new Error("at least one city id must be configured"), {
      code: "invalid_config",
      cause: { huge: "do-not-print-this" }
    }));
    jest.doMock("../../src/composition/root", () => ({ runExtract }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeExtractCli } = await import("../../src/cli/extract");
    await expect(executeExtractCli()).rejects.toThrow("EXIT:1");

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const logged = String(errorSpy.mock.calls[0]?.[0] ?? "");
    expect(JSON.parse(logged)).toEqual({
      event: "pipeline.failed",
      name: "Error",
      message: "at least one city id must be configured",
      code: "invalid_config"
    });
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("aborts the run signal on SIGTERM", async () => {
    let seenSignal: AbortSignal | undefined;
    const runExtract = jest.fn().mockImplementation(
      (signal: AbortSignal) =>
        new Promise((resolve) => {
          seenSignal = signal;
          signal.addEventListener("abort", () =>
            resolve({ succeeded: 0, failed: 1, droppedRecords: 0, rows: 0, exitCode: 1, cities: [] })
          );
        })
    );
    jest.doMock("../../src/composition/root", () => ({ runExtract }));

    jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeExtractCli } = await import("../../src/cli/extract");
    const running = executeExtractCli();
    process.emit("SIGTERM", "SIGTERM");

    await expect(running).rejects.toThrow("EXIT:1");
    expect(seenSignal?.aborted).toBe(true);
  });
});
