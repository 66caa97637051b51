import { Logger, type ILog, type LogLevels } from "../../models/Logger";
import { LogPrinter } from "../../models/LogPrinter";

describe("Logger", () => {
  let logs: string[];
  let errs: string[];

  const createLogger = (threshold: LogLevels | null = "info") =>
    new Logger({
      printThreshold: threshold,
      printStrategy: "plain",
      useColors: false,
    });

  const gather = () => [...logs, ...errs].join("\n");

  beforeEach(() => {
    logs = [];
    errs = [];
    LogPrinter.setWriters({
      log: (msg) => logs.push(msg),
      error: (msg) => errs.push(msg),
    });
  });

  afterEach(() => {
    LogPrinter.resetWriters();
  });

  it("supports with() to bind context and a source", async () => {
    const logger = createLogger().with({
      source: "worker",
      additionalContext: { userId: 42 },
    });

    await logger.info("hello");

    const all = gather();
    expect(all).toContain("[worker] hello");
    expect(all).toContain("context:");
    expect(all).toContain('"userId": 42');
  });

  it("lets logInfo override the bound source", async () => {
    const logger = createLogger().with({ source: "worker" });

    await logger.info("hello", { source: "override" });

    expect(logs[0]).toContain("[override] hello");
  });

  it("keeps the parent source when a child gives none", async () => {
    const parent = createLogger().with({ source: "parent" });
    const child = parent.with({ additionalContext: { step: 1 } });
    const seen: ILog[] = [];
    parent.onLog((log) => {
      seen.push(log);
    });

    await child.info("nested");

    expect(seen).toHaveLength(1);
    expect(seen[0].source).toBe("parent");
    expect(seen[0].context).toEqual({ step: 1 });
  });

  it("triggers listeners even below the print threshold", async () => {
    const logger = createLogger("error");
    const seen: ILog[] = [];
    logger.onLog((log) => {
      seen.push(log);
    });

    await logger.info("not printed");

    expect(seen).toHaveLength(1);
    expect(seen[0].level).toBe("info");
    expect(seen[0].message).toBe("not printed");
    expect(logs).toEqual([]);
    expect(errs).toEqual([]);
  });

  it("respects print threshold severity", async () => {
    const logger = createLogger("warn");
    await logger.trace("TRACE_MSG");
    await logger.debug("DEBUG_MSG");
    await logger.info("INFO_MSG");
    await logger.warn("WARN_MSG");
    await logger.error("ERROR_MSG");
    await logger.critical("CRITICAL_MSG");

    const outputs = gather();
    expect(outputs).not.toContain("TRACE_MSG");
    expect(outputs).not.toContain("DEBUG_MSG");
    expect(outputs).not.toContain("INFO_MSG");
    expect(errs).toHaveLength(3);
  });

  it("prints nothing when the threshold is null", async () => {
    const logger = createLogger(null);
    await logger.critical("quiet");

    expect(logs).toEqual([]);
    expect(errs).toEqual([]);
  });

  it("reduces errors to name, message and stack", async () => {
    const logger = createLogger();
    const seen: ILog[] = [];
    logger.onLog((log) => {
      seen.push(log);
    });

    const failure = new TypeError("bad input");
    await logger.error("failed", { error: failure });
    await logger.error("failed", { error: "just text" });

    expect(seen[0].error).toEqual({
      name: "TypeError",
      message: "bad input",
      stack: failure.stack,
    });
    expect(seen[1].error).toEqual({
      name: "UnknownError",
      message: "just text",
    });
    expect(errs).toContain("    ╰─ TypeError: bad input");
  });

  it("keeps data separate from context", async () => {
    const logger = createLogger();
    const seen: ILog[] = [];
    logger.onLog((log) => {
      seen.push(log);
    });

    await logger.info("with data", { data: { n: 1 }, requestId: "r1" });

    expect(seen[0].data).toEqual({ n: 1 });
    expect(seen[0].context).toEqual({ requestId: "r1" });
  });

  it("awaits async listeners before returning", async () => {
    const logger = createLogger(null);
    const order: string[] = [];
    logger.onLog(async () => {
      await Promise.resolve();
      order.push("listener");
    });

    await logger.info("x");
    order.push("after");

    expect(order).toEqual(["listener", "after"]);
  });

  it("reports a failing listener and keeps logging", async () => {
    const logger = createLogger();
    const seen: string[] = [];
    logger.onLog(() => {
      throw new Error("listener broke");
    });
    logger.onLog((log) => {
      seen.push(String(log.message));
    });

    await logger.info("still works");

    expect(seen).toEqual(["still works"]);
    expect(errs.some((line) => line.includes("Error in log listener"))).toBe(
      true,
    );
    expect(errs).toContain("    ╰─ Error: listener broke");
    expect(logs.some((line) => line.endsWith("INFO     still works"))).toBe(
      true,
    );
  });

  it("ranks severities from trace to critical", () => {
    expect(Object.entries(Logger.Severity)).toEqual([
      ["trace", 0],
      ["debug", 1],
      ["info", 2],
      ["warn", 3],
      ["error", 4],
      ["critical", 5],
    ]);
  });
});
