import { afterEach, describe, expect, it } from "vitest";
import { configureLogging, getLog } from "./logger.js";
import { configureFromEnv } from "../filter/build.js";

afterEach(() => configureLogging({ level: "silent" }));

describe("Log", () => {
  it("follows configureLogging after creation", () => {
    configureLogging({ level: "warn" });
    const log = getLog("test");
    expect(log.isLoggable("debug")).toBe(false);
    expect(log.isLoggable("warn")).toBe(true);

    configureLogging({ level: "debug" });
    expect(log.isLoggable("debug")).toBe(true);
    expect(log.child({ filter: "charge" }).isLoggable("debug")).toBe(true);
  });

  it("lets a per-logger level override the global one", () => {
    configureLogging({ level: "debug" });

    expect(getLog("quiet", { level: "error" }).isLoggable("warn")).toBe(false);
  });
});

describe("shared root", () => {
  function sink(): { lines: unknown[]; write(line: string): void } {
    const lines: unknown[] = [];
    return { lines, write: (line: string) => { lines.push(JSON.parse(line)); } };
  }

  it("writes named lines through the configured destination", () => {
    const out = sink();
    configureLogging({ level: "info", destination: out });
    const log = getLog("FilterList");

    log.error("evaluation failed", { filter: "charge less 3" });
    log.debug("not written");

    expect(out.lines).toHaveLength(1);
    expect(out.lines[0]).toMatchObject({
      level: 50,
      name: "FilterList",
      service: "psm-filter-engine",
      msg: "evaluation failed",
      filter: "charge less 3",
    });
  });

  it("moves existing loggers to the new root on reconfiguration", () => {
    const first = sink();
    const second = sink();
    configureLogging({ level: "info", destination: first });
    const log = getLog("Evaluator").child({ scope: 1 });

    log.info("one");
    configureLogging({ level: "info", destination: second });
    log.info("two");

    expect(first.lines).toEqual([expect.objectContaining({ msg: "one", scope: 1 })]);
    expect(second.lines).toEqual([expect.objectContaining({ msg: "two", name: "Evaluator" })]);
  });
});

describe("configureFromEnv", () => {
  it("applies the logging settings and returns build options", () => {
    const options = configureFromEnv({ LOG_LEVEL: "error", FILTER_VALIDATION: "lenient" });

    expect(options).toEqual({ massTolerance: 0.001, validation: "lenient" });
    expect(getLog("any").isLoggable("warn")).toBe(false);
    expect(getLog("any").isLoggable("error")).toBe(true);
  });
});
