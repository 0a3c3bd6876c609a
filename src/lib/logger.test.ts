import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger, getLogLevel, isLogLevel, setLogLevel, type LogLevel } from "./logger";

describe("logger", () => {
  let initial: LogLevel;

  beforeEach(() => {
    initial = getLogLevel();
  });

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("should suppress messages below the active level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    setLogLevel("info");

    const logger = createLogger("Capture");
    logger.debug("frame processed");
    logger.info("recording started");

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith("[Capture] recording started");
  });

  it("should always print warnings", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    setLogLevel("error");

    createLogger("Motion").warn("sample dropped", 3);

    expect(warn).toHaveBeenCalledWith("[Motion] sample dropped", 3);
  });

  it("should timestamp errors", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("Persistence").error("save failed");

    const [line] = error.mock.calls[0];
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[Persistence\] save failed$/);
  });

  it("should extend the prefix for child loggers", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    setLogLevel("debug");

    createLogger("Analysis").child("Gait").info("cadence updated");

    expect(info).toHaveBeenCalledWith("[Analysis:Gait] cadence updated");
  });

  it("should honor force on conditional logs", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    setLogLevel("warn");

    const logger = createLogger("ML");
    logger.log("debug", "skipped");
    logger.log("debug", "forced", { id: 1 }, { force: true });

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[ML] forced", { id: 1 });
  });

  it("should recognize log levels", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
