import { describe, expect, it, vi } from "vitest";
import { LoggerService } from "./logger.js";

function createSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("LoggerService", () => {
  it("prefixes messages with their context", () => {
    const sink = createSink();
    new LoggerService({ level: "debug", sink }).info("drive", "uploading", { bytes: 2 });
    expect(sink.info).toHaveBeenCalledWith("[drive] uploading", { bytes: 2 });
  });

  it("passes an empty string when there is no data", () => {
    const sink = createSink();
    new LoggerService({ sink }).error("cli", "unexpected failure");
    expect(sink.error).toHaveBeenCalledWith("[cli] unexpected failure", "");
  });

  it("drops messages below the configured level", () => {
    const sink = createSink();
    const logger = new LoggerService({ level: "warn", sink });

    logger.debug("drive", "a");
    logger.info("drive", "b");
    logger.warn("drive", "c");
    logger.error("drive", "d");

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledTimes(1);
    expect(sink.error).toHaveBeenCalledTimes(1);
  });

  it("logs info and above by default", () => {
    const sink = createSink();
    const logger = new LoggerService({ sink });
    logger.debug("drive", "hidden");
    logger.info("drive", "shown");
    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).toHaveBeenCalledWith("[drive] shown", "");
  });
});
