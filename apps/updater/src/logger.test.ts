import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createLogger } from "./logger.js";

describe("createLogger", () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it("writes info to stdout by default", () => {
    createLogger({ infoToStderr: false }).info("[main] hello");

    expect(logSpy).toHaveBeenCalledWith("[main] hello");
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("writes info to stderr when asked", () => {
    createLogger({ infoToStderr: true }).info("[main] hello");

    expect(errorSpy).toHaveBeenCalledWith("[main] hello");
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("always sends warnings through console.warn", () => {
    createLogger({ infoToStderr: true }).warn("[render] careful");

    expect(warnSpy).toHaveBeenCalledWith("[render] careful");
  });
});
