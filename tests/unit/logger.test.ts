import { describe, it, expect, vi, afterEach } from "vitest";
import { createConsoleLogger } from "../../src/internal/logging/logger.js";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes lines with a timestamp and the phase", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    createConsoleLogger("run").info("Loaded 8 queries from f1_units");

    expect(log).toHaveBeenCalledWith(
      expect.stringMatching(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[run\]$/),
      "Loaded 8 queries from f1_units",
    );
  });

  it("marks warnings and errors", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createConsoleLogger("analyze");

    logger.warn("slow");
    logger.error("broken");

    expect(warn).toHaveBeenCalledWith(expect.any(String), "WARN:", "slow");
    expect(error).toHaveBeenCalledWith(expect.any(String), "ERROR:", "broken");
  });

  it("only logs debug output when enabled", () => {
    expect(createConsoleLogger("run").debug).toBeUndefined();

    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    createConsoleLogger("run", { debug: true }).debug?.("exec: ollama run llama3.2");

    expect(debug).toHaveBeenCalledWith(expect.any(String), "exec: ollama run llama3.2");
  });
});
