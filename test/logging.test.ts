import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger, createFileLogger, errorMessage, isLogLevel } from "../src/logging.js";

const LINE = /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] WARN disk low \{"free":1\}$/;

describe("logging", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes lines at or above the minimum level to stderr", () => {
    const write = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createConsoleLogger("warn");

    logger.info("ignored", {});
    logger.warn("disk low", { free: 1 });

    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0]?.[0]).toMatch(LINE);
  });

  it("appends to a file", () => {
    const dir = mkdtempSync(join(tmpdir(), "logging-test-"));
    const file = join(dir, "client.log");
    try {
      const logger = createFileLogger("debug", file);
      logger.warn("disk low", { free: 1 });
      logger.debug("second");

      const lines = readFileSync(file, "utf-8").trimEnd().split("\n");
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(LINE);
      expect(lines[1]).toMatch(/ DEBUG second$/);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("recognizes log levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });

  it("renders thrown values", () => {
    expect(errorMessage(new Error("bad"))).toBe("bad");
    expect(errorMessage(42)).toBe("42");
  });
});
