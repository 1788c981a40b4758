import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { setupLogger } from "@utils/logger";

describe("Logger Configuration", () => {
  let capturedLogs: string[] = [];
  let originalEnv: string | undefined;

  beforeEach(() => {
    capturedLogs = [];
    originalEnv = process.env.LOG_LEVEL;
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: unknown) => {
      capturedLogs.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env.LOG_LEVEL = originalEnv;
    } else {
      delete process.env.LOG_LEVEL;
    }
  });

  it("should default to warn level when LOG_LEVEL is not set", () => {
    delete process.env.LOG_LEVEL;
    const logger = setupLogger();

    expect(logger.level).toBe("warn");
  });

  it("should write to stderr with the logger name", () => {
    const stdoutSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const logger = setupLogger("custom-module", "info");
    logger.info("test message");

    expect(capturedLogs).toHaveLength(1);
    expect(stdoutSpy).not.toHaveBeenCalled();
    const logEntry = JSON.parse(capturedLogs[0].trim());
    expect(logEntry.name).toBe("custom-module");
    expect(logEntry.msg).toBe("test message");
  });

  it("should respect explicit log level parameter", () => {
    process.env.LOG_LEVEL = "error";
    const logger = setupLogger("test", "debug");

    expect(logger.level).toBe("debug");
  });

  it("should read log level from LOG_LEVEL environment variable", () => {
    process.env.LOG_LEVEL = "DEBUG";
    const logger = setupLogger("env-test");

    expect(logger.level).toBe("debug");
  });

  it("should fall back to warn for an unknown level", () => {
    process.env.LOG_LEVEL = "verbose";
    const logger = setupLogger("env-test");

    expect(logger.level).toBe("warn");
  });

  it("should output uppercase level names and ISO timestamps", () => {
    const logger = setupLogger("level-test", "info");
    logger.warn("test message");

    const logEntry = JSON.parse(capturedLogs[0].trim());
    expect(logEntry.level).toBe("WARN");
    expect(logEntry.time).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it("should log at the configured level and suppress lower levels", () => {
    delete process.env.LOG_LEVEL;
    const logger = setupLogger("filter-test");

    logger.info("info message");
    expect(capturedLogs).toHaveLength(0);

    logger.warn("warn message");
    expect(capturedLogs).toHaveLength(1);
  });
});
