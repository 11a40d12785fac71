import { ConsoleLogger, createLogger, isLogLevel, resolveLogLevel } from "./logger";

describe("Logger", () => {
  const originalEnv = { ...process.env };
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation();
    warnSpy = jest.spyOn(console, "warn").mockImplementation();
    errorSpy = jest.spyOn(console, "error").mockImplementation();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    jest.restoreAllMocks();
  });

  describe("ConsoleLogger", () => {
    it("should prefix messages and forward extra args", () => {
      const logger = new ConsoleLogger("[scoring] ", "debug");

      logger.debug("scored", 3);

      expect(logSpy).toHaveBeenCalledWith("[scoring] scored", 3);
    });

    it("should drop messages below the configured level", () => {
      const logger = new ConsoleLogger("", "warn");

      logger.debug("hidden");
      logger.info("hidden");
      logger.warn("shown");
      logger.error("shown too");

      expect(logSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith("shown");
      expect(errorSpy).toHaveBeenCalledWith("shown too");
    });

    it("should print nothing when silent", () => {
      const logger = new ConsoleLogger("", "silent");

      logger.error("nope");

      expect(errorSpy).not.toHaveBeenCalled();
    });

    it("should change level at runtime", () => {
      const logger = new ConsoleLogger("", "error");
      logger.setLevel("info");

      logger.info("now visible");

      expect(logger.getLevel()).toBe("info");
      expect(logSpy).toHaveBeenCalledWith("now visible");
    });
  });

  describe("resolveLogLevel", () => {
    it("should prefer the explicit level", () => {
      process.env["VULNRANK_LOG_LEVEL"] = "error";
      expect(resolveLogLevel("debug")).toBe("debug");
    });

    it("should read VULNRANK_LOG_LEVEL case-insensitively", () => {
      process.env["VULNRANK_LOG_LEVEL"] = "WARN";
      expect(resolveLogLevel()).toBe("warn");
    });

    it("should ignore unknown env values and fall back to silent under tests", () => {
      process.env["VULNRANK_LOG_LEVEL"] = "verbose";
      process.env["NODE_ENV"] = "test";
      expect(resolveLogLevel()).toBe("silent");
    });

    it("should default to info outside tests", () => {
      delete process.env["VULNRANK_LOG_LEVEL"];
      process.env["NODE_ENV"] = "production";
      expect(resolveLogLevel()).toBe("info");
    });
  });

  it("createLogger should build a ConsoleLogger with the resolved level", () => {
    const logger = createLogger("[x] ", "warn");
    expect(logger).toBeInstanceOf(ConsoleLogger);
    expect(logger.getLevel()).toBe("warn");
  });

  it("isLogLevel should only accept known levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel(2)).toBe(false);
  });
});
