import {afterEach, describe, it, expect} from "vitest";
import {
  LogLevel,
  WinstonLogger,
  getEnvLogFormat,
  getEnvLogLevel,
  getEnvLogger,
  getEnvTimestampFormat,
} from "../../src/index.js";

const envKeys = ["LOG_LEVEL", "DEBUG", "VERBOSE", "LOG_FORMAT", "LOG_TIMESTAMP_FORMAT"] as const;

describe("env logger", () => {
  const saved = new Map(envKeys.map((key) => [key, process.env[key]]));

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  function clearEnv(): void {
    for (const key of envKeys) delete process.env[key];
  }

  describe("getEnvLogLevel", () => {
    it("reads LOG_LEVEL", () => {
      clearEnv();
      process.env.LOG_LEVEL = "verbose";
      expect(getEnvLogLevel()).toBe(LogLevel.verbose);
    });

    it("ignores an unknown LOG_LEVEL", () => {
      clearEnv();
      process.env.LOG_LEVEL = "loud";
      expect(getEnvLogLevel()).toBeNull();
    });

    it("falls back to DEBUG then VERBOSE", () => {
      clearEnv();
      process.env.VERBOSE = "1";
      expect(getEnvLogLevel()).toBe(LogLevel.verbose);
      process.env.DEBUG = "1";
      expect(getEnvLogLevel()).toBe(LogLevel.debug);
    });

    it("returns null without any variable", () => {
      clearEnv();
      expect(getEnvLogLevel()).toBeNull();
    });
  });

  it("getEnvLogFormat", () => {
    clearEnv();
    expect(getEnvLogFormat()).toBeUndefined();
    process.env.LOG_FORMAT = "json";
    expect(getEnvLogFormat()).toBe("json");
    process.env.LOG_FORMAT = "xml";
    expect(getEnvLogFormat()).toBeUndefined();
  });

  it("getEnvTimestampFormat", () => {
    clearEnv();
    expect(getEnvTimestampFormat()).toBeUndefined();
    process.env.LOG_TIMESTAMP_FORMAT = "hidden";
    expect(getEnvTimestampFormat()).toBe("hidden");
    process.env.LOG_TIMESTAMP_FORMAT = "epoch";
    expect(getEnvTimestampFormat()).toBeUndefined();
  });

  describe("getEnvLogger", () => {
    it("returns an empty logger without level", () => {
      clearEnv();
      const logger = getEnvLogger();
      expect(logger).not.toBeInstanceOf(WinstonLogger);
      expect(() => logger.error("nothing")).not.toThrow();
    });

    it("returns a winston logger configured from env", () => {
      clearEnv();
      process.env.LOG_LEVEL = "debug";
      process.env.LOG_FORMAT = "json";
      process.env.LOG_TIMESTAMP_FORMAT = "hidden";
      const logger = getEnvLogger({module: "list"});
      expect(logger).toBeInstanceOf(WinstonLogger);
      expect(logger instanceof WinstonLogger && logger.options).toEqual({
        module: "list",
        level: LogLevel.debug,
        format: "json",
        timestampFormat: "hidden",
      });
    });

    it("options take precedence over env", () => {
      clearEnv();
      process.env.LOG_LEVEL = "debug";
      const logger = getEnvLogger({level: LogLevel.warn});
      expect(logger instanceof WinstonLogger && logger.options.level).toBe(LogLevel.warn);
    });
  });
});
