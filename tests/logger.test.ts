/**
 * Tests for logger module.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  configureLogger,
  debug,
  error as logError,
  getLoggerState,
  info,
  resetLogger,
  warn,
} from "../src/core/logger.js";

describe("Logger", () => {
  let capturedOutput: string[] = [];

  beforeEach(() => {
    resetLogger();
    capturedOutput = [];
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      capturedOutput.push(args.join(" "));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("configureLogger", () => {
    it("should set quiet flag", () => {
      configureLogger({ quiet: true });
      expect(getLoggerState()).toEqual({ quiet: true, debug: false });
    });

    it("should set debug flag", () => {
      configureLogger({ debug: true });
      expect(getLoggerState()).toEqual({ quiet: false, debug: true });
    });

    it("should prioritize quiet over debug", () => {
      configureLogger({ quiet: true, debug: true });
      expect(getLoggerState()).toEqual({ quiet: true, debug: false });
    });

    it("should route lines to a custom sink", () => {
      const lines: string[] = [];
      configureLogger({ sink: (level, message) => lines.push(`${level}:${message}`) });

      info("hello");
      warn("careful");

      expect(lines).toEqual(["info:hello", "warn:WARN: careful"]);
      expect(capturedOutput).toEqual([]);
    });
  });

  describe("warn", () => {
    it("should output warning by default", () => {
      warn("test warning");
      expect(capturedOutput).toEqual(["WARN: test warning"]);
    });

    it("should suppress warning with --quiet", () => {
      configureLogger({ quiet: true });
      warn("test warning");
      expect(capturedOutput).toEqual([]);
    });
  });

  describe("info", () => {
    it("should output info by default", () => {
      info("test info");
      expect(capturedOutput).toEqual(["test info"]);
    });

    it("should suppress info with --quiet", () => {
      configureLogger({ quiet: true });
      info("test info");
      expect(capturedOutput).toEqual([]);
    });
  });

  describe("debug", () => {
    it("should not output debug by default", () => {
      debug("test debug");
      expect(capturedOutput).toEqual([]);
    });

    it("should output debug with --debug", () => {
      configureLogger({ debug: true });
      debug("test debug");
      expect(capturedOutput).toEqual(["[DEBUG] test debug"]);
    });
  });

  describe("error", () => {
    it("should output error even with --quiet", () => {
      configureLogger({ quiet: true });
      logError("test error");
      expect(capturedOutput).toEqual(["test error"]);
    });
  });

  describe("resetLogger", () => {
    it("should reset to default state", () => {
      configureLogger({ quiet: true, debug: true });
      resetLogger();
      expect(getLoggerState()).toEqual({ quiet: false, debug: false });
    });
  });
});
