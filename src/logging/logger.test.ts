/**
 * Logging Tests
 */

import { describe, it, expect, vi } from "vitest";
import {
  shouldLog,
  isLogLevel,
  createDefaultFormatter,
  ConsoleTransport,
  LoggerImpl,
  MemoryTransport,
  type LogEntry,
} from "./logger.js";

describe("shouldLog", () => {
  it("compares against the minimum level", () => {
    expect(shouldLog("error", "info")).toBe(true);
    expect(shouldLog("debug", "info")).toBe(false);
    expect(shouldLog("info", "info")).toBe(true);
    expect(shouldLog("fatal", "trace")).toBe(true);
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

describe("createDefaultFormatter", () => {
  const entry: LogEntry = {
    timestamp: new Date("2024-01-01T00:00:00.000Z"),
    level: "info",
    subsystem: "converge/executor",
    message: "Operation succeeded",
    scope: "prod",
    address: "network.main",
    metadata: { attempts: 1 },
  };

  it("renders a plain line without colors", () => {
    const format = createDefaultFormatter({ colors: false });
    expect(format(entry)).toBe(
      '2024-01-01T00:00:00.000Z INFO  [converge/executor] Operation succeeded (scope=prod resource=network.main) {"attempts":1}',
    );
  });

  it("omits timestamps and metadata when asked", () => {
    const format = createDefaultFormatter({ colors: false, timestamps: false, includeMetadata: false });
    expect(format(entry)).toBe("INFO  [converge/executor] Operation succeeded (scope=prod resource=network.main)");
  });
});

describe("ConsoleTransport", () => {
  it("writes every level to stderr", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug");
    const log = vi.spyOn(console, "log");
    const transport = new ConsoleTransport({ formatter: (e) => `${e.level}:${e.message}` });
    const at = new Date("2024-01-01T00:00:00.000Z");

    try {
      transport.write({ timestamp: at, level: "info", subsystem: "t", message: "Lock acquired" });
      transport.write({ timestamp: at, level: "debug", subsystem: "t", message: "Change set computed" });

      expect(error.mock.calls).toEqual([["info:Lock acquired"], ["debug:Change set computed"]]);
      expect(debug).not.toHaveBeenCalled();
      expect(log).not.toHaveBeenCalled();
    } finally {
      error.mockRestore();
      debug.mockRestore();
      log.mockRestore();
    }
  });
});

describe("LoggerImpl", () => {
  it("filters below the configured level", () => {
    const memory = new MemoryTransport();
    const logger = new LoggerImpl({ subsystem: "t", level: "warn", transports: [memory] });

    logger.info("ignored");
    logger.warn("kept");

    expect(memory.entries.map((e) => e.message)).toEqual(["kept"]);
  });

  it("builds child subsystems and carries context", () => {
    const memory = new MemoryTransport();
    const logger = new LoggerImpl({ subsystem: "converge", level: "debug", transports: [memory] });

    logger.child("state").withContext({ scope: "staging", runId: "run-1" }).debug("lock acquired");

    expect(memory.entries[0]).toMatchObject({
      subsystem: "converge/state",
      scope: "staging",
      runId: "run-1",
      message: "lock acquired",
    });
  });

  it("redacts configured patterns in messages and nested metadata", () => {
    const memory = new MemoryTransport();
    const logger = new LoggerImpl({
      subsystem: "t",
      transports: [memory],
      redactPatterns: ["secret-[a-z]+"],
    });

    logger.info("token secret-abc used", { nested: { value: "secret-xyz" }, count: 2 });

    expect(memory.entries[0].message).toBe("token [REDACTED] used");
    expect(memory.entries[0].metadata).toEqual({ nested: { value: "[REDACTED]" }, count: 2 });
  });

  it("keeps logging when a transport throws", () => {
    const memory = new MemoryTransport();
    const broken = {
      name: "broken",
      write: () => {
        throw new Error("disk full");
      },
    };
    const logger = new LoggerImpl({ subsystem: "t", transports: [broken, memory] });

    logger.info("still here");

    expect(memory.entries).toHaveLength(1);
  });
});
