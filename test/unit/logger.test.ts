import assert from "node:assert/strict";
import test from "node:test";

import { createConsoleLogger, type LogLevel } from "../../src/infrastructure/logging/logger.js";

function captureLogger(level?: LogLevel) {
  const lines: Array<{ line: string; level: LogLevel }> = [];
  const logger = createConsoleLogger({
    name: "test-logger",
    ...(level !== undefined ? { level } : {}),
    now: () => new Date("2026-03-01T10:00:00.000Z"),
    write: (line, entryLevel) => {
      lines.push({ line, level: entryLevel });
    }
  });
  return { logger, lines };
}

test("writes one JSON line per entry with context merged in", () => {
  const { logger, lines } = captureLogger();

  logger.info("risk analysis batch completed", { analyzed: 3, failed: 0 });

  assert.equal(lines.length, 1);
  assert.equal(
    lines[0]?.line,
    '{"timestamp":"2026-03-01T10:00:00.000Z","level":"info","logger":"test-logger","message":"risk analysis batch completed","analyzed":3,"failed":0}'
  );
  assert.equal(lines[0]?.level, "info");
});

test("context keys cannot replace the fixed fields", () => {
  const { logger, lines } = captureLogger();

  logger.warn("publish failed", { message: "other", level: "debug", timestamp: "never", stream: "risk-alerts" });

  assert.equal(
    lines[0]?.line,
    '{"timestamp":"2026-03-01T10:00:00.000Z","level":"warn","logger":"test-logger","message":"publish failed","stream":"risk-alerts"}'
  );
  assert.equal(lines[0]?.level, "warn");
});

test("drops entries below the configured level", () => {
  const { logger, lines } = captureLogger("warn");

  logger.debug("debug entry");
  logger.info("info entry");
  logger.warn("warn entry");
  logger.error("error entry");

  assert.deepEqual(
    lines.map((entry) => entry.level),
    ["warn", "error"]
  );
});

test("debug level keeps everything", () => {
  const { logger, lines } = captureLogger("debug");

  logger.debug("one");
  logger.info("two");

  assert.equal(lines.length, 2);
  assert.match(lines[0]?.line ?? "", /"level":"debug","logger":"test-logger","message":"one"/);
});
