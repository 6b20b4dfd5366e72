import { strict as assert } from "node:assert";
import test, { type TestContext } from "node:test";
import { createLogger } from "../src/index.js";

const captureStdout = (t: TestContext): string[] => {
  const logs: string[] = [];
  const originalWrite = process.stdout.write.bind(process.stdout);
  process.stdout.write = (chunk: string | Uint8Array): boolean => {
    logs.push(chunk.toString());
    return true;
  };
  t.after(() => {
    process.stdout.write = originalWrite;
  });
  return logs;
};

const captureStderr = (t: TestContext): string[] => {
  const logs: string[] = [];
  const originalWrite = process.stderr.write.bind(process.stderr);
  process.stderr.write = (chunk: string | Uint8Array): boolean => {
    logs.push(chunk.toString());
    return true;
  };
  t.after(() => {
    process.stderr.write = originalWrite;
  });
  return logs;
};

const withLogLevelEnv = (t: TestContext, value: string | undefined): void => {
  const original = process.env.LOG_LEVEL;
  if (value === undefined) {
    delete process.env.LOG_LEVEL;
  } else {
    process.env.LOG_LEVEL = value;
  }
  t.after(() => {
    if (original === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = original;
    }
  });
};

test("createLogger returns a logger with the correct module name", () => {
  const logger = createLogger("test-module");
  assert.equal(logger.module, "test-module");
});

test("logger.log writes JSON formatted output to stdout", (t) => {
  const logger = createLogger("test-log", { level: "info" });
  const logs = captureStdout(t);

  logger.log("info", "test message", { runId: "123", extra: "data" });

  assert.equal(logs.length, 1);
  assert.ok(logs[0]?.endsWith("\n"));
  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.equal(parsed.level, "info");
  assert.equal(parsed.module, "test-log");
  assert.equal(parsed.msg, "test message");
  assert.equal(parsed.runId, "123");
  assert.equal(parsed.extra, "data");
  assert.ok(new Date(parsed.ts).getTime() > 0);
});

test("logger.debug writes when the threshold is debug", (t) => {
  const logger = createLogger("debug-test", { level: "debug" });
  const logs = captureStdout(t);

  logger.debug("debug message");

  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.equal(parsed.level, "debug");
  assert.equal(parsed.msg, "debug message");
});

test("messages below the threshold are dropped", (t) => {
  const logger = createLogger("threshold-test", { level: "warn" });
  const logs = captureStdout(t);

  logger.debug("dropped");
  logger.info("dropped too");
  logger.warn("kept");

  assert.equal(logs.length, 1);
  assert.equal(JSON.parse(logs[0] ?? "{}").msg, "kept");
});

test("threshold defaults to info", (t) => {
  withLogLevelEnv(t, undefined);
  const logger = createLogger("default-level");
  const logs = captureStdout(t);

  logger.debug("hidden");
  logger.info("shown");

  assert.equal(logger.level, "info");
  assert.equal(logs.length, 1);
});

test("LOG_LEVEL sets the threshold when no option is given", (t) => {
  withLogLevelEnv(t, "DEBUG");
  assert.equal(createLogger("env-level").level, "debug");
  assert.equal(createLogger("explicit-level", { level: "error" }).level, "error");
});

test("unknown LOG_LEVEL values fall back to info", (t) => {
  withLogLevelEnv(t, "verbose");
  assert.equal(createLogger("bad-env-level").level, "info");
});

test("logger.warn calls log with warn level", (t) => {
  const logger = createLogger("warn-test", { level: "info" });
  const logs = captureStdout(t);

  logger.warn("warning message");

  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.equal(parsed.level, "warn");
  assert.equal(parsed.msg, "warning message");
});

test("logger.error writes to stderr and uses error level", (t) => {
  const logger = createLogger("error-test");
  const logs = captureStderr(t);

  logger.error("error message", { parameters: { period: 5 } });

  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.equal(parsed.level, "error");
  assert.equal(parsed.msg, "error message");
  assert.deepEqual(parsed.parameters, { period: 5 });
});

test("logger handles empty metadata", (t) => {
  const logger = createLogger("empty-meta-test", { level: "info" });
  const logs = captureStdout(t);

  logger.info("message without meta");

  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.deepEqual(Object.keys(parsed), ["ts", "level", "module", "msg"]);
});

test("logger timestamp is in ISO format", (t) => {
  const logger = createLogger("timestamp-test", { level: "info" });
  const logs = captureStdout(t);

  const before = new Date().toISOString();
  logger.info("timestamp check");
  const after = new Date().toISOString();

  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.ok(parsed.ts >= before);
  assert.ok(parsed.ts <= after);
});

test("multiple loggers with different modules don't interfere", (t) => {
  const logger1 = createLogger("module-1", { level: "info" });
  const logger2 = createLogger("module-2", { level: "info" });
  const logs = captureStdout(t);

  logger1.info("first");
  logger2.info("second");

  assert.equal(logs.length, 2);
  const first = JSON.parse(logs[0] ?? "{}");
  const second = JSON.parse(logs[1] ?? "{}");
  assert.equal(first.module, "module-1");
  assert.equal(second.module, "module-2");
});
