import assert from "node:assert/strict";
import test, { mock } from "node:test";

import { formatError, getLogLevel, isLogLevel, log, setLogLevel } from "../logger";

function captureConsole(fn: () => void): string[] {
  const lines: string[] = [];
  const spy = mock.method(console, "log", (line?: unknown) => {
    lines.push(String(line));
  });
  try {
    fn();
  } finally {
    spy.mock.restore();
  }
  return lines;
}

test("log writes one JSON object per line", () => {
  const lines = captureConsole(() => {
    log("warn", "unknown_flag", { epoch: 3, flag: "0x7f" });
  });

  assert.equal(lines.length, 1);
  const entry = JSON.parse(lines[0] ?? "") as Record<string, unknown>;
  assert.equal(entry.level, "warn");
  assert.equal(entry.event, "unknown_flag");
  assert.equal(entry.epoch, 3);
  assert.equal(entry.flag, "0x7f");
  assert.equal(typeof entry.ts, "string");
});

test("log drops entries below the configured level", () => {
  const previous = getLogLevel();
  setLogLevel("warn");
  try {
    const lines = captureConsole(() => {
      log("debug", "unknown_channel");
      log("info", "tunnel_connected");
      log("error", "auth_rejected", { consecutiveRejections: 5 });
    });
    assert.equal(lines.length, 1);
    assert.match(lines[0] ?? "", /"event":"auth_rejected"/);
  } finally {
    setLogLevel(previous);
  }
});

test("isLogLevel accepts only the four levels", () => {
  assert.equal(isLogLevel("debug"), true);
  assert.equal(isLogLevel("error"), true);
  assert.equal(isLogLevel("verbose"), false);
  assert.equal(isLogLevel("toString"), false);
});

test("formatError keeps errno codes and sanitizes messages", () => {
  const refused = Object.assign(new Error("connect ECONNREFUSED\n127.0.0.1:1"), { code: "ECONNREFUSED" });
  assert.deepEqual(formatError(refused), {
    name: "Error",
    message: "connect ECONNREFUSED 127.0.0.1:1",
    code: "ECONNREFUSED"
  });
  assert.deepEqual(formatError(new TypeError("bad")), { name: "TypeError", message: "bad" });
  assert.deepEqual(formatError("boom"), { message: "boom" });
});
