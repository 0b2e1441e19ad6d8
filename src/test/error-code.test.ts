import assert from "node:assert/strict";
import test from "node:test";

import { describeDialError, tryGetErrorCode } from "../errorCode";

test("tryGetErrorCode only returns string codes", () => {
  assert.equal(tryGetErrorCode(Object.assign(new Error("x"), { code: "ECONNRESET" })), "ECONNRESET");
  assert.equal(tryGetErrorCode({ code: 42 }), undefined);
  assert.equal(tryGetErrorCode("ECONNRESET"), undefined);
  assert.equal(tryGetErrorCode(null), undefined);

  const hostile = {
    get code(): string {
      throw new Error("nope");
    }
  };
  assert.equal(tryGetErrorCode(hostile), undefined);
});

test("describeDialError maps errno codes to stable reasons", () => {
  assert.equal(describeDialError({ code: "ECONNREFUSED" }), "connection refused");
  assert.equal(describeDialError({ code: "ETIMEDOUT" }), "connection timed out");
  assert.equal(describeDialError({ code: "ENETUNREACH" }), "host unreachable");
  assert.equal(describeDialError({ code: "EAI_AGAIN" }), "host not found");
  assert.equal(describeDialError(new Error("Connect timeout after 10ms")), "dial failed");
});
