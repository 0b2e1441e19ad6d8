import assert from "node:assert/strict";
import test from "node:test";

import {
  CONTROL_CHANNEL_ID,
  MalformedFrameError,
  TUNNEL_FRAME_HEADER_BYTES,
  TunnelFrameFlag,
  decodeTunnelFrame,
  encodeTunnelFrame,
  isTunnelFrameFlag,
  tunnelFrameFlagName,
  type MalformedFrameReason
} from "../tunnelFrame";

const ID = Buffer.from("000102030405060708090a0b0c0d0e0f", "hex");

function expectMalformed(reason: MalformedFrameReason) {
  return (err: unknown) => err instanceof MalformedFrameError && err.reason === reason;
}

test("frame flags keep their wire values", () => {
  assert.equal(TunnelFrameFlag.NEW, 0x01);
  assert.equal(TunnelFrameFlag.DATA, 0x02);
  assert.equal(TunnelFrameFlag.CLOSE, 0x04);
  assert.equal(TunnelFrameFlag.PING, 0x08);
  assert.equal(TunnelFrameFlag.PONG, 0x09);
  assert.equal(TunnelFrameFlag.PAUSE, 0x16);
  assert.equal(TunnelFrameFlag.RESUME, 0x32);

  assert.equal(isTunnelFrameFlag(0x03), false);
  assert.equal(tunnelFrameFlagName(0x16), "PAUSE");
  assert.equal(tunnelFrameFlagName(0x7f), "0x7f");
  assert.equal(tunnelFrameFlagName(5), "0x05");
  assert.deepEqual(CONTROL_CHANNEL_ID, Buffer.alloc(16));
});

test("encodeTunnelFrame lays out id, flag, big-endian size and reserved byte", () => {
  const buf = encodeTunnelFrame(ID, TunnelFrameFlag.DATA, Buffer.from("hi"));

  assert.equal(buf.length, TUNNEL_FRAME_HEADER_BYTES + 2);
  assert.deepEqual(buf.subarray(0, 16), ID);
  assert.equal(buf[16], 0x02);
  assert.equal(buf.readUInt32BE(17), 2);
  assert.equal(buf[21], 0);
  assert.equal(buf.subarray(22).toString(), "hi");
});

test("encodeTunnelFrame defaults to an empty payload", () => {
  const buf = encodeTunnelFrame(ID, TunnelFrameFlag.CLOSE);
  assert.equal(buf.length, TUNNEL_FRAME_HEADER_BYTES);
  assert.equal(buf.readUInt32BE(17), 0);
});

test("encodeTunnelFrame rejects bad ids and oversized payloads", () => {
  assert.throws(() => encodeTunnelFrame(Buffer.alloc(15), TunnelFrameFlag.DATA), /channel id must be 16 bytes \(got 15\)/);
  assert.throws(
    () => encodeTunnelFrame(ID, TunnelFrameFlag.DATA, Buffer.alloc(9), 8),
    /Frame payload length 9 exceeds max 8/
  );
});

test("decodeTunnelFrame inverts encodeTunnelFrame for every flag", () => {
  const flags = [
    TunnelFrameFlag.NEW,
    TunnelFrameFlag.DATA,
    TunnelFrameFlag.CLOSE,
    TunnelFrameFlag.PING,
    TunnelFrameFlag.PONG,
    TunnelFrameFlag.PAUSE,
    TunnelFrameFlag.RESUME
  ];
  for (const flag of flags) {
    const payload = Buffer.from(`payload-${flag}`);
    const { frame, remainder } = decodeTunnelFrame(encodeTunnelFrame(ID, flag, payload));
    assert.deepEqual(frame.channelId, ID);
    assert.equal(frame.flag, flag);
    assert.deepEqual(frame.payload, payload);
    assert.equal(remainder.length, 0);
  }
});

test("decodeTunnelFrame ignores the reserved byte", () => {
  const buf = encodeTunnelFrame(ID, TunnelFrameFlag.DATA, Buffer.from("x"));
  buf[21] = 0xff;
  const { frame } = decodeTunnelFrame(buf);
  assert.equal(frame.payload.toString(), "x");
});

test("decodeTunnelFrame returns the bytes after the first frame", () => {
  const first = encodeTunnelFrame(ID, TunnelFrameFlag.DATA, Buffer.from("ab"));
  const second = encodeTunnelFrame(ID, TunnelFrameFlag.CLOSE);

  const a = decodeTunnelFrame(Buffer.concat([first, second]));
  assert.equal(a.frame.payload.toString(), "ab");
  assert.deepEqual(a.remainder, second);

  const b = decodeTunnelFrame(a.remainder);
  assert.equal(b.frame.flag, TunnelFrameFlag.CLOSE);
  assert.equal(b.remainder.length, 0);
});

test("decodeTunnelFrame rejects buffers shorter than a header", () => {
  for (let len = 0; len < TUNNEL_FRAME_HEADER_BYTES; len += 1) {
    assert.throws(() => decodeTunnelFrame(Buffer.alloc(len)), expectMalformed("short_header"), `len=${len}`);
  }
});

test("decodeTunnelFrame rejects a payload shorter than declared", () => {
  const header = encodeTunnelFrame(ID, TunnelFrameFlag.DATA, Buffer.alloc(10)).subarray(0, TUNNEL_FRAME_HEADER_BYTES + 4);
  assert.throws(
    () => decodeTunnelFrame(header),
    (err: unknown) =>
      err instanceof MalformedFrameError &&
      err.reason === "truncated_payload" &&
      err.declaredSize === 10 &&
      err.message === "Frame declares 10 payload bytes but only 4 remain"
  );
});

test("decodeTunnelFrame rejects an oversized payload and reports how much to skip", () => {
  const full = encodeTunnelFrame(ID, TunnelFrameFlag.DATA, Buffer.alloc(9));
  assert.throws(
    () => decodeTunnelFrame(full, 8),
    (err: unknown) =>
      err instanceof MalformedFrameError &&
      err.reason === "oversized_payload" &&
      err.channelId !== null &&
      err.channelId.equals(ID) &&
      err.skipBytes === 31
  );

  // Only part of the oversized payload is present: skip what is there.
  const partial = encodeTunnelFrame(ID, TunnelFrameFlag.DATA, Buffer.alloc(100)).subarray(0, 27);
  assert.throws(
    () => decodeTunnelFrame(partial, 8),
    (err: unknown) => err instanceof MalformedFrameError && err.reason === "oversized_payload" && err.skipBytes === 27
  );
});

test("decodeTunnelFrame reports unknown flags with the frame length", () => {
  const buf = encodeTunnelFrame(ID, TunnelFrameFlag.DATA, Buffer.from("abc"));
  buf[16] = 0x7f;
  assert.throws(
    () => decodeTunnelFrame(buf),
    (err: unknown) =>
      err instanceof MalformedFrameError &&
      err.reason === "unknown_flag" &&
      err.flag === 0x7f &&
      err.skipBytes === 25 &&
      err.message === "Unknown frame flag 0x7f"
  );
});
