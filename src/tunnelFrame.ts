export const TUNNEL_FRAME_HEADER_BYTES = 22;
export const CHANNEL_ID_BYTES = 16;

// Bounds what a peer can make us allocate for a single frame.
export const DEFAULT_MAX_FRAME_PAYLOAD_BYTES = 1024 * 1024;

// Connection-level control frames (PING/PONG) use the all-zero channel id.
export const CONTROL_CHANNEL_ID: Buffer = Buffer.alloc(CHANNEL_ID_BYTES);

// Numeric values are fixed by the relay; do not renumber.
export enum TunnelFrameFlag {
  NEW = 0x01,
  DATA = 0x02,
  CLOSE = 0x04,
  PING = 0x08,
  PONG = 0x09,
  PAUSE = 0x16,
  RESUME = 0x32
}

const FLAG_NAMES: ReadonlyMap<number, string> = new Map([
  [TunnelFrameFlag.NEW, "NEW"],
  [TunnelFrameFlag.DATA, "DATA"],
  [TunnelFrameFlag.CLOSE, "CLOSE"],
  [TunnelFrameFlag.PING, "PING"],
  [TunnelFrameFlag.PONG, "PONG"],
  [TunnelFrameFlag.PAUSE, "PAUSE"],
  [TunnelFrameFlag.RESUME, "RESUME"]
]);

export function isTunnelFrameFlag(value: number): value is TunnelFrameFlag {
  return FLAG_NAMES.has(value);
}

export function tunnelFrameFlagName(value: number): string {
  return FLAG_NAMES.get(value) ?? `0x${value.toString(16).padStart(2, "0")}`;
}

export function channelIdToHex(channelId: Buffer): string {
  return channelId.toString("hex");
}

export type TunnelFrame = {
  channelId: Buffer;
  flag: TunnelFrameFlag;
  payload: Buffer;
};

export type DecodedTunnelFrame = {
  frame: TunnelFrame;
  remainder: Buffer;
};

export type MalformedFrameReason = "short_header" | "truncated_payload" | "oversized_payload" | "unknown_flag";

/**
 * Raised by {@link decodeTunnelFrame}. Only `short_header` and `truncated_payload`
 * leave the byte stream unrecoverable; for the other reasons the header was read
 * in full, so `channelId` is known and `skipBytes` says how much of the input the
 * rejected frame occupies (clamped to what is actually there).
 */
export class MalformedFrameError extends Error {
  readonly reason: MalformedFrameReason;
  readonly channelId: Buffer | null;
  readonly flag: number | null;
  readonly declaredSize: number | null;
  readonly skipBytes: number;

  constructor(
    reason: MalformedFrameReason,
    message: string,
    details: { channelId?: Buffer; flag?: number; declaredSize?: number; skipBytes?: number } = {}
  ) {
    super(message);
    this.name = "MalformedFrameError";
    this.reason = reason;
    this.channelId = details.channelId ?? null;
    this.flag = details.flag ?? null;
    this.declaredSize = details.declaredSize ?? null;
    this.skipBytes = details.skipBytes ?? 0;
  }
}

export function encodeTunnelFrame(
  channelId: Buffer,
  flag: TunnelFrameFlag,
  payload?: Buffer,
  maxPayloadBytes = DEFAULT_MAX_FRAME_PAYLOAD_BYTES
): Buffer {
  if (channelId.length !== CHANNEL_ID_BYTES) {
    throw new Error(`channel id must be ${CHANNEL_ID_BYTES} bytes (got ${channelId.length})`);
  }
  const payloadBuf = payload ?? Buffer.alloc(0);
  if (payloadBuf.length > maxPayloadBytes) {
    throw new Error(`Frame payload length ${payloadBuf.length} exceeds max ${maxPayloadBytes}`);
  }

  const buf = Buffer.allocUnsafe(TUNNEL_FRAME_HEADER_BYTES + payloadBuf.length);
  channelId.copy(buf, 0);
  buf.writeUInt8(flag, 16);
  buf.writeUInt32BE(payloadBuf.length, 17);
  // Reserved `extra` byte.
  buf.writeUInt8(0, 21);
  payloadBuf.copy(buf, TUNNEL_FRAME_HEADER_BYTES);
  return buf;
}

/**
 * Decode the first frame in `buf`. The returned payload and remainder are views
 * into `buf`, not copies.
 */
export function decodeTunnelFrame(buf: Buffer, maxPayloadBytes = DEFAULT_MAX_FRAME_PAYLOAD_BYTES): DecodedTunnelFrame {
  if (buf.length < TUNNEL_FRAME_HEADER_BYTES) {
    throw new MalformedFrameError(
      "short_header",
      `Frame header needs ${TUNNEL_FRAME_HEADER_BYTES} bytes (got ${buf.length})`
    );
  }

  // Copy the id so it does not pin the (possibly large) message buffer.
  const channelId = Buffer.from(buf.subarray(0, CHANNEL_ID_BYTES));
  const flag = buf.readUInt8(16);
  const size = buf.readUInt32BE(17);
  // buf[21] (`extra`) is reserved and ignored.

  const available = buf.length - TUNNEL_FRAME_HEADER_BYTES;
  const frameBytes = TUNNEL_FRAME_HEADER_BYTES + size;

  if (size > maxPayloadBytes) {
    throw new MalformedFrameError("oversized_payload", `Frame payload length ${size} exceeds max ${maxPayloadBytes}`, {
      channelId,
      flag,
      declaredSize: size,
      skipBytes: Math.min(buf.length, frameBytes)
    });
  }
  if (size > available) {
    throw new MalformedFrameError("truncated_payload", `Frame declares ${size} payload bytes but only ${available} remain`, {
      channelId,
      flag,
      declaredSize: size
    });
  }
  if (!isTunnelFrameFlag(flag)) {
    throw new MalformedFrameError("unknown_flag", `Unknown frame flag ${tunnelFrameFlagName(flag)}`, {
      channelId,
      flag,
      declaredSize: size,
      skipBytes: frameBytes
    });
  }

  return {
    frame: { channelId, flag, payload: buf.subarray(TUNNEL_FRAME_HEADER_BYTES, frameBytes) },
    remainder: buf.subarray(frameBytes)
  };
}
