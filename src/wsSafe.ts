import type { WebSocket } from "ws";

import { formatOneLine } from "./text";

// RFC 6455 limits close reasons to 123 bytes of UTF-8.
const MAX_CLOSE_REASON_BYTES = 123;

const WS_OPEN = 1;

function readyStateOf(ws: WebSocket): number | undefined {
  try {
    const state: unknown = ws.readyState;
    return typeof state === "number" ? state : undefined;
  } catch {
    return undefined;
  }
}

export function wsIsOpenSafe(ws: WebSocket | null | undefined): boolean {
  if (!ws) return false;
  return readyStateOf(ws) === WS_OPEN;
}

export function wsBufferedAmountSafe(ws: WebSocket): number {
  try {
    const value: unknown = ws.bufferedAmount;
    return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : 0;
  } catch {
    return 0;
  }
}

/**
 * Send without throwing. Returns false when the socket is not open or `send`
 * threw synchronously; asynchronous failures are reported through `cb`.
 */
export function wsSendSafe(ws: WebSocket, data: Buffer | string, cb?: (err?: Error) => void): boolean {
  if (!wsIsOpenSafe(ws)) return false;
  try {
    if (cb) {
      ws.send(data, (err) => cb(err ?? undefined));
    } else {
      ws.send(data);
    }
    return true;
  } catch {
    wsTerminateSafe(ws);
    return false;
  }
}

export function wsTerminateSafe(ws: WebSocket): void {
  try {
    ws.terminate();
  } catch {
    // already gone
  }
}

export function wsCloseSafe(ws: WebSocket, code?: number, reason?: unknown): void {
  try {
    if (typeof code !== "number") {
      ws.close();
      return;
    }
    const safeReason = reason === undefined ? "" : formatOneLine(reason, MAX_CLOSE_REASON_BYTES);
    if (safeReason) {
      ws.close(code, safeReason);
    } else {
      ws.close(code);
    }
  } catch {
    wsTerminateSafe(ws);
  }
}
