import { formatErrorMessage, formatOneLine } from "./text";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent =
  | "tunnel_start"
  | "tunnel_stop"
  | "tunnel_connecting"
  | "tunnel_connected"
  | "tunnel_close"
  | "tunnel_error"
  | "tunnel_reconnect_scheduled"
  | "auth_rejected"
  | "heartbeat_timeout"
  | "protocol_error"
  | "unknown_flag"
  | "unknown_channel"
  | "channel_open"
  | "channel_connected"
  | "channel_open_failed"
  | "channel_close"
  | "channel_replaced"
  | "channel_overflow"
  | "config_warning";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const MAX_LOG_ERROR_MESSAGE_BYTES = 512;

let minLevel: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export function log(level: LogLevel, event: LogEvent, fields: Record<string, unknown> = {}): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
  const entry = {
    ts: new Date().toISOString(),
    level,
    event,
    ...fields
  };
  // JSONL structured logging.
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(entry));
}

export function formatError(err: unknown): { message: string; name?: string; code?: string } {
  const message = formatErrorMessage(err, MAX_LOG_ERROR_MESSAGE_BYTES);
  if (!(err instanceof Error)) return { message };

  let rawName: unknown = "Error";
  let rawCode: unknown;
  try {
    rawName = err.name;
    // errno-style `code` (ECONNREFUSED, ETIMEDOUT, ...) is the most useful field for dial failures.
    rawCode = "code" in err ? err.code : undefined;
  } catch {
    // getters may throw on exotic errors
  }
  const name = formatOneLine(rawName, 128) || "Error";
  return typeof rawCode === "string" ? { name, message, code: rawCode } : { name, message };
}
