import ipaddr from "ipaddr.js";

import { isLogLevel, type LogLevel } from "./logger";
import { formatErrorMessage } from "./text";
import { DEFAULT_MAX_FRAME_PAYLOAD_BYTES } from "./tunnelFrame";

export interface TunnelConfig {
  relayUrl: string;
  token: string;
  localHost: string;
  localPort: number;
  maxFramePayloadBytes: number;
  readChunkBytes: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  heartbeatIntervalMs: number;
  handshakeTimeoutMs: number;
  connectTimeoutMs: number;
  maxChannelBufferedBytes: number;
  wsMaxPayloadBytes: number;
  wsBufferedAmountLimitBytes: number;
  authFailureThreshold: number;
  logLevel: LogLevel;
}

export const DEFAULT_LOCAL_HOST = "127.0.0.1";
export const DEFAULT_LOCAL_PORT = 8123;
export const DEFAULT_READ_CHUNK_BYTES = 4096;

export const DEFAULT_TUNNEL_CONFIG: Omit<TunnelConfig, "relayUrl" | "token"> = {
  localHost: DEFAULT_LOCAL_HOST,
  localPort: DEFAULT_LOCAL_PORT,
  maxFramePayloadBytes: DEFAULT_MAX_FRAME_PAYLOAD_BYTES,
  readChunkBytes: DEFAULT_READ_CHUNK_BYTES,
  reconnectBaseMs: 1_000,
  reconnectMaxMs: 60_000,
  heartbeatIntervalMs: 30_000,
  handshakeTimeoutMs: 10_000,
  connectTimeoutMs: 10_000,
  maxChannelBufferedBytes: 1024 * 1024,
  wsMaxPayloadBytes: 4 * 1024 * 1024,
  wsBufferedAmountLimitBytes: 1024 * 1024,
  authFailureThreshold: 5,
  logLevel: "info"
};

type Env = Record<string, string | undefined>;

const MAX_ENV_INT_LEN = 64;
const MAX_ENV_STRING_LEN = 8 * 1024;

function readEnvInt(env: Env, name: string, fallback: number, opts?: { min?: number; max?: number }): number {
  const raw = env[name];
  if (raw === undefined) return fallback;
  const trimmed = raw.trim();
  if (trimmed === "") return fallback;
  if (trimmed.length > MAX_ENV_INT_LEN) {
    throw new Error(`Invalid ${name} (value too long)`);
  }
  if (!/^\+?\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${name}`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`Invalid ${name}`);
  }

  const min = opts?.min ?? 0;
  const max = opts?.max ?? Number.MAX_SAFE_INTEGER;
  if (parsed < min || parsed > max) {
    throw new Error(`Invalid ${name} (expected ${min}..${max})`);
  }
  return parsed;
}

function readEnvString(env: Env, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (trimmed === "") return undefined;
  if (trimmed.length > MAX_ENV_STRING_LEN) {
    throw new Error(`Invalid ${name} (value too long)`);
  }
  return trimmed;
}

/**
 * `https://api.example.net` -> `wss://tun.example.net/ws/tunnel`. Hosts with more
 * than two labels lose their first label; shorter hosts are used as-is.
 */
export function deriveRelayUrl(apiEndpoint: string): string {
  let hostname: string;
  try {
    hostname = new URL(apiEndpoint).hostname;
  } catch (err) {
    throw new Error(`Invalid TUNNEL_API_ENDPOINT: ${formatErrorMessage(err, 256, "invalid URL")}`);
  }
  if (!hostname) {
    throw new Error("Invalid TUNNEL_API_ENDPOINT: missing host");
  }
  const labels = hostname.split(".");
  const domain = labels.length > 2 ? labels.slice(1).join(".") : hostname;
  return `wss://tun.${domain}/ws/tunnel`;
}

export function isLoopbackHost(host: string): boolean {
  const trimmed = host.trim().toLowerCase();
  if (trimmed === "localhost" || trimmed.endsWith(".localhost")) return true;
  const literal = trimmed.startsWith("[") && trimmed.endsWith("]") ? trimmed.slice(1, -1) : trimmed;
  if (!ipaddr.isValid(literal)) return false;
  // `process` unwraps IPv4-mapped IPv6 (::ffff:127.0.0.1) before classifying.
  return ipaddr.process(literal).range() === "loopback";
}

export function validateTunnelConfig(config: TunnelConfig): void {
  let url: URL;
  try {
    url = new URL(config.relayUrl);
  } catch {
    throw new Error("Invalid relayUrl (not a URL)");
  }
  if (url.protocol !== "ws:" && url.protocol !== "wss:") {
    throw new Error(`Invalid relayUrl (expected ws: or wss:, got ${url.protocol})`);
  }
  if (config.token === "") {
    throw new Error("Missing tunnel token");
  }
  if (config.localHost.trim() === "") {
    throw new Error("Invalid localHost");
  }
  if (!Number.isInteger(config.localPort) || config.localPort < 1 || config.localPort > 65535) {
    throw new Error(`Invalid localPort: ${config.localPort}`);
  }
  if (!Number.isInteger(config.maxFramePayloadBytes) || config.maxFramePayloadBytes < 1) {
    throw new Error(`Invalid maxFramePayloadBytes: ${config.maxFramePayloadBytes}`);
  }
  if (
    !Number.isInteger(config.readChunkBytes) ||
    config.readChunkBytes < 1 ||
    config.readChunkBytes > config.maxFramePayloadBytes
  ) {
    throw new Error(`Invalid readChunkBytes: ${config.readChunkBytes} (must be 1..maxFramePayloadBytes)`);
  }
  if (config.reconnectBaseMs <= 0 || config.reconnectMaxMs < config.reconnectBaseMs) {
    throw new Error("Invalid reconnect delays (need 0 < base <= max)");
  }
  if (config.authFailureThreshold < 1) {
    throw new Error(`Invalid authFailureThreshold: ${config.authFailureThreshold}`);
  }
}

export function loadConfigFromEnv(env: Env = process.env): TunnelConfig {
  const explicitUrl = readEnvString(env, "TUNNEL_URL");
  const apiEndpoint = readEnvString(env, "TUNNEL_API_ENDPOINT");
  let relayUrl: string;
  if (explicitUrl !== undefined) {
    relayUrl = explicitUrl;
  } else if (apiEndpoint !== undefined) {
    relayUrl = deriveRelayUrl(apiEndpoint);
  } else {
    throw new Error("Missing TUNNEL_URL (or TUNNEL_API_ENDPOINT)");
  }

  const token = readEnvString(env, "TUNNEL_TOKEN");
  if (token === undefined) {
    throw new Error("Missing TUNNEL_TOKEN");
  }

  const logLevelRaw = (readEnvString(env, "TUNNEL_LOG_LEVEL") ?? DEFAULT_TUNNEL_CONFIG.logLevel).toLowerCase();
  if (!isLogLevel(logLevelRaw)) {
    throw new Error(`Invalid TUNNEL_LOG_LEVEL=${logLevelRaw} (expected debug, info, warn or error)`);
  }

  const d = DEFAULT_TUNNEL_CONFIG;
  const config: TunnelConfig = {
    relayUrl,
    token,
    localHost: readEnvString(env, "TUNNEL_LOCAL_HOST") ?? d.localHost,
    localPort: readEnvInt(env, "TUNNEL_LOCAL_PORT", d.localPort, { min: 1, max: 65535 }),
    maxFramePayloadBytes: readEnvInt(env, "TUNNEL_MAX_FRAME_PAYLOAD_BYTES", d.maxFramePayloadBytes, {
      min: 1,
      max: 0xffffffff
    }),
    readChunkBytes: readEnvInt(env, "TUNNEL_READ_CHUNK_BYTES", d.readChunkBytes, { min: 1 }),
    reconnectBaseMs: readEnvInt(env, "TUNNEL_RECONNECT_BASE_MS", d.reconnectBaseMs, { min: 1 }),
    reconnectMaxMs: readEnvInt(env, "TUNNEL_RECONNECT_MAX_MS", d.reconnectMaxMs, { min: 1 }),
    heartbeatIntervalMs: readEnvInt(env, "TUNNEL_HEARTBEAT_MS", d.heartbeatIntervalMs),
    handshakeTimeoutMs: readEnvInt(env, "TUNNEL_HANDSHAKE_TIMEOUT_MS", d.handshakeTimeoutMs, { min: 1 }),
    connectTimeoutMs: readEnvInt(env, "TUNNEL_CONNECT_TIMEOUT_MS", d.connectTimeoutMs, { min: 1 }),
    maxChannelBufferedBytes: readEnvInt(env, "TUNNEL_MAX_CHANNEL_BUFFERED_BYTES", d.maxChannelBufferedBytes, { min: 1 }),
    wsMaxPayloadBytes: readEnvInt(env, "TUNNEL_WS_MAX_PAYLOAD_BYTES", d.wsMaxPayloadBytes, { min: 1 }),
    wsBufferedAmountLimitBytes: readEnvInt(env, "TUNNEL_WS_BUFFERED_AMOUNT_LIMIT_BYTES", d.wsBufferedAmountLimitBytes, {
      min: 1
    }),
    authFailureThreshold: readEnvInt(env, "TUNNEL_AUTH_FAILURE_THRESHOLD", d.authFailureThreshold, { min: 1 }),
    logLevel: logLevelRaw
  };

  validateTunnelConfig(config);
  return config;
}
