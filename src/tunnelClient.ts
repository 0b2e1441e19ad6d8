import { WebSocket, type ClientOptions, type RawData } from "ws";

import { ReconnectBackoff } from "./backoff";
import { Channel, type ChannelSink, type CreateTcpConnection } from "./channel";
import { ChannelRegistry } from "./channelRegistry";
import { DEFAULT_TUNNEL_CONFIG, validateTunnelConfig, type TunnelConfig } from "./config";
import { formatError, log } from "./logger";
import { createTunnelMetrics, type TunnelMetrics } from "./metrics";
import { formatOneLine } from "./text";
import {
  CONTROL_CHANNEL_ID,
  MalformedFrameError,
  TunnelFrameFlag,
  channelIdToHex,
  decodeTunnelFrame,
  encodeTunnelFrame,
  tunnelFrameFlagName,
  type TunnelFrame
} from "./tunnelFrame";
import {
  wsBufferedAmountSafe,
  wsCloseSafe,
  wsIsOpenSafe,
  wsSendSafe,
  wsTerminateSafe
} from "./wsSafe";

export type TunnelClientState = "disconnected" | "connecting" | "authenticating" | "active";

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;
export type CreateWebSocket = (url: string, options: ClientOptions) => WebSocket;

export interface TunnelClientHooks {
  createTcpConnection?: CreateTcpConnection;
  createWebSocket?: CreateWebSocket;
  /** Backoff sleep; must resolve (not reject) when `signal` aborts. */
  sleep?: SleepFn;
  onStateChange?: (state: TunnelClientState) => void;
  /** Called once the relay has rejected `authFailureThreshold` (or more) connections in a row. */
  onAuthRejected?: (consecutiveRejections: number) => void;
}

export type TunnelClientOptions = Pick<TunnelConfig, "relayUrl" | "token"> & Partial<TunnelConfig>;

export interface RunningTunnelClient {
  config: TunnelConfig;
  metrics: TunnelMetrics;
  state: () => TunnelClientState;
  isStopping: () => boolean;
  channelCount: () => number;
  channels: () => Channel[];
  backoffDelayMs: () => number;
  /** Settles when the reconnect loop has exited after {@link RunningTunnelClient.stop}. */
  done: Promise<void>;
  stop: () => Promise<void>;
}

// Close codes (and upgrade statuses) a relay uses to turn away a credential.
const AUTH_REJECT_CLOSE_CODES: ReadonlySet<number> = new Set([1008, 4001, 4003]);
const AUTH_REJECT_HTTP_STATUSES: ReadonlySet<number> = new Set([401, 403]);

const WS_CLOSE_GRACE_MS = 1_000;

type EpochOutcome = {
  framesIn: number;
  closeCode: number | null;
  upgradeStatus: number | null;
  error: unknown;
};

type Teardown = (why: string, wsCode: number, wsReason: string) => void;

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// Never log query strings: relays sometimes accept credentials there too.
function redactUrl(raw: string): string {
  try {
    const url = new URL(raw);
    return `${url.protocol}//${url.host}${url.pathname}`;
  } catch {
    return "(invalid url)";
  }
}

function isAuthRejection(outcome: EpochOutcome): boolean {
  if (outcome.framesIn > 0) return false;
  if (outcome.closeCode !== null && AUTH_REJECT_CLOSE_CODES.has(outcome.closeCode)) return true;
  return outcome.upgradeStatus !== null && AUTH_REJECT_HTTP_STATUSES.has(outcome.upgradeStatus);
}

export function startTunnelClient(options: TunnelClientOptions, hooks: TunnelClientHooks = {}): RunningTunnelClient {
  const config: TunnelConfig = { ...DEFAULT_TUNNEL_CONFIG, ...options };
  validateTunnelConfig(config);

  const metrics = createTunnelMetrics();
  const backoff = new ReconnectBackoff(config.reconnectBaseMs, config.reconnectMaxMs);
  const sleep = hooks.sleep ?? abortableSleep;
  const createWebSocket: CreateWebSocket = hooks.createWebSocket ?? ((url, wsOptions) => new WebSocket(url, wsOptions));
  const stopController = new AbortController();
  const relayUrlForLog = redactUrl(config.relayUrl);

  let state: TunnelClientState = "disconnected";
  let stopping = false;
  let epochCounter = 0;
  let consecutiveAuthRejections = 0;
  let currentRegistry: ChannelRegistry<Channel> | null = null;
  let currentTeardown: Teardown | null = null;

  const setState = (next: TunnelClientState) => {
    if (state === next) return;
    state = next;
    hooks.onStateChange?.(next);
  };

  const runEpoch = (epoch: number): Promise<EpochOutcome> =>
    new Promise<EpochOutcome>((resolve) => {
      const outcome: EpochOutcome = { framesIn: 0, closeCode: null, upgradeStatus: null, error: null };
      const registry = new ChannelRegistry<Channel>();
      let closed = false;
      let transportPaused = false;
      let heartbeatTimer: NodeJS.Timeout | null = null;
      let awaitingPong = false;
      let bytesIn = 0;
      let bytesOut = 0;

      metrics.incConnectAttempt();
      setState("connecting");
      log("info", "tunnel_connecting", { epoch, relayUrl: relayUrlForLog });

      let ws: WebSocket;
      try {
        ws = createWebSocket(config.relayUrl, {
          handshakeTimeout: config.handshakeTimeoutMs,
          maxPayload: config.wsMaxPayloadBytes,
          perMessageDeflate: false
        });
      } catch (err) {
        outcome.error = err;
        log("warn", "tunnel_error", { epoch, why: "ws_create_error", err: formatError(err) });
        resolve(outcome);
        return;
      }

      const syncChannelGauge = () => metrics.setChannelsActive(registry.size);

      const stopHeartbeat = () => {
        if (heartbeatTimer) {
          clearInterval(heartbeatTimer);
          heartbeatTimer = null;
        }
      };

      const teardown: Teardown = (why, wsCode, wsReason) => {
        if (closed) return;
        closed = true;
        stopHeartbeat();

        // Every channel is scoped to this connection; the relay re-issues NEW after reconnecting.
        for (const channel of registry.drain()) {
          channel.destroy();
        }
        syncChannelGauge();

        if (wsIsOpenSafe(ws)) {
          wsCloseSafe(ws, wsCode, wsReason);
          // Bound the close handshake; `ws` would otherwise wait 30s for the relay's close frame.
          const forceClose = setTimeout(() => wsTerminateSafe(ws), WS_CLOSE_GRACE_MS);
          forceClose.unref();
          ws.once("close", () => clearTimeout(forceClose));
        } else {
          wsTerminateSafe(ws);
        }

        log("info", "tunnel_close", {
          epoch,
          why,
          framesIn: outcome.framesIn,
          bytesIn,
          bytesOut,
          closeCode: outcome.closeCode,
          upgradeStatus: outcome.upgradeStatus
        });

        if (currentTeardown === teardown) {
          currentTeardown = null;
          currentRegistry = null;
        }
        resolve(outcome);
      };

      const setTransportPaused = (paused: boolean) => {
        if (transportPaused === paused) return;
        transportPaused = paused;
        for (const channel of registry.values()) {
          channel.setTransportPaused(paused);
        }
      };

      const maybeResumeTransport = () => {
        if (!transportPaused || closed) return;
        if (wsBufferedAmountSafe(ws) <= config.wsBufferedAmountLimitBytes / 2) {
          setTransportPaused(false);
        }
      };

      // Single writer: every frame goes out as one WebSocket message, so headers never interleave.
      const sendFrame = (channelId: Buffer, flag: TunnelFrameFlag, payload?: Buffer) => {
        if (closed || !wsIsOpenSafe(ws)) return;
        let frame: Buffer;
        try {
          frame = encodeTunnelFrame(channelId, flag, payload, config.maxFramePayloadBytes);
        } catch (err) {
          log("error", "protocol_error", {
            epoch,
            why: "encode_failed",
            channelId: channelIdToHex(channelId),
            flag: tunnelFrameFlagName(flag),
            err: formatError(err)
          });
          return;
        }

        const sent = wsSendSafe(ws, frame, (err) => {
          if (err) {
            if (closed) return;
            outcome.error = err;
            log("warn", "tunnel_error", { epoch, why: "ws_send_error", err: formatError(err) });
            teardown("ws_send_error", 1011, "WebSocket send failed");
            return;
          }
          maybeResumeTransport();
        });
        if (!sent) {
          teardown("ws_send_error", 1011, "WebSocket send failed");
          return;
        }

        const payloadBytes = payload?.length ?? 0;
        bytesOut += payloadBytes;
        metrics.addFrameOut(payloadBytes);
        if (wsBufferedAmountSafe(ws) > config.wsBufferedAmountLimitBytes) {
          setTransportPaused(true);
        }
      };

      const sink: ChannelSink = {
        sendFrame,
        release: (channel) => {
          if (registry.remove(channel)) syncChannelGauge();
        },
        openFailed: () => {
          metrics.incChannelOpenFailure();
        }
      };

      const openChannel = (frame: TunnelFrame) => {
        const hexId = channelIdToHex(frame.channelId);
        const existing = registry.get(frame.channelId);
        if (existing) {
          // The relay reused an id whose CLOSE we never saw; the old stream is dead to it.
          log("warn", "channel_replaced", { epoch, channelId: hexId });
          existing.destroy();
        }

        const channel = new Channel(
          {
            id: frame.channelId,
            host: config.localHost,
            port: config.localPort,
            epoch,
            readChunkBytes: config.readChunkBytes,
            maxBufferedBytes: config.maxChannelBufferedBytes,
            connectTimeoutMs: config.connectTimeoutMs,
            createTcpConnection: hooks.createTcpConnection
          },
          sink
        );
        registry.add(channel);
        metrics.incChannelOpened();
        syncChannelGauge();
        log("debug", "channel_open", { epoch, channelId: hexId, metadataBytes: frame.payload.length });

        if (transportPaused) channel.setTransportPaused(true);
        channel.open();
      };

      const withChannel = (frame: TunnelFrame, fn: (channel: Channel) => void) => {
        const channel = registry.get(frame.channelId);
        if (!channel) {
          // Routine when a local close races a frame already in flight from the relay.
          metrics.incUnknownChannel();
          log("debug", "unknown_channel", {
            epoch,
            channelId: channelIdToHex(frame.channelId),
            flag: tunnelFrameFlagName(frame.flag)
          });
          return;
        }
        fn(channel);
      };

      const dispatch = (frame: TunnelFrame) => {
        switch (frame.flag) {
          case TunnelFrameFlag.PING: {
            sendFrame(CONTROL_CHANNEL_ID, TunnelFrameFlag.PONG, frame.payload);
            return;
          }
          case TunnelFrameFlag.PONG: {
            return;
          }
          case TunnelFrameFlag.NEW: {
            openChannel(frame);
            return;
          }
          case TunnelFrameFlag.DATA: {
            withChannel(frame, (channel) => channel.feedRemote(frame.payload));
            return;
          }
          case TunnelFrameFlag.CLOSE: {
            withChannel(frame, (channel) => channel.close());
            return;
          }
          case TunnelFrameFlag.PAUSE: {
            withChannel(frame, (channel) => channel.pause());
            return;
          }
          case TunnelFrameFlag.RESUME: {
            withChannel(frame, (channel) => channel.resume());
            return;
          }
        }
      };

      const rejectOversizedFrame = (err: MalformedFrameError) => {
        const channelId = err.channelId;
        if (!channelId || channelId.equals(CONTROL_CHANNEL_ID)) return;
        const channel = registry.get(channelId);
        if (channel) channel.destroy();
        sendFrame(channelId, TunnelFrameFlag.CLOSE);
      };

      const handleMessage = (data: RawData, isBinary: boolean) => {
        if (closed) return;
        if (!isBinary) {
          log("warn", "protocol_error", { epoch, why: "text_message" });
          return;
        }

        let buf = toBuffer(data);
        while (buf.length > 0 && !closed) {
          let frame: TunnelFrame;
          try {
            const decoded = decodeTunnelFrame(buf, config.maxFramePayloadBytes);
            frame = decoded.frame;
            buf = decoded.remainder;
          } catch (err) {
            if (err instanceof MalformedFrameError && err.reason === "unknown_flag") {
              metrics.incUnknownFlag();
              log("warn", "unknown_flag", {
                epoch,
                channelId: err.channelId ? channelIdToHex(err.channelId) : null,
                flag: err.flag === null ? null : tunnelFrameFlagName(err.flag)
              });
              buf = buf.subarray(err.skipBytes);
              continue;
            }

            metrics.incProtocolError();
            const reason = err instanceof MalformedFrameError ? err.reason : "decode_failed";
            log("warn", "protocol_error", { epoch, why: reason, err: formatError(err) });

            if (err instanceof MalformedFrameError && err.reason === "oversized_payload") {
              rejectOversizedFrame(err);
              buf = buf.subarray(err.skipBytes);
              continue;
            }

            // The byte stream cannot be trusted past a broken header.
            outcome.error = err;
            teardown("protocol_error", 1002, "Protocol error");
            return;
          }

          if (outcome.framesIn === 0) {
            // A frame from the relay proves the credential and the link work.
            backoff.reset();
          }
          outcome.framesIn += 1;
          bytesIn += frame.payload.length;
          metrics.addFrameIn(frame.payload.length);
          dispatch(frame);
        }
      };

      const startHeartbeat = () => {
        if (config.heartbeatIntervalMs <= 0) return;
        heartbeatTimer = setInterval(() => {
          if (closed) return;
          if (awaitingPong) {
            outcome.error = new Error(`No pong within ${config.heartbeatIntervalMs}ms`);
            log("warn", "heartbeat_timeout", { epoch, intervalMs: config.heartbeatIntervalMs });
            teardown("heartbeat_timeout", 1011, "Heartbeat timeout");
            return;
          }
          awaitingPong = true;
          try {
            ws.ping();
          } catch (err) {
            outcome.error = err;
            teardown("ws_ping_error", 1011, "WebSocket ping failed");
          }
        }, config.heartbeatIntervalMs);
        heartbeatTimer.unref();
      };

      currentRegistry = registry;
      currentTeardown = teardown;

      ws.on("open", () => {
        if (closed) return;
        setState("authenticating");
        // The credential goes first, before any binary frame.
        if (!wsSendSafe(ws, config.token)) {
          teardown("auth_send_error", 1011, "Authentication send failed");
          return;
        }
        metrics.incConnectionEstablished();
        setState("active");
        log("info", "tunnel_connected", { epoch, relayUrl: relayUrlForLog });
        startHeartbeat();
      });

      ws.on("message", handleMessage);

      ws.on("pong", () => {
        awaitingPong = false;
      });

      ws.on("unexpected-response", (_req, res) => {
        outcome.upgradeStatus = res.statusCode ?? null;
        res.resume();
        log("warn", "tunnel_error", { epoch, why: "upgrade_rejected", status: outcome.upgradeStatus });
        teardown("upgrade_rejected", 1000, "");
      });

      ws.on("error", (err) => {
        if (closed) return;
        outcome.error = err;
        log("warn", "tunnel_error", { epoch, why: "ws_error", err: formatError(err) });
        teardown("ws_error", 1011, "WebSocket error");
      });

      ws.on("close", (code, reason) => {
        if (closed) return;
        outcome.closeCode = code;
        teardown("ws_close", code, formatOneLine(reason.toString("utf8"), 123));
      });
    });

  const trackAuthRejection = (outcome: EpochOutcome) => {
    if (!isAuthRejection(outcome)) {
      consecutiveAuthRejections = 0;
      return;
    }
    consecutiveAuthRejections += 1;
    metrics.incAuthRejection();
    if (consecutiveAuthRejections >= config.authFailureThreshold) {
      log("error", "auth_rejected", {
        consecutiveRejections: consecutiveAuthRejections,
        closeCode: outcome.closeCode,
        upgradeStatus: outcome.upgradeStatus
      });
      hooks.onAuthRejected?.(consecutiveAuthRejections);
    }
  };

  const run = async (): Promise<void> => {
    log("info", "tunnel_start", {
      relayUrl: relayUrlForLog,
      localHost: config.localHost,
      localPort: config.localPort
    });

    while (!stopping) {
      epochCounter += 1;
      const epoch = epochCounter;
      const outcome = await runEpoch(epoch);
      setState("disconnected");
      trackAuthRejection(outcome);
      if (stopping) break;

      const delayMs = backoff.next();
      log("warn", "tunnel_reconnect_scheduled", {
        epoch,
        delayMs,
        consecutiveFailures: backoff.consecutiveFailures,
        err: outcome.error ? formatError(outcome.error) : undefined
      });
      await sleep(delayMs, stopController.signal);
    }

    log("info", "tunnel_stop", { epochs: epochCounter, ...metrics.snapshot() });
  };

  const done = run().catch((err: unknown) => {
    setState("disconnected");
    log("error", "tunnel_error", { why: "supervisor_failed", err: formatError(err) });
  });

  const stop = async (): Promise<void> => {
    if (!stopping) {
      stopping = true;
      stopController.abort();
      currentTeardown?.("stop", 1000, "client stopping");
    }
    await done;
  };

  return {
    config,
    metrics,
    state: () => state,
    isStopping: () => stopping,
    channelCount: () => currentRegistry?.size ?? 0,
    channels: () => currentRegistry?.values() ?? [],
    backoffDelayMs: () => backoff.delayMs,
    done,
    stop
  };
}
