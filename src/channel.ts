import net from "node:net";

import { describeDialError } from "./errorCode";
import { formatError, log } from "./logger";
import { TunnelFrameFlag, channelIdToHex } from "./tunnelFrame";

export type ChannelState = "opening" | "open" | "paused" | "closing" | "closed";

export type CreateTcpConnection = (options: net.NetConnectOpts) => net.Socket;

/** What a channel needs from the connection that owns it. */
export interface ChannelSink {
  sendFrame: (channelId: Buffer, flag: TunnelFrameFlag, payload?: Buffer) => void;
  /** Drop the channel from the registry. Must tolerate repeated calls. */
  release: (channel: Channel) => void;
  /** The local dial failed; the channel is already released. */
  openFailed: (channel: Channel, err: unknown) => void;
}

export interface ChannelOptions {
  id: Buffer;
  host: string;
  port: number;
  epoch: number;
  readChunkBytes: number;
  maxBufferedBytes: number;
  connectTimeoutMs: number;
  createTcpConnection?: CreateTcpConnection;
  closeGraceMs?: number;
}

export type ChannelStats = {
  bytesToLocal: number;
  bytesFromLocal: number;
};

const DEFAULT_CLOSE_GRACE_MS = 5_000;

/**
 * One multiplexed stream bridged to one local TCP connection.
 *
 * Relay -> local goes through {@link Channel.feedRemote}; local -> relay is the
 * pump installed by {@link Channel.open}, which turns socket reads into DATA
 * frames of at most `readChunkBytes` and ends with exactly one CLOSE when the
 * local side finishes first. Teardown initiated by the relay ({@link Channel.close})
 * or by the connection ({@link Channel.destroy}) never sends a frame.
 */
export class Channel {
  readonly id: Buffer;
  readonly hexId: string;

  private readonly opts: ChannelOptions;
  private readonly sink: ChannelSink;

  private socket: net.Socket | null = null;
  private currentState: ChannelState = "opening";
  private pendingWrites: Buffer[] = [];
  private pendingWriteBytes = 0;
  private remotePaused = false;
  private transportPaused = false;
  // True while the relay has been told to PAUSE because the local socket is saturated.
  private pausedRelayForLocalWrites = false;
  private connectTimer: NodeJS.Timeout | null = null;
  private graceTimer: NodeJS.Timeout | null = null;
  private bytesToLocal = 0;
  private bytesFromLocal = 0;

  constructor(opts: ChannelOptions, sink: ChannelSink) {
    this.id = opts.id;
    this.hexId = channelIdToHex(opts.id);
    this.opts = opts;
    this.sink = sink;
  }

  get state(): ChannelState {
    return this.currentState;
  }

  /** Closing or closed: no more bytes flow in either direction. */
  get isDone(): boolean {
    return this.currentState === "closing" || this.currentState === "closed";
  }

  get stats(): ChannelStats {
    return { bytesToLocal: this.bytesToLocal, bytesFromLocal: this.bytesFromLocal };
  }

  open(): void {
    if (this.socket || this.currentState !== "opening") return;

    const createConnection = this.opts.createTcpConnection ?? net.createConnection;
    let socket: net.Socket;
    try {
      socket = createConnection({ host: this.opts.host, port: this.opts.port, allowHalfOpen: false });
      socket.setNoDelay(true);
    } catch (err) {
      this.failOpen(err);
      return;
    }

    this.socket = socket;

    this.connectTimer = setTimeout(() => {
      socket.destroy(new Error(`Connect timeout after ${this.opts.connectTimeoutMs}ms`));
    }, this.opts.connectTimeoutMs);
    this.connectTimer.unref();

    socket.once("connect", () => this.handleConnect());
    this.pumpLocal(socket);
    this.applyReadState();
  }

  feedRemote(payload: Buffer): void {
    if (this.isDone) return;
    this.bytesToLocal += payload.length;

    if (this.currentState === "opening" || !this.socket) {
      this.pendingWrites.push(payload);
      this.pendingWriteBytes += payload.length;
      if (this.pendingWriteBytes > this.opts.maxBufferedBytes) {
        this.overflow(this.pendingWriteBytes);
      }
      return;
    }

    this.writeLocal(this.socket, payload);
  }

  pause(): void {
    if (this.isDone) return;
    this.remotePaused = true;
    if (this.currentState === "open") this.currentState = "paused";
    this.applyReadState();
  }

  resume(): void {
    if (this.isDone) return;
    this.remotePaused = false;
    if (this.currentState === "paused") this.currentState = "open";
    this.applyReadState();
  }

  /** Outbound WebSocket backpressure; independent of relay PAUSE/RESUME. */
  setTransportPaused(paused: boolean): void {
    if (this.transportPaused === paused) return;
    this.transportPaused = paused;
    if (!this.isDone) this.applyReadState();
  }

  /**
   * Relay-initiated close: flush what is queued, end the local write side and
   * settle in `closed` once the socket is gone. Idempotent.
   */
  close(): void {
    if (this.isDone) return;
    this.currentState = "closing";
    this.sink.release(this);

    const socket = this.socket;
    if (!socket) {
      this.settleClosed();
      return;
    }
    // Still dialing (the connect timer keeps running): handleConnect flushes the
    // queue and ends the socket.
    if (socket.connecting) return;
    this.clearConnectTimer();
    this.endLocal(socket);
  }

  /** Force-close without flushing. Used when the whole connection goes away. */
  destroy(): void {
    if (this.currentState === "closed") return;
    this.sink.release(this);
    this.pendingWrites = [];
    this.pendingWriteBytes = 0;
    this.settleClosed();
    this.socket?.destroy();
  }

  private handleConnect(): void {
    this.clearConnectTimer();
    const socket = this.socket;
    if (!socket || this.currentState === "closed") return;

    log("debug", "channel_connected", {
      epoch: this.opts.epoch,
      channelId: this.hexId,
      host: this.opts.host,
      port: this.opts.port
    });

    const wasClosing = this.currentState === "closing";
    if (!wasClosing) {
      this.currentState = this.remotePaused ? "paused" : "open";
    }

    const queued = this.pendingWrites;
    this.pendingWrites = [];
    this.pendingWriteBytes = 0;
    for (const chunk of queued) {
      if (this.state === "closed") return;
      this.writeLocal(socket, chunk, wasClosing);
    }

    if (wasClosing) this.endLocal(socket);
  }

  /** Local -> relay. Runs until the local socket ends, errors or is torn down. */
  private pumpLocal(socket: net.Socket): void {
    socket.on("data", (chunk: Buffer) => {
      if (this.isDone) return;
      this.bytesFromLocal += chunk.length;
      const step = this.opts.readChunkBytes;
      for (let offset = 0; offset < chunk.length; offset += step) {
        this.sink.sendFrame(this.id, TunnelFrameFlag.DATA, chunk.subarray(offset, offset + step));
      }
    });

    socket.on("drain", () => {
      if (this.isDone || !this.pausedRelayForLocalWrites) return;
      this.pausedRelayForLocalWrites = false;
      this.sink.sendFrame(this.id, TunnelFrameFlag.RESUME);
    });

    socket.on("end", () => {
      this.finishFromLocal("local_eof");
    });

    socket.on("error", (err) => {
      if (this.currentState === "opening") {
        this.failOpen(err);
        return;
      }
      if (this.isDone) return;
      log("warn", "channel_close", {
        epoch: this.opts.epoch,
        channelId: this.hexId,
        why: "local_error",
        err: formatError(err)
      });
      this.finishFromLocal("local_error");
      socket.destroy();
    });

    socket.on("close", () => {
      if (this.currentState === "opening") {
        this.failOpen(new Error("local socket closed before connecting"));
        return;
      }
      this.finishFromLocal("local_close");
      this.settleClosed();
    });
  }

  private writeLocal(socket: net.Socket, chunk: Buffer, closing = false): void {
    let ok: boolean;
    try {
      ok = socket.write(chunk);
    } catch (err) {
      log("warn", "channel_close", {
        epoch: this.opts.epoch,
        channelId: this.hexId,
        why: "local_write_error",
        err: formatError(err)
      });
      this.finishFromLocal("local_write_error");
      socket.destroy();
      return;
    }

    const buffered = socket.writableLength;
    if (buffered > this.opts.maxBufferedBytes) {
      this.overflow(buffered);
      return;
    }
    // No point asking the relay to hold off once it has closed the channel.
    if (!ok && !closing && !this.pausedRelayForLocalWrites) {
      this.pausedRelayForLocalWrites = true;
      this.sink.sendFrame(this.id, TunnelFrameFlag.PAUSE);
    }
  }

  private endLocal(socket: net.Socket): void {
    socket.end();
    // Keep reading (and discarding) so the peer's FIN is seen even while paused.
    socket.resume();
    this.graceTimer = setTimeout(() => {
      socket.destroy();
      this.settleClosed();
    }, this.opts.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS);
    this.graceTimer.unref();
  }

  /** The local side finished first: tell the relay, exactly once. */
  private finishFromLocal(why: string): void {
    if (this.isDone) return;
    this.currentState = "closed";
    this.sink.release(this);
    this.sink.sendFrame(this.id, TunnelFrameFlag.CLOSE);
    this.clearTimers();
    log("debug", "channel_close", {
      epoch: this.opts.epoch,
      channelId: this.hexId,
      why,
      bytesToLocal: this.bytesToLocal,
      bytesFromLocal: this.bytesFromLocal
    });
  }

  private failOpen(err: unknown): void {
    // A relay CLOSE already arrived for this id; do not answer it.
    const silent = this.currentState === "closing";
    if (this.currentState === "closed") return;
    this.currentState = "closed";
    this.clearTimers();
    this.sink.release(this);
    if (!silent) this.sink.sendFrame(this.id, TunnelFrameFlag.CLOSE);
    this.socket?.destroy();
    this.sink.openFailed(this, err);
    log("warn", "channel_open_failed", {
      epoch: this.opts.epoch,
      channelId: this.hexId,
      host: this.opts.host,
      port: this.opts.port,
      reason: describeDialError(err),
      err: formatError(err)
    });
  }

  private overflow(buffered: number): void {
    log("warn", "channel_overflow", {
      epoch: this.opts.epoch,
      channelId: this.hexId,
      buffered,
      max: this.opts.maxBufferedBytes
    });
    this.finishFromLocal("local_buffer_overflow");
    this.socket?.destroy();
  }

  private applyReadState(): void {
    const socket = this.socket;
    if (!socket) return;
    if (this.remotePaused || this.transportPaused) {
      socket.pause();
    } else {
      socket.resume();
    }
  }

  private settleClosed(): void {
    this.currentState = "closed";
    this.clearTimers();
  }

  private clearConnectTimer(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private clearTimers(): void {
    this.clearConnectTimer();
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
  }
}
