import net from "node:net";
import { TypedEventEmitter } from "../typedEmitter";
import { SlidewireError } from "../errors";
import { parseSenderConfig } from "../config";
import { runSenderSession } from "../sender";
import type {
  SenderObserver,
  SenderSessionResult,
  SlidewireClientEvents,
  SlidewireClientOptions,
} from "../types/types";

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

type InternalOptions = SlidewireClientOptions & {
  connectTimeoutMs: number;
};

/**
 * Sending peer: connects to a receiver and runs one transfer session per
 * `send()` call, each on its own connection.
 */
export class SlidewireClient extends TypedEventEmitter<SlidewireClientEvents> {
  private readonly options: InternalOptions;
  private socket?: net.Socket;
  private connectTimer?: NodeJS.Timeout;

  constructor(options: SlidewireClientOptions) {
    super();
    this.options = this.buildOptions(options);
  }

  /**
   * Connects, transfers `sourceData`, and resolves once the session has
   * ended. Rejects with E_HANDSHAKE_FAILED, E_NEGOTIATION_FAILED or
   * E_CONNECTION_CLOSED when the session aborts.
   */
  async send(): Promise<SenderSessionResult> {
    if (this.socket && !this.socket.destroyed) {
      throw new Error("SlidewireClient already has a session in progress");
    }
    const socket = await this.connect();
    let hadError = false;
    try {
      const result = await runSenderSession(
        socket,
        {
          sourceData: this.options.sourceData,
          windowSize: this.options.windowSize,
          timeoutSeconds: this.options.timeoutSeconds,
          pollIntervalMs: this.options.pollIntervalMs,
        },
        {
          observer: this.createObserver(),
          onTelemetry: this.options.onTelemetry,
        },
      );
      this.emit("complete", result);
      return result;
    } catch (err) {
      hadError = true;
      throw err;
    } finally {
      socket.destroy();
      this.socket = undefined;
      this.emit("close", { hadError });
    }
  }

  public isConnected(): boolean {
    return Boolean(this.socket && !this.socket.destroyed);
  }

  /** Aborts the running session by destroying its socket. */
  public async disconnect(): Promise<void> {
    this.clearConnectTimer();
    const socket = this.socket;
    if (!socket) return;
    this.socket = undefined;
    socket.destroy();
  }

  private connect(): Promise<net.Socket> {
    return new Promise<net.Socket>((resolve, reject) => {
      let settled = false;
      const socket = net.createConnection(
        { host: this.options.host, port: this.options.port },
        () => {
          if (settled) return;
          settled = true;
          this.clearConnectTimer();
          this.emit("connect");
          resolve(socket);
        },
      );
      this.socket = socket;

      const onError = (err: Error) => {
        if (settled) return;
        settled = true;
        this.clearConnectTimer();
        this.socket = undefined;
        reject(err);
      };
      socket.once("error", onError);

      if (this.options.connectTimeoutMs > 0) {
        this.connectTimer = setTimeout(() => {
          if (settled) return;
          settled = true;
          socket.destroy();
          this.socket = undefined;
          reject(
            new SlidewireError("E_CONNECT_TIMEOUT", "Connection timed out"),
          );
        }, this.options.connectTimeoutMs);
      }
    });
  }

  private createObserver(): SenderObserver {
    return {
      onState: state => this.emit("state", state),
      onNegotiated: params => this.emit("negotiated", params),
      onSegment: event => this.emit("segment", event),
      onAck: event => this.emit("ack", event),
      onTimeout: event => this.emit("timeout", event),
      onResize: maxSegmentSize => this.emit("resize", { maxSegmentSize }),
    };
  }

  private buildOptions(options: SlidewireClientOptions): InternalOptions {
    const config = parseSenderConfig({
      sourceData: options.sourceData,
      windowSize: options.windowSize,
      timeoutSeconds: options.timeoutSeconds,
      pollIntervalMs: options.pollIntervalMs,
    });
    return {
      ...config,
      host: options.host,
      port: options.port,
      connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      onTelemetry: options.onTelemetry,
    };
  }

  private clearConnectTimer(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = undefined;
    }
  }
}
