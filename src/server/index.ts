import net from "node:net";
import { randomUUID } from "node:crypto";
import { TypedEventEmitter } from "../typedEmitter";
import {
  parseReceiverConfig,
  resolveReceiverLineLimit,
  type ReceiverConfig,
} from "../config";
import { runReceiverSession } from "../receiver";
import type {
  ReceiverObserver,
  SlidewireServerConnection,
  SlidewireServerEvents,
  SlidewireServerOptions,
} from "../types/types";

type InternalServerOptions = Omit<SlidewireServerOptions, "host"> & {
  host: string;
};

/**
 * Receiving peer. Accepts connections and serves them one session at a
 * time; connections that arrive during a session wait their turn in order.
 */
export class SlidewireServer extends TypedEventEmitter<SlidewireServerEvents> {
  private readonly server: net.Server;
  private readonly options: InternalServerOptions;
  private readonly config: ReceiverConfig;
  private readonly waiting: net.Socket[] = [];
  private active?: net.Socket;
  private serving = false;
  private idle: Promise<void> = Promise.resolve();

  constructor(options: SlidewireServerOptions) {
    super();
    this.options = this.buildOptions(options);
    this.config = parseReceiverConfig({
      maxMessageSize: options.maxMessageSize,
      adaptiveSizing: options.adaptiveSizing,
      windowSize: options.windowSize,
      timeoutSeconds: options.timeoutSeconds,
    });
    resolveReceiverLineLimit(this.config.maxMessageSize, options.maxLineLength);
    this.server = net.createServer(socket => this.enqueue(socket));
    this.server.on("error", err => this.emit("error", err));
    this.on("error", err => {
      console.error("[SlidewireServer] error:", err);
    });
  }

  async listen(): Promise<net.AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(
        { host: this.options.host, port: this.options.port },
        () => {
          this.server.off("error", reject);
          const address = this.server.address();
          if (!address || typeof address === "string") {
            reject(
              new Error("SlidewireServer could not determine listening address"),
            );
            return;
          }
          this.emit("listening", address);
          resolve(address);
        },
      );
    });
  }

  /** Drops waiting and active connections, then stops listening. */
  async close(): Promise<void> {
    for (const socket of this.waiting.splice(0)) {
      socket.destroy();
    }
    this.active?.destroy();
    await this.idle;

    if (!this.server.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.server.close(err => (err ? reject(err) : resolve()));
    });
    this.emit("close");
  }

  /** Connections waiting behind the active session */
  getQueueLength(): number {
    return this.waiting.length;
  }

  isServing(): boolean {
    return this.serving;
  }

  private enqueue(socket: net.Socket): void {
    // queued sockets may fail before their turn; the session sees them closed
    socket.on("error", () => socket.destroy());
    this.waiting.push(socket);
    if (!this.serving) {
      this.idle = this.drain();
    }
  }

  private async drain(): Promise<void> {
    this.serving = true;
    try {
      for (let socket = this.waiting.shift(); socket; socket = this.waiting.shift()) {
        if (socket.destroyed) continue;
        await this.serve(socket);
      }
    } finally {
      this.serving = false;
    }
  }

  private async serve(socket: net.Socket): Promise<void> {
    const client: SlidewireServerConnection = {
      id: randomUUID(),
      remoteAddress: socket.remoteAddress,
      remotePort: socket.remotePort,
    };
    this.active = socket;
    this.emit("connection", client);
    try {
      const result = await runReceiverSession(socket, this.config, {
        observer: this.createObserver(client),
        idleTimeoutMs: this.options.idleTimeoutMs,
        maxLineLength: this.options.maxLineLength,
        onTelemetry: this.options.onTelemetry,
      });
      this.emit("sessionEnd", { client, result });
    } catch (err) {
      this.emit("error", err instanceof Error ? err : new Error(String(err)));
    } finally {
      this.active = undefined;
      socket.destroy();
    }
  }

  private createObserver(client: SlidewireServerConnection): ReceiverObserver {
    return {
      onState: state => this.emit("state", { client, state }),
      onNegotiated: params => this.emit("negotiated", { client, params }),
      onSegment: event => this.emit("segment", { client, ...event }),
      onResize: maxSegmentSize =>
        this.emit("resize", { client, maxSegmentSize }),
      onComplete: data => this.emit("complete", { client, data }),
    };
  }

  private buildOptions(options: SlidewireServerOptions): InternalServerOptions {
    return {
      ...options,
      host: options.host ?? "localhost",
    };
  }
}
