import type { Duplex } from "node:stream";
import { LineFramer } from "./framing";
import { decodeMessage, encodeMessage, messages } from "./codecs";
import { SlidewireError } from "./errors";
import { TypedEventEmitter } from "./typedEmitter";
import type { Message } from "./schema/messages";
import type { SlidewireTelemetry } from "./types/types";

export type ReceiveResult =
  | { status: "message"; message: Message }
  | { status: "timeout" }
  | { status: "closed" };

interface ChannelEvents {
  closed: { error?: Error };
}

export interface MessageChannelOptions {
  maxLineLength?: number;
}

const TIMEOUT: ReceiveResult = { status: "timeout" };
const CLOSED: ReceiveResult = { status: "closed" };

/**
 * One protocol message per line over a byte stream. Inbound records are
 * queued until a control flow asks for them with `receive`, which waits on a
 * timer raced against message readiness.
 */
export class MessageChannel extends TypedEventEmitter<ChannelEvents> {
  private readonly framer: LineFramer;
  private readonly inbox: Message[] = [];
  private waiter?: (result: ReceiveResult) => void;
  private closed = false;
  private failure?: Error;
  private readonly stats: SlidewireTelemetry = {
    bytesIn: 0,
    bytesOut: 0,
    messagesIn: 0,
    messagesOut: 0,
    malformed: 0,
  };

  private readonly onData = (chunk: Buffer | string) => {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    this.stats.bytesIn += buffer.length;
    this.framer.push(buffer);
  };
  private readonly onEnd = () => {
    this.framer.end();
    this.markClosed();
  };
  private readonly onClose = () => this.markClosed();
  private readonly onError = (err: Error) => {
    this.failure = err;
    this.markClosed();
  };

  constructor(
    private readonly stream: Duplex,
    options: MessageChannelOptions = {},
  ) {
    super();
    this.framer = new LineFramer({ maxLineLength: options.maxLineLength });
    this.framer.on("message", line => {
      this.deliver(
        line.length === 0
          ? messages.malformed("empty_record")
          : (decodeMessage(line) ?? messages.malformed("empty_record")),
      );
    });
    this.framer.on("error", () => this.deliver(messages.malformed("line_too_long")));

    stream.on("data", this.onData);
    stream.on("end", this.onEnd);
    stream.on("close", this.onClose);
    stream.on("error", this.onError);
    if (stream.destroyed) this.markClosed();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Socket error that closed the channel, if any. */
  get error(): Error | undefined {
    return this.failure;
  }

  get telemetry(): SlidewireTelemetry {
    return { ...this.stats };
  }

  async send(message: Message): Promise<void> {
    if (this.closed || this.stream.destroyed || !this.stream.writable) {
      throw new SlidewireError(
        "E_CONNECTION_CLOSED",
        `Cannot send ${message.kind}: connection closed`,
      );
    }
    const record = encodeMessage(message);
    this.stats.bytesOut += record.length;
    this.stats.messagesOut += 1;
    const wrote = this.stream.write(record);
    if (wrote) return;

    await new Promise<void>((resolve, reject) => {
      const onDrain = () => {
        cleanup();
        resolve();
      };
      const onClose = () => {
        cleanup();
        reject(
          new SlidewireError("E_CONNECTION_CLOSED", "Connection closed while writing"),
        );
      };
      const cleanup = () => {
        this.stream.off("drain", onDrain);
        this.stream.off("close", onClose);
      };
      this.stream.once("drain", onDrain);
      this.stream.once("close", onClose);
    });
  }

  /**
   * Next inbound message. Without `timeoutMs` the wait is unbounded; a zero
   * timeout only checks what is already queued. Once the stream has closed
   * and the queue is empty, every call resolves to `closed`.
   */
  receive(timeoutMs?: number): Promise<ReceiveResult> {
    const queued = this.inbox.shift();
    if (queued) return Promise.resolve({ status: "message", message: queued });
    if (this.closed) return Promise.resolve(CLOSED);
    if (timeoutMs !== undefined && timeoutMs <= 0) return Promise.resolve(TIMEOUT);
    if (this.waiter) {
      return Promise.reject(new Error("MessageChannel supports one reader at a time"));
    }

    return new Promise<ReceiveResult>(resolve => {
      let timer: NodeJS.Timeout | undefined;
      this.waiter = result => {
        if (timer) clearTimeout(timer);
        this.waiter = undefined;
        resolve(result);
      };
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => this.waiter?.(TIMEOUT), timeoutMs);
      }
    });
  }

  /**
   * Half-closes our side and stops reading. The error listener stays attached
   * so a late socket error is recorded rather than thrown.
   */
  close(): void {
    if (!this.stream.destroyed && !this.stream.writableEnded) {
      this.stream.end();
    }
    this.markClosed();
    this.stream.off("data", this.onData);
    this.stream.off("end", this.onEnd);
    this.stream.off("close", this.onClose);
  }

  private deliver(message: Message): void {
    this.stats.messagesIn += 1;
    if (message.kind === "MALFORMED") this.stats.malformed += 1;
    if (this.waiter) {
      this.waiter({ status: "message", message });
      return;
    }
    this.inbox.push(message);
  }

  private markClosed(): void {
    if (this.closed) return;
    this.closed = true;
    this.emit("closed", { error: this.failure });
    this.waiter?.(CLOSED);
  }
}
