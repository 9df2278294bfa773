import { TypedEventEmitter } from "./typedEmitter";

interface FramerEvents {
  message: Buffer;
  error: Error;
}

export interface LineFramerOptions {
  maxLineLength?: number;
}

const LF = 0x0a;
const CR = 0x0d;
export const DEFAULT_MAX_LINE_LENGTH = 1024 * 1024; // 1 MiB

/**
 * Splits a byte stream into newline-terminated records. A trailing CR is
 * dropped so CRLF peers frame the same way.
 */
export class LineFramer extends TypedEventEmitter<FramerEvents> {
  private readonly maxLineLength: number;
  private buffer: Buffer = Buffer.alloc(0);

  constructor(options?: LineFramerOptions) {
    super();
    this.maxLineLength = options?.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
  }

  push(chunk: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, chunk]);

    while (this.buffer.length > 0) {
      const newline = this.buffer.indexOf(LF);
      if (newline === -1) {
        if (this.buffer.length > this.maxLineLength) {
          const length = this.buffer.length;
          this.buffer = Buffer.alloc(0);
          this.emit(
            "error",
            new Error(`Line length ${length} exceeds limit ${this.maxLineLength}`),
          );
        }
        return;
      }

      const line = this.stripCr(this.buffer.subarray(0, newline));
      this.buffer = this.buffer.subarray(newline + 1);
      if (line.length > this.maxLineLength) {
        this.emit(
          "error",
          new Error(`Line length ${line.length} exceeds limit ${this.maxLineLength}`),
        );
        continue;
      }
      this.emit("message", line);
    }
  }

  /** Emits a final unterminated line, if any, once the stream has ended. */
  end(): void {
    if (this.buffer.length === 0) return;
    const rest = this.stripCr(this.buffer);
    this.buffer = Buffer.alloc(0);
    if (rest.length > 0) this.emit("message", rest);
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }

  private stripCr(line: Buffer): Buffer {
    return line.length > 0 && line[line.length - 1] === CR
      ? line.subarray(0, line.length - 1)
      : line;
  }
}
