import { SeqMap } from "../utils/seq-map";
import type { SegmentOutcome } from "../types/types";

/** Buffered segments beyond which the receiver asks for smaller ones. */
export const BACKLOG_THRESHOLD = 2;
export const SHRINK_STEP = 20;
export const GROW_STEP = 10;
export const MIN_SEGMENT_SIZE = 20;

export interface ReassemblyOptions {
  /** Configured ceiling, and the starting size */
  maxSegmentSize: number;
  adaptive: boolean;
}

/** What the receiver acknowledges after one DATA message. */
export interface AckDecision {
  outcome: SegmentOutcome;
  /** rcvBase - 1; -1 until segment 0 is delivered */
  ack: number;
  /** Present only when adaptive sizing is on */
  maxSize?: number;
  /** Segments handed to `delivered` by this message */
  deliveredCount: number;
  resized: boolean;
}

const isValidSeq = (seq: number | null): seq is number =>
  seq !== null && Number.isInteger(seq) && seq >= 0;

/**
 * Receiver reassembly: out-of-order segments wait in the reorder buffer and
 * are delivered strictly in seq order. Every DATA message is acknowledged,
 * including the ones that are dropped.
 */
export class ReassemblyEngine {
  private nextExpected = 0;
  private segmentSize: number;
  private readonly ceiling: number;
  private readonly floor: number;
  private readonly reorderBuffer = new SeqMap<string>();
  private readonly deliveredParts: string[] = [];

  constructor(private readonly options: ReassemblyOptions) {
    this.segmentSize = options.maxSegmentSize;
    this.ceiling = options.maxSegmentSize;
    // never shrink past a ceiling configured below the usual floor
    this.floor = Math.min(MIN_SEGMENT_SIZE, options.maxSegmentSize);
  }

  /** Next expected seq */
  get rcvBase(): number {
    return this.nextExpected;
  }

  get ackNumber(): number {
    return this.nextExpected - 1;
  }

  get maxSegmentSize(): number {
    return this.segmentSize;
  }

  get adaptive(): boolean {
    return this.options.adaptive;
  }

  /** Undelivered segments waiting in the reorder buffer */
  get backlog(): number {
    return this.reorderBuffer.size;
  }

  bufferedSeqs(): number[] {
    return this.reorderBuffer.keys();
  }

  /** Concatenation of segments 0..rcvBase-1 */
  get delivered(): string {
    return this.deliveredParts.join("");
  }

  receive(seq: number | null, payload: string | null): AckDecision {
    if (
      !isValidSeq(seq) ||
      payload === null ||
      Buffer.byteLength(payload, "utf8") > this.segmentSize
    ) {
      return this.decide("rejected", 0, false);
    }
    if (seq < this.nextExpected) {
      return this.decide("duplicate", 0, false);
    }

    this.reorderBuffer.set(seq, payload);
    const { values, next } = this.reorderBuffer.drainFrom(this.nextExpected);
    this.deliveredParts.push(...values);
    this.nextExpected = next;

    return this.decide("accepted", values.length, this.adapt());
  }

  private adapt(): boolean {
    if (!this.options.adaptive) return false;
    const before = this.segmentSize;
    if (this.reorderBuffer.size > BACKLOG_THRESHOLD) {
      this.segmentSize = Math.max(this.floor, this.segmentSize - SHRINK_STEP);
    } else if (this.reorderBuffer.size === 0) {
      this.segmentSize = Math.min(this.ceiling, this.segmentSize + GROW_STEP);
    }
    return this.segmentSize !== before;
  }

  private decide(
    outcome: SegmentOutcome,
    deliveredCount: number,
    resized: boolean,
  ): AckDecision {
    return {
      outcome,
      ack: this.ackNumber,
      maxSize: this.options.adaptive ? this.segmentSize : undefined,
      deliveredCount,
      resized,
    };
  }
}
