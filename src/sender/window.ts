import { SeqMap } from "../utils/seq-map";

export interface Segment {
  readonly seq: number;
  readonly payload: string;
}

export interface SenderWindowOptions {
  source: string;
  windowSize: number;
  /** Retransmission timeout */
  timeoutMs: number;
  maxSegmentSize: number;
  /** When set, a maxSize carried by an ACK replaces maxSegmentSize */
  adaptive: boolean;
  now?: () => number;
}

export interface AckOutcome {
  /** False unless the ACK moved base */
  advanced: boolean;
  base: number;
  /** Set when the ACK changed the segment size */
  resizedTo?: number;
}

const utf8Width = (codePoint: number): number => {
  if (codePoint <= 0x7f) return 1;
  if (codePoint <= 0x7ff) return 2;
  if (codePoint <= 0xffff) return 3;
  return 4;
};

/**
 * Longest prefix of `source` from `cursor` whose UTF-8 encoding fits in
 * `maxBytes`, never splitting a code point. At least one code point is
 * always taken so the cursor moves.
 */
export function cutSegment(
  source: string,
  cursor: number,
  maxBytes: number,
): string {
  let end = cursor;
  let bytes = 0;
  while (end < source.length) {
    const codePoint = source.codePointAt(end) ?? 0;
    const width = utf8Width(codePoint);
    const units = codePoint > 0xffff ? 2 : 1;
    if (bytes + width > maxBytes) {
      if (end === cursor) end += units;
      break;
    }
    bytes += width;
    end += units;
  }
  return source.slice(cursor, end);
}

/**
 * Go-Back-N sender bookkeeping. `outstanding` always holds exactly the seqs
 * in [base, nextSeq), and nextSeq never runs more than windowSize ahead of
 * base. One timer covers the whole window.
 */
export class SenderWindow {
  private baseSeq = 0;
  private next = 0;
  private cursor = 0;
  private segmentSize: number;
  private timerStart: number | null = null;
  private readonly outstanding = new SeqMap<string>();
  private readonly now: () => number;

  constructor(private readonly options: SenderWindowOptions) {
    this.segmentSize = options.maxSegmentSize;
    this.now = options.now ?? Date.now;
  }

  get base(): number {
    return this.baseSeq;
  }

  get nextSeq(): number {
    return this.next;
  }

  get windowSize(): number {
    return this.options.windowSize;
  }

  get maxSegmentSize(): number {
    return this.segmentSize;
  }

  /** Read position in the source text */
  get readCursor(): number {
    return this.cursor;
  }

  get inFlight(): number {
    return this.next - this.baseSeq;
  }

  get timerArmed(): boolean {
    return this.timerStart !== null;
  }

  get sourceExhausted(): boolean {
    return this.cursor >= this.options.source.length;
  }

  /** Every byte has been cut and every segment acknowledged. */
  get finished(): boolean {
    return this.sourceExhausted && this.baseSeq === this.next;
  }

  payloadOf(seq: number): string | undefined {
    return this.outstanding.get(seq);
  }

  /**
   * Cuts and records segments while the window has room. The timer is armed
   * when the first segment of an empty window goes out.
   */
  fill(): Segment[] {
    const cut: Segment[] = [];
    while (
      this.next < this.baseSeq + this.options.windowSize &&
      !this.sourceExhausted
    ) {
      const payload = cutSegment(
        this.options.source,
        this.cursor,
        this.segmentSize,
      );
      const seq = this.next;
      this.outstanding.set(seq, payload);
      if (this.baseSeq === seq) this.timerStart = this.now();
      this.cursor += payload.length;
      this.next += 1;
      cut.push({ seq, payload });
    }
    return cut;
  }

  /**
   * Applies a cumulative ACK. ACKs below base are stale and ignored; an ACK
   * past the last sent seq only covers what was sent.
   */
  acknowledge(ack: number, maxSize?: number): AckOutcome {
    if (ack < this.baseSeq) {
      return { advanced: false, base: this.baseSeq };
    }
    const previousBase = this.baseSeq;
    this.baseSeq = Math.min(ack + 1, this.next);
    this.outstanding.dropBelow(this.baseSeq);
    this.timerStart = this.baseSeq < this.next ? this.now() : null;

    let resizedTo: number | undefined;
    if (
      this.options.adaptive &&
      maxSize !== undefined &&
      maxSize !== this.segmentSize
    ) {
      this.segmentSize = maxSize;
      resizedTo = maxSize;
    }
    return {
      advanced: this.baseSeq !== previousBase,
      base: this.baseSeq,
      resizedTo,
    };
  }

  /** True once the armed timer has run strictly longer than the timeout. */
  expired(): boolean {
    return (
      this.timerStart !== null &&
      this.now() - this.timerStart > this.options.timeoutMs
    );
  }

  /**
   * Every outstanding segment with its original payload, in seq order; the
   * timer restarts.
   */
  retransmit(): Segment[] {
    this.timerStart = this.now();
    return this.outstanding
      .range(this.baseSeq, this.next)
      .map(([seq, payload]) => ({ seq, payload }));
  }
}
