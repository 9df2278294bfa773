import { Duplex } from "node:stream";

/** Maps one outgoing line to the lines the peer sees; [] drops it. */
export type LineFilter = (line: string) => readonly string[];

const passThrough: LineFilter = line => [line];

class MemoryEndpoint extends Duplex {
  peer?: MemoryEndpoint;
  private pending = "";

  constructor(private readonly lineFilter: LineFilter) {
    super();
  }

  _read(): void {}

  _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.pending += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    const out: string[] = [];
    let newline = this.pending.indexOf("\n");
    while (newline !== -1) {
      out.push(...this.lineFilter(this.pending.slice(0, newline)));
      this.pending = this.pending.slice(newline + 1);
      newline = this.pending.indexOf("\n");
    }
    const peer = this.peer;
    setImmediate(() => {
      for (const line of out) {
        if (peer && !peer.destroyed) peer.push(`${line}\n`);
      }
      callback();
    });
  }

  _final(callback: (error?: Error | null) => void): void {
    const peer = this.peer;
    setImmediate(() => {
      if (peer && !peer.destroyed) peer.push(null);
      callback();
    });
  }
}

export interface DuplexPairOptions {
  /** Applied to lines written by `a` */
  aToB?: LineFilter;
  /** Applied to lines written by `b` */
  bToA?: LineFilter;
}

/**
 * Two connected in-process streams. Bytes are forwarded line by line on the
 * next turn of the event loop, through an optional filter per direction.
 */
export function createDuplexPair(options: DuplexPairOptions = {}): {
  a: Duplex;
  b: Duplex;
  sever: () => void;
} {
  const a = new MemoryEndpoint(options.aToB ?? passThrough);
  const b = new MemoryEndpoint(options.bToA ?? passThrough);
  a.peer = b;
  b.peer = a;
  return {
    a,
    b,
    sever: () => {
      a.destroy();
      b.destroy();
    },
  };
}

/** Filter that drops the first `times` lines matching `predicate`. */
export function dropMatching(
  predicate: (record: Record<string, unknown>) => boolean,
  times = 1,
): LineFilter {
  let remaining = times;
  return line => {
    if (remaining > 0 && predicate(parseRecord(line))) {
      remaining -= 1;
      return [];
    }
    return [line];
  };
}

export const parseRecord = (line: string): Record<string, unknown> => {
  try {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    return {};
  }
  return {};
};

export const isData = (seq: number) => (record: Record<string, unknown>) =>
  record.type === "DATA" && record.seq === seq;
