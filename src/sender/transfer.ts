import type { MessageChannel } from "../channel";
import { messages } from "../codecs";
import { SlidewireError } from "../errors";
import type { SenderObserver, TransferReport } from "../types/types";
import type { Segment, SenderWindow } from "./window";

export const DEFAULT_POLL_INTERVAL_MS = 100;

/** Poll granularity stays at or below a tenth of the retransmission timeout. */
export const resolvePollInterval = (
  timeoutMs: number,
  requested = DEFAULT_POLL_INTERVAL_MS,
): number => Math.max(1, Math.min(requested, timeoutMs / 10));

export interface SenderTransferOptions {
  pollIntervalMs: number;
  observer?: SenderObserver;
}

/**
 * Steady-state loop: fill the window, poll once for a cumulative ACK, then
 * check the retransmission timer. Returns once the source is fully cut and
 * every segment is acknowledged. A closed connection ends the session with
 * E_CONNECTION_CLOSED; unacknowledged data is lost.
 */
export async function runSenderTransfer(
  channel: MessageChannel,
  window: SenderWindow,
  options: SenderTransferOptions,
): Promise<TransferReport> {
  const { observer } = options;
  let segments = 0;
  let retransmissions = 0;
  let bytes = 0;

  const transmit = async (segment: Segment, retransmit: boolean) => {
    await channel.send(messages.data(segment.seq, segment.payload));
    observer?.onSegment?.({
      seq: segment.seq,
      length: Buffer.byteLength(segment.payload, "utf8"),
      retransmit,
    });
  };

  while (!window.finished) {
    for (const segment of window.fill()) {
      segments += 1;
      bytes += Buffer.byteLength(segment.payload, "utf8");
      await transmit(segment, false);
    }

    const result = await channel.receive(options.pollIntervalMs);
    if (result.status === "closed") {
      throw new SlidewireError(
        "E_CONNECTION_CLOSED",
        `Connection closed with ${window.inFlight} segment(s) unacknowledged`,
      );
    }
    if (result.status === "message" && result.message.kind === "CUM_ACK") {
      const { ack, maxSize } = result.message;
      const outcome = window.acknowledge(ack, maxSize);
      if (outcome.advanced) {
        observer?.onAck?.({ ack, base: outcome.base, nextSeq: window.nextSeq });
      }
      if (outcome.resizedTo !== undefined) {
        observer?.onResize?.(outcome.resizedTo);
      }
    }

    if (window.expired()) {
      observer?.onTimeout?.({ base: window.base, nextSeq: window.nextSeq });
      for (const segment of window.retransmit()) {
        retransmissions += 1;
        await transmit(segment, true);
      }
    }
  }

  return {
    segments,
    retransmissions,
    bytes,
    finalMaxSegmentSize: window.maxSegmentSize,
  };
}
