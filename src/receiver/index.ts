import type { Duplex } from "node:stream";
import { MessageChannel } from "../channel";
import {
  parseReceiverConfig,
  resolveReceiverLineLimit,
  type ReceiverConfig,
} from "../config";
import { isSlidewireError } from "../errors";
import { acceptHandshake } from "../handshake/handshake";
import { answerParameters } from "../handshake/negotiation";
import type {
  NegotiatedParams,
  ReceiverObserver,
  ReceiverSessionResult,
  SlidewireTelemetry,
} from "../types/types";
import { ReassemblyEngine } from "./reassembly";
import { runReceiverTransfer } from "./transfer";

export interface ReceiverSessionOptions {
  observer?: ReceiverObserver;
  idleTimeoutMs?: number;
  maxLineLength?: number;
  onTelemetry?: (metrics: SlidewireTelemetry) => void;
}

/**
 * Serves one receiving session on an established stream. A peer that breaks
 * the handshake is dropped without a reply (`reason: "handshake"`).
 */
export async function runReceiverSession(
  stream: Duplex,
  config: ReceiverConfig,
  options: ReceiverSessionOptions = {},
): Promise<ReceiverSessionResult> {
  const { maxMessageSize, adaptiveSizing } = parseReceiverConfig(config);
  const { observer, idleTimeoutMs } = options;
  const channel = new MessageChannel(stream, {
    maxLineLength: resolveReceiverLineLimit(maxMessageSize, options.maxLineLength),
  });
  let engine: ReassemblyEngine | undefined;

  try {
    const established = await acceptHandshake(
      channel,
      idleTimeoutMs,
      observer?.onState,
    );
    if (!established) {
      return { finished: false, reason: "handshake", data: "", lastAck: -1 };
    }

    const params: NegotiatedParams = {
      maxSegmentSize: maxMessageSize,
      adaptive: adaptiveSizing,
    };
    const pending = await answerParameters(channel, params, idleTimeoutMs);
    observer?.onNegotiated?.(params);

    engine = new ReassemblyEngine(params);
    return await runReceiverTransfer(channel, engine, {
      idleTimeoutMs,
      pending,
      observer,
    });
  } catch (err) {
    // the peer went away while we were replying
    if (!isSlidewireError(err, "E_CONNECTION_CLOSED")) throw err;
    return {
      finished: false,
      reason: "closed",
      data: engine?.delivered ?? "",
      lastAck: engine?.ackNumber ?? -1,
    };
  } finally {
    channel.close();
    options.onTelemetry?.(channel.telemetry);
  }
}

export {
  ReassemblyEngine,
  BACKLOG_THRESHOLD,
  SHRINK_STEP,
  GROW_STEP,
  MIN_SEGMENT_SIZE,
} from "./reassembly";
export type { AckDecision, ReassemblyOptions } from "./reassembly";
export { runReceiverTransfer } from "./transfer";
