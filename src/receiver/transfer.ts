import type { MessageChannel } from "../channel";
import { messages } from "../codecs";
import type { Message } from "../schema/messages";
import { acknowledgeClose } from "../termination";
import type { ReceiverObserver, ReceiverSessionResult } from "../types/types";
import type { ReassemblyEngine } from "./reassembly";

export interface ReceiverTransferOptions {
  /** Unbounded when omitted */
  idleTimeoutMs?: number;
  /** A message already read during negotiation */
  pending?: Message;
  observer?: ReceiverObserver;
}

/**
 * Receiver loop: every DATA is fed to the engine and acknowledged; FIN hands
 * over the delivered data and ends the loop. Other message kinds are ignored.
 */
export async function runReceiverTransfer(
  channel: MessageChannel,
  engine: ReassemblyEngine,
  options: ReceiverTransferOptions = {},
): Promise<ReceiverSessionResult> {
  const { observer } = options;
  let pending = options.pending;
  const end = (reason: ReceiverSessionResult["reason"]): ReceiverSessionResult => ({
    finished: reason === "fin",
    reason,
    data: engine.delivered,
    lastAck: engine.ackNumber,
  });

  for (;;) {
    let message: Message;
    if (pending) {
      message = pending;
      pending = undefined;
    } else {
      const result = await channel.receive(options.idleTimeoutMs);
      if (result.status === "closed") return end("closed");
      if (result.status === "timeout") return end("idle");
      message = result.message;
    }

    switch (message.kind) {
      case "FIN":
        await acknowledgeClose(channel, engine.delivered, observer?.onComplete);
        return end("fin");
      case "DATA": {
        const decision = engine.receive(message.seq, message.payload);
        observer?.onSegment?.({
          seq: message.seq,
          outcome: decision.outcome,
          ack: decision.ack,
          backlog: engine.backlog,
        });
        if (decision.resized) observer?.onResize?.(engine.maxSegmentSize);
        await channel.send(messages.cumAck(decision.ack, decision.maxSize));
        break;
      }
      case "HELLO":
      case "HELLO_ACK":
      case "ACK_HELLO":
      case "SIZE_REQUEST":
      case "SIZE_REPLY":
      case "CUM_ACK":
      case "FIN_ACK":
      case "MALFORMED":
        break;
      default: {
        const unreachable: never = message;
        return unreachable;
      }
    }
  }
}
