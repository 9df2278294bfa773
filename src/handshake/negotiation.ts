import type { MessageChannel } from "../channel";
import { messages } from "../codecs";
import { SlidewireError } from "../errors";
import type { Message } from "../schema/messages";
import type { NegotiatedParams } from "../types/types";

/** Segment size assumed when the receiver's reply leaves it out. */
export const DEFAULT_MAX_SEGMENT_SIZE = 400;

/**
 * Asks the receiver for its segment size and adaptive flag. Exactly one read;
 * no reply is fatal, since both peers must agree on the size before DATA.
 */
export async function requestParameters(
  channel: MessageChannel,
  timeoutMs: number,
): Promise<NegotiatedParams> {
  await channel.send(messages.sizeRequest());
  const reply = await channel.receive(timeoutMs);
  if (reply.status !== "message") {
    throw new SlidewireError(
      "E_NEGOTIATION_FAILED",
      `Negotiation failed: no size reply (${reply.status})`,
    );
  }
  const message = reply.message;
  if (message.kind === "MALFORMED") {
    throw new SlidewireError(
      "E_NEGOTIATION_FAILED",
      `Negotiation failed: unreadable size reply (${message.reason})`,
    );
  }
  if (message.kind !== "SIZE_REPLY") {
    return { maxSegmentSize: DEFAULT_MAX_SEGMENT_SIZE, adaptive: false };
  }
  return {
    maxSegmentSize: message.maxSize ?? DEFAULT_MAX_SEGMENT_SIZE,
    adaptive: message.adaptive ?? false,
  };
}

/**
 * Reads one message and answers it when it is a SIZE_REQUEST. Any other
 * message is returned unanswered for the transfer loop to interpret.
 */
export async function answerParameters(
  channel: MessageChannel,
  params: NegotiatedParams,
  timeoutMs?: number,
): Promise<Message | undefined> {
  const request = await channel.receive(timeoutMs);
  if (request.status !== "message") return undefined;
  if (request.message.kind !== "SIZE_REQUEST") return request.message;
  await channel.send(messages.sizeReply(params.maxSegmentSize, params.adaptive));
  return undefined;
}
