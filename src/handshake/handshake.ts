import type { MessageChannel, ReceiveResult } from "../channel";
import { messages } from "../codecs";
import { SlidewireError } from "../errors";
import type { MessageKind } from "../schema/messages";
import type {
  ReceiverHandshakeState,
  SenderHandshakeState,
} from "../types/types";

const summarize = (result: ReceiveResult): string =>
  result.status === "message" ? result.message.kind : result.status;

const isKind = (result: ReceiveResult, kind: MessageKind): boolean =>
  result.status === "message" && result.message.kind === kind;

/**
 * Sender side of the three-way exchange: HELLO, expect HELLO_ACK, answer
 * ACK_HELLO. Anything else within `timeoutMs` is fatal; there is no retry.
 */
export async function initiateHandshake(
  channel: MessageChannel,
  timeoutMs: number,
  onState?: (state: SenderHandshakeState) => void,
): Promise<void> {
  onState?.("Idle");
  await channel.send(messages.hello());
  onState?.("Initiated");

  const reply = await channel.receive(timeoutMs);
  if (!isKind(reply, "HELLO_ACK")) {
    throw new SlidewireError(
      "E_HANDSHAKE_FAILED",
      `Handshake failed: expected HELLO_ACK, got ${summarize(reply)}`,
    );
  }
  await channel.send(messages.ackHello());
  onState?.("Established");
}

/**
 * Receiver side. Resolves false when the peer does not follow the exchange;
 * the caller drops the connection without replying.
 */
export async function acceptHandshake(
  channel: MessageChannel,
  timeoutMs: number | undefined,
  onState?: (state: ReceiverHandshakeState) => void,
): Promise<boolean> {
  onState?.("Listening");
  const hello = await channel.receive(timeoutMs);
  if (!isKind(hello, "HELLO")) return false;
  onState?.("Received");

  await channel.send(messages.helloAck());
  const ack = await channel.receive(timeoutMs);
  if (!isKind(ack, "ACK_HELLO")) return false;
  onState?.("Established");
  return true;
}
