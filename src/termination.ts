import type { MessageChannel } from "./channel";
import { messages } from "./codecs";

/**
 * Sender side: FIN, then wait up to `timeoutMs` for FIN_ACK. Late CUM_ACKs
 * answering retransmitted segments are skipped; anything else ends the wait.
 * Resolves false when the receiver does not confirm; FIN is never resent.
 */
export async function closeSession(
  channel: MessageChannel,
  timeoutMs: number,
  now: () => number = Date.now,
): Promise<boolean> {
  await channel.send(messages.fin());
  const deadline = now() + timeoutMs;
  for (;;) {
    const reply = await channel.receive(deadline - now());
    if (reply.status !== "message") return false;
    switch (reply.message.kind) {
      case "FIN_ACK":
        return true;
      case "CUM_ACK":
      case "MALFORMED":
        continue;
      default:
        return false;
    }
  }
}

/** Receiver side: hands over the delivered data, then answers FIN_ACK. */
export async function acknowledgeClose(
  channel: MessageChannel,
  delivered: string,
  onComplete?: (data: string) => void,
): Promise<void> {
  onComplete?.(delivered);
  await channel.send(messages.finAck());
}
