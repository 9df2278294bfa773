import type { Duplex } from "node:stream";
import { MessageChannel } from "../channel";
import { parseSenderConfig, type SenderConfig } from "../config";
import { initiateHandshake } from "../handshake/handshake";
import { requestParameters } from "../handshake/negotiation";
import { closeSession } from "../termination";
import type {
  SenderObserver,
  SenderSessionResult,
  SlidewireTelemetry,
} from "../types/types";
import { resolvePollInterval, runSenderTransfer } from "./transfer";
import { SenderWindow } from "./window";

export interface SenderSessionOptions {
  observer?: SenderObserver;
  /** Clock for the retransmission timer */
  now?: () => number;
  maxLineLength?: number;
  onTelemetry?: (metrics: SlidewireTelemetry) => void;
}

/**
 * Runs one complete sending session over an established stream: handshake,
 * negotiation, windowed transfer, termination. The stream is half-closed
 * when the session ends, whether it succeeded or not.
 */
export async function runSenderSession(
  stream: Duplex,
  config: SenderConfig,
  options: SenderSessionOptions = {},
): Promise<SenderSessionResult> {
  const { sourceData, windowSize, timeoutSeconds, pollIntervalMs } =
    parseSenderConfig(config);
  const timeoutMs = timeoutSeconds * 1000;
  const observer = options.observer;
  const channel = new MessageChannel(stream, {
    maxLineLength: options.maxLineLength,
  });

  try {
    await initiateHandshake(channel, timeoutMs, observer?.onState);
    const params = await requestParameters(channel, timeoutMs);
    observer?.onNegotiated?.(params);

    const window = new SenderWindow({
      source: sourceData,
      windowSize,
      timeoutMs,
      maxSegmentSize: params.maxSegmentSize,
      adaptive: params.adaptive,
      now: options.now,
    });
    const report = await runSenderTransfer(channel, window, {
      pollIntervalMs: resolvePollInterval(timeoutMs, pollIntervalMs),
      observer,
    });
    const confirmed = await closeSession(channel, timeoutMs);
    return { ...report, params, confirmed };
  } finally {
    channel.close();
    options.onTelemetry?.(channel.telemetry);
  }
}

export { SenderWindow, cutSegment } from "./window";
export type { Segment, SenderWindowOptions, AckOutcome } from "./window";
export {
  runSenderTransfer,
  resolvePollInterval,
  DEFAULT_POLL_INTERVAL_MS,
} from "./transfer";
