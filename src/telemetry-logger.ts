import type { SlidewireTelemetry } from "./types/types";

/**
 * Simple console telemetry logger; pass to onTelemetry to trace bytes and messages per session.
 */
export const createConsoleTelemetryLogger = (prefix = "slidewire") => {
  return (metrics: SlidewireTelemetry) => {
    const msg = [
      `[${prefix}]`,
      `in=${metrics.bytesIn}`,
      `out=${metrics.bytesOut}`,
      `msgIn=${metrics.messagesIn}`,
      `msgOut=${metrics.messagesOut}`,
      `malformed=${metrics.malformed}`,
    ].join(" ");
    console.log(msg);
  };
};
