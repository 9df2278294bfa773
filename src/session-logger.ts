import type { SlidewireClient } from "./client";
import type { SlidewireServer } from "./server";

/**
 * Console status lines for a transfer. The engine itself never logs; attach
 * this to a client or server to print what it does.
 */
export const createConsoleSessionLogger = (prefix = "slidewire") => {
  const log = (line: string) => console.log(`[${prefix}] ${line}`);

  const attachClient = (client: SlidewireClient, windowSize: number) => {
    client.on("negotiated", params => {
      log(
        `Starting transfer. Window Size: ${windowSize}, Initial MMS: ${params.maxSegmentSize}`,
      );
    });
    client.on("segment", event => {
      if (!event.retransmit) log(`[SEND] Seq ${event.seq} (len: ${event.length})`);
    });
    client.on("ack", event => log(`[ACK] Cumulative up to ${event.ack}`));
    client.on("timeout", event =>
      log(`[TIMEOUT] Retransmitting window starting from ${event.base}`),
    );
    client.on("resize", event => log(`[MMS] Now ${event.maxSegmentSize}`));
    client.on("complete", result => {
      if (result.confirmed) log("Transfer Complete. FIN_ACK received.");
      else log("Transfer ended without FIN_ACK.");
    });
    return client;
  };

  const attachServer = (server: SlidewireServer) => {
    server.on("listening", address =>
      log(`The server is ready to receive on ${address.address}:${address.port}`),
    );
    server.on("complete", ({ data }) => {
      console.log(
        `\n--- FINAL MESSAGE ---\n${data}\n--------------------\n`,
      );
    });
    server.on("sessionEnd", ({ client, result }) => {
      if (!result.finished) log(`Session ${client.id} ended: ${result.reason}`);
    });
    return server;
  };

  return { attachClient, attachServer };
};
