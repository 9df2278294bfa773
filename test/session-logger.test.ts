import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { SlidewireClient } from "../src/client";
import { SlidewireServer } from "../src/server";
import { createConsoleSessionLogger } from "../src/session-logger";

describe("session logger", () => {
  let spy: MockInstance<typeof console.log>;

  beforeEach(() => {
    spy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    spy.mockRestore();
  });

  const lines = () => spy.mock.calls.map(call => call[0]);

  it("prints sender status lines", () => {
    const client = new SlidewireClient({
      host: "127.0.0.1",
      port: 12345,
      sourceData: "HELLO WORLD",
      windowSize: 4,
      timeoutSeconds: 1,
    });
    createConsoleSessionLogger("client").attachClient(client, 4);

    client.emit("negotiated", { maxSegmentSize: 400, adaptive: false });
    client.emit("segment", { seq: 0, length: 10, retransmit: false });
    client.emit("segment", { seq: 0, length: 10, retransmit: true });
    client.emit("ack", { ack: 0, base: 1, nextSeq: 2 });
    client.emit("timeout", { base: 1, nextSeq: 2 });
    client.emit("resize", { maxSegmentSize: 380 });
    client.emit("complete", {
      segments: 2,
      retransmissions: 1,
      bytes: 11,
      finalMaxSegmentSize: 380,
      params: { maxSegmentSize: 400, adaptive: true },
      confirmed: true,
    });

    expect(lines()).toEqual([
      "[client] Starting transfer. Window Size: 4, Initial MMS: 400",
      "[client] [SEND] Seq 0 (len: 10)",
      "[client] [ACK] Cumulative up to 0",
      "[client] [TIMEOUT] Retransmitting window starting from 1",
      "[client] [MMS] Now 380",
      "[client] Transfer Complete. FIN_ACK received.",
    ]);
  });

  it("prints the final message and unfinished sessions on the server", () => {
    const server = new SlidewireServer({
      port: 0,
      maxMessageSize: 400,
      adaptiveSizing: false,
    });
    createConsoleSessionLogger("server").attachServer(server);
    const client = { id: "session-1" };

    server.emit("listening", { address: "127.0.0.1", family: "IPv4", port: 12345 });
    server.emit("complete", { client, data: "hello" });
    server.emit("sessionEnd", {
      client,
      result: { finished: true, reason: "fin", data: "hello", lastAck: 0 },
    });
    server.emit("sessionEnd", {
      client,
      result: { finished: false, reason: "closed", data: "", lastAck: -1 },
    });

    expect(lines()).toEqual([
      "[server] The server is ready to receive on 127.0.0.1:12345",
      "\n--- FINAL MESSAGE ---\nhello\n--------------------\n",
      "[server] Session session-1 ended: closed",
    ]);
  });
});
