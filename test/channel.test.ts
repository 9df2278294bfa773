import { afterEach, describe, expect, it } from "vitest";
import { MessageChannel } from "../src/channel";
import { encodeMessage, messages } from "../src/codecs";
import { createDuplexPair } from "./helpers/memory-duplex";

describe("MessageChannel", () => {
  let sever: () => void = () => {};

  afterEach(() => sever());

  const setup = () => {
    const pair = createDuplexPair();
    sever = pair.sever;
    return { raw: pair.a, channel: new MessageChannel(pair.b), peerStream: pair.a };
  };

  it("hands out inbound messages in arrival order", async () => {
    const { raw, channel } = setup();
    raw.write('{"type":"HELLO"}\n{"type":"DATA","seq":0,"payload":"hi"}\n');

    expect(await channel.receive(1000)).toEqual({
      status: "message",
      message: messages.hello(),
    });
    expect(await channel.receive(1000)).toEqual({
      status: "message",
      message: messages.data(0, "hi"),
    });
  });

  it("times out when nothing arrives", async () => {
    const { channel } = setup();
    expect(await channel.receive(20)).toEqual({ status: "timeout" });
    expect(await channel.receive(0)).toEqual({ status: "timeout" });
  });

  it("turns blank and unparsable lines into MALFORMED", async () => {
    const { raw, channel } = setup();
    raw.write("\nnot json\n");

    expect(await channel.receive(1000)).toEqual({
      status: "message",
      message: messages.malformed("empty_record"),
    });
    expect(await channel.receive(1000)).toEqual({
      status: "message",
      message: messages.malformed("bad_json"),
    });
    expect(channel.telemetry.malformed).toBe(2);
  });

  it("reports over-long lines as MALFORMED", async () => {
    const pair = createDuplexPair();
    sever = pair.sever;
    const channel = new MessageChannel(pair.b, { maxLineLength: 8 });
    pair.a.write('{"type":"HELLO"}\n');

    expect(await channel.receive(1000)).toEqual({
      status: "message",
      message: messages.malformed("line_too_long"),
    });
  });

  it("resolves a pending receive with closed once the peer ends", async () => {
    const { raw, channel } = setup();
    const pending = channel.receive();
    raw.end();

    expect(await pending).toEqual({ status: "closed" });
    expect(await channel.receive(1000)).toEqual({ status: "closed" });
    expect(channel.isClosed).toBe(true);
  });

  it("still hands out queued messages after the peer ended", async () => {
    const { raw, channel } = setup();
    raw.end('{"type":"FIN"}\n');
    await channel.next("closed", 1000);

    expect(await channel.receive(0)).toEqual({
      status: "message",
      message: messages.fin(),
    });
    expect(await channel.receive(0)).toEqual({ status: "closed" });
  });

  it("refuses to send once closed", async () => {
    const { channel } = setup();
    channel.close();

    await expect(channel.send(messages.hello())).rejects.toMatchObject({
      code: "E_CONNECTION_CLOSED",
    });
  });

  it("allows one reader at a time", async () => {
    const { raw, channel } = setup();
    const first = channel.receive(1000);

    await expect(channel.receive(1000)).rejects.toThrow(
      "MessageChannel supports one reader at a time",
    );

    raw.write('{"type":"FIN"}\n');
    expect(await first).toEqual({ status: "message", message: messages.fin() });
  });

  it("writes one record per message and counts it", async () => {
    const { channel, peerStream } = setup();
    const peer = new MessageChannel(peerStream);

    await channel.send(messages.cumAck(3));

    expect(await peer.receive(1000)).toEqual({
      status: "message",
      message: messages.cumAck(3),
    });
    expect(channel.telemetry).toMatchObject({
      messagesOut: 1,
      bytesOut: encodeMessage(messages.cumAck(3)).length,
    });
    expect(peer.telemetry.messagesIn).toBe(1);
  });
});
