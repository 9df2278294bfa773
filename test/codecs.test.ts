import { describe, expect, it } from "vitest";
import {
  decodeMessage,
  encodeMessage,
  maxDataRecordLength,
  messages,
} from "../src/codecs";

const wire = (message: Parameters<typeof encodeMessage>[0]) =>
  encodeMessage(message).toString("utf8");

describe("message codec", () => {
  describe("encodeMessage", () => {
    it("writes one JSON record per line with the wire field names", () => {
      expect(wire(messages.hello())).toBe('{"type":"HELLO"}\n');
      expect(wire(messages.data(3, "abc"))).toBe(
        '{"type":"DATA","seq":3,"payload":"abc"}\n',
      );
      expect(wire(messages.sizeReply(400, false))).toBe(
        '{"type":"SIZE_REPLY","maxSize":400,"adaptive":false}\n',
      );
      expect(wire(messages.cumAck(7, 120))).toBe(
        '{"type":"CUM_ACK","ack":7,"maxSize":120}\n',
      );
    });

    it("leaves absent optional fields out", () => {
      expect(wire(messages.cumAck(-1))).toBe('{"type":"CUM_ACK","ack":-1}\n');
      expect(wire(messages.sizeReply())).toBe('{"type":"SIZE_REPLY"}\n');
    });

    it("can encode MALFORMED", () => {
      expect(wire(messages.malformed("bad_json"))).toBe(
        '{"type":"MALFORMED","reason":"bad_json"}\n',
      );
    });
  });

  describe("maxDataRecordLength", () => {
    it("covers a payload made only of escaped control characters", () => {
      const payload = "\u0001".repeat(50);
      const line = encodeMessage(
        messages.data(Number.MAX_SAFE_INTEGER, payload),
      ).length - 1;

      expect(Buffer.byteLength(payload, "utf8")).toBe(50);
      expect(line).toBe(50 * 6 + 51);
      expect(line).toBeLessThanOrEqual(maxDataRecordLength(50));
    });
  });

  describe("decodeMessage", () => {
    it("returns null for an empty read", () => {
      expect(decodeMessage(Buffer.alloc(0))).toBeNull();
      expect(decodeMessage("")).toBeNull();
      expect(decodeMessage(null)).toBeNull();
    });

    it("decodes what encodeMessage wrote", () => {
      const sent = messages.data(12, "héllo wörld");
      expect(decodeMessage(encodeMessage(sent))).toEqual(sent);
      expect(decodeMessage('{"type":"FIN_ACK"}')).toEqual(messages.finAck());
    });

    it("returns frozen messages", () => {
      const decoded = decodeMessage('{"type":"CUM_ACK","ack":2}');
      expect(decoded).toEqual({ kind: "CUM_ACK", ack: 2 });
      expect(Object.isFrozen(decoded)).toBe(true);
    });

    it("flags unparsable records as MALFORMED", () => {
      expect(decodeMessage("not json")).toEqual(messages.malformed("bad_json"));
      expect(decodeMessage("[1,2]")).toEqual(messages.malformed("missing_type"));
      expect(decodeMessage('{"seq":1}')).toEqual(
        messages.malformed("missing_type"),
      );
      expect(decodeMessage('{"type":"NOPE"}')).toEqual(
        messages.malformed("unknown_type:NOPE"),
      );
      expect(decodeMessage('{"type":"CUM_ACK","ack":"x"}')).toEqual(
        messages.malformed("invalid_fields:CUM_ACK"),
      );
      expect(decodeMessage('{"type":"SIZE_REPLY","maxSize":0}')).toEqual(
        messages.malformed("invalid_fields:SIZE_REPLY"),
      );
    });

    it("keeps bad DATA fields for the receiver to reject", () => {
      expect(decodeMessage('{"type":"DATA","seq":"3","payload":5}')).toEqual(
        messages.data(null, null),
      );
      expect(decodeMessage('{"type":"DATA","seq":1}')).toEqual(
        messages.data(1, ""),
      );
    });

    it("reads SIZE_REPLY without fields as absent values", () => {
      const decoded = decodeMessage('{"type":"SIZE_REPLY"}');
      expect(decoded).toEqual({ kind: "SIZE_REPLY" });
    });
  });
});
