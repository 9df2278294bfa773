import {
  cumAckSchema,
  dataSchema,
  isMessageKind,
  malformedSchema,
  recordEnvelopeSchema,
  sizeReplySchema,
  type Message,
  type MessageKind,
} from "./schema/messages";

const assertNever = (value: never): never => {
  throw new Error(`Unhandled message kind: ${JSON.stringify(value)}`);
};

const freeze = (message: Message): Message => Object.freeze(message);

/** Frozen message constructors. */
export const messages = {
  hello: (): Message => freeze({ kind: "HELLO" }),
  helloAck: (): Message => freeze({ kind: "HELLO_ACK" }),
  ackHello: (): Message => freeze({ kind: "ACK_HELLO" }),
  sizeRequest: (): Message => freeze({ kind: "SIZE_REQUEST" }),
  sizeReply: (maxSize?: number, adaptive?: boolean): Message =>
    freeze({ kind: "SIZE_REPLY", maxSize, adaptive }),
  data: (seq: number | null, payload: string | null): Message =>
    freeze({ kind: "DATA", seq, payload }),
  cumAck: (ack: number, maxSize?: number): Message =>
    freeze({ kind: "CUM_ACK", ack, maxSize }),
  fin: (): Message => freeze({ kind: "FIN" }),
  finAck: (): Message => freeze({ kind: "FIN_ACK" }),
  malformed: (reason: string): Message =>
    freeze({ kind: "MALFORMED", reason }),
};

/** Plain record for JSON serialization; absent optional fields are left out. */
export const toWireRecord = (message: Message): Record<string, unknown> => {
  switch (message.kind) {
    case "SIZE_REPLY": {
      const record: Record<string, unknown> = { type: message.kind };
      if (message.maxSize !== undefined) record.maxSize = message.maxSize;
      if (message.adaptive !== undefined) record.adaptive = message.adaptive;
      return record;
    }
    case "DATA":
      return { type: message.kind, seq: message.seq, payload: message.payload };
    case "CUM_ACK":
      return message.maxSize === undefined
        ? { type: message.kind, ack: message.ack }
        : { type: message.kind, ack: message.ack, maxSize: message.maxSize };
    case "MALFORMED":
      return { type: message.kind, reason: message.reason };
    case "HELLO":
    case "HELLO_ACK":
    case "ACK_HELLO":
    case "SIZE_REQUEST":
    case "FIN":
    case "FIN_ACK":
      return { type: message.kind };
    default:
      return assertNever(message);
  }
};

// `{"type":"DATA","seq":<n>,"payload":""}` with room for any safe-integer seq
const DATA_ENVELOPE_BYTES = 64;
// JSON escapes a control character as `\u00XX`
const MAX_ESCAPED_BYTES_PER_BYTE = 6;

/** Longest line a DATA record with a payload of `maxPayloadBytes` can encode to. */
export const maxDataRecordLength = (maxPayloadBytes: number): number =>
  maxPayloadBytes * MAX_ESCAPED_BYTES_PER_BYTE + DATA_ENVELOPE_BYTES;

/** One JSON record terminated by a line break. */
export const encodeMessage = (message: Message): Buffer =>
  Buffer.from(`${JSON.stringify(toWireRecord(message))}\n`, "utf8");

/**
 * Decodes one record. A zero-length read (the peer closed) yields `null`;
 * anything unparsable yields a MALFORMED message instead of throwing.
 */
export const decodeMessage = (
  record: Buffer | string | null | undefined,
): Message | null => {
  if (record === null || record === undefined || record.length === 0) {
    return null;
  }
  const text = typeof record === "string" ? record : record.toString("utf8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.trim());
  } catch {
    return messages.malformed("bad_json");
  }

  const envelope = recordEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) return messages.malformed("missing_type");
  const { type } = envelope.data;
  if (!isMessageKind(type)) return messages.malformed(`unknown_type:${type}`);
  return decodeFields(type, envelope.data);
};

const decodeFields = (kind: MessageKind, fields: unknown): Message => {
  const invalid = () => messages.malformed(`invalid_fields:${kind}`);
  switch (kind) {
    case "HELLO":
      return messages.hello();
    case "HELLO_ACK":
      return messages.helloAck();
    case "ACK_HELLO":
      return messages.ackHello();
    case "SIZE_REQUEST":
      return messages.sizeRequest();
    case "FIN":
      return messages.fin();
    case "FIN_ACK":
      return messages.finAck();
    case "SIZE_REPLY": {
      const parsed = sizeReplySchema.safeParse(fields);
      if (!parsed.success) return invalid();
      return messages.sizeReply(parsed.data.maxSize, parsed.data.adaptive);
    }
    case "DATA": {
      const parsed = dataSchema.safeParse(fields);
      if (!parsed.success) return invalid();
      const { seq, payload } = parsed.data;
      return messages.data(
        typeof seq === "number" ? seq : null,
        payload === undefined ? "" : typeof payload === "string" ? payload : null,
      );
    }
    case "CUM_ACK": {
      const parsed = cumAckSchema.safeParse(fields);
      if (!parsed.success) return invalid();
      return messages.cumAck(parsed.data.ack, parsed.data.maxSize);
    }
    case "MALFORMED": {
      const parsed = malformedSchema.safeParse(fields);
      if (!parsed.success) return invalid();
      return messages.malformed(parsed.data.reason);
    }
    default:
      return assertNever(kind);
  }
};
