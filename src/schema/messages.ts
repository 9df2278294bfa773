import { z } from "zod";

/**
 * Every message kind carried on the wire. The record's `type` field holds one
 * of these names.
 */
export const messageKinds = [
  "HELLO",
  "HELLO_ACK",
  "ACK_HELLO",
  "SIZE_REQUEST",
  "SIZE_REPLY",
  "DATA",
  "CUM_ACK",
  "FIN",
  "FIN_ACK",
  "MALFORMED",
] as const;

export type MessageKind = (typeof messageKinds)[number];

export type Message =
  | { readonly kind: "HELLO" }
  | { readonly kind: "HELLO_ACK" }
  | { readonly kind: "ACK_HELLO" }
  | { readonly kind: "SIZE_REQUEST" }
  | {
      readonly kind: "SIZE_REPLY";
      readonly maxSize?: number;
      readonly adaptive?: boolean;
    }
  | {
      readonly kind: "DATA";
      /** null when the record carried no numeric seq */
      readonly seq: number | null;
      /** null when the record carried a non-string payload */
      readonly payload: string | null;
    }
  | { readonly kind: "CUM_ACK"; readonly ack: number; readonly maxSize?: number }
  | { readonly kind: "FIN" }
  | { readonly kind: "FIN_ACK" }
  | { readonly kind: "MALFORMED"; readonly reason: string };

export type MessageOf<K extends MessageKind> = Extract<Message, { kind: K }>;

export const isMessageKind = (value: unknown): value is MessageKind =>
  typeof value === "string" &&
  messageKinds.some(kind => kind === value);

export const recordEnvelopeSchema = z
  .object({ type: z.string().min(1) })
  .passthrough();

export const sizeReplySchema = z.object({
  maxSize: z.number().int().positive().optional(),
  adaptive: z.boolean().optional(),
});

/**
 * DATA fields stay loose here. The receiver rejects a bad seq or payload and
 * still acknowledges it.
 */
export const dataSchema = z.object({
  seq: z.unknown(),
  payload: z.unknown(),
});

export const cumAckSchema = z.object({
  ack: z.number().int().min(-1),
  maxSize: z.number().int().positive().optional(),
});

export const malformedSchema = z.object({
  reason: z.string(),
});
