import type net from "node:net";
import type { ReceiverConfig, SenderConfig } from "../config";

export type SenderHandshakeState = "Idle" | "Initiated" | "Established";
export type ReceiverHandshakeState = "Listening" | "Received" | "Established";

export interface NegotiatedParams {
  /** Upper bound on a DATA payload, in UTF-8 bytes */
  maxSegmentSize: number;
  adaptive: boolean;
}

export type SegmentOutcome = "accepted" | "duplicate" | "rejected";

export interface SegmentSentEvent {
  seq: number;
  /** UTF-8 byte length of the payload */
  length: number;
  retransmit: boolean;
}

export interface AckReceivedEvent {
  ack: number;
  base: number;
  nextSeq: number;
}

export interface RetransmitEvent {
  base: number;
  nextSeq: number;
}

export interface SegmentReceivedEvent {
  seq: number | null;
  outcome: SegmentOutcome;
  ack: number;
  backlog: number;
}

/**
 * Callbacks invoked from the sender's control flow. The engine never logs;
 * peers forward these to their event emitters.
 */
export interface SenderObserver {
  onState?: (state: SenderHandshakeState) => void;
  onNegotiated?: (params: NegotiatedParams) => void;
  onSegment?: (event: SegmentSentEvent) => void;
  onAck?: (event: AckReceivedEvent) => void;
  onTimeout?: (event: RetransmitEvent) => void;
  onResize?: (maxSegmentSize: number) => void;
}

export interface ReceiverObserver {
  onState?: (state: ReceiverHandshakeState) => void;
  onNegotiated?: (params: NegotiatedParams) => void;
  onSegment?: (event: SegmentReceivedEvent) => void;
  onResize?: (maxSegmentSize: number) => void;
  onComplete?: (data: string) => void;
}

export interface TransferReport {
  /** Distinct segments cut from the source */
  segments: number;
  retransmissions: number;
  /** UTF-8 bytes of source data transferred */
  bytes: number;
  finalMaxSegmentSize: number;
}

export interface SenderSessionResult extends TransferReport {
  params: NegotiatedParams;
  /** True when the receiver answered FIN with FIN_ACK */
  confirmed: boolean;
}

export type ReceiverSessionEnd = "fin" | "closed" | "idle" | "handshake";

export interface ReceiverSessionResult {
  /** True only when the session ended on FIN */
  finished: boolean;
  reason: ReceiverSessionEnd;
  /** Contiguously delivered data (the full message when finished) */
  data: string;
  lastAck: number;
}

export interface SlidewireClientOptions extends SenderConfig {
  host: string;
  port: number;
  /**
   * Timeout for establishing a connection before failing with E_CONNECT_TIMEOUT (ms).
   */
  connectTimeoutMs?: number;
  onTelemetry?: (metrics: SlidewireTelemetry) => void;
}

export interface SlidewireServerOptions extends ReceiverConfig {
  host?: string;
  port: number;
  /**
   * When set, a receiver read that stays silent this long ends the session.
   * By default the receiver waits indefinitely.
   */
  idleTimeoutMs?: number;
  maxLineLength?: number;
  onTelemetry?: (metrics: SlidewireTelemetry) => void;
}

export interface SlidewireClientEvents {
  connect: void;
  state: SenderHandshakeState;
  negotiated: NegotiatedParams;
  segment: SegmentSentEvent;
  ack: AckReceivedEvent;
  timeout: RetransmitEvent;
  resize: { maxSegmentSize: number };
  complete: SenderSessionResult;
  close: { hadError: boolean };
}

export interface SlidewireServerConnection {
  id: string;
  remoteAddress?: string;
  remotePort?: number;
}

export interface SlidewireServerEvents {
  listening: net.AddressInfo;
  connection: SlidewireServerConnection;
  state: { client: SlidewireServerConnection; state: ReceiverHandshakeState };
  negotiated: { client: SlidewireServerConnection; params: NegotiatedParams };
  segment: { client: SlidewireServerConnection } & SegmentReceivedEvent;
  resize: { client: SlidewireServerConnection; maxSegmentSize: number };
  complete: { client: SlidewireServerConnection; data: string };
  sessionEnd: { client: SlidewireServerConnection; result: ReceiverSessionResult };
  close: void;
  error: Error;
}

export interface SlidewireTelemetry {
  bytesIn: number;
  bytesOut: number;
  messagesIn: number;
  messagesOut: number;
  malformed: number;
}
