export { SlidewireClient } from "./client";
export { SlidewireServer } from "./server";
export { LineFramer } from "./framing";
export type { LineFramerOptions } from "./framing";
export { MessageChannel } from "./channel";
export type { ReceiveResult, MessageChannelOptions } from "./channel";
export { messages, encodeMessage, decodeMessage, toWireRecord } from "./codecs";
export {
  messageKinds,
  isMessageKind,
  type Message,
  type MessageKind,
  type MessageOf,
} from "./schema/messages";
export { SlidewireError, isSlidewireError } from "./errors";
export type { SlidewireErrorCode } from "./errors";
export { TypedEventEmitter } from "./typedEmitter";
export { SeqMap } from "./utils/seq-map";
export { initiateHandshake, acceptHandshake } from "./handshake/handshake";
export {
  requestParameters,
  answerParameters,
  DEFAULT_MAX_SEGMENT_SIZE,
} from "./handshake/negotiation";
export { closeSession, acknowledgeClose } from "./termination";
export {
  runSenderSession,
  runSenderTransfer,
  SenderWindow,
  cutSegment,
  resolvePollInterval,
  DEFAULT_POLL_INTERVAL_MS,
  type SenderSessionOptions,
  type Segment,
} from "./sender";
export {
  runReceiverSession,
  runReceiverTransfer,
  ReassemblyEngine,
  BACKLOG_THRESHOLD,
  SHRINK_STEP,
  GROW_STEP,
  MIN_SEGMENT_SIZE,
  type ReceiverSessionOptions,
  type AckDecision,
} from "./receiver";
export {
  parseSenderConfig,
  parseReceiverConfig,
  parseClientConfigText,
  parseServerConfigText,
  loadClientConfig,
  loadServerConfig,
  CLIENT_CONFIG_DEFAULTS,
  SERVER_CONFIG_DEFAULTS,
  type SenderConfig,
  type ReceiverConfig,
  type ClientFileConfig,
  type ServerFileConfig,
  type Prompt,
} from "./config";
export { createConsoleTelemetryLogger } from "./telemetry-logger";
export { createConsoleSessionLogger } from "./session-logger";
export type * from "./types/types";
