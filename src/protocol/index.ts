/**
 * Relay wire protocol: message types and codec.
 */

export {
  MESSAGE_TYPES,
  REQUEST_TYPE,
  REPLY_TYPE,
  isMessageType,
  isBroadcastRequest,
  isBroadcastReply,
  kindOf,
} from "./messages.js";
export type {
  MessageType,
  RequestType,
  ReplyType,
  RegistrationStatus,
  RelayMessage,
  BroadcastRequest,
  BroadcastReply,
  ErrorNotice,
} from "./messages.js";

export {
  MAX_DEVICE_ID_BYTES,
  decodeDatagram,
  encodeMessage,
  parseMessage,
  serializeMessage,
  truncateUtf8,
  formatOutcome,
  parseOutcome,
} from "./codec.js";
export type { ParseResult, ParseFailureReason, Outcome } from "./codec.js";
