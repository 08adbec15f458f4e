/**
 * Message Codec
 *
 * Converts between datagrams and RelayMessage records. Encoding always
 * yields a newline-terminated datagram that fits the receiver's fixed
 * buffer with one byte to spare for its terminator.
 */

import { DEFAULT_MAX_MESSAGE_BYTES } from "../config.js";
import {
  isMessageType,
  type ReplyType,
  type RelayMessage,
} from "./messages.js";

export type ParseFailureReason = "unknown-type" | "malformed";

export type ParseResult =
  | { ok: true; message: RelayMessage }
  | { ok: false; reason: ParseFailureReason; tag: string };

/** Longest device id in bytes. */
export const MAX_DEVICE_ID_BYTES = 31;

/**
 * Read a received datagram the way a fixed receive buffer would:
 * at most `maxBytes - 1` bytes, cut at the first NUL.
 */
export function decodeDatagram(data: Uint8Array, maxBytes = DEFAULT_MAX_MESSAGE_BYTES): string {
  const limit = Math.min(data.length, maxBytes - 1);
  const nul = data.indexOf(0);
  const end = nul !== -1 && nul < limit ? nul : limit;
  return Buffer.from(data.subarray(0, end)).toString("utf8");
}

/**
 * Truncate `text` to at most `maxBytes` UTF-8 bytes without splitting a
 * multi-byte character.
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  const bytes = Buffer.from(text, "utf8");
  if (bytes.length <= maxBytes) return text;
  let end = Math.max(0, maxBytes);
  // Back off continuation bytes (10xxxxxx) so the cut lands on a lead byte.
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) end--;
  return bytes.subarray(0, end).toString("utf8");
}

/** Serialize without the trailing newline and without any size limit. */
export function serializeMessage(message: RelayMessage): string {
  switch (message.type) {
    case "REGISTER":
    case "HEARTBEAT":
    case "UNREGISTER":
      return `${message.type}:${message.deviceId}`;
    case "REGISTERED":
      return `REGISTERED:${message.status}`;
    case "ERROR":
      return `ERROR:${message.code}:${message.detail}`;
    case "TIME_REQUEST":
    case "LS_REQUEST":
    case "CAMERA_REQUEST":
    case "S3_UPLOAD_REQUEST":
      return message.type;
    case "TIME_RESPONSE":
    case "LS_RESPONSE":
    case "CAMERA_RESPONSE":
    case "S3_UPLOAD_RESPONSE":
      return `${message.type}:${message.deviceId}:${message.payload}`;
  }
}

/**
 * Encode a message into a datagram of at most `maxBytes - 1` bytes,
 * newline included. Oversized bodies are truncated.
 */
export function encodeMessage(message: RelayMessage, maxBytes = DEFAULT_MAX_MESSAGE_BYTES): Buffer {
  const body = truncateUtf8(serializeMessage(message), maxBytes - 2);
  return Buffer.from(`${body}\n`, "utf8");
}

/** Parse one datagram's text. Exactly one trailing newline is stripped. */
export function parseMessage(text: string): ParseResult {
  const body = text.endsWith("\n") ? text.slice(0, -1) : text;
  const sep = body.search(/[:\n]/);
  const tag = sep === -1 ? body : body.slice(0, sep);
  const rest = sep !== -1 && body[sep] === ":" ? body.slice(sep + 1) : "";

  if (!isMessageType(tag)) {
    return { ok: false, reason: "unknown-type", tag };
  }

  const malformed: ParseResult = { ok: false, reason: "malformed", tag };

  switch (tag) {
    case "REGISTER":
    case "HEARTBEAT":
    case "UNREGISTER":
      if (rest.length === 0) return malformed;
      return { ok: true, message: { type: tag, deviceId: rest } };

    case "REGISTERED":
      if (rest.length === 0) return malformed;
      return { ok: true, message: { type: "REGISTERED", status: rest } };

    case "ERROR": {
      const [code, detail] = splitFirst(rest);
      if (code.length === 0) return malformed;
      return { ok: true, message: { type: "ERROR", code, detail } };
    }

    case "TIME_REQUEST":
    case "LS_REQUEST":
    case "CAMERA_REQUEST":
    case "S3_UPLOAD_REQUEST":
      return { ok: true, message: { type: tag } };

    case "TIME_RESPONSE":
    case "LS_RESPONSE":
    case "CAMERA_RESPONSE":
    case "S3_UPLOAD_RESPONSE":
      return parseReply(tag, rest) ?? malformed;
  }
}

function parseReply(type: ReplyType, rest: string): ParseResult | null {
  const [deviceId, payload] = splitFirst(rest);
  if (deviceId.length === 0 || deviceId.includes("\n")) return null;
  if (type === "TIME_RESPONSE" && payload.length === 0) return null;
  return { ok: true, message: { type, deviceId, payload } };
}

/** Split at the first colon; the second part is "" when there is none. */
function splitFirst(text: string): [string, string] {
  const idx = text.indexOf(":");
  return idx === -1 ? [text, ""] : [text.slice(0, idx), text.slice(idx + 1)];
}

// --- Collaborator outcomes ---

/** Result of a worker-side collaborator, as carried in a reply payload. */
export interface Outcome {
  ok: boolean;
  detail: string;
  /** Collaborator output, appended after a newline when non-empty. */
  output?: string;
}

/** `SUCCESS:<detail>` or `ERROR:<detail>`, then a newline and output when present. */
export function formatOutcome(outcome: Outcome): string {
  const head = `${outcome.ok ? "SUCCESS" : "ERROR"}:${outcome.detail}`;
  return outcome.output ? `${head}\n${outcome.output}` : head;
}

/** Inverse of formatOutcome. Returns null for payloads that carry no outcome. */
export function parseOutcome(payload: string): Outcome | null {
  let ok: boolean;
  let rest: string;
  if (payload.startsWith("SUCCESS:")) {
    ok = true;
    rest = payload.slice("SUCCESS:".length);
  } else if (payload.startsWith("ERROR:")) {
    ok = false;
    rest = payload.slice("ERROR:".length);
  } else {
    return null;
  }
  const nl = rest.indexOf("\n");
  return nl === -1
    ? { ok, detail: rest, output: "" }
    : { ok, detail: rest.slice(0, nl), output: rest.slice(nl + 1) };
}
