/**
 * Relay wire messages.
 *
 * Every datagram is `<TYPE>[:<field>[:<field>...]]\n`. The last field of a
 * type takes the remainder of the datagram, so listing output and
 * collaborator logs may contain colons and newlines. Device ids may not.
 */

import type { BroadcastKind } from "../types.js";

export const MESSAGE_TYPES = [
  "REGISTER",
  "REGISTERED",
  "HEARTBEAT",
  "UNREGISTER",
  "TIME_REQUEST",
  "TIME_RESPONSE",
  "LS_REQUEST",
  "LS_RESPONSE",
  "CAMERA_REQUEST",
  "CAMERA_RESPONSE",
  "S3_UPLOAD_REQUEST",
  "S3_UPLOAD_RESPONSE",
  "ERROR",
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export type RequestType = "TIME_REQUEST" | "LS_REQUEST" | "CAMERA_REQUEST" | "S3_UPLOAD_REQUEST";

export type ReplyType = "TIME_RESPONSE" | "LS_RESPONSE" | "CAMERA_RESPONSE" | "S3_UPLOAD_RESPONSE";

/** Status carried by REGISTERED. Receivers accept any text; these are the ones the relay sends. */
export type RegistrationStatus = "OK" | "FULL" | "INVALID";

export interface RegisterMessage {
  type: "REGISTER";
  deviceId: string;
}

export interface RegisteredMessage {
  type: "REGISTERED";
  status: string;
}

export interface HeartbeatMessage {
  type: "HEARTBEAT";
  deviceId: string;
}

export interface UnregisterMessage {
  type: "UNREGISTER";
  deviceId: string;
}

/** Controller → relay → every active worker. Carries no fields. */
export interface BroadcastRequest {
  type: RequestType;
}

/** Worker → relay → controller. `payload` is the remainder after the device id. */
export interface BroadcastReply {
  type: ReplyType;
  deviceId: string;
  payload: string;
}

/** Relay → controller notice, e.g. `ERROR:BUSY:<detail>`. */
export interface ErrorNotice {
  type: "ERROR";
  code: string;
  detail: string;
}

export type RelayMessage =
  | RegisterMessage
  | RegisteredMessage
  | HeartbeatMessage
  | UnregisterMessage
  | BroadcastRequest
  | BroadcastReply
  | ErrorNotice;

export const REQUEST_TYPE: Record<BroadcastKind, RequestType> = {
  time: "TIME_REQUEST",
  listing: "LS_REQUEST",
  capture: "CAMERA_REQUEST",
  upload: "S3_UPLOAD_REQUEST",
};

export const REPLY_TYPE: Record<BroadcastKind, ReplyType> = {
  time: "TIME_RESPONSE",
  listing: "LS_RESPONSE",
  capture: "CAMERA_RESPONSE",
  upload: "S3_UPLOAD_RESPONSE",
};

const KIND_BY_TYPE: Record<RequestType | ReplyType, BroadcastKind> = {
  TIME_REQUEST: "time",
  TIME_RESPONSE: "time",
  LS_REQUEST: "listing",
  LS_RESPONSE: "listing",
  CAMERA_REQUEST: "capture",
  CAMERA_RESPONSE: "capture",
  S3_UPLOAD_REQUEST: "upload",
  S3_UPLOAD_RESPONSE: "upload",
};

export function isMessageType(tag: string): tag is MessageType {
  return (MESSAGE_TYPES as readonly string[]).includes(tag);
}

export function isBroadcastRequest(message: RelayMessage): message is BroadcastRequest {
  return (
    message.type === "TIME_REQUEST" ||
    message.type === "LS_REQUEST" ||
    message.type === "CAMERA_REQUEST" ||
    message.type === "S3_UPLOAD_REQUEST"
  );
}

export function isBroadcastReply(message: RelayMessage): message is BroadcastReply {
  return (
    message.type === "TIME_RESPONSE" ||
    message.type === "LS_RESPONSE" ||
    message.type === "CAMERA_RESPONSE" ||
    message.type === "S3_UPLOAD_RESPONSE"
  );
}

/** The broadcast kind a request or reply belongs to. */
export function kindOf(message: BroadcastRequest | BroadcastReply): BroadcastKind {
  return KIND_BY_TYPE[message.type];
}
