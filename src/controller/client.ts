/**
 * Controller Client
 *
 * Sends broadcast requests to the relay and streams every forwarded reply
 * to `onReply` as it arrives. There is no end-of-session message; the
 * operator judges completion from the reply count or a pause in output.
 */

import { decodeDatagram, encodeMessage, parseMessage, parseOutcome } from "../protocol/codec.js";
import { REQUEST_TYPE, isBroadcastReply, kindOf } from "../protocol/messages.js";
import type { DatagramTransport } from "../transport/types.js";
import { errorMessage } from "../errors.js";
import { formatLocalTime } from "../utils/time.js";
import {
  formatEndpoint,
  type BroadcastKind,
  type Clock,
  type Endpoint,
  type RelayLogger,
} from "../types.js";

/** One worker reply, as forwarded by the relay. */
export interface ControllerReply {
  receivedAt: Date;
  kind: BroadcastKind;
  deviceId: string;
  payload: string;
}

/** An ERROR notice from the relay (busy, no devices). */
export interface ControllerNotice {
  receivedAt: Date;
  code: string;
  detail: string;
}

export interface ControllerClientDeps {
  relay: Endpoint;
  transport: DatagramTransport;
  logger: RelayLogger;
  maxMessageBytes: number;
  onReply: (reply: ControllerReply) => void;
  onNotice?: (notice: ControllerNotice) => void;
  /** Override the clock (tests). Default: Date.now. */
  clock?: Clock;
}

export class ControllerClient {
  private readonly deps: ControllerClientDeps;
  private readonly clock: Clock;
  private lastRequest: { kind: BroadcastKind; sentAt: Date } | null = null;
  private repliesSinceRequest = 0;

  constructor(deps: ControllerClientDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => Date.now());
    deps.transport.onDatagram((data, from) => this.handleDatagram(data, from));
  }

  /** The most recent request and how many replies it has drawn so far. */
  status(): { relay: Endpoint; lastRequest: { kind: BroadcastKind; sentAt: Date } | null; replies: number } {
    return {
      relay: { ...this.deps.relay },
      lastRequest: this.lastRequest ? { ...this.lastRequest } : null,
      replies: this.repliesSinceRequest,
    };
  }

  /** Send a broadcast request. Returns false when the send fails. */
  async request(kind: BroadcastKind): Promise<boolean> {
    const { transport, relay, logger, maxMessageBytes } = this.deps;
    const type = REQUEST_TYPE[kind];
    try {
      await transport.send(encodeMessage({ type }, maxMessageBytes), relay);
    } catch (err) {
      logger.error(`[relay:controller] Failed to send ${type}: ${errorMessage(err)}`);
      return false;
    }
    this.lastRequest = { kind, sentAt: new Date(this.clock()) };
    this.repliesSinceRequest = 0;
    logger.info(`[relay:controller] Sent ${type} to ${formatEndpoint(relay)}`);
    return true;
  }

  handleDatagram(data: Buffer, from: Endpoint): void {
    const { logger, maxMessageBytes, onReply, onNotice } = this.deps;
    const parsed = parseMessage(decodeDatagram(data, maxMessageBytes));
    if (!parsed.ok) {
      logger.debug?.(`[relay:controller] Dropping ${parsed.reason} message "${parsed.tag}" from ${formatEndpoint(from)}`);
      return;
    }

    const message = parsed.message;
    const receivedAt = new Date(this.clock());
    if (isBroadcastReply(message)) {
      this.repliesSinceRequest++;
      onReply({ receivedAt, kind: kindOf(message), deviceId: message.deviceId, payload: message.payload });
      return;
    }
    if (message.type === "ERROR") {
      onNotice?.({ receivedAt, code: message.code, detail: message.detail });
      return;
    }
    logger.debug?.(`[relay:controller] Ignoring ${message.type} from ${formatEndpoint(from)}`);
  }

  async close(): Promise<void> {
    await this.deps.transport.close();
  }
}

const OUTCOME_LABEL: Record<"capture" | "upload", string> = {
  capture: "Capture",
  upload: "Upload",
};

/** One display block per reply, tagged with receive time and device id. */
export function formatReply(reply: ControllerReply): string {
  const tag = `[${formatLocalTime(reply.receivedAt)}] [${reply.deviceId}]`;
  switch (reply.kind) {
    case "time":
      return `${tag} Time: ${reply.payload}`;
    case "listing":
      return `${tag} Listing:\n${reply.payload}`;
    case "capture":
    case "upload": {
      const outcome = parseOutcome(reply.payload);
      if (!outcome) return `${tag} ${OUTCOME_LABEL[reply.kind]}: ${reply.payload}`;
      const head = `${tag} ${OUTCOME_LABEL[reply.kind]} ${outcome.ok ? "succeeded" : "failed"}: ${outcome.detail}`;
      return outcome.output ? `${head}\n${outcome.output}` : head;
    }
  }
}

export function formatNotice(notice: ControllerNotice): string {
  return `[${formatLocalTime(notice.receivedAt)}] Relay: ${notice.code} ${notice.detail}`.trimEnd();
}
