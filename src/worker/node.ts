/**
 * Worker Node
 *
 * A camera host that registers with the relay, answers broadcast requests
 * and keeps itself alive with heartbeats.
 *
 * Design:
 * - REGISTER is sent once at startup; without an OK acknowledgment the
 *   worker keeps running unacknowledged (with a warning) and never retries
 * - TIME_REQUEST is answered inline
 * - listing/capture/upload run as background jobs; their replies are sent
 *   when the collaborator finishes, so heartbeats and other requests are
 *   never held up by a slow command
 * - UNREGISTER is sent best-effort on stop, without waiting for anything
 */

import type { RelayConfig } from "../config.js";
import { decodeDatagram, encodeMessage, formatOutcome, parseMessage } from "../protocol/codec.js";
import { REPLY_TYPE, type RelayMessage } from "../protocol/messages.js";
import { isValidDeviceId } from "../registry/device-registry.js";
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
import {
  capturePayload,
  captureFileName,
  expandCommand,
  listingPayload,
  uploadDestination,
  uploadPayload,
  type CollaboratorRunner,
} from "./collaborators.js";

/** Broadcast kinds a worker answers by running a collaborator. */
export type JobKind = Exclude<BroadcastKind, "time">;

export interface WorkerNodeDeps {
  deviceId: string;
  /** The relay's rendezvous endpoint. */
  relay: Endpoint;
  transport: DatagramTransport;
  config: RelayConfig;
  logger: RelayLogger;
  runner: CollaboratorRunner;
  /** Override the clock (tests). Default: Date.now. */
  clock?: Clock;
}

export interface RegistrationOutcome {
  acknowledged: boolean;
  /** Status carried by REGISTERED, or null when none arrived in time. */
  status: string | null;
}

export class WorkerNode {
  /** True once the relay has acknowledged registration with OK. */
  registered = false;
  /** Epoch ms of the last heartbeat sent; 0 before the first. */
  lastHeartbeatSent = 0;

  private readonly deps: WorkerNodeDeps;
  private readonly clock: Clock;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private ackWaiter: ((status: string | null) => void) | null = null;
  private inflight = new Set<Promise<void>>();
  private started = false;
  private stopped = false;

  constructor(deps: WorkerNodeDeps) {
    if (!isValidDeviceId(deps.deviceId)) {
      throw new Error(
        `Invalid device id "${deps.deviceId}": 1-31 bytes, no ":" or newline`,
      );
    }
    this.deps = deps;
    this.clock = deps.clock ?? (() => Date.now());
  }

  get deviceId(): string {
    return this.deps.deviceId;
  }

  /** Number of collaborator jobs still running. */
  get pendingJobs(): number {
    return this.inflight.size;
  }

  /**
   * Register with the relay and start heartbeats.
   * Resolves once an acknowledgment arrives or the wait times out.
   */
  async start(): Promise<RegistrationOutcome> {
    if (this.started) {
      return { acknowledged: this.registered, status: this.registered ? "OK" : null };
    }
    this.started = true;

    const { transport, logger, config, relay, deviceId } = this.deps;
    transport.onDatagram((data, from) => this.handleDatagram(data, from));

    logger.info(`[relay:worker] Registering with relay ${formatEndpoint(relay)} as "${deviceId}"`);
    const ack = this.waitForAck(config.timing.registrationAckTimeoutSec * 1000);
    try {
      await transport.send(this.encode({ type: "REGISTER", deviceId }), relay);
    } catch (err) {
      this.settleAck(null);
      throw err;
    }

    const status = await ack;
    if (status === "OK") {
      this.registered = true;
      logger.info(`[relay:worker] Registration acknowledged`);
    } else if (status === null) {
      logger.warn(`[relay:worker] No registration acknowledgment received; continuing unacknowledged`);
    } else {
      logger.warn(`[relay:worker] Registration refused (${status}); continuing unacknowledged`);
    }

    if (!this.stopped) {
      this.lastHeartbeatSent = this.clock();
      this.heartbeatTimer = setInterval(
        () => void this.sendHeartbeat(),
        config.timing.heartbeatIntervalSec * 1000,
      );
      logger.info(`[relay:worker] Worker "${deviceId}" ready`);
    }

    return { acknowledged: this.registered, status };
  }

  /** Send UNREGISTER best-effort and release the socket. Idempotent. */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    this.settleAck(null);

    const { transport, relay, deviceId, logger } = this.deps;
    if (this.started) {
      await this.send({ type: "UNREGISTER", deviceId }, relay);
    }
    await transport.close();
    logger.info(`[relay:worker] Worker "${deviceId}" stopped`);
  }

  /** Resolves when every running collaborator job has replied. */
  async whenIdle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(this.inflight);
    }
  }

  /** Handle one received datagram. */
  handleDatagram(data: Buffer, from: Endpoint): void {
    if (this.stopped) return;
    const { config, logger, deviceId } = this.deps;

    const parsed = parseMessage(decodeDatagram(data, config.maxMessageBytes));
    if (!parsed.ok) {
      logger.debug?.(`[relay:worker] Dropping ${parsed.reason} message "${parsed.tag}" from ${formatEndpoint(from)}`);
      return;
    }

    const message = parsed.message;
    switch (message.type) {
      case "REGISTERED":
        this.handleAck(message.status);
        return;
      case "TIME_REQUEST":
        logger.info(`[relay:worker] TIME_REQUEST from ${formatEndpoint(from)}`);
        void this.send(
          { type: "TIME_RESPONSE", deviceId, payload: formatLocalTime(new Date(this.clock())) },
          from,
        );
        return;
      case "LS_REQUEST":
        this.startJob("listing", from);
        return;
      case "CAMERA_REQUEST":
        this.startJob("capture", from);
        return;
      case "S3_UPLOAD_REQUEST":
        this.startJob("upload", from);
        return;
      case "ERROR":
        logger.warn(`[relay:worker] Relay error ${message.code}: ${message.detail}`);
        return;
      default:
        logger.debug?.(`[relay:worker] Ignoring ${message.type} from ${formatEndpoint(from)}`);
    }
  }

  /** Send one heartbeat now. */
  async sendHeartbeat(): Promise<void> {
    if (this.stopped) return;
    const { deviceId, relay, logger } = this.deps;
    this.lastHeartbeatSent = this.clock();
    if (await this.send({ type: "HEARTBEAT", deviceId }, relay)) {
      logger.debug?.(`[relay:worker] Heartbeat sent`);
    }
  }

  // --- Registration ---

  private waitForAck(timeoutMs: number): Promise<string | null> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => this.settleAck(null), timeoutMs);
      this.ackWaiter = (status) => {
        clearTimeout(timer);
        this.ackWaiter = null;
        resolve(status);
      };
    });
  }

  private settleAck(status: string | null): void {
    this.ackWaiter?.(status);
  }

  private handleAck(status: string): void {
    if (this.ackWaiter) {
      this.settleAck(status);
      return;
    }
    // A late ack, or one answering a heartbeat after the relay lost track of us.
    if (status === "OK" && !this.registered) {
      this.registered = true;
      this.deps.logger.info(`[relay:worker] Registration acknowledged`);
    } else if (status !== "OK") {
      this.deps.logger.warn(`[relay:worker] Relay reported registration status ${status}`);
    }
  }

  // --- Collaborator jobs ---

  private startJob(kind: JobKind, replyTo: Endpoint): void {
    this.deps.logger.info(`[relay:worker] Running ${kind} job for ${formatEndpoint(replyTo)}`);
    const job: Promise<void> = this.runJob(kind, replyTo).finally(() => {
      this.inflight.delete(job);
    });
    this.inflight.add(job);
  }

  private async runJob(kind: JobKind, replyTo: Endpoint): Promise<void> {
    const { deviceId, logger } = this.deps;
    let payload: string;
    try {
      payload = await this.collect(kind, new Date(this.clock()));
    } catch (err) {
      logger.error(`[relay:worker] ${kind} job failed: ${errorMessage(err)}`);
      payload = formatOutcome({ ok: false, detail: `${kind} failed: ${errorMessage(err)}` });
    }

    if (this.stopped) {
      logger.debug?.(`[relay:worker] Dropping ${kind} reply: worker stopped`);
      return;
    }
    if (await this.send({ type: REPLY_TYPE[kind], deviceId, payload }, replyTo)) {
      logger.info(`[relay:worker] Sent ${REPLY_TYPE[kind]}`);
    }
  }

  private async collect(kind: JobKind, startedAt: Date): Promise<string> {
    const { runner, config, logger } = this.deps;
    const commands = config.collaborators;

    switch (kind) {
      case "listing":
        return listingPayload(await runner.run(commands.listing));

      case "capture": {
        const file = captureFileName(startedAt);
        const result = await runner.run(expandCommand(commands.capture, { file }));
        if (result.exitCode !== 0) {
          logger.warn(`[relay:worker] Capture failed: ${result.error ?? `exit code ${result.exitCode}`}`);
        }
        return capturePayload(result, file);
      }

      case "upload": {
        const destination = uploadDestination(config.upload.bucket, startedAt);
        const result = await runner.run(expandCommand(commands.upload, { destination }));
        if (result.exitCode !== 0) {
          logger.warn(`[relay:worker] Upload failed: ${result.error ?? `exit code ${result.exitCode}`}`);
        }
        return uploadPayload(result, destination);
      }
    }
  }

  // --- I/O ---

  private encode(message: RelayMessage): Buffer {
    return encodeMessage(message, this.deps.config.maxMessageBytes);
  }

  /** Send a message; failures are logged, never thrown. */
  private async send(message: RelayMessage, to: Endpoint): Promise<boolean> {
    try {
      await this.deps.transport.send(this.encode(message), to);
      return true;
    } catch (err) {
      this.deps.logger.warn(
        `[relay:worker] Failed to send ${message.type} to ${formatEndpoint(to)}: ${errorMessage(err)}`,
      );
      return false;
    }
  }
}
