/**
 * Relay Coordinator
 *
 * Owns the RelayState and drives it from the Node.js event loop:
 * - each received datagram is decoded, classified and dispatched
 * - a tick timer closes timed-out sessions (250ms while collecting, 1s
 *   otherwise) and runs the liveness sweep on its own cadence
 *
 * All state changes happen in these callbacks, one at a time.
 */

import type { RelayConfig } from "../config.js";
import { decodeDatagram, encodeMessage, parseMessage } from "../protocol/codec.js";
import type { DeviceRecord } from "../registry/device-registry.js";
import type { RequestSession } from "../session/aggregator.js";
import { UdpTransport } from "../transport/udp.js";
import type { DatagramTransport } from "../transport/types.js";
import { errorMessage } from "../errors.js";
import { formatEndpoint, type Clock, type Endpoint, type RelayLogger } from "../types.js";
import {
  createRelayState,
  dispatchMessage,
  logTimeout,
  type Outbound,
  type RelayState,
} from "./dispatch.js";

/** Tick period while a session is collecting (ms). */
const ACTIVE_TICK_MS = 250;

/** Tick period while idle (ms). */
const IDLE_TICK_MS = 1000;

export interface RelayCoordinatorDeps {
  config: RelayConfig;
  logger: RelayLogger;
  transport: DatagramTransport;
  /** Override the clock (tests). Default: Date.now. */
  clock?: Clock;
}

/** Point-in-time view for status output. */
export interface RelaySnapshot {
  devices: DeviceRecord[];
  activeCount: number;
  session: RequestSession | null;
}

export class RelayCoordinator {
  readonly state: RelayState;
  private readonly deps: RelayCoordinatorDeps;
  private readonly clock: Clock;
  private readonly sweepIntervalMs: number;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private timerDelay = 0;
  private running = false;
  private lastSweepAt = 0;

  constructor(deps: RelayCoordinatorDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => Date.now());
    this.sweepIntervalMs = deps.config.timing.sweepIntervalSec * 1000;
    this.state = createRelayState(deps.config);
  }

  get local(): Endpoint {
    return this.deps.transport.local;
  }

  /** Start receiving and ticking. Idempotent. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.lastSweepAt = this.clock();
    this.deps.transport.onDatagram((data, from) => this.handleDatagram(data, from));
    this.schedule();
    this.deps.logger.info(
      `[relay:coordinator] Relay ready on ${formatEndpoint(this.local)} ` +
      `(max devices: ${this.deps.config.maxDevices}, policy: ${this.deps.config.broadcastPolicy})`,
    );
  }

  /** Stop ticking and release the socket. Idempotent. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.deps.transport.close();
    this.deps.logger.info(`[relay:coordinator] Relay stopped`);
  }

  snapshot(): RelaySnapshot {
    return {
      devices: this.state.registry.list(),
      activeCount: this.state.registry.activeCount(),
      session: this.state.aggregator.session,
    };
  }

  /** Handle one received datagram. */
  handleDatagram(data: Buffer, from: Endpoint): void {
    if (!this.running) return;
    const { config, logger } = this.deps;

    const text = decodeDatagram(data, config.maxMessageBytes);
    const parsed = parseMessage(text);
    if (!parsed.ok) {
      if (parsed.reason === "unknown-type") {
        logger.debug?.(`[relay:coordinator] Dropping unknown message "${parsed.tag}" from ${formatEndpoint(from)}`);
      } else {
        logger.warn(`[relay:coordinator] Dropping malformed ${parsed.tag} from ${formatEndpoint(from)}`);
      }
      return;
    }

    const outbound = dispatchMessage(
      { state: this.state, logger, now: this.clock() },
      parsed.message,
      from,
    );
    for (const out of outbound) {
      void this.send(out);
    }

    // A session may have just opened; tick at the faster rate.
    if (this.state.aggregator.state === "collecting" && this.timerDelay !== ACTIVE_TICK_MS) {
      this.schedule();
    }
  }

  /** Close a timed-out session and run the sweep when it is due. */
  tick(): void {
    if (!this.running) return;
    const now = this.clock();

    const timedOut = this.state.aggregator.expire(now);
    if (timedOut) logTimeout(this.deps.logger, timedOut);

    if (now - this.lastSweepAt >= this.sweepIntervalMs) {
      this.lastSweepAt = now;
      for (const record of this.state.registry.sweep(now)) {
        this.deps.logger.warn(`[relay:coordinator] Marked ${record.deviceId} inactive (no heartbeat)`);
      }
    }
  }

  private schedule(): void {
    if (this.timer) clearTimeout(this.timer);
    if (!this.running) return;
    this.timerDelay = this.state.aggregator.state === "collecting" ? ACTIVE_TICK_MS : IDLE_TICK_MS;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick();
      this.schedule();
    }, this.timerDelay);
  }

  private async send(out: Outbound): Promise<void> {
    const data = encodeMessage(out.message, this.deps.config.maxMessageBytes);
    try {
      await this.deps.transport.send(data, out.to);
    } catch (err) {
      this.deps.logger.warn(
        `[relay:coordinator] Failed to send ${out.message.type} to ${formatEndpoint(out.to)}: ${errorMessage(err)}`,
      );
    }
  }
}

export interface StartRelayOptions {
  config: RelayConfig;
  logger: RelayLogger;
}

/** Bind the rendezvous socket and start a coordinator on it. */
export async function startRelay(opts: StartRelayOptions): Promise<RelayCoordinator> {
  const transport = await UdpTransport.bind({
    host: opts.config.host,
    port: opts.config.port,
    logger: opts.logger,
  });
  const coordinator = new RelayCoordinator({ config: opts.config, logger: opts.logger, transport });
  coordinator.start();
  return coordinator;
}
