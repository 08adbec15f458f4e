/**
 * Relay dispatch.
 *
 * `dispatchMessage` is the coordinator's whole protocol: it takes the
 * explicit RelayState, one parsed message and its sender, mutates the
 * registry and aggregator, and returns the datagrams to send. It does no
 * I/O, so it is tested without sockets or timers.
 */

import type { RelayConfig, UnknownHeartbeatPolicy } from "../config.js";
import {
  REQUEST_TYPE,
  isBroadcastReply,
  isBroadcastRequest,
  kindOf,
  type BroadcastReply,
  type BroadcastRequest,
  type RegistrationStatus,
  type RelayMessage,
} from "../protocol/messages.js";
import { DeviceRegistry, type RegisterResult } from "../registry/device-registry.js";
import { RequestAggregator, type RequestSession } from "../session/aggregator.js";
import { formatEndpoint, type Endpoint, type RelayLogger } from "../types.js";

/** Everything the coordinator knows, owned by its event loop. */
export interface RelayState {
  registry: DeviceRegistry;
  aggregator: RequestAggregator;
  unknownHeartbeat: UnknownHeartbeatPolicy;
}

export interface DispatchContext {
  state: RelayState;
  logger: RelayLogger;
  now: number;
}

/** A datagram the coordinator must send. */
export interface Outbound {
  to: Endpoint;
  message: RelayMessage;
}

export function createRelayState(config: RelayConfig): RelayState {
  return {
    registry: new DeviceRegistry({
      capacity: config.maxDevices,
      livenessTimeoutMs: config.timing.livenessTimeoutSec * 1000,
    }),
    aggregator: new RequestAggregator({
      responseTimeoutMs: config.timing.responseTimeoutSec * 1000,
      policy: config.broadcastPolicy,
    }),
    unknownHeartbeat: config.unknownHeartbeat,
  };
}

export function dispatchMessage(
  ctx: DispatchContext,
  message: RelayMessage,
  sender: Endpoint,
): Outbound[] {
  if (isBroadcastRequest(message)) {
    return handleBroadcastRequest(ctx, message, sender);
  }
  if (isBroadcastReply(message)) {
    return handleReply(ctx, message);
  }

  switch (message.type) {
    case "REGISTER":
      return handleRegister(ctx, message.deviceId, sender);
    case "HEARTBEAT":
      return handleHeartbeat(ctx, message.deviceId, sender);
    case "UNREGISTER":
      return handleUnregister(ctx, message.deviceId);
    case "REGISTERED":
    case "ERROR":
      ctx.logger.debug?.(`[relay:coordinator] Ignoring ${message.type} from ${formatEndpoint(sender)}`);
      return [];
  }
}

/** Log a session that ran out of time before its tally was satisfied. */
export function logTimeout(logger: RelayLogger, session: RequestSession): void {
  const missing = session.targets.filter((id) => !session.responded.includes(id));
  logger.warn(
    `[relay:coordinator] Timeout reached for ${session.kind} ${session.id}: ` +
    `${session.receivedCount}/${session.expectedCount} replies` +
    (missing.length > 0 ? `, no reply from ${missing.join(", ")}` : ""),
  );
}

// --- Handlers ---

function registrationStatus(result: RegisterResult): RegistrationStatus {
  if (result.ok) return "OK";
  return result.reason === "capacity-exceeded" ? "FULL" : "INVALID";
}

function ack(to: Endpoint, result: RegisterResult): Outbound {
  return { to, message: { type: "REGISTERED", status: registrationStatus(result) } };
}

function logRegistration(
  ctx: DispatchContext,
  deviceId: string,
  sender: Endpoint,
  result: RegisterResult,
  via: "register" | "heartbeat",
): void {
  const { logger, state } = ctx;
  if (result.ok) {
    const how = via === "heartbeat" ? " (implicit, from heartbeat)" : "";
    if (result.created) {
      logger.info(
        `[relay:coordinator] Registered new device ${deviceId} at ${formatEndpoint(sender)}${how} ` +
        `(total: ${state.registry.size}/${state.registry.capacity})`,
      );
    } else {
      logger.info(`[relay:coordinator] Updated registration for ${deviceId} at ${formatEndpoint(sender)}${how}`);
    }
    return;
  }
  if (result.reason === "capacity-exceeded") {
    logger.warn(
      `[relay:coordinator] Rejected ${deviceId}: device limit reached (${state.registry.capacity})`,
    );
  } else {
    logger.warn(`[relay:coordinator] Rejected invalid device id from ${formatEndpoint(sender)}`);
  }
}

function handleRegister(ctx: DispatchContext, deviceId: string, sender: Endpoint): Outbound[] {
  const result = ctx.state.registry.register(deviceId, sender, ctx.now);
  logRegistration(ctx, deviceId, sender, result, "register");
  return [ack(sender, result)];
}

function handleHeartbeat(ctx: DispatchContext, deviceId: string, sender: Endpoint): Outbound[] {
  const { state, logger, now } = ctx;
  if (state.registry.heartbeat(deviceId, now)) {
    logger.debug?.(`[relay:coordinator] Heartbeat from ${deviceId}`);
    return [];
  }

  if (state.unknownHeartbeat === "ignore") {
    logger.debug?.(`[relay:coordinator] Ignoring heartbeat from unknown device ${deviceId}`);
    return [];
  }

  const result = state.registry.register(deviceId, sender, now);
  logRegistration(ctx, deviceId, sender, result, "heartbeat");
  return [ack(sender, result)];
}

function handleUnregister(ctx: DispatchContext, deviceId: string): Outbound[] {
  if (ctx.state.registry.unregister(deviceId)) {
    ctx.logger.info(`[relay:coordinator] Device ${deviceId} unregistered`);
  } else {
    ctx.logger.debug?.(`[relay:coordinator] UNREGISTER for unknown device ${deviceId}`);
  }
  return [];
}

function handleBroadcastRequest(
  ctx: DispatchContext,
  message: BroadcastRequest,
  sender: Endpoint,
): Outbound[] {
  const { state, logger, now } = ctx;
  const kind = kindOf(message);

  // Stale devices must not be counted or targeted, whatever the sweep cadence.
  for (const record of state.registry.sweep(now)) {
    logger.warn(`[relay:coordinator] Marked ${record.deviceId} inactive (no heartbeat)`);
  }

  const targets = state.registry.activeDevices();
  const result = state.aggregator.begin({
    kind,
    requester: sender,
    targets: targets.map((t) => t.deviceId),
    now,
  });

  if (!result.ok) {
    const active = result.active;
    logger.warn(
      `[relay:coordinator] Rejected ${message.type} from ${formatEndpoint(sender)}: ` +
      `${active.kind} ${active.id} still collecting`,
    );
    return [{
      to: sender,
      message: {
        type: "ERROR",
        code: "BUSY",
        detail: `${active.kind} request in progress (${active.receivedCount}/${active.expectedCount} replies)`,
      },
    }];
  }

  if (result.expired) logTimeout(logger, result.expired);
  if (result.replaced) {
    logger.warn(
      `[relay:coordinator] Abandoned ${result.replaced.kind} ${result.replaced.id} ` +
      `at ${result.replaced.receivedCount}/${result.replaced.expectedCount} replies`,
    );
  }

  if (result.completed) {
    logger.warn(`[relay:coordinator] ${message.type} from ${formatEndpoint(sender)}: no active devices`);
    return [{
      to: sender,
      message: { type: "ERROR", code: "NO_DEVICES", detail: "No active devices registered" },
    }];
  }

  logger.info(
    `[relay:coordinator] Forwarding ${message.type} to ${targets.length} device(s) (${result.session.id})`,
  );
  return targets.map((t) => ({ to: t.address, message: { type: REQUEST_TYPE[kind] } }));
}

function handleReply(ctx: DispatchContext, message: BroadcastReply): Outbound[] {
  const { state, logger, now } = ctx;
  const result = state.aggregator.record({ kind: kindOf(message), deviceId: message.deviceId }, now);

  if (result.expired) logTimeout(logger, result.expired);

  if (!result.forwardTo) {
    logger.debug?.(`[relay:coordinator] Dropping ${message.type} from ${message.deviceId}: no requester`);
    return [];
  }

  const note = result.late ? " (late, not tallied)" : result.tallied ? "" : " (not tallied)";
  logger.info(`[relay:coordinator] Forwarded ${message.type} from ${message.deviceId}${note}`);

  if (result.completed) {
    logger.info(
      `[relay:coordinator] All ${result.completed.receivedCount} device(s) responded to ${result.completed.kind} (${result.completed.id})`,
    );
  }

  return [{ to: result.forwardTo, message }];
}
