/**
 * camrelay: relay, registry and broadcast aggregation for camera rigs.
 *
 * One relay coordinator, any number of worker nodes, and a controller
 * that broadcasts requests and streams the workers' replies.
 */

export {
  createRelayLogger,
  rolePrefix,
  type RelayLoggerOptions,
  type LogLevel,
  type ProcessRole,
} from "./logger.js";
export {
  loadRelayConfig,
  resolveRelayConfig,
  DEFAULT_RELAY_PORT,
  DEFAULT_MAX_MESSAGE_BYTES,
  type RelayConfig,
  type CommandSpec,
  type BroadcastPolicy,
  type UnknownHeartbeatPolicy,
} from "./config.js";
export { StartupError, type StartupStage } from "./errors.js";
export type { RelayLogger, Endpoint, BroadcastKind, Clock } from "./types.js";

export * from "./protocol/index.js";

export { DeviceRegistry, isValidDeviceId } from "./registry/device-registry.js";
export type { DeviceRecord, RegisterResult } from "./registry/device-registry.js";

export { RequestAggregator } from "./session/aggregator.js";
export type { RequestSession, AggregatorState, BeginResult, RecordResult } from "./session/aggregator.js";

export { RelayCoordinator, startRelay, type RelaySnapshot } from "./relay/coordinator.js";
export { createRelayState, dispatchMessage, type RelayState, type Outbound } from "./relay/dispatch.js";

export { WorkerNode, type RegistrationOutcome } from "./worker/node.js";
export { ProcessCollaboratorRunner } from "./worker/collaborators.js";
export type { CollaboratorRunner, CollaboratorResult } from "./worker/collaborators.js";

export { ControllerClient, formatReply, formatNotice } from "./controller/client.js";
export type { ControllerReply, ControllerNotice } from "./controller/client.js";

export { UdpTransport, resolveEndpoint } from "./transport/udp.js";
export type { DatagramTransport, DatagramHandler } from "./transport/types.js";
