/**
 * camrelay configuration resolution.
 * Merges a raw JSON object with defaults, field by field.
 *
 * Two loading modes:
 *   1. Embedded:   resolveRelayConfig(raw), the caller passes the raw object
 *   2. Standalone: loadRelayConfig(), reads from file or env directly
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import type { LogLevel } from "./logger.js";

/** Fixed rendezvous port the relay listens on unless overridden. */
export const DEFAULT_RELAY_PORT = 8080;

/** Receive buffer size in bytes; one byte is reserved for the terminator. */
export const DEFAULT_MAX_MESSAGE_BYTES = 1024;

/** What the coordinator does with a broadcast that arrives mid-session. */
export type BroadcastPolicy = "reject" | "replace";

/** What the coordinator does with a heartbeat from a device it has never seen. */
export type UnknownHeartbeatPolicy = "register" | "ignore";

/** An external command. `{file}` and `{destination}` placeholders are substituted per run. */
export interface CommandSpec {
  command: string;
  args: string[];
  cwd?: string;
}

export interface TimingConfig {
  /** Response-aggregation window for one broadcast session. */
  responseTimeoutSec: number;
  /** How often a worker sends HEARTBEAT. */
  heartbeatIntervalSec: number;
  /** Heartbeat silence after which a device is deactivated. */
  livenessTimeoutSec: number;
  /** Cadence of the registry liveness sweep. */
  sweepIntervalSec: number;
  /** How long a worker waits for REGISTERED after REGISTER. */
  registrationAckTimeoutSec: number;
}

export interface RelayConfig {
  /** Bind host for the relay. */
  host: string;
  port: number;
  /** Maximum number of distinct device ids the registry holds. */
  maxDevices: number;
  maxMessageBytes: number;
  timing: TimingConfig;
  broadcastPolicy: BroadcastPolicy;
  unknownHeartbeat: UnknownHeartbeatPolicy;
  collaborators: {
    listing: CommandSpec;
    capture: CommandSpec;
    upload: CommandSpec;
    /** Upper bound on one collaborator run. */
    timeoutSec: number;
  };
  upload: {
    bucket: string;
  };
  logLevel: LogLevel;
}

const DEFAULT_LISTING: CommandSpec = { command: "ls", args: ["-la"] };

const DEFAULT_CAPTURE: CommandSpec = {
  command: "libcamera-still",
  args: [
    "-n", "-t", "1",
    "--width", "4056", "--height", "3040",
    "-e", "png",
    "-o", "{file}",
    "--immediate",
  ],
};

const DEFAULT_UPLOAD: CommandSpec = {
  command: "aws",
  args: [
    "s3", "cp", ".", "{destination}",
    "--recursive", "--exclude", "*", "--include", "*.png",
  ],
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Safely coerce an unknown value to a string-keyed record. */
function toRecord(v: unknown): Record<string, unknown> {
  if (typeof v === "object" && v !== null && !Array.isArray(v)) {
    return v as Record<string, unknown>;
  }
  return {};
}

function positiveInt(v: unknown, fallback: number): number {
  return typeof v === "number" && Number.isInteger(v) && v > 0 ? v : fallback;
}

function toCommandSpec(v: unknown, fallback: CommandSpec): CommandSpec {
  const obj = toRecord(v);
  if (typeof obj.command !== "string" || obj.command.length === 0) {
    return { ...fallback, args: [...fallback.args] };
  }
  const args = Array.isArray(obj.args)
    ? obj.args.filter((a): a is string => typeof a === "string")
    : [];
  return {
    command: obj.command,
    args,
    cwd: typeof obj.cwd === "string" ? obj.cwd : undefined,
  };
}

export function resolveRelayConfig(raw?: Record<string, unknown> | null): RelayConfig {
  const r = raw ?? {};
  const timingRaw = toRecord(r.timing);
  const collaboratorsRaw = toRecord(r.collaborators);
  const uploadRaw = toRecord(r.upload);

  const port = typeof r.port === "number" && Number.isInteger(r.port) && r.port > 0 && r.port < 65_536
    ? r.port
    : DEFAULT_RELAY_PORT;

  const broadcastPolicy: BroadcastPolicy = r.broadcastPolicy === "replace" ? "replace" : "reject";
  const unknownHeartbeat: UnknownHeartbeatPolicy = r.unknownHeartbeat === "ignore" ? "ignore" : "register";

  const logLevel = LOG_LEVELS.find((l) => l === r.logLevel) ?? "info";

  // A message must at least hold a type tag and its terminators.
  const maxMessageBytes = Math.max(64, positiveInt(r.maxMessageBytes, DEFAULT_MAX_MESSAGE_BYTES));

  return {
    host: typeof r.host === "string" ? r.host : "0.0.0.0",
    port,
    maxDevices: positiveInt(r.maxDevices, 10),
    maxMessageBytes,
    timing: {
      responseTimeoutSec: positiveInt(timingRaw.responseTimeoutSec, 2),
      heartbeatIntervalSec: positiveInt(timingRaw.heartbeatIntervalSec, 30),
      livenessTimeoutSec: positiveInt(timingRaw.livenessTimeoutSec, 90),
      sweepIntervalSec: positiveInt(timingRaw.sweepIntervalSec, 30),
      registrationAckTimeoutSec: positiveInt(timingRaw.registrationAckTimeoutSec, 5),
    },
    broadcastPolicy,
    unknownHeartbeat,
    collaborators: {
      listing: toCommandSpec(collaboratorsRaw.listing, DEFAULT_LISTING),
      capture: toCommandSpec(collaboratorsRaw.capture, DEFAULT_CAPTURE),
      upload: toCommandSpec(collaboratorsRaw.upload, DEFAULT_UPLOAD),
      timeoutSec: positiveInt(collaboratorsRaw.timeoutSec, 120),
    },
    upload: {
      bucket: typeof uploadRaw.bucket === "string" && uploadRaw.bucket.length > 0
        ? uploadRaw.bucket
        : "camrelay-captures",
    },
    logLevel,
  };
}

/**
 * Default config file search paths (highest priority first):
 *   1. $CAMRELAY_CONFIG env
 *   2. ./camrelay.json (cwd)
 *   3. ~/.camrelay/camrelay.json
 */
function resolveConfigPath(): string | null {
  if (process.env.CAMRELAY_CONFIG) {
    return process.env.CAMRELAY_CONFIG;
  }
  const cwdPath = path.resolve("camrelay.json");
  if (fs.existsSync(cwdPath)) return cwdPath;

  const homePath = path.join(os.homedir(), ".camrelay", "camrelay.json");
  if (fs.existsSync(homePath)) return homePath;

  return null;
}

/**
 * Load camrelay config from the file system.
 * Falls back to defaults if no config file is found.
 */
export function loadRelayConfig(): RelayConfig {
  const configPath = resolveConfigPath();
  if (!configPath) {
    return resolveRelayConfig({});
  }

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid camrelay config at ${configPath}: expected a JSON object`);
  }
  return resolveRelayConfig(toRecord(raw));
}
