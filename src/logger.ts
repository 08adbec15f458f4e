/**
 * camrelay logger.
 *
 * Provides a RelayLogger factory backed by Winston. Each process role
 * tags its lines with its own prefix; a worker's prefix carries its
 * device id so logs from several workers can be interleaved.
 */

import winston from "winston";
import type { RelayLogger } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type ProcessRole = "relay" | "worker" | "controller";

export interface RelayLoggerOptions {
  /** Process role; picks the default prefix. */
  role?: ProcessRole;
  /** Device id, appended to the worker prefix ("worker:cam-1"). */
  deviceId?: string;
  /** Explicit prefix; overrides the role. Default: "camrelay". */
  prefix?: string;
  /** Minimum log level. Default: "info". */
  level?: LogLevel;
  /** Discard every line. */
  silent?: boolean;
}

/** Prefix for a process role, e.g. "relay" or "worker:cam-1". */
export function rolePrefix(role: ProcessRole, deviceId?: string): string {
  return role === "worker" && deviceId ? `worker:${deviceId}` : role;
}

function linePrefix(opts: RelayLoggerOptions): string {
  if (opts.prefix) return opts.prefix;
  if (opts.role) return rolePrefix(opts.role, opts.deviceId);
  return "camrelay";
}

/** Create a console logger satisfying RelayLogger. */
export function createRelayLogger(opts: RelayLoggerOptions = {}): Required<RelayLogger> {
  const prefix = linePrefix(opts);

  const sink = winston.createLogger({
    level: opts.level ?? "info",
    silent: opts.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
      winston.format.printf(({ timestamp, level, message }) =>
        `${String(timestamp)} [${prefix}:${level}] ${String(message)}`
      ),
    ),
    transports: [new winston.transports.Console({ forceConsole: true })],
  });

  const at = (level: LogLevel) => (msg: string): void => {
    sink.log(level, msg);
  };
  return { info: at("info"), warn: at("warn"), error: at("error"), debug: at("debug") };
}
