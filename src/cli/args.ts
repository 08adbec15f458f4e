/**
 * CLI argument parsing.
 *
 *   camrelay relay [port]
 *   camrelay worker <device-id> <relay-host> [port]
 *   camrelay controller <relay-host> [port]
 */

import { isValidDeviceId } from "../registry/device-registry.js";
import type { BroadcastKind } from "../types.js";

export type CliCommand =
  | { command: "relay"; port?: number }
  | { command: "worker"; deviceId: string; host: string; port?: number }
  | { command: "controller"; host: string; port?: number }
  | { command: "help" };

export type ParseArgsResult =
  | { ok: true; value: CliCommand }
  | { ok: false; error: string };

export const USAGE = [
  "Usage:",
  "  camrelay relay [port]                              Run the relay coordinator",
  "  camrelay worker <device-id> <relay-host> [port]    Run a worker node",
  "  camrelay controller <relay-host> [port]            Run the interactive controller",
  "",
  "Example:",
  "  camrelay worker PiZero-01 192.168.1.100 8080",
].join("\n");

function parsePort(raw: string | undefined): number | undefined | null {
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) return null;
  const port = Number(raw);
  return port > 0 && port < 65_536 ? port : null;
}

export function parseCliArgs(args: readonly string[]): ParseArgsResult {
  const [command, ...rest] = args;

  switch (command) {
    case "relay": {
      const port = parsePort(rest[0]);
      if (port === null) return { ok: false, error: `Invalid port: ${rest[0]}` };
      return { ok: true, value: { command: "relay", port } };
    }

    case "worker": {
      const [deviceId, host, rawPort] = rest;
      if (!deviceId || !host) return { ok: false, error: "worker needs <device-id> and <relay-host>" };
      if (!isValidDeviceId(deviceId)) {
        return { ok: false, error: `Invalid device id "${deviceId}" (max 31 bytes, no ":")` };
      }
      const port = parsePort(rawPort);
      if (port === null) return { ok: false, error: `Invalid port: ${rawPort}` };
      return { ok: true, value: { command: "worker", deviceId, host, port } };
    }

    case "controller": {
      const [host, rawPort] = rest;
      if (!host) return { ok: false, error: "controller needs <relay-host>" };
      const port = parsePort(rawPort);
      if (port === null) return { ok: false, error: `Invalid port: ${rawPort}` };
      return { ok: true, value: { command: "controller", host, port } };
    }

    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { ok: true, value: { command: "help" } };

    default:
      return { ok: false, error: `Unknown command: ${command}` };
  }
}

/** Interactive controller input. */
export type ControllerInput =
  | { action: "broadcast"; kind: BroadcastKind }
  | { action: "status" }
  | { action: "help" }
  | { action: "quit" }
  | { action: "none" }
  | { action: "unknown"; input: string };

const BROADCAST_COMMANDS = new Map<string, BroadcastKind>([
  ["time", "time"],
  ["ls", "listing"],
  ["list", "listing"],
  ["capture", "capture"],
  ["upload", "upload"],
]);

export const CONTROLLER_HELP = [
  "Commands:",
  "  time     Request time from all workers",
  "  ls       Request a directory listing from all workers",
  "  capture  Capture an image on all workers",
  "  upload   Upload captured images from all workers",
  "  status   Show connection status",
  "  quit     Exit",
].join("\n");

export function parseControllerInput(line: string): ControllerInput {
  const input = line.trim();
  if (input.length === 0) return { action: "none" };
  const kind = BROADCAST_COMMANDS.get(input);
  if (kind) return { action: "broadcast", kind };
  switch (input) {
    case "status":
      return { action: "status" };
    case "help":
      return { action: "help" };
    case "quit":
    case "exit":
      return { action: "quit" };
    default:
      return { action: "unknown", input };
  }
}
