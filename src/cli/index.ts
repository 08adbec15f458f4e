#!/usr/bin/env node
/**
 * camrelay CLI: relay coordinator, worker node and interactive controller.
 *
 * Commands:
 *   camrelay relay [port]                            Run the relay
 *   camrelay worker <device-id> <relay-host> [port]  Run a worker node
 *   camrelay controller <relay-host> [port]          Run the controller
 *
 * Settings come from camrelay.json (see config.ts); a port given on the
 * command line overrides the configured one.
 */

import readline from "node:readline";
import { loadRelayConfig, type RelayConfig } from "../config.js";
import { ControllerClient, formatNotice, formatReply } from "../controller/client.js";
import { StartupError, errorMessage } from "../errors.js";
import { createRelayLogger } from "../logger.js";
import { startRelay } from "../relay/coordinator.js";
import { UdpTransport, resolveEndpoint } from "../transport/udp.js";
import { formatEndpoint, type RelayLogger } from "../types.js";
import { formatLocalTime } from "../utils/time.js";
import { ProcessCollaboratorRunner } from "../worker/collaborators.js";
import { WorkerNode } from "../worker/node.js";
import {
  CONTROLLER_HELP,
  USAGE,
  parseCliArgs,
  parseControllerInput,
} from "./args.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Run `shutdown` once on SIGINT/SIGTERM, then exit 0. */
function onTermination(logger: RelayLogger, shutdown: () => Promise<void>): void {
  let stopping = false;
  const handler = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down...`);
    shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };
  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function cmdRelay(config: RelayConfig, port: number | undefined): Promise<void> {
  const logger = createRelayLogger({ role: "relay", level: config.logLevel });
  const coordinator = await startRelay({
    config: { ...config, port: port ?? config.port },
    logger,
  });
  onTermination(logger, () => coordinator.stop());
}

async function cmdWorker(
  config: RelayConfig,
  deviceId: string,
  host: string,
  port: number | undefined,
): Promise<void> {
  const logger = createRelayLogger({ role: "worker", deviceId, level: config.logLevel });
  const relay = await resolveEndpoint(host, port ?? config.port);
  logger.info(`Relay server: ${formatEndpoint(relay)}`);

  const transport = await UdpTransport.bind({ logger });
  const worker = new WorkerNode({
    deviceId,
    relay,
    transport,
    config,
    logger,
    runner: new ProcessCollaboratorRunner({ timeoutMs: config.collaborators.timeoutSec * 1000 }),
  });
  onTermination(logger, () => worker.stop());
  await worker.start();
}

async function cmdController(config: RelayConfig, host: string, port: number | undefined): Promise<void> {
  const logger = createRelayLogger({ role: "controller", level: config.logLevel });
  const relay = await resolveEndpoint(host, port ?? config.port);
  const transport = await UdpTransport.bind({ logger });

  const controller = new ControllerClient({
    relay,
    transport,
    logger,
    maxMessageBytes: config.maxMessageBytes,
    onReply: (reply) => console.log(formatReply(reply)),
    onNotice: (notice) => console.log(formatNotice(notice)),
  });

  console.log(`Relay server: ${formatEndpoint(relay)}`);
  console.log(CONTROLLER_HELP);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let closing = false;
  const shutdown = async () => {
    if (closing) return;
    closing = true;
    rl.close();
    await controller.close();
  };

  rl.on("line", (line) => {
    const input = parseControllerInput(line);
    switch (input.action) {
      case "broadcast":
        void controller.request(input.kind).then((sent) => {
          if (sent) console.log(`[${formatLocalTime(new Date())}] Request sent. Waiting for responses...`);
        });
        break;
      case "status": {
        const status = controller.status();
        console.log(`Relay server: ${formatEndpoint(status.relay)}`);
        if (status.lastRequest) {
          console.log(
            `Last request: ${status.lastRequest.kind} at ${formatLocalTime(status.lastRequest.sentAt)}, ` +
            `${status.replies} repl${status.replies === 1 ? "y" : "ies"} so far`,
          );
        }
        break;
      }
      case "help":
        console.log(CONTROLLER_HELP);
        break;
      case "quit":
        shutdown()
          .then(() => process.exit(0))
          .catch((err: unknown) => {
            logger.error(`Shutdown failed: ${errorMessage(err)}`);
            process.exit(1);
          });
        break;
      case "unknown":
        console.log(`Unknown command: ${input.input}`);
        console.log(CONTROLLER_HELP);
        break;
      case "none":
        break;
    }
  });
  rl.on("close", () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  });
  onTermination(logger, shutdown);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    process.exit(1);
  }

  const cmd = parsed.value;
  if (cmd.command === "help") {
    console.log(USAGE);
    return;
  }

  const config = loadRelayConfig();
  switch (cmd.command) {
    case "relay":
      await cmdRelay(config, cmd.port);
      break;
    case "worker":
      await cmdWorker(config, cmd.deviceId, cmd.host, cmd.port);
      break;
    case "controller":
      await cmdController(config, cmd.host, cmd.port);
      break;
  }
}

main().catch((err: unknown) => {
  if (err instanceof StartupError) {
    console.error(`Startup failed (${err.stage}): ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
