/**
 * UDP Transport
 *
 * IPv4 datagram sockets on node:dgram. Binding and address resolution are
 * startup steps, so their failures surface as StartupError; runtime socket
 * errors are logged and the socket stays up.
 */

import dgram from "node:dgram";
import { lookup } from "node:dns/promises";
import { StartupError, errorMessage } from "../errors.js";
import { formatEndpoint, type Endpoint, type RelayLogger } from "../types.js";
import type { DatagramHandler, DatagramTransport } from "./types.js";

export interface UdpBindOptions {
  /** Local port. 0 or omitted picks an ephemeral port. */
  port?: number;
  /** Local address. Default: "0.0.0.0". */
  host?: string;
  logger: RelayLogger;
}

/** Resolve a host name to an IPv4 endpoint. */
export async function resolveEndpoint(host: string, port: number): Promise<Endpoint> {
  try {
    const { address } = await lookup(host, { family: 4 });
    return { address, port };
  } catch (err) {
    throw new StartupError("resolve", `Failed to resolve ${host}: ${errorMessage(err)}`, { cause: err });
  }
}

export class UdpTransport implements DatagramTransport {
  private handler: DatagramHandler | null = null;
  private closed = false;

  private constructor(
    private readonly socket: dgram.Socket,
    readonly local: Endpoint,
    private readonly logger: RelayLogger,
  ) {
    socket.on("message", (msg, rinfo) => {
      this.handler?.(msg, { address: rinfo.address, port: rinfo.port });
    });
    socket.on("error", (err) => {
      logger.error(`[relay:udp] socket error on ${formatEndpoint(local)}: ${err.message}`);
    });
  }

  /** Create and bind an IPv4 datagram socket. */
  static async bind(opts: UdpBindOptions): Promise<UdpTransport> {
    const host = opts.host ?? "0.0.0.0";
    const port = opts.port ?? 0;

    let socket: dgram.Socket;
    try {
      socket = dgram.createSocket("udp4");
    } catch (err) {
      throw new StartupError("socket", `Failed to create socket: ${errorMessage(err)}`, { cause: err });
    }

    const bound = await new Promise<Endpoint>((resolve, reject) => {
      const onError = (err: Error) => {
        socket.close();
        reject(new StartupError("bind", `Failed to bind ${host}:${port}: ${err.message}`, { cause: err }));
      };
      socket.once("error", onError);
      socket.bind(port, host, () => {
        socket.off("error", onError);
        const addr = socket.address();
        resolve({ address: addr.address, port: addr.port });
      });
    });

    opts.logger.debug?.(`[relay:udp] bound ${formatEndpoint(bound)}`);
    return new UdpTransport(socket, bound, opts.logger);
  }

  send(data: Buffer, to: Endpoint): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(data, to.port, to.address, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  onDatagram(handler: DatagramHandler): void {
    this.handler = handler;
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    this.handler = null;
    return new Promise((resolve) => {
      this.socket.close(() => resolve());
    });
  }
}
