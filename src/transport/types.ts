/**
 * Datagram Transport Types
 *
 * The coordinator, worker and controller only see this interface; the UDP
 * socket lives behind it so the protocol can run over an in-process
 * network in tests.
 */

import type { Endpoint } from "../types.js";

export type DatagramHandler = (data: Buffer, from: Endpoint) => void;

/** A bound datagram socket. */
export interface DatagramTransport {
  /** The endpoint this transport is bound to. */
  readonly local: Endpoint;
  /** Send one datagram. Rejects if the send fails locally; delivery is never confirmed. */
  send(data: Buffer, to: Endpoint): Promise<void>;
  /** Install the receive handler. A later call replaces the earlier handler. */
  onDatagram(handler: DatagramHandler): void;
  /** Release the socket. Idempotent. */
  close(): Promise<void>;
}
