/**
 * Shared type definitions for camrelay.
 * Kept minimal so coordinator, worker and controller stay decoupled.
 */

// --- Logging ---

export interface RelayLogger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}

// --- Transport ---

/** An IPv4 datagram endpoint. */
export interface Endpoint {
  address: string;
  port: number;
}

/** Render an endpoint as "host:port" for logs. */
export function formatEndpoint(endpoint: Endpoint): string {
  return `${endpoint.address}:${endpoint.port}`;
}

// --- Broadcasts ---

/** The kinds of broadcast the controller can issue. */
export type BroadcastKind = "time" | "listing" | "capture" | "upload";

/** Milliseconds since the epoch. Injected so tests can drive time. */
export type Clock = () => number;
