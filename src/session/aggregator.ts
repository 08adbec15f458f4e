/**
 * Request Aggregator
 *
 * State machine for the single in-flight broadcast session:
 *
 *   idle ──begin()──▶ collecting ──(tally satisfied | deadline)──▶ idle
 *
 * Every reply is forwarded to a requester, in arrival order. Only replies
 * of the session's kind from targeted devices that have not answered yet
 * are tallied. Replies arriving while idle go to the most recent
 * requester and never reopen a session.
 */

import type { BroadcastPolicy } from "../config.js";
import type { BroadcastKind, Endpoint } from "../types.js";

export type AggregatorState = "idle" | "collecting";

/** One broadcast and its bounded-time reply tally. */
export interface RequestSession {
  id: string;
  kind: BroadcastKind;
  requester: Endpoint;
  startedAt: number;
  /** Epoch ms at which the session times out. */
  deadline: number;
  /** Active-device count at session start. */
  expectedCount: number;
  receivedCount: number;
  /** Device ids the request was fanned out to. */
  targets: string[];
  /** Device ids already tallied. */
  responded: string[];
}

export type BeginResult =
  | {
      ok: true;
      session: RequestSession;
      /** A collecting session abandoned under the "replace" policy. */
      replaced: RequestSession | null;
      /** A session that timed out just before this one began. */
      expired: RequestSession | null;
      /** True when there was nothing to wait for. */
      completed: boolean;
    }
  | { ok: false; reason: "busy"; active: RequestSession };

export interface RecordResult {
  /** Where to forward the reply; null when no requester is known yet. */
  forwardTo: Endpoint | null;
  tallied: boolean;
  /** Arrived while idle, after the session it answers had closed. */
  late: boolean;
  /** The session this reply completed. */
  completed: RequestSession | null;
  /** A session that timed out just before this reply was looked at. */
  expired: RequestSession | null;
}

export interface RequestAggregatorOptions {
  responseTimeoutMs: number;
  policy: BroadcastPolicy;
}

function copySession(session: RequestSession): RequestSession {
  return {
    ...session,
    requester: { ...session.requester },
    targets: [...session.targets],
    responded: [...session.responded],
  };
}

export class RequestAggregator {
  private current: RequestSession | null = null;
  private lastRequester: Endpoint | null = null;
  private sequence = 0;
  private readonly responseTimeoutMs: number;
  private readonly policy: BroadcastPolicy;

  constructor(opts: RequestAggregatorOptions) {
    this.responseTimeoutMs = opts.responseTimeoutMs;
    this.policy = opts.policy;
  }

  get state(): AggregatorState {
    return this.current ? "collecting" : "idle";
  }

  /** A copy of the collecting session, or null when idle. */
  get session(): RequestSession | null {
    return this.current ? copySession(this.current) : null;
  }

  /** Open a session for a broadcast fanned out to `targets`. */
  begin(params: {
    kind: BroadcastKind;
    requester: Endpoint;
    targets: readonly string[];
    now: number;
  }): BeginResult {
    const expired = this.expire(params.now);

    let replaced: RequestSession | null = null;
    if (this.current) {
      if (this.policy === "reject") {
        return { ok: false, reason: "busy", active: copySession(this.current) };
      }
      replaced = copySession(this.current);
      this.current = null;
    }

    const session: RequestSession = {
      id: `session-${params.now}-${++this.sequence}`,
      kind: params.kind,
      requester: { ...params.requester },
      startedAt: params.now,
      deadline: params.now + this.responseTimeoutMs,
      expectedCount: params.targets.length,
      receivedCount: 0,
      targets: [...params.targets],
      responded: [],
    };
    this.lastRequester = { ...params.requester };

    const completed = session.expectedCount === 0;
    if (!completed) {
      this.current = session;
    }
    return { ok: true, session: copySession(session), replaced, expired, completed };
  }

  /** Account for one worker reply. */
  record(reply: { kind: BroadcastKind; deviceId: string }, now: number): RecordResult {
    const expired = this.expire(now);
    const session = this.current;

    if (!session) {
      return {
        forwardTo: this.lastRequester ? { ...this.lastRequester } : null,
        tallied: false,
        late: this.lastRequester !== null,
        completed: null,
        expired,
      };
    }

    const forwardTo = { ...session.requester };
    const countable =
      reply.kind === session.kind &&
      session.targets.includes(reply.deviceId) &&
      !session.responded.includes(reply.deviceId);

    if (!countable) {
      return { forwardTo, tallied: false, late: false, completed: null, expired };
    }

    session.responded.push(reply.deviceId);
    session.receivedCount++;

    if (session.receivedCount >= session.expectedCount) {
      this.current = null;
      return { forwardTo, tallied: true, late: false, completed: copySession(session), expired };
    }
    return { forwardTo, tallied: true, late: false, completed: null, expired };
  }

  /**
   * Close the session if its deadline has passed. Returns the partial
   * session that timed out, or null.
   */
  expire(now: number): RequestSession | null {
    if (!this.current || now < this.current.deadline) return null;
    const timedOut = copySession(this.current);
    this.current = null;
    return timedOut;
  }
}
