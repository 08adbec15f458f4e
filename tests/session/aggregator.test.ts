/**
 * Tests for RequestAggregator: session lifecycle, tallying, deadlines
 * and the busy policies.
 */

import { describe, it, expect } from "vitest";
import { RequestAggregator } from "../../src/session/aggregator.js";

const controller = { address: "10.0.0.9", port: 5000 };
const other = { address: "10.0.0.8", port: 5001 };

function makeAggregator(policy: "reject" | "replace" = "reject") {
  return new RequestAggregator({ responseTimeoutMs: 2_000, policy });
}

describe("RequestAggregator", () => {
  it("starts idle", () => {
    const agg = makeAggregator();
    expect(agg.state).toBe("idle");
    expect(agg.session).toBeNull();
  });

  it("opens a session sized to its targets", () => {
    const agg = makeAggregator();
    const result = agg.begin({ kind: "time", requester: controller, targets: ["a", "b", "c"], now: 1_000 });

    expect(result.ok).toBe(true);
    expect(agg.state).toBe("collecting");
    expect(agg.session).toMatchObject({
      kind: "time",
      requester: controller,
      startedAt: 1_000,
      deadline: 3_000,
      expectedCount: 3,
      receivedCount: 0,
    });
  });

  it("closes once every target has replied", () => {
    const agg = makeAggregator();
    agg.begin({ kind: "time", requester: controller, targets: ["a", "b", "c"], now: 0 });

    expect(agg.record({ kind: "time", deviceId: "a" }, 10)).toEqual({
      forwardTo: controller, tallied: true, late: false, completed: null, expired: null,
    });
    agg.record({ kind: "time", deviceId: "b" }, 20);
    const last = agg.record({ kind: "time", deviceId: "c" }, 30);

    expect(last.tallied).toBe(true);
    expect(last.completed?.receivedCount).toBe(3);
    expect(last.completed?.responded).toEqual(["a", "b", "c"]);
    expect(agg.state).toBe("idle");
  });

  it("tallies each device once", () => {
    const agg = makeAggregator();
    agg.begin({ kind: "time", requester: controller, targets: ["a", "b"], now: 0 });
    agg.record({ kind: "time", deviceId: "a" }, 10);
    const dup = agg.record({ kind: "time", deviceId: "a" }, 20);

    expect(dup.forwardTo).toEqual(controller);
    expect(dup.tallied).toBe(false);
    expect(agg.session?.receivedCount).toBe(1);
    expect(agg.state).toBe("collecting");
  });

  it("forwards but does not tally replies of another kind or from untargeted devices", () => {
    const agg = makeAggregator();
    agg.begin({ kind: "capture", requester: controller, targets: ["a"], now: 0 });

    const wrongKind = agg.record({ kind: "time", deviceId: "a" }, 10);
    const stranger = agg.record({ kind: "capture", deviceId: "z" }, 20);

    expect(wrongKind).toMatchObject({ forwardTo: controller, tallied: false });
    expect(stranger).toMatchObject({ forwardTo: controller, tallied: false });
    expect(agg.session?.receivedCount).toBe(0);
  });

  it("expires exactly at the deadline", () => {
    const agg = makeAggregator();
    agg.begin({ kind: "time", requester: controller, targets: ["a", "b", "c"], now: 1_000 });
    agg.record({ kind: "time", deviceId: "a" }, 1_500);

    expect(agg.expire(2_999)).toBeNull();
    const timedOut = agg.expire(3_000);
    expect(timedOut?.receivedCount).toBe(1);
    expect(timedOut?.responded).toEqual(["a"]);
    expect(agg.state).toBe("idle");
  });

  it("forwards late replies to the last requester without reopening", () => {
    const agg = makeAggregator();
    agg.begin({ kind: "time", requester: controller, targets: ["a", "b"], now: 0 });
    agg.expire(2_000);

    const late = agg.record({ kind: "time", deviceId: "b" }, 2_500);
    expect(late).toEqual({ forwardTo: controller, tallied: false, late: true, completed: null, expired: null });
    expect(agg.state).toBe("idle");
  });

  it("expires a due session when a reply arrives before the tick does", () => {
    const agg = makeAggregator();
    agg.begin({ kind: "time", requester: controller, targets: ["a", "b"], now: 0 });

    const result = agg.record({ kind: "time", deviceId: "a" }, 2_000);
    expect(result.expired?.receivedCount).toBe(0);
    expect(result.tallied).toBe(false);
    expect(result.late).toBe(true);
  });

  it("drops replies while idle when nobody has asked yet", () => {
    const agg = makeAggregator();
    expect(agg.record({ kind: "time", deviceId: "a" }, 0)).toEqual({
      forwardTo: null, tallied: false, late: false, completed: null, expired: null,
    });
  });

  it("completes immediately with no targets", () => {
    const agg = makeAggregator();
    const result = agg.begin({ kind: "listing", requester: controller, targets: [], now: 0 });

    expect(result.ok && result.completed).toBe(true);
    expect(agg.state).toBe("idle");
  });

  // --- busy policies ---

  it("rejects a second request while collecting", () => {
    const agg = makeAggregator("reject");
    agg.begin({ kind: "time", requester: controller, targets: ["a"], now: 0 });
    const second = agg.begin({ kind: "listing", requester: other, targets: ["a"], now: 100 });

    expect(second.ok).toBe(false);
    if (!second.ok) {
      expect(second.reason).toBe("busy");
      expect(second.active.kind).toBe("time");
    }
    expect(agg.session?.requester).toEqual(controller);
  });

  it("replaces the collecting session under the replace policy", () => {
    const agg = makeAggregator("replace");
    agg.begin({ kind: "time", requester: controller, targets: ["a"], now: 0 });
    const second = agg.begin({ kind: "listing", requester: other, targets: ["a"], now: 100 });

    expect(second.ok).toBe(true);
    if (second.ok) {
      expect(second.replaced?.kind).toBe("time");
      expect(second.session.kind).toBe("listing");
    }
    expect(agg.record({ kind: "listing", deviceId: "a" }, 200).forwardTo).toEqual(other);
  });

  it("accepts a new request once the previous deadline has passed", () => {
    const agg = makeAggregator("reject");
    agg.begin({ kind: "time", requester: controller, targets: ["a"], now: 0 });
    const next = agg.begin({ kind: "time", requester: controller, targets: ["a"], now: 2_000 });

    expect(next.ok).toBe(true);
    if (next.ok) {
      expect(next.expired?.kind).toBe("time");
      expect(next.session.deadline).toBe(4_000);
    }
  });

  it("gives each session a distinct id", () => {
    const agg = makeAggregator("replace");
    const first = agg.begin({ kind: "time", requester: controller, targets: ["a"], now: 0 });
    const second = agg.begin({ kind: "time", requester: controller, targets: ["a"], now: 0 });
    expect(first.ok && second.ok && first.session.id !== second.session.id).toBe(true);
  });
});
