import { describe, it } from "node:test";
import assert from "node:assert";
import {
  computeDeadlines,
  elapsedRatio,
  nextSlaCheckpoint,
  shrinkDeadlines,
  slaView,
  validateSlaPolicy,
  warningAt
} from "./sla.js";
import { slaPolicy } from "../presets/service-desk.v1.js";
import { T0, hoursAfter, makeTicket } from "../test-support.js";

const iso = (hours: number) => hoursAfter(T0, hours).toISOString();

describe("computeDeadlines", () => {
  it("adds the priority's windows to the start time", () => {
    assert.deepStrictEqual(computeDeadlines("medium", T0, slaPolicy), {
      responseDueAt: iso(4),
      resolutionDueAt: iso(24)
    });
    assert.deepStrictEqual(computeDeadlines("high", T0, slaPolicy), {
      responseDueAt: iso(1),
      resolutionDueAt: iso(4)
    });
  });
});

describe("validateSlaPolicy", () => {
  it("rejects a response window that is not shorter than the resolution window", () => {
    assert.throws(
      () => validateSlaPolicy({ ...slaPolicy, low: { responseHours: 72, resolutionHours: 72 } }),
      /low must be shorter/
    );
  });

  it("rejects non-positive windows", () => {
    assert.throws(() => validateSlaPolicy({ ...slaPolicy, high: { responseHours: 0, resolutionHours: 4 } }), /positive/);
  });
});

describe("shrinkDeadlines", () => {
  const current = { responseDueAt: iso(4), resolutionDueAt: iso(24) };

  it("pulls deadlines in to the high windows from the escalation time", () => {
    assert.deepStrictEqual(shrinkDeadlines(current, "high", hoursAfter(T0, 1), slaPolicy), {
      responseDueAt: iso(2),
      resolutionDueAt: iso(5)
    });
  });

  it("never extends a deadline", () => {
    assert.deepStrictEqual(shrinkDeadlines(current, "high", hoursAfter(T0, 23), slaPolicy), current);
  });
});

describe("warning point", () => {
  it("sits at the warning ratio of the resolution window", () => {
    const t = { createdAt: iso(0), resolutionDueAt: iso(24) };
    assert.strictEqual(warningAt(t, 0.8), "2026-03-03T04:12:00.000Z");
    assert.strictEqual(elapsedRatio(t, hoursAfter(T0, 6)), 0.25);
  });
});

describe("nextSlaCheckpoint", () => {
  const t = makeTicket(); // medium, assigned at T0

  it("is the response deadline while it is pending", () => {
    assert.strictEqual(nextSlaCheckpoint(t, 0.8), iso(4));
  });

  it("moves to the warning point once the response is settled", () => {
    assert.strictEqual(nextSlaCheckpoint({ ...t, respondedAt: iso(1) }, 0.8), "2026-03-03T04:12:00.000Z");
    assert.strictEqual(
      nextSlaCheckpoint({ ...t, sla: { responseBreached: true, resolutionBreached: false } }, 0.8),
      "2026-03-03T04:12:00.000Z"
    );
  });

  it("moves to the resolution deadline once warned", () => {
    const warned = { ...t, respondedAt: iso(1), notices: { ...t.notices, warningAt: iso(20) } };
    assert.strictEqual(nextSlaCheckpoint(warned, 0.8), iso(24));
  });

  it("is null when nothing is pending or the ticket is terminal", () => {
    const flagged = { ...t, sla: { responseBreached: true, resolutionBreached: true } };
    assert.strictEqual(nextSlaCheckpoint(flagged, 0.8), null);
    assert.strictEqual(nextSlaCheckpoint({ ...t, status: "resolved" }, 0.8), null);
  });
});

describe("slaView", () => {
  const t = makeTicket();

  it("is on track early in the window", () => {
    const v = slaView({ ...t, respondedAt: iso(0.5) }, hoursAfter(T0, 1), 0.8);
    assert.strictEqual(v.state, "on_track");
    assert.strictEqual(v.timeToBreachSeconds, 23 * 3600);
  });

  it("is at risk past the warning point", () => {
    assert.strictEqual(slaView({ ...t, respondedAt: iso(0.5) }, hoursAfter(T0, 20), 0.8).state, "at_risk");
  });

  it("is breached once a deadline has passed, flagged or not", () => {
    const v = slaView(t, hoursAfter(T0, 5), 0.8);
    assert.strictEqual(v.state, "breached");
    assert.strictEqual(v.responseBreached, true);
    assert.strictEqual(v.resolutionBreached, false);
  });

  it("reports no time to breach for terminal tickets", () => {
    const done = makeTicket({ subject: "Password reset", body: "please reset my password" });
    assert.strictEqual(done.status, "auto_resolved");
    const v = slaView(done, hoursAfter(T0, 100), 0.8);
    assert.strictEqual(v.timeToBreachSeconds, null);
    assert.strictEqual(v.state, "on_track");
  });
});
