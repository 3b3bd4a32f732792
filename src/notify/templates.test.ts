import { describe, it } from "node:test";
import assert from "node:assert";
import { renderEvent } from "./templates.js";
import { teams } from "../presets/service-desk.v1.js";
import { T0, makeTicket } from "../test-support.js";

const at = T0.toISOString();

describe("renderEvent", () => {
  it("confirms a new ticket to its sender", () => {
    const msg = renderEvent({ id: "e", type: "ticket_created", ticket: makeTicket(), at }, teams);
    assert.strictEqual(msg.recipient, "alice@example.com");
    assert.strictEqual(msg.subject, "Ticket TKT-000001 created: VPN keeps dropping");
    assert.ok(msg.body.includes("Priority: medium\n"));
  });

  it("confirms an auto-resolved ticket before its resolution notice", () => {
    const ticket = makeTicket({ subject: "Password reset", body: "" });
    const confirmation = renderEvent({ id: "e", type: "ticket_created", ticket, at }, teams);
    assert.strictEqual(confirmation.recipient, "alice@example.com");
    assert.strictEqual(confirmation.subject, "Ticket TKT-000001 created: Password reset");
    assert.ok(confirmation.body.includes("Status: auto_resolved\n"));

    const msg = renderEvent({ id: "e", type: "ticket_auto_resolved", ticket, at }, teams);
    assert.strictEqual(msg.recipient, "alice@example.com");
    assert.strictEqual(msg.subject, "Ticket TKT-000001 resolved");
    assert.strictEqual(
      msg.body.split("\n")[1],
      "Auto-resolved by service desk policy"
    );
  });

  it("passes the resolution note on to the sender", () => {
    const msg = renderEvent(
      { id: "e", type: "ticket_resolved", ticket: makeTicket(), at, note: "Replaced the router", actor: "erin" },
      teams
    );
    assert.strictEqual(msg.body.split("\n")[1], "Resolution: Replaced the router");
  });

  it("alerts the assigned team on escalation", () => {
    const ticket = makeTicket({ subject: "Server down", body: "" });
    const msg = renderEvent({ id: "e", type: "ticket_escalated", ticket, at }, teams);
    assert.strictEqual(msg.recipient, "infra-team@example.com");
    assert.strictEqual(msg.subject, "[ESCALATED] Ticket TKT-000001: Server down");
  });

  it("warns the team with the elapsed share of the window", () => {
    const msg = renderEvent({ id: "e", type: "sla_warning", ticket: makeTicket(), at, elapsedRatio: 0.875 }, teams);
    assert.strictEqual(msg.recipient, "network-team@example.com");
    assert.strictEqual(msg.subject, "[SLA WARNING] Ticket TKT-000001 approaching breach");
    assert.strictEqual(msg.body.split("\n")[0], "Ticket TKT-000001 has used 88% of its resolution window.");
  });

  it("reports breaches and whether the ticket was escalated", () => {
    const ticket = makeTicket();
    assert.strictEqual(
      renderEvent({ id: "e", type: "sla_response_breach", ticket, at }, teams)?.subject,
      "[SLA BREACH] Ticket TKT-000001 missed its response deadline"
    );
    const msg = renderEvent({ id: "e", type: "sla_resolution_breach", ticket, at, escalated: true }, teams);
    assert.strictEqual(msg.subject, "[SLA BREACH] Ticket TKT-000001 missed its resolution deadline");
    assert.strictEqual(msg.body.split("\n")[1], "The ticket has been escalated to high priority.");
  });

  it("falls back to the category team when none is assigned", () => {
    const ticket = { ...makeTicket(), assignedTeam: null };
    const msg = renderEvent({ id: "e", type: "sla_response_breach", ticket, at }, { other: "desk@example.com" });
    assert.strictEqual(msg.recipient, "desk@example.com");
  });
});
