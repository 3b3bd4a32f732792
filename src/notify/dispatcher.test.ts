import { describe, it } from "node:test";
import assert from "node:assert";
import pino from "pino";
import { createNotificationDispatcher } from "./dispatcher.js";
import { Notifier, OutboundMessage, SendResult } from "./notifier.js";
import { teams } from "../presets/service-desk.v1.js";
import { TicketEvent } from "../types/contracts.js";
import { T0, makeTicket, silentLogger } from "../test-support.js";

function capture() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino({ level: "info" }, { write: (s: string) => { lines.push(JSON.parse(s)); } });
  return { lines, logger };
}

function stubNotifier(send: (m: OutboundMessage) => Promise<SendResult>): Notifier & { sent: OutboundMessage[] } {
  const sent: OutboundMessage[] = [];
  return {
    mode: "stub",
    sent,
    send: m => {
      sent.push(m);
      return send(m);
    }
  };
}

const created: TicketEvent = { id: "e1", type: "ticket_created", ticket: makeTicket(), at: T0.toISOString() };

describe("notification dispatcher", () => {
  it("sends the rendered message for an event", async () => {
    const notifier = stubNotifier(async () => ({ ok: true, mode: "stub" }));
    const d = createNotificationDispatcher({ notifier, teams, timeoutMs: 1000, logger: silentLogger });

    d.handle(created);
    await d.flush();
    assert.deepStrictEqual(notifier.sent.map(m => [m.recipient, m.subject]), [
      ["alice@example.com", "Ticket TKT-000001 created: VPN keeps dropping"]
    ]);
  });

  it("mails an auto-resolved requester a confirmation and then the resolution", async () => {
    const notifier = stubNotifier(async () => ({ ok: true, mode: "stub" }));
    const d = createNotificationDispatcher({ notifier, teams, timeoutMs: 1000, logger: silentLogger });
    const ticket = makeTicket({ subject: "Password reset", body: "" });

    d.handle({ id: "e2", type: "ticket_created", ticket, at: T0.toISOString() });
    d.handle({ id: "e3", type: "ticket_auto_resolved", ticket, at: T0.toISOString() });
    await d.flush();
    assert.deepStrictEqual(notifier.sent.map(m => [m.recipient, m.subject]), [
      ["alice@example.com", "Ticket TKT-000001 created: Password reset"],
      ["alice@example.com", "Ticket TKT-000001 resolved"]
    ]);
  });

  it("gives up on a delivery that outlives its timeout and logs it", async () => {
    const { lines, logger } = capture();
    const notifier = stubNotifier(() => new Promise<SendResult>(() => {}));
    const d = createNotificationDispatcher({ notifier, teams, timeoutMs: 10, logger });

    d.handle(created);
    await d.flush();

    const failed = lines.filter(l => l.msg === "notify: delivery failed");
    assert.strictEqual(failed.length, 1);
    assert.strictEqual(failed[0].ticketId, "TKT-000001");
    const err = failed[0].err;
    assert.ok(typeof err === "object" && err !== null && "message" in err);
    assert.strictEqual(err.message, "notifier:stub: delivery timed out after 10ms");
  });

  it("logs a failed send result", async () => {
    const { lines, logger } = capture();
    const notifier = stubNotifier(async () => ({ ok: false, error: "mailbox full" }));
    const d = createNotificationDispatcher({ notifier, teams, timeoutMs: 1000, logger });

    d.handle(created);
    await d.flush();
    const failed = lines.find(l => l.msg === "notify: delivery failed");
    assert.strictEqual(failed?.error, "mailbox full");
    assert.strictEqual(failed?.component, "notifier");
  });
});
