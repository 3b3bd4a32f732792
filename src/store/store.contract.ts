import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { TicketStore } from "./store.js";
import { buildTicketDraft, resolvePolicy } from "../core/engine.js";
import { createLifecycle } from "../core/lifecycle.js";
import { EventBus } from "../events/bus.js";
import { DuplicateIngestionError } from "../core/errors.js";
import { makeAudit } from "../audit/audit.js";
import { RawMessage, TicketDraft } from "../types/contracts.js";
import { T0, hoursAfter, message, silentLogger } from "../test-support.js";

const policy = resolvePolicy();

function draftOf(overrides: Partial<RawMessage>): TicketDraft {
  return buildTicketDraft(message(overrides), T0, policy).draft;
}

const lowDraft = () => draftOf({ sender: "bob@example.com", subject: "Password reset", body: "I forgot my password" });
const mediumDraft = () => draftOf({ sender: "carol@example.com", subject: "VPN", body: "cannot connect from home" });
const highDraft = () => draftOf({ sender: "dave@example.com", subject: "Outage", body: "the intranet is DOWN" });

/** Behaviour every TicketStore implementation shares. */
export function describeStoreContract(name: string, open: () => TicketStore) {
  describe(`${name} contract`, () => {
    let store: TicketStore;

    beforeEach(async () => {
      store = open();
      await store.init();
    });

    afterEach(async () => {
      await store.close();
    });

    it("assigns sequential ids and version 1", async () => {
      const a = await store.create(lowDraft());
      const b = await store.create(mediumDraft());
      assert.strictEqual(a.id, "TKT-000001");
      assert.strictEqual(b.id, "TKT-000002");
      assert.strictEqual(b.seq, 2);
      assert.strictEqual(b.version, 1);
      assert.deepStrictEqual(await store.get("TKT-000002"), b);
    });

    it("rejects a second ticket with the same fingerprint", async () => {
      const a = await store.create(mediumDraft());
      await assert.rejects(store.create(mediumDraft()), (err: unknown) => {
        assert.ok(err instanceof DuplicateIngestionError);
        assert.strictEqual(err.existingId, a.id);
        return true;
      });
      assert.strictEqual((await store.list({})).length, 1);
      assert.deepStrictEqual(await store.findByFingerprint(a.fingerprint), a);
      assert.strictEqual(await store.findByFingerprint("nope"), null);
    });

    it("tickets a message once when two ingests race", async () => {
      const lc = createLifecycle({ store, bus: new EventBus(silentLogger), policy, logger: silentLogger });
      const m = message();
      const [x, y] = await Promise.all([lc.ingest([m], T0), lc.ingest([m], T0)]);

      assert.strictEqual(x.created.length + y.created.length, 1);
      assert.strictEqual(x.duplicates.length + y.duplicates.length, 1);
      assert.deepStrictEqual([...x.duplicates, ...y.duplicates].map(d => d.existingId), ["TKT-000001"]);
      assert.deepStrictEqual((await store.list({})).map(t => t.id), ["TKT-000001"]);
    });

    it("returns null for unknown ids", async () => {
      assert.strictEqual(await store.get("TKT-000042"), null);
      assert.strictEqual(await store.get("not-an-id"), null);
      assert.strictEqual(await store.update("TKT-000042", t => t), null);
    });

    it("applies a mutation and bumps the version", async () => {
      const a = await store.create(mediumDraft());
      const updated = await store.update(a.id, t => ({ ...t, ownerId: "erin", updatedAt: hoursAfter(T0, 1).toISOString() }));
      assert.strictEqual(updated?.version, 2);
      assert.strictEqual(updated?.ownerId, "erin");
      assert.deepStrictEqual(await store.get(a.id), updated);
    });

    it("skips the write when the mutation returns the current ticket", async () => {
      const a = await store.create(mediumDraft());
      const same = await store.update(a.id, t => t);
      assert.strictEqual(same?.version, 1);
    });

    it("leaves the ticket unchanged when the mutation throws", async () => {
      const a = await store.create(mediumDraft());
      await assert.rejects(
        store.update(a.id, () => {
          throw new Error("abort");
        }),
        /abort/
      );
      assert.deepStrictEqual(await store.get(a.id), a);
    });

    it("lists newest first with filters and paging", async () => {
      await store.create(lowDraft());
      await store.create(mediumDraft());
      await store.create(highDraft());

      assert.deepStrictEqual((await store.list({})).map(t => t.id), ["TKT-000003", "TKT-000002", "TKT-000001"]);
      assert.deepStrictEqual((await store.list({ status: "assigned" })).map(t => t.id), ["TKT-000002"]);
      assert.deepStrictEqual((await store.list({ category: "access" })).map(t => t.id), ["TKT-000001"]);
      assert.deepStrictEqual((await store.list({ priority: "high" })).map(t => t.id), ["TKT-000003"]);
      assert.deepStrictEqual((await store.list({ search: "intranet is down" })).map(t => t.id), ["TKT-000003"]);
      assert.deepStrictEqual((await store.list({ search: "CAROL@" })).map(t => t.id), ["TKT-000002"]);
      assert.deepStrictEqual((await store.list({ limit: 1, offset: 1 })).map(t => t.id), ["TKT-000002"]);
      assert.deepStrictEqual((await store.list({ offset: 2 })).map(t => t.id), ["TKT-000001"]);
      assert.deepStrictEqual((await store.listByStatus("escalated")).map(t => t.id), ["TKT-000003"]);
    });

    it("matches search text literally", async () => {
      await store.create(draftOf({ sender: "erin@example.com", subject: "Printer", body: "error 100 on tray two" }));
      await store.create(draftOf({ sender: "frank@example.com", subject: "Scanner", body: "only 50% of pages come out" }));
      await store.create(draftOf({ sender: "gina@example.com", subject: "Share", body: "cannot open C:\\share\\reports" }));

      assert.deepStrictEqual(await store.list({ search: "1_0" }), []);
      assert.deepStrictEqual((await store.list({ search: "%" })).map(t => t.id), ["TKT-000002"]);
      assert.deepStrictEqual((await store.list({ search: "c:\\share" })).map(t => t.id), ["TKT-000003"]);
    });

    it("hands out copies of stored tickets", async () => {
      const a = await store.create(mediumDraft());
      a.status = "resolved";
      a.sla.responseBreached = true;

      const got = await store.get(a.id);
      assert.strictEqual(got?.status, "assigned");
      assert.strictEqual(got?.sla.responseBreached, false);

      const [listed] = await store.list({});
      listed.ownerId = "mallory";
      await store.update(a.id, t => {
        t.priority = "low";
        return t;
      });

      const after = await store.get(a.id);
      assert.strictEqual(after?.ownerId, null);
      assert.strictEqual(after?.priority, "medium");
      assert.strictEqual(after?.version, 1);
    });

    it("lists open tickets whose checkpoint is due, oldest first", async () => {
      await store.create(lowDraft()); // terminal, no checkpoint
      await store.create(mediumDraft()); // due at hour 4
      await store.create(highDraft()); // due at hour 1

      assert.deepStrictEqual(await store.listDueBefore(hoursAfter(T0, 0.5).toISOString()), []);
      assert.deepStrictEqual(
        (await store.listDueBefore(hoursAfter(T0, 1).toISOString())).map(t => t.id),
        ["TKT-000003"]
      );
      assert.deepStrictEqual(
        (await store.listDueBefore(hoursAfter(T0, 100).toISOString())).map(t => t.id),
        ["TKT-000002", "TKT-000003"]
      );
    });

    it("keeps audit entries per ticket in order", async () => {
      const a = await store.create(mediumDraft());
      for (const type of ["created", "status_changed", "acknowledged"]) {
        await store.appendAudit(makeAudit({ ticketId: a.id, type, at: T0, payload: { type } }));
      }
      await store.appendAudit(makeAudit({ ticketId: "TKT-000099", type: "created", at: T0 }));

      const audit = await store.listAudit(a.id);
      assert.deepStrictEqual(audit.map(e => e.type), ["created", "status_changed", "acknowledged"]);
      assert.deepStrictEqual(audit[2].payload, { type: "acknowledged" });
      assert.strictEqual(audit[0].actor, "system");
      assert.deepStrictEqual((await store.listAudit(a.id, 2)).map(e => e.type), ["created", "status_changed"]);
    });
  });
}
