import { test, describe } from "node:test";
import assert from "node:assert";
import crypto from "crypto";
import { fingerprintOf } from "./dedupe.js";

const base = {
  sender: "Alice@Example.com ",
  subject: " Printer jam ",
  receivedAt: "2026-03-02T09:00:00.000Z",
  normalizedBody: "printer jam\nthe printer on floor 2 is jammed"
};

describe("fingerprintOf", () => {
  test("is deterministic", () => {
    assert.strictEqual(fingerprintOf(base), fingerprintOf({ ...base }));
  });

  test("changes with the content", () => {
    assert.notStrictEqual(fingerprintOf(base), fingerprintOf({ ...base, normalizedBody: "something else" }));
    assert.notStrictEqual(fingerprintOf(base), fingerprintOf({ ...base, receivedAt: "2026-03-02T09:00:01.000Z" }));
  });

  test("matches the content vector when there is no message id", () => {
    const raw = `alice@example.com|2026-03-02T09:00:00.000Z|Printer jam|${base.normalizedBody}`;
    const expected = crypto.createHash("sha256").update(raw).digest("hex");
    assert.strictEqual(fingerprintOf(base), expected);
  });

  test("uses only the message id when one is present", () => {
    const expected = crypto.createHash("sha256").update("id|AAMkAD-1").digest("hex");
    assert.strictEqual(fingerprintOf({ ...base, messageId: "AAMkAD-1" }), expected);
    assert.strictEqual(
      fingerprintOf({ ...base, messageId: "AAMkAD-1" }),
      fingerprintOf({ ...base, subject: "Re: Printer jam", messageId: "AAMkAD-1" })
    );
  });

  test("handles empty strings", () => {
    const hash = fingerprintOf({ sender: "", subject: "", receivedAt: "", normalizedBody: "" });
    assert.strictEqual(hash.length, 64);
  });
});
