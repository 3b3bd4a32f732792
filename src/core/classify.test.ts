import { describe, it } from "node:test";
import assert from "node:assert";
import { classify, classificationText } from "./classify.js";
import { ClassificationRule } from "../presets/service-desk.v1.js";

describe("classify", () => {
  it("maps an outage to infrastructure/high", () => {
    const c = classify({ subject: "Production outage", body: "The billing site is unreachable." });
    assert.deepStrictEqual(c, { category: "infrastructure", priority: "high", ruleId: "infra-outage", fallback: false });
  });

  it("lets the first matching rule win", () => {
    // "email" matches a later rule, "down" the first one
    const c = classify({ subject: "Email server down", body: "" });
    assert.strictEqual(c.ruleId, "infra-outage");
    assert.strictEqual(c.priority, "high");
  });

  it("matches multi-word keywords and apostrophes", () => {
    assert.strictEqual(classify({ subject: "Help", body: "I am LOCKED OUT of my account" }).ruleId, "access-credentials");
    assert.strictEqual(classify({ subject: "Can't connect", body: "from home" }).category, "network");
  });

  it("matches on word boundaries only", () => {
    const c = classify({ subject: "Question", body: "The download of the installer failed" });
    assert.deepStrictEqual(c, { category: "other", priority: "low", ruleId: null, fallback: true });
  });

  it("reads the subject and the body", () => {
    assert.strictEqual(classify({ subject: "Outlook", body: "" }).category, "email");
    assert.strictEqual(classify({ subject: "", body: "new laptop needed" }).category, "hardware");
  });

  it("uses the rules it is given", () => {
    const rules: ClassificationRule[] = [
      { id: "payroll", category: "software", priority: "high", keywords: ["payroll"] }
    ];
    assert.deepStrictEqual(classify({ subject: "Payroll run failed", body: "" }, rules), {
      category: "software",
      priority: "high",
      ruleId: "payroll",
      fallback: false
    });
    assert.strictEqual(classify({ subject: "vpn", body: "" }, rules).fallback, true);
  });
});

describe("classificationText", () => {
  it("joins subject and body with a newline and normalizes", () => {
    assert.strictEqual(classificationText({ subject: " VPN  Down ", body: "Since\r\n9am" }), "vpn down \nsince\n9am");
  });
});
