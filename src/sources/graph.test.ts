import { describe, it } from "node:test";
import assert from "node:assert";
import { GraphSource } from "./graph.js";
import { AdapterError } from "../core/errors.js";
import { silentLogger } from "../test-support.js";

interface Call {
  url: string;
  method: string;
  body: string;
}

function graphStub(opts: { listStatus?: number; patchStatus?: number } = {}) {
  const calls: Call[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = String(input);
    const method = init?.method ?? "GET";
    calls.push({ url, method, body: typeof init?.body === "string" ? init.body : "" });

    if (url.includes("/oauth2/v2.0/token")) {
      return Response.json({ access_token: "test-token", expires_in: 3600 });
    }
    if (method === "PATCH") {
      return new Response(null, { status: opts.patchStatus ?? 200 });
    }
    if ((opts.listStatus ?? 200) !== 200) {
      return new Response("nope", { status: opts.listStatus });
    }
    return Response.json({
      value: [
        {
          id: "msg-1",
          subject: "Outlook crashes",
          receivedDateTime: "2026-03-02T08:30:00Z",
          from: { emailAddress: { address: "alice@example.com" } },
          body: { contentType: "html", content: "<p>It&nbsp;crashes<br>on start</p>" }
        },
        {
          id: "msg-2",
          subject: null,
          receivedDateTime: null,
          from: null,
          body: { contentType: "text", content: "  plain body  " }
        }
      ]
    });
  };
  return { calls, fetchImpl };
}

const creds = {
  clientId: "test-client",
  clientSecret: "test-secret",
  tenantId: "test-tenant",
  userEmail: "servicedesk@example.com",
  logger: silentLogger
};

describe("GraphSource", () => {
  it("refuses to fetch without credentials", async () => {
    const source = new GraphSource({ ...creds, clientSecret: "" });
    assert.strictEqual(source.isConfigured(), false);
    await assert.rejects(source.fetch(), AdapterError);
  });

  it("maps unread messages and caches the token", async () => {
    const { calls, fetchImpl } = graphStub();
    const source = new GraphSource({ ...creds, fetchImpl });

    const messages = await source.fetch();
    await source.fetch();

    assert.strictEqual(messages.length, 2);
    assert.deepStrictEqual(messages[0], {
      sender: "alice@example.com",
      subject: "Outlook crashes",
      body: "It crashes on start",
      receivedAt: "2026-03-02T08:30:00.000Z",
      messageId: "msg-1"
    });
    assert.strictEqual(messages[1].sender, "unknown");
    assert.strictEqual(messages[1].subject, "");
    assert.strictEqual(messages[1].body, "plain body");

    assert.strictEqual(calls.filter(c => c.url.includes("/token")).length, 1);
    const list = calls.find(c => c.url.includes("/messages?"));
    assert.ok(list?.url.startsWith("https://graph.microsoft.com/v1.0/users/servicedesk%40example.com/mailFolders/Inbox/messages?"));
  });

  it("wraps a failed listing in an AdapterError", async () => {
    const { fetchImpl } = graphStub({ listStatus: 503 });
    const source = new GraphSource({ ...creds, fetchImpl });
    await assert.rejects(source.fetch(), (err: unknown) => {
      assert.ok(err instanceof AdapterError);
      assert.strictEqual(err.message, "graph: list messages failed with 503");
      return true;
    });
  });

  it("marks each message read", async () => {
    const { calls, fetchImpl } = graphStub();
    const source = new GraphSource({ ...creds, fetchImpl });
    await source.acknowledge(await source.fetch());

    const patches = calls.filter(c => c.method === "PATCH");
    assert.deepStrictEqual(
      patches.map(p => p.url),
      [
        "https://graph.microsoft.com/v1.0/users/servicedesk%40example.com/messages/msg-1",
        "https://graph.microsoft.com/v1.0/users/servicedesk%40example.com/messages/msg-2"
      ]
    );
    assert.strictEqual(patches[0].body, '{"isRead":true}');
  });

  it("reports every message it could not mark", async () => {
    const { fetchImpl } = graphStub({ patchStatus: 500 });
    const source = new GraphSource({ ...creds, fetchImpl });
    const messages = await source.fetch();
    await assert.rejects(source.acknowledge(messages), /could not mark 2 message\(s\) as read/);
  });
});
