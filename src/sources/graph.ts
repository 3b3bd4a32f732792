import { z } from "zod";
import pino, { Logger } from "pino";
import { RawMessage } from "../types/contracts.js";
import { AdapterError, errorMessage } from "../core/errors.js";
import { MessageSource, stripHtml } from "./source.js";

const TOKEN_URL = "https://login.microsoftonline.com";
const GRAPH_URL = "https://graph.microsoft.com/v1.0";

const TokenResponse = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().default(3600)
});

const GraphMessages = z.object({
  value: z.array(z.object({
    id: z.string(),
    subject: z.string().nullish(),
    receivedDateTime: z.string().nullish(),
    from: z.object({
      emailAddress: z.object({ address: z.string().nullish() }).partial().nullish()
    }).partial().nullish(),
    body: z.object({
      contentType: z.string().nullish(),
      content: z.string().nullish()
    }).partial().nullish()
  }).passthrough())
}).passthrough();

export interface GraphSourceOptions {
  clientId: string;
  clientSecret: string;
  tenantId: string;
  userEmail: string;
  folder?: string;
  top?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

/** Reads unread mail from a Microsoft 365 mailbox (client-credentials flow). */
export class GraphSource implements MessageSource {
  readonly name = "graph";

  private fetchImpl: typeof fetch;
  private log: Logger;
  private token: { value: string; expiresAtMs: number } | null = null;

  constructor(private opts: GraphSourceOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.log = (opts.logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "graph-source" });
  }

  isConfigured(): boolean {
    return !!(this.opts.clientId && this.opts.clientSecret && this.opts.tenantId && this.opts.userEmail);
  }

  private async accessToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAtMs) return this.token.value;

    const res = await this.fetchImpl(`${TOKEN_URL}/${encodeURIComponent(this.opts.tenantId)}/oauth2/v2.0/token`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        client_id: this.opts.clientId,
        client_secret: this.opts.clientSecret,
        scope: "https://graph.microsoft.com/.default",
        grant_type: "client_credentials"
      }).toString()
    });
    if (!res.ok) {
      const txt = await res.text().catch(() => "");
      throw new AdapterError(this.name, `token request failed with ${res.status} ${txt}`.trim());
    }

    const t = TokenResponse.parse(await res.json());
    // refresh a minute early
    this.token = { value: t.access_token, expiresAtMs: Date.now() + Math.max(0, t.expires_in - 60) * 1000 };
    return t.access_token;
  }

  async fetch(): Promise<RawMessage[]> {
    if (!this.isConfigured()) throw new AdapterError(this.name, "not configured");

    const folder = encodeURIComponent(this.opts.folder ?? "Inbox");
    const params = new URLSearchParams({
      $filter: "isRead eq false",
      $top: String(this.opts.top ?? 50),
      $select: "id,from,subject,body,receivedDateTime",
      $orderby: "receivedDateTime asc"
    });
    const url = `${GRAPH_URL}/users/${encodeURIComponent(this.opts.userEmail)}/mailFolders/${folder}/messages?${params}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, { headers: { Authorization: `Bearer ${await this.accessToken()}` } });
    } catch (err) {
      if (err instanceof AdapterError) throw err;
      throw new AdapterError(this.name, errorMessage(err), { cause: err });
    }
    if (!res.ok) throw new AdapterError(this.name, `list messages failed with ${res.status}`);

    const parsed = GraphMessages.parse(await res.json());
    return parsed.value.map(m => {
      const content = m.body?.content ?? "";
      const isHtml = (m.body?.contentType ?? "").toLowerCase() === "html";
      const received = Date.parse(m.receivedDateTime ?? "");
      return {
        sender: m.from?.emailAddress?.address || "unknown",
        subject: m.subject ?? "",
        body: isHtml ? stripHtml(content) : content.trim(),
        receivedAt: Number.isFinite(received) ? new Date(received).toISOString() : new Date().toISOString(),
        messageId: m.id
      };
    });
  }

  /** Marks each message read; reports every failure after trying them all. */
  async acknowledge(messages: RawMessage[]): Promise<void> {
    const failed: string[] = [];
    for (const m of messages) {
      if (!m.messageId) continue;
      const url = `${GRAPH_URL}/users/${encodeURIComponent(this.opts.userEmail)}/messages/${encodeURIComponent(m.messageId)}`;
      try {
        const res = await this.fetchImpl(url, {
          method: "PATCH",
          headers: {
            Authorization: `Bearer ${await this.accessToken()}`,
            "Content-Type": "application/json"
          },
          body: JSON.stringify({ isRead: true })
        });
        if (!res.ok) failed.push(m.messageId);
      } catch (err) {
        this.log.warn({ err, messageId: m.messageId }, "graph: mark as read failed");
        failed.push(m.messageId);
      }
    }
    if (failed.length) {
      throw new AdapterError(this.name, `could not mark ${failed.length} message(s) as read`);
    }
  }
}
