import { RawMessage } from "../types/contracts.js";

export interface MessageSource {
  readonly name: string;
  fetch(): Promise<RawMessage[]>;
  /** Called after a fetched batch has been ingested, e.g. to mark mail as read. */
  acknowledge?(messages: RawMessage[]): Promise<void>;
  /** Sources that can take new messages (the demo file) implement this. */
  append?(message: Pick<RawMessage, "sender" | "subject" | "body">, receivedAt: Date): Promise<RawMessage>;
}

export function stripHtml(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, " ")
    .replace(/<[^>]*>/g, " ")
    .replace(/&nbsp;/g, " ")
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/\s+/g, " ")
    .trim();
}
