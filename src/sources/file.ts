import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { RawMessage } from "../types/contracts.js";
import { MessageSource } from "./source.js";

const ISO_PREFIX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/;

function oneLine(s: string): string {
  return s.replace(/[\r\n]+/g, " ").trim();
}

/**
 * Parses one `sender|subject|body[|receivedAt]` record. The body may itself
 * contain pipes; a trailing field is only taken as the timestamp when it looks
 * like an ISO date.
 */
export function parseEmailLine(line: string, fallbackReceivedAt: string): RawMessage {
  const parts = line.split("|");
  const sender = (parts[0] ?? "").trim() || "unknown";
  const subject = (parts[1] ?? "").trim();
  const rest = parts.slice(2);

  let receivedAt = fallbackReceivedAt;
  const last = rest.length > 1 ? rest[rest.length - 1].trim() : "";
  if (ISO_PREFIX.test(last) && Number.isFinite(Date.parse(last))) {
    receivedAt = new Date(last).toISOString();
    rest.pop();
  }

  return {
    sender,
    subject,
    body: rest.join("|").trim(),
    receivedAt,
    messageId: `file:${crypto.createHash("sha256").update(line).digest("hex")}`
  };
}

/** Demo mailbox: a text file with one email per line. */
export class FileSource implements MessageSource {
  readonly name = "file";

  constructor(private filePath: string) {}

  async fetch(): Promise<RawMessage[]> {
    if (!fs.existsSync(this.filePath)) return [];
    const fallback = fs.statSync(this.filePath).mtime.toISOString();
    return fs
      .readFileSync(this.filePath, "utf8")
      .split("\n")
      .map(l => l.trim())
      .filter(l => l && !l.startsWith("#"))
      .map(l => parseEmailLine(l, fallback));
  }

  async append(message: Pick<RawMessage, "sender" | "subject" | "body">, receivedAt: Date): Promise<RawMessage> {
    const sender = oneLine(message.sender).replace(/\|/g, " ");
    const subject = oneLine(message.subject).replace(/\|/g, " ");
    const line = `${sender}|${subject}|${oneLine(message.body)}|${receivedAt.toISOString()}`;

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, line + "\n", "utf8");
    return parseEmailLine(line, receivedAt.toISOString());
  }
}
