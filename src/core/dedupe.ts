import crypto from "crypto";

export function fingerprintOf(args: {
  sender: string;
  subject: string;
  receivedAt: string;
  normalizedBody: string;
  messageId?: string;
}): string {
  // A provider message id identifies the message on its own; without one the
  // content plus arrival time stands in for it.
  const raw = args.messageId
    ? `id|${args.messageId}`
    : `${args.sender.trim().toLowerCase()}|${args.receivedAt}|${args.subject.trim()}|${args.normalizedBody}`;
  return crypto.createHash("sha256").update(raw).digest("hex");
}
