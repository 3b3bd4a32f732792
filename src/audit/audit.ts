import { nanoid } from "nanoid";
import { AuditEvent } from "../types/contracts.js";

export function makeAudit(args: {
  ticketId: string;
  type: string;
  at: Date;
  actor?: string;
  payload?: Record<string, unknown>;
}): AuditEvent {
  return {
    id: nanoid(),
    ticketId: args.ticketId,
    type: args.type,
    actor: args.actor ?? "system",
    payload: args.payload ?? {},
    at: args.at.toISOString()
  };
}
