export type Priority = "low" | "medium" | "high";
export type Status = "new" | "assigned" | "auto_resolved" | "resolved" | "escalated";
export type Category =
  | "access"
  | "network"
  | "infrastructure"
  | "email"
  | "software"
  | "hardware"
  | "other";

export const PRIORITIES = ["low", "medium", "high"] as const satisfies readonly Priority[];
export const STATUSES = ["new", "assigned", "auto_resolved", "resolved", "escalated"] as const satisfies readonly Status[];
export const CATEGORIES = [
  "access",
  "network",
  "infrastructure",
  "email",
  "software",
  "hardware",
  "other"
] as const satisfies readonly Category[];

export interface RawMessage {
  sender: string;
  subject: string;
  body: string;
  receivedAt: string; // ISO
  messageId?: string; // provider id when the source has one
}

export interface SlaFlags {
  responseBreached: boolean;
  resolutionBreached: boolean;
}

export interface SlaNotices {
  warningAt: string | null;
  responseBreachAt: string | null;
  resolutionBreachAt: string | null;
}

export interface Ticket {
  id: string;
  seq: number;
  fingerprint: string;
  source: RawMessage;
  category: Category;
  priority: Priority;
  ruleId: string | null;
  status: Status;
  assignedTeam: string | null;
  ownerId: string | null;
  createdAt: string;
  updatedAt: string;
  responseDueAt: string;
  resolutionDueAt: string;
  respondedAt: string | null;
  escalatedAt: string | null;
  resolvedAt: string | null;
  resolutionNote: string | null;
  sla: SlaFlags;
  notices: SlaNotices;
  nextSlaCheckAt: string | null;
  version: number;
}

// What the Lifecycle Engine hands the Store; the Store assigns the rest.
export type TicketDraft = Omit<Ticket, "id" | "seq" | "version">;

export interface TicketQuery {
  status?: Status;
  category?: Category;
  priority?: Priority;
  search?: string;
  limit?: number;
  offset?: number;
}

export interface AuditEvent {
  id: string;
  ticketId: string;
  type: string;
  actor: string; // "system" unless a person acted
  payload: Record<string, unknown>;
  at: string; // ISO
}

export type TicketEventType =
  | "ticket_created"
  | "ticket_auto_resolved"
  | "ticket_escalated"
  | "ticket_resolved"
  | "sla_warning"
  | "sla_response_breach"
  | "sla_resolution_breach";

interface EventBase<T extends TicketEventType> {
  id: string;
  type: T;
  ticket: Ticket;
  at: string;
}

export type TicketEvent =
  | EventBase<"ticket_created">
  | EventBase<"ticket_auto_resolved">
  | EventBase<"ticket_escalated">
  | (EventBase<"ticket_resolved"> & { note: string; actor: string })
  | (EventBase<"sla_warning"> & { elapsedRatio: number })
  | EventBase<"sla_response_breach">
  | (EventBase<"sla_resolution_breach"> & { escalated: boolean });
