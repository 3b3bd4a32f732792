import { PRIORITIES, Priority, Ticket } from "../types/contracts.js";
import { SlaPolicy } from "../presets/service-desk.v1.js";
import { isTerminal } from "./transitions.js";

const HOUR_MS = 60 * 60 * 1000;

export type SlaState = "on_track" | "at_risk" | "breached";

export interface SlaView {
  state: SlaState;
  responseDueAt: string;
  resolutionDueAt: string;
  responseBreached: boolean;
  resolutionBreached: boolean;
  timeToBreachSeconds: number | null;
}

export function validateSlaPolicy(policy: SlaPolicy): SlaPolicy {
  for (const priority of PRIORITIES) {
    const w = policy[priority];
    if (!(w.responseHours > 0) || !(w.resolutionHours > 0)) {
      throw new Error(`SLA windows for ${priority} must be positive`);
    }
    if (w.responseHours >= w.resolutionHours) {
      throw new Error(`SLA response window for ${priority} must be shorter than its resolution window`);
    }
  }
  return policy;
}

export function computeDeadlines(priority: Priority, from: Date, policy: SlaPolicy) {
  const w = policy[priority];
  return {
    responseDueAt: new Date(from.getTime() + w.responseHours * HOUR_MS).toISOString(),
    resolutionDueAt: new Date(from.getTime() + w.resolutionHours * HOUR_MS).toISOString()
  };
}

// Deadlines after escalation: recomputed from the escalation time, never extended.
export function shrinkDeadlines(
  ticket: Pick<Ticket, "responseDueAt" | "resolutionDueAt">,
  priority: Priority,
  at: Date,
  policy: SlaPolicy
) {
  const fresh = computeDeadlines(priority, at, policy);
  return {
    responseDueAt: earlier(ticket.responseDueAt, fresh.responseDueAt),
    resolutionDueAt: earlier(ticket.resolutionDueAt, fresh.resolutionDueAt)
  };
}

function earlier(a: string, b: string): string {
  return Date.parse(a) <= Date.parse(b) ? a : b;
}

export function warningAt(ticket: Pick<Ticket, "createdAt" | "resolutionDueAt">, warningRatio: number): string {
  const start = Date.parse(ticket.createdAt);
  const end = Date.parse(ticket.resolutionDueAt);
  return new Date(start + Math.round((end - start) * warningRatio)).toISOString();
}

export function elapsedRatio(ticket: Pick<Ticket, "createdAt" | "resolutionDueAt">, now: Date): number {
  const start = Date.parse(ticket.createdAt);
  const end = Date.parse(ticket.resolutionDueAt);
  if (end <= start) return 1;
  return (now.getTime() - start) / (end - start);
}

type CheckpointFields = Pick<
  Ticket,
  "status" | "createdAt" | "responseDueAt" | "resolutionDueAt" | "respondedAt" | "sla" | "notices"
>;

/**
 * Earliest instant at which a sweep could change this ticket, or null when
 * nothing is pending. The Store indexes it so sweeps only read tickets that
 * are due.
 */
export function nextSlaCheckpoint(t: CheckpointFields, warningRatio: number): string | null {
  if (isTerminal(t.status)) return null;

  const pending: string[] = [];
  if (!t.sla.resolutionBreached) {
    pending.push(t.resolutionDueAt);
    if (!t.notices.warningAt) pending.push(warningAt(t, warningRatio));
  }
  if (!t.respondedAt && !t.sla.responseBreached) pending.push(t.responseDueAt);

  if (!pending.length) return null;
  return pending.reduce(earlier);
}

export function slaView(t: Ticket, now: Date, warningRatio: number): SlaView {
  const terminal = isTerminal(t.status);
  const nowMs = now.getTime();

  const responseBreached =
    t.sla.responseBreached || (!terminal && !t.respondedAt && nowMs > Date.parse(t.responseDueAt));
  const resolutionBreached =
    t.sla.resolutionBreached || (!terminal && nowMs > Date.parse(t.resolutionDueAt));

  let state: SlaState = "on_track";
  if (responseBreached || resolutionBreached) state = "breached";
  else if (!terminal && nowMs >= Date.parse(warningAt(t, warningRatio))) state = "at_risk";

  return {
    state,
    responseDueAt: t.responseDueAt,
    resolutionDueAt: t.resolutionDueAt,
    responseBreached,
    resolutionBreached,
    timeToBreachSeconds: terminal ? null : Math.round((Date.parse(t.resolutionDueAt) - nowMs) / 1000)
  };
}
