import { RawMessage, Ticket, TicketDraft } from "../types/contracts.js";
import { Classification, classificationText, classify } from "./classify.js";
import { fingerprintOf } from "./dedupe.js";
import { computeDeadlines, nextSlaCheckpoint, shrinkDeadlines, validateSlaPolicy } from "./sla.js";
import { canTransition, creationStatus, isTerminal } from "./transitions.js";
import { InvalidTransitionError, TerminalStateError } from "./errors.js";
import * as desk from "../presets/service-desk.v1.js";

export interface DeskPolicy {
  rules: desk.ClassificationRule[];
  sla: desk.SlaPolicy;
  teams: desk.TeamTable;
  warningRatio: number;
}

export const AUTO_RESOLUTION_NOTE = "Auto-resolved by service desk policy";

export function resolvePolicy(overrides: Partial<DeskPolicy> = {}): DeskPolicy {
  const warningRatio = overrides.warningRatio ?? 0.8;
  if (!(warningRatio > 0 && warningRatio < 1)) {
    throw new Error(`warningRatio must be between 0 and 1, got ${warningRatio}`);
  }
  return {
    rules: overrides.rules ?? desk.classificationRules,
    sla: validateSlaPolicy(overrides.sla ?? desk.slaPolicy),
    teams: overrides.teams ?? desk.teams,
    warningRatio
  };
}

export function buildTicketDraft(
  msg: RawMessage,
  now: Date,
  policy: DeskPolicy
): { draft: TicketDraft; classification: Classification } {
  const classification = classify(msg, policy.rules);
  const status = creationStatus(classification.priority);
  if (!canTransition("new", status)) {
    throw new InvalidTransitionError("new", status);
  }

  const at = now.toISOString();
  const deadlines = computeDeadlines(classification.priority, now, policy.sla);
  const resolved = isTerminal(status);

  const fingerprint = fingerprintOf({
    sender: msg.sender,
    subject: msg.subject,
    receivedAt: msg.receivedAt,
    normalizedBody: classificationText(msg),
    messageId: msg.messageId
  });

  const base: TicketDraft = {
    fingerprint,
    source: { ...msg },
    category: classification.category,
    priority: classification.priority,
    ruleId: classification.ruleId,
    status,
    assignedTeam: resolved ? null : desk.teamFor(classification.category, policy.teams),
    ownerId: null,
    createdAt: at,
    updatedAt: at,
    ...deadlines,
    respondedAt: null,
    escalatedAt: status === "escalated" ? at : null,
    resolvedAt: resolved ? at : null,
    resolutionNote: resolved ? AUTO_RESOLUTION_NOTE : null,
    sla: { responseBreached: false, resolutionBreached: false },
    notices: { warningAt: null, responseBreachAt: null, resolutionBreachAt: null },
    nextSlaCheckAt: null
  };

  return {
    draft: { ...base, nextSlaCheckAt: nextSlaCheckpoint(base, policy.warningRatio) },
    classification
  };
}

/**
 * Moves an open ticket to escalated at high priority. Deadlines are
 * recomputed from the escalation time and only ever move earlier.
 */
export function forceEscalation(t: Ticket, now: Date, policy: DeskPolicy): Ticket {
  if (isTerminal(t.status)) throw new TerminalStateError(t.id, t.status);
  if (t.status === "escalated" && t.priority === "high") return t;
  if (t.status !== "escalated" && !canTransition(t.status, "escalated")) {
    throw new InvalidTransitionError(t.status, "escalated");
  }

  const at = now.toISOString();
  return {
    ...t,
    status: "escalated",
    priority: "high",
    assignedTeam: t.assignedTeam ?? desk.teamFor(t.category, policy.teams),
    escalatedAt: t.escalatedAt ?? at,
    ...shrinkDeadlines(t, "high", now, policy.sla),
    updatedAt: at
  };
}
