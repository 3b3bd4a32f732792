import { nanoid } from "nanoid";
import pino, { Logger } from "pino";
import { TicketStore } from "../store/store.js";
import { EventBus } from "../events/bus.js";
import { makeAudit } from "../audit/audit.js";
import { Ticket, TicketEvent } from "../types/contracts.js";
import { DeskPolicy, forceEscalation } from "./engine.js";
import { elapsedRatio, nextSlaCheckpoint, slaView } from "./sla.js";
import { isTerminal } from "./transitions.js";
import { errorMessage } from "./errors.js";

export interface SlaEvaluation {
  ticket: Ticket;
  changed: boolean;
  warning: boolean;
  responseBreach: boolean;
  resolutionBreach: boolean;
  escalated: boolean;
  priorityRaised: boolean;
  elapsedRatio: number;
}

export interface SlaReport {
  at: string;
  scanned: number;
  updated: number;
  warnings: number;
  responseBreaches: number;
  resolutionBreaches: number;
  escalations: number;
  failures: Array<{ ticketId: string; error: string }>;
}

export interface SlaSummary {
  total: number;
  onTrack: number;
  atRisk: number;
  breached: number;
  complianceRate: number;
}

/**
 * Decides what a sweep at `now` changes on one ticket. Returns the same
 * ticket object when nothing changes. Flags and notices are only ever set,
 * never cleared.
 */
export function evaluateSla(t: Ticket, now: Date, policy: DeskPolicy): SlaEvaluation {
  const ratio = elapsedRatio(t, now);
  const out: SlaEvaluation = {
    ticket: t,
    changed: false,
    warning: false,
    responseBreach: false,
    resolutionBreach: false,
    escalated: false,
    priorityRaised: false,
    elapsedRatio: ratio
  };
  if (isTerminal(t.status)) return out;

  const at = now.toISOString();
  const nowMs = now.getTime();
  let next = t;

  if (!next.sla.resolutionBreached && nowMs > Date.parse(next.resolutionDueAt)) {
    const escalated = forceEscalation(next, now, policy);
    out.escalated = next.status !== "escalated";
    out.priorityRaised = next.priority !== "high";
    out.resolutionBreach = !next.notices.resolutionBreachAt;
    next = {
      ...escalated,
      sla: { ...escalated.sla, resolutionBreached: true },
      notices: { ...escalated.notices, resolutionBreachAt: escalated.notices.resolutionBreachAt ?? at }
    };
  }

  if (!next.respondedAt && !next.sla.responseBreached && nowMs > Date.parse(next.responseDueAt)) {
    out.responseBreach = !next.notices.responseBreachAt;
    next = {
      ...next,
      sla: { ...next.sla, responseBreached: true },
      notices: { ...next.notices, responseBreachAt: next.notices.responseBreachAt ?? at }
    };
  }

  if (!next.sla.resolutionBreached && !next.notices.warningAt && ratio >= policy.warningRatio) {
    out.warning = true;
    next = { ...next, notices: { ...next.notices, warningAt: at } };
  }

  if (next === t) return out;

  out.changed = true;
  out.ticket = { ...next, updatedAt: at, nextSlaCheckAt: nextSlaCheckpoint(next, policy.warningRatio) };
  return out;
}

export function createSlaMonitor(args: {
  store: TicketStore;
  bus: EventBus;
  policy: DeskPolicy;
  logger?: Logger;
}) {
  const log = (args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "sla-monitor" });
  const { store, bus, policy } = args;

  async function sweepOne(candidate: Ticket, now: Date, report: SlaReport) {
    const seen: { evaluation?: SlaEvaluation; before?: Ticket } = {};

    const updated = await store.update(candidate.id, cur => {
      // re-evaluated on the stored state: a resolve that landed after the scan wins
      const evaluation = evaluateSla(cur, now, policy);
      seen.evaluation = evaluation;
      seen.before = cur;
      return evaluation.ticket;
    });

    const evaluation = seen.evaluation;
    const before = seen.before;
    if (!updated || !evaluation || !before || !evaluation.changed) return;

    report.updated++;
    const at = now.toISOString();
    const events: TicketEvent[] = [];

    await store.appendAudit(makeAudit({
      ticketId: updated.id,
      type: "sla_flagged",
      at: now,
      payload: {
        warning: evaluation.warning,
        responseBreach: evaluation.responseBreach,
        resolutionBreach: evaluation.resolutionBreach,
        elapsedRatio: Number(evaluation.elapsedRatio.toFixed(3))
      }
    }));
    if (evaluation.escalated) {
      report.escalations++;
      await store.appendAudit(makeAudit({
        ticketId: updated.id,
        type: "status_changed",
        at: now,
        payload: { from: before.status, to: updated.status, reason: "sla_resolution_breach" }
      }));
    }
    if (evaluation.priorityRaised) {
      await store.appendAudit(makeAudit({
        ticketId: updated.id,
        type: "priority_raised",
        at: now,
        payload: { from: before.priority, to: updated.priority }
      }));
    }

    if (evaluation.warning) {
      report.warnings++;
      events.push({ id: nanoid(), type: "sla_warning", ticket: updated, at, elapsedRatio: evaluation.elapsedRatio });
    }
    if (evaluation.responseBreach) {
      report.responseBreaches++;
      events.push({ id: nanoid(), type: "sla_response_breach", ticket: updated, at });
    }
    if (evaluation.resolutionBreach) {
      report.resolutionBreaches++;
      events.push({
        id: nanoid(),
        type: "sla_resolution_breach",
        ticket: updated,
        at,
        escalated: evaluation.escalated
      });
    }

    log.info(
      {
        ticketId: updated.id,
        warning: evaluation.warning,
        responseBreach: evaluation.responseBreach,
        resolutionBreach: evaluation.resolutionBreach,
        escalated: evaluation.escalated
      },
      "sla: ticket flagged"
    );
    bus.emit(events);
  }

  async function sweep(now: Date): Promise<SlaReport> {
    const report: SlaReport = {
      at: now.toISOString(),
      scanned: 0,
      updated: 0,
      warnings: 0,
      responseBreaches: 0,
      resolutionBreaches: 0,
      escalations: 0,
      failures: []
    };

    const due = await store.listDueBefore(report.at);
    report.scanned = due.length;

    for (const candidate of due) {
      try {
        await sweepOne(candidate, now, report);
      } catch (err) {
        report.failures.push({ ticketId: candidate.id, error: errorMessage(err) });
        log.error({ err, ticketId: candidate.id }, "sla: ticket evaluation failed");
      }
    }

    log.info(
      {
        scanned: report.scanned,
        updated: report.updated,
        warnings: report.warnings,
        breaches: report.responseBreaches + report.resolutionBreaches,
        failures: report.failures.length
      },
      "sla: sweep complete"
    );
    return report;
  }

  async function summary(now: Date): Promise<SlaSummary> {
    const tickets = await store.list({});
    const out: SlaSummary = { total: tickets.length, onTrack: 0, atRisk: 0, breached: 0, complianceRate: 100 };
    for (const t of tickets) {
      const view = slaView(t, now, policy.warningRatio);
      if (view.state === "breached") out.breached++;
      else if (view.state === "at_risk") out.atRisk++;
      else out.onTrack++;
    }
    if (out.total > 0) out.complianceRate = Math.round((out.onTrack / out.total) * 1000) / 10;
    return out;
  }

  return { sweep, summary };
}

export type SlaMonitor = ReturnType<typeof createSlaMonitor>;
