import { Ticket, TicketEvent } from "../types/contracts.js";
import { TeamTable, teamFor } from "../presets/service-desk.v1.js";
import { OutboundMessage } from "./notifier.js";

const SIGNATURE = "Thank you,\nIT Service Desk";

function summaryLines(t: Ticket): string {
  return [
    `Ticket ID: ${t.id}`,
    `Issue: ${t.source.subject || "(no subject)"}`,
    `Category: ${t.category}`,
    `Priority: ${t.priority}`,
    `Status: ${t.status}`
  ].join("\n");
}

function teamOf(t: Ticket, teams: TeamTable): string {
  return t.assignedTeam ?? teamFor(t.category, teams);
}

/** Maps a ticket event to the message it sends. */
export function renderEvent(event: TicketEvent, teams: TeamTable): OutboundMessage {
  const t = event.ticket;
  const issue = t.source.subject || "(no subject)";

  switch (event.type) {
    case "ticket_created":
      return {
        recipient: t.source.sender,
        subject: `Ticket ${t.id} created: ${issue}`,
        body: [
          "Your service desk ticket has been created.",
          "",
          summaryLines(t),
          "",
          `We will respond within the SLA timeframe for ${t.priority} priority tickets (by ${t.responseDueAt}).`,
          "",
          SIGNATURE
        ].join("\n")
      };

    case "ticket_auto_resolved":
      return {
        recipient: t.source.sender,
        subject: `Ticket ${t.id} resolved`,
        body: [
          `Ticket ${t.id} regarding "${issue}" has been automatically resolved.`,
          t.resolutionNote ?? "",
          "If you still need assistance, reply to this email or submit a new request.",
          "",
          SIGNATURE
        ].join("\n")
      };

    case "ticket_resolved":
      return {
        recipient: t.source.sender,
        subject: `Ticket ${t.id} resolved`,
        body: [
          `Ticket ${t.id} regarding "${issue}" has been resolved.`,
          `Resolution: ${event.note}`,
          "",
          SIGNATURE
        ].join("\n")
      };

    case "ticket_escalated":
      return {
        recipient: teamOf(t, teams),
        subject: `[ESCALATED] Ticket ${t.id}: ${issue}`,
        body: [
          "High priority ticket escalated.",
          "",
          `From: ${t.source.sender}`,
          summaryLines(t),
          "",
          `Action required: respond by ${t.responseDueAt}, resolve by ${t.resolutionDueAt}.`
        ].join("\n")
      };

    case "sla_warning":
      return {
        recipient: teamOf(t, teams),
        subject: `[SLA WARNING] Ticket ${t.id} approaching breach`,
        body: [
          `Ticket ${t.id} has used ${Math.round(event.elapsedRatio * 100)}% of its resolution window.`,
          `Resolution due: ${t.resolutionDueAt}`,
          "",
          summaryLines(t)
        ].join("\n")
      };

    case "sla_response_breach":
      return {
        recipient: teamOf(t, teams),
        subject: `[SLA BREACH] Ticket ${t.id} missed its response deadline`,
        body: [
          `Ticket ${t.id} was not acknowledged by ${t.responseDueAt}.`,
          "",
          summaryLines(t)
        ].join("\n")
      };

    case "sla_resolution_breach":
      return {
        recipient: teamOf(t, teams),
        subject: `[SLA BREACH] Ticket ${t.id} missed its resolution deadline`,
        body: [
          `Ticket ${t.id} was not resolved by ${t.resolutionDueAt}.`,
          event.escalated ? "The ticket has been escalated to high priority." : "The ticket was already escalated.",
          "",
          summaryLines(t)
        ].join("\n")
      };
  }
}
