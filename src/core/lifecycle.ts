import { z } from "zod";
import { nanoid } from "nanoid";
import pino, { Logger } from "pino";
import { TicketStore } from "../store/store.js";
import { EventBus } from "../events/bus.js";
import { MessageSource } from "../sources/source.js";
import { makeAudit } from "../audit/audit.js";
import { Category, Priority, RawMessage, Status, Ticket, TicketEvent } from "../types/contracts.js";
import { DeskPolicy, buildTicketDraft } from "./engine.js";
import { nextSlaCheckpoint } from "./sla.js";
import { canTransition, isTerminal } from "./transitions.js";
import {
  DuplicateIngestionError,
  InvalidTransitionError,
  NotFoundError,
  TerminalStateError,
  errorMessage
} from "./errors.js";

export const RawMessageSchema = z.object({
  sender: z.string().trim().min(1),
  subject: z.string(),
  body: z.string(),
  receivedAt: z.string().datetime({ offset: true }),
  messageId: z.string().min(1).optional()
});

export interface IngestedTicket {
  id: string;
  status: Status;
  category: Category;
  priority: Priority;
}

export interface SkippedDuplicate {
  fingerprint: string;
  existingId: string;
  sender: string;
  subject: string;
}

export interface IngestResult {
  created: IngestedTicket[];
  duplicates: SkippedDuplicate[];
}

export interface IngestionCycleResult extends IngestResult {
  source: string | null;
  fetched: number;
  sourceError?: string;
}

export function createLifecycle(args: {
  store: TicketStore;
  bus: EventBus;
  policy: DeskPolicy;
  source?: MessageSource;
  logger?: Logger;
}) {
  const log = (args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "lifecycle" });
  const { store, bus, policy } = args;

  async function ingest(messages: readonly unknown[], now: Date): Promise<IngestResult> {
    const result: IngestResult = { created: [], duplicates: [] };

    for (const raw of messages) {
      const msg: RawMessage = RawMessageSchema.parse(raw);
      const { draft, classification } = buildTicketDraft(msg, now, policy);

      if (classification.fallback) {
        log.info({ sender: msg.sender, subject: msg.subject }, "classify: no rule matched, using fallback");
      }

      let ticket: Ticket;
      try {
        ticket = await store.create(draft);
      } catch (err) {
        if (!(err instanceof DuplicateIngestionError)) throw err;
        await store.appendAudit(makeAudit({
          ticketId: err.existingId,
          type: "duplicate_received",
          at: now,
          payload: { sender: msg.sender, subject: msg.subject }
        }));
        result.duplicates.push({
          fingerprint: err.fingerprint,
          existingId: err.existingId,
          sender: msg.sender,
          subject: msg.subject
        });
        log.info({ ticketId: err.existingId }, "dedupe: duplicate_received");
        continue;
      }

      await store.appendAudit(makeAudit({
        ticketId: ticket.id,
        type: "created",
        at: now,
        payload: {
          sender: msg.sender,
          category: ticket.category,
          priority: ticket.priority,
          ruleId: ticket.ruleId
        }
      }));
      await store.appendAudit(makeAudit({
        ticketId: ticket.id,
        type: "status_changed",
        at: now,
        payload: { from: "new", to: ticket.status, assignedTeam: ticket.assignedTeam }
      }));

      result.created.push({
        id: ticket.id,
        status: ticket.status,
        category: ticket.category,
        priority: ticket.priority
      });
      log.info({ ticketId: ticket.id, status: ticket.status, priority: ticket.priority }, "ticket: created");

      const at = now.toISOString();
      const events: TicketEvent[] = [{ id: nanoid(), type: "ticket_created", ticket, at }];
      if (ticket.status === "auto_resolved") events.push({ id: nanoid(), type: "ticket_auto_resolved", ticket, at });
      if (ticket.status === "escalated") events.push({ id: nanoid(), type: "ticket_escalated", ticket, at });
      bus.emit(events);
    }

    return result;
  }

  async function runIngestionCycle(now: Date): Promise<IngestionCycleResult> {
    const source = args.source;
    if (!source) return { source: null, fetched: 0, created: [], duplicates: [] };

    let messages: RawMessage[];
    try {
      messages = await source.fetch();
    } catch (err) {
      log.error({ err, source: source.name }, "ingest: source fetch failed");
      return { source: source.name, fetched: 0, created: [], duplicates: [], sourceError: errorMessage(err) };
    }

    const res = await ingest(messages, now);

    if (source.acknowledge && messages.length) {
      try {
        await source.acknowledge(messages);
      } catch (err) {
        log.warn({ err, source: source.name }, "ingest: source acknowledge failed");
      }
    }

    log.info(
      { source: source.name, fetched: messages.length, created: res.created.length, duplicates: res.duplicates.length },
      "ingest: cycle complete"
    );
    return { source: source.name, fetched: messages.length, ...res };
  }

  async function resolve(id: string, note: string, now: Date, actor: string = "agent"): Promise<Ticket> {
    const at = now.toISOString();
    const seen: { from?: Status } = {};

    const updated = await store.update(id, cur => {
      if (isTerminal(cur.status)) throw new TerminalStateError(id, cur.status);
      if (!canTransition(cur.status, "resolved")) throw new InvalidTransitionError(cur.status, "resolved");
      seen.from = cur.status;
      return {
        ...cur,
        status: "resolved",
        resolvedAt: at,
        resolutionNote: note,
        respondedAt: cur.respondedAt ?? at,
        nextSlaCheckAt: null,
        updatedAt: at
      };
    });
    if (!updated) throw new NotFoundError(id);

    await store.appendAudit(makeAudit({
      ticketId: id,
      type: "status_changed",
      actor,
      at: now,
      payload: { from: seen.from ?? null, to: "resolved", note }
    }));
    log.info({ ticketId: id, actor }, "ticket: resolved");

    bus.emit({ id: nanoid(), type: "ticket_resolved", ticket: updated, note, actor, at });
    return updated;
  }

  /** Records the first human response; status is left as it is. */
  async function acknowledge(id: string, ownerId: string, now: Date): Promise<Ticket> {
    const at = now.toISOString();
    const seen: { previousOwner?: string | null; changed: boolean } = { changed: false };

    const updated = await store.update(id, cur => {
      if (isTerminal(cur.status)) throw new TerminalStateError(id, cur.status);
      if (cur.respondedAt && cur.ownerId === ownerId) return cur;
      seen.previousOwner = cur.ownerId;
      seen.changed = true;
      const next: Ticket = { ...cur, ownerId, respondedAt: cur.respondedAt ?? at, updatedAt: at };
      return { ...next, nextSlaCheckAt: nextSlaCheckpoint(next, policy.warningRatio) };
    });
    if (!updated) throw new NotFoundError(id);

    if (seen.changed) {
      await store.appendAudit(makeAudit({
        ticketId: id,
        type: "acknowledged",
        actor: ownerId,
        at: now,
        payload: { from: seen.previousOwner ?? null, to: ownerId }
      }));
      log.info({ ticketId: id, ownerId }, "ticket: acknowledged");
    }
    return updated;
  }

  return { ingest, runIngestionCycle, resolve, acknowledge };
}

export type Lifecycle = ReturnType<typeof createLifecycle>;
