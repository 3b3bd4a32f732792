import pino, { Logger } from "pino";
import { TicketStore, page } from "../store/store.js";
import { EventBus } from "../events/bus.js";
import { MessageSource } from "../sources/source.js";
import { Notifier } from "../notify/notifier.js";
import { createNotificationDispatcher } from "../notify/dispatcher.js";
import { createLifecycle } from "../core/lifecycle.js";
import { SlaSummary, createSlaMonitor } from "../core/sla-monitor.js";
import { DeskPolicy, resolvePolicy } from "../core/engine.js";
import { SlaState, SlaView, slaView } from "../core/sla.js";
import { isTerminal } from "../core/transitions.js";
import { DeskError, NotFoundError } from "../core/errors.js";
import { AuditEvent, RawMessage, Ticket, TicketQuery } from "../types/contracts.js";

export interface TicketWithSla extends Ticket {
  slaStatus: SlaView;
}

export interface DeskStats {
  tickets: { total: number; open: number; resolved: number };
  distributions: { priority: Record<string, number>; category: Record<string, number> };
  sla: SlaSummary;
}

/**
 * Wires the lifecycle, the SLA monitor and the notifier around one store and
 * one event bus. Everything the HTTP layer and the scheduler call goes
 * through here.
 */
export function createDesk(args: {
  store: TicketStore;
  policy?: DeskPolicy;
  source?: MessageSource;
  notifier?: Notifier;
  notifyTimeoutMs?: number;
  logger?: Logger;
}) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const policy = args.policy ?? resolvePolicy();
  const { store, source, notifier } = args;

  const bus = new EventBus(log);
  const lifecycle = createLifecycle({ store, bus, policy, source, logger: log });
  const monitor = createSlaMonitor({ store, bus, policy, logger: log });

  const dispatcher = notifier
    ? createNotificationDispatcher({ notifier, teams: policy.teams, timeoutMs: args.notifyTimeoutMs ?? 10_000, logger: log })
    : null;
  if (dispatcher) bus.on(dispatcher.handle);

  function withSla(t: Ticket, now: Date): TicketWithSla {
    return { ...t, slaStatus: slaView(t, now, policy.warningRatio) };
  }

  async function getTicket(id: string): Promise<Ticket> {
    const t = await store.get(id);
    if (!t) throw new NotFoundError(id);
    return t;
  }

  async function viewTicket(id: string, now: Date): Promise<TicketWithSla> {
    return withSla(await getTicket(id), now);
  }

  async function listTickets(q: TicketQuery & { sla?: SlaState }, now: Date): Promise<TicketWithSla[]> {
    const { sla, ...query } = q;
    if (!sla) return (await store.list(query)).map(t => withSla(t, now));

    // SLA state is computed, not stored: filter before paging
    const { limit, offset, ...unpaged } = query;
    const rows = (await store.list(unpaged)).map(t => withSla(t, now)).filter(t => t.slaStatus.state === sla);
    return page(rows, { limit, offset });
  }

  async function listAudit(id: string, limit?: number): Promise<AuditEvent[]> {
    await getTicket(id);
    return store.listAudit(id, limit);
  }

  async function stats(now: Date): Promise<DeskStats> {
    const all = await store.list({});
    const priority: Record<string, number> = {};
    const category: Record<string, number> = {};
    let open = 0;
    for (const t of all) {
      priority[t.priority] = (priority[t.priority] ?? 0) + 1;
      category[t.category] = (category[t.category] ?? 0) + 1;
      if (!isTerminal(t.status)) open++;
    }
    return {
      tickets: { total: all.length, open, resolved: all.length - open },
      distributions: { priority, category },
      sla: await monitor.summary(now)
    };
  }

  /** Appends a message to a source that accepts them (the demo file). */
  async function addMessage(
    message: Pick<RawMessage, "sender" | "subject" | "body">,
    now: Date
  ): Promise<RawMessage> {
    if (!source?.append) {
      throw new DeskError(409, "source_read_only", `source ${source?.name ?? "(none)"} does not accept messages`);
    }
    return source.append(message, now);
  }

  return {
    bus,
    policy,
    ingest: lifecycle.ingest,
    runIngestionCycle: lifecycle.runIngestionCycle,
    resolve: lifecycle.resolve,
    acknowledge: lifecycle.acknowledge,
    runSlaSweep: monitor.sweep,
    slaSummary: monitor.summary,
    getTicket,
    viewTicket,
    listTickets,
    listAudit,
    stats,
    addMessage,
    teams: () => policy.teams,
    status: () => ({ source: source?.name ?? null, notifier: notifier?.mode ?? null }),
    flushNotifications: async () => {
      if (dispatcher) await dispatcher.flush();
    }
  };
}

export type Desk = ReturnType<typeof createDesk>;
