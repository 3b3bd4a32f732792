import pino, { Logger } from "pino";
import { TicketEvent } from "../types/contracts.js";
import { TeamTable } from "../presets/service-desk.v1.js";
import { AdapterError } from "../core/errors.js";
import { Notifier, SendResult } from "./notifier.js";
import { renderEvent } from "./templates.js";

function withTimeout(p: Promise<SendResult>, ms: number, adapter: string): Promise<SendResult> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AdapterError(adapter, `delivery timed out after ${ms}ms`)), ms);
  });
  return Promise.race([p, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Bus listener that turns ticket events into notifications. Deliveries run
 * in the background; their outcome is logged and never touches the ticket.
 */
export function createNotificationDispatcher(args: {
  notifier: Notifier;
  teams: TeamTable;
  timeoutMs: number;
  logger?: Logger;
}) {
  const log = (args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "notifier" });
  const pending = new Set<Promise<void>>();

  async function deliver(event: TicketEvent): Promise<void> {
    const message = renderEvent(event, args.teams);

    const ctx = { eventType: event.type, ticketId: event.ticket.id, recipient: message.recipient };
    try {
      const res = await withTimeout(args.notifier.send(message), args.timeoutMs, `notifier:${args.notifier.mode}`);
      if (res.ok) log.info({ ...ctx, mode: res.mode }, "notify: sent");
      else log.warn({ ...ctx, error: res.error }, "notify: delivery failed");
    } catch (err) {
      log.warn({ ...ctx, err }, "notify: delivery failed");
    }
  }

  function handle(event: TicketEvent): void {
    const p = deliver(event).finally(() => pending.delete(p));
    pending.add(p);
  }

  /** Waits for every delivery started so far. */
  async function flush(): Promise<void> {
    while (pending.size) await Promise.all([...pending]);
  }

  return { handle, flush };
}

export type NotificationDispatcher = ReturnType<typeof createNotificationDispatcher>;
