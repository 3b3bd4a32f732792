import pino, { Logger } from "pino";
import { TicketEvent } from "../types/contracts.js";

export type TicketEventListener = (event: TicketEvent) => void;

export class EventBus {
  private readonly log: Logger;
  private readonly listeners: TicketEventListener[] = [];

  constructor(logger?: Logger) {
    this.log = (logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "event-bus" });
  }

  /** Returns an unsubscribe function. */
  on(listener: TicketEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const i = this.listeners.indexOf(listener);
      if (i >= 0) this.listeners.splice(i, 1);
    };
  }

  emit(events: TicketEvent | TicketEvent[]): void {
    for (const event of Array.isArray(events) ? events : [events]) {
      this.log.debug({ eventType: event.type, ticketId: event.ticket.id }, "event: emit");
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.log.error({ err, eventType: event.type, ticketId: event.ticket.id }, "event listener failed");
        }
      }
    }
  }
}
