import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { RawMessage, Ticket } from "./types/contracts.js";
import { DeskPolicy, buildTicketDraft, resolvePolicy } from "./core/engine.js";

export const silentLogger = pino({ level: "silent" });

export const T0 = new Date("2026-03-02T09:00:00.000Z");

export function hoursAfter(base: Date, hours: number): Date {
  return new Date(base.getTime() + hours * 60 * 60 * 1000);
}

export function tempDir(prefix = "service-desk-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function message(overrides: Partial<RawMessage> = {}): RawMessage {
  return {
    sender: "alice@example.com",
    subject: "VPN keeps dropping",
    body: "The vpn disconnects every few minutes.",
    receivedAt: T0.toISOString(),
    ...overrides
  };
}

/** A stored-looking ticket built the way ingestion builds it. */
export function makeTicket(overrides: Partial<RawMessage> = {}, now: Date = T0, policy: DeskPolicy = resolvePolicy()): Ticket {
  const { draft } = buildTicketDraft(message(overrides), now, policy);
  return { ...draft, id: "TKT-000001", seq: 1, version: 1 };
}
