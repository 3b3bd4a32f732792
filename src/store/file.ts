import fs from "fs";
import path from "path";
import { TicketMutation, TicketStore, formatTicketId, matchesQuery, page } from "./store.js";
import { AuditEvent, Status, Ticket, TicketDraft, TicketQuery } from "../types/contracts.js";
import { DuplicateIngestionError } from "../core/errors.js";
import { isTerminal } from "../core/transitions.js";

type Index = {
  byId: Map<string, Ticket>;
  byFingerprint: Map<string, string>;
  auditByTicket: Map<string, AuditEvent[]>;
  lastSeq: number;
};

/**
 * Append-only JSONL journal with an in-memory index. Every write appends the
 * full ticket; on load the last line per id wins. All reads and writes of the
 * index run without awaiting, so each call is atomic with respect to others in
 * the same process.
 */
export class FileStore implements TicketStore {
  private dir: string;
  private ticketsPath: string;
  private auditPath: string;

  private idx: Index = {
    byId: new Map(),
    byFingerprint: new Map(),
    auditByTicket: new Map(),
    lastSeq: 0
  };

  constructor(dataDir: string) {
    this.dir = dataDir;
    this.ticketsPath = path.join(this.dir, "tickets.jsonl");
    this.auditPath = path.join(this.dir, "audit.jsonl");
  }

  async init(): Promise<void> {
    fs.mkdirSync(this.dir, { recursive: true });
    if (!fs.existsSync(this.ticketsPath)) fs.writeFileSync(this.ticketsPath, "", "utf8");
    if (!fs.existsSync(this.auditPath)) fs.writeFileSync(this.auditPath, "", "utf8");
    this.loadTickets();
    this.loadAudit();
  }

  async close(): Promise<void> {}

  private readLines(filePath: string): unknown[] {
    const out: unknown[] = [];
    const lines = fs.readFileSync(filePath, "utf8").split("\n").filter(Boolean);
    for (const line of lines) {
      try {
        out.push(JSON.parse(line));
      } catch {
        // a torn final line from a crash mid-append; everything before it is intact
        continue;
      }
    }
    return out;
  }

  private loadTickets() {
    for (const row of this.readLines(this.ticketsPath)) {
      const t = row as Ticket;
      const cur = this.idx.byId.get(t.id);
      if (cur && cur.version > t.version) continue;
      this.idx.byId.set(t.id, t);
      this.idx.byFingerprint.set(t.fingerprint, t.id);
      this.idx.lastSeq = Math.max(this.idx.lastSeq, t.seq);
    }
  }

  private loadAudit() {
    for (const row of this.readLines(this.auditPath)) {
      const ev = row as AuditEvent;
      const arr = this.idx.auditByTicket.get(ev.ticketId) ?? [];
      arr.push(ev);
      this.idx.auditByTicket.set(ev.ticketId, arr);
    }
  }

  private appendLine(filePath: string, obj: unknown) {
    fs.appendFileSync(filePath, JSON.stringify(obj) + "\n", "utf8");
  }

  private newestFirst(): Ticket[] {
    return [...this.idx.byId.values()].sort((a, b) => b.seq - a.seq);
  }

  async create(draft: TicketDraft): Promise<Ticket> {
    const existingId = this.idx.byFingerprint.get(draft.fingerprint);
    if (existingId) throw new DuplicateIngestionError(draft.fingerprint, existingId);

    const seq = this.idx.lastSeq + 1;
    const ticket: Ticket = structuredClone({ ...draft, id: formatTicketId(seq), seq, version: 1 });
    this.appendLine(this.ticketsPath, ticket);

    this.idx.lastSeq = seq;
    this.idx.byId.set(ticket.id, ticket);
    this.idx.byFingerprint.set(ticket.fingerprint, ticket.id);
    return structuredClone(ticket);
  }

  async get(id: string): Promise<Ticket | null> {
    const t = this.idx.byId.get(id);
    return t ? structuredClone(t) : null;
  }

  async update(id: string, mutation: TicketMutation): Promise<Ticket | null> {
    const stored = this.idx.byId.get(id);
    if (!stored) return null;

    // the mutation gets a copy; the indexed ticket only changes on commit
    const cur = structuredClone(stored);
    const next = mutation(cur);
    if (next === cur) return cur;

    const updated: Ticket = structuredClone({ ...next, id: cur.id, seq: cur.seq, version: cur.version + 1 });
    this.appendLine(this.ticketsPath, updated);
    this.idx.byId.set(id, updated);
    return structuredClone(updated);
  }

  async list(q: TicketQuery): Promise<Ticket[]> {
    return page(this.newestFirst().filter(t => matchesQuery(t, q)), q).map(t => structuredClone(t));
  }

  async listByStatus(status: Status): Promise<Ticket[]> {
    return this.newestFirst().filter(t => t.status === status).map(t => structuredClone(t));
  }

  async listDueBefore(isoTimestamp: string): Promise<Ticket[]> {
    const limitMs = Date.parse(isoTimestamp);
    return [...this.idx.byId.values()]
      .filter(t => !isTerminal(t.status) && t.nextSlaCheckAt !== null && Date.parse(t.nextSlaCheckAt) <= limitMs)
      .sort((a, b) => a.seq - b.seq)
      .map(t => structuredClone(t));
  }

  async findByFingerprint(fingerprint: string): Promise<Ticket | null> {
    const id = this.idx.byFingerprint.get(fingerprint);
    return id ? this.get(id) : null;
  }

  async appendAudit(ev: AuditEvent): Promise<void> {
    this.appendLine(this.auditPath, ev);
    const arr = this.idx.auditByTicket.get(ev.ticketId) ?? [];
    arr.push(structuredClone(ev));
    this.idx.auditByTicket.set(ev.ticketId, arr);
  }

  async listAudit(ticketId: string, limit: number = 200): Promise<AuditEvent[]> {
    const arr = this.idx.auditByTicket.get(ticketId) ?? [];
    return structuredClone(arr.slice(0, Math.min(limit, 1000)));
  }
}
