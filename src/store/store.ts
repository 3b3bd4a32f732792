import { AuditEvent, Status, Ticket, TicketDraft, TicketQuery } from "../types/contracts.js";

/**
 * Receives the stored ticket and returns its replacement. Runs synchronously
 * inside the Store's write; throwing aborts the write, and returning `current`
 * itself skips it.
 */
export type TicketMutation = (current: Ticket) => Ticket;

export interface TicketStore {
  init(): Promise<void>;
  close(): Promise<void>;

  /** Throws DuplicateIngestionError when the fingerprint is already stored. */
  create(draft: TicketDraft): Promise<Ticket>;
  get(id: string): Promise<Ticket | null>;
  update(id: string, mutation: TicketMutation): Promise<Ticket | null>;

  list(q: TicketQuery): Promise<Ticket[]>;
  listByStatus(status: Status): Promise<Ticket[]>;
  listDueBefore(isoTimestamp: string): Promise<Ticket[]>;
  findByFingerprint(fingerprint: string): Promise<Ticket | null>;

  appendAudit(ev: AuditEvent): Promise<void>;
  listAudit(ticketId: string, limit?: number): Promise<AuditEvent[]>;
}

export function formatTicketId(seq: number): string {
  return `TKT-${String(seq).padStart(6, "0")}`;
}

export function parseTicketId(id: string): number | null {
  const m = /^TKT-(\d+)$/.exec(id);
  if (!m) return null;
  const seq = Number(m[1]);
  return Number.isSafeInteger(seq) && seq > 0 ? seq : null;
}

export function matchesQuery(t: Ticket, q: TicketQuery): boolean {
  if (q.status && t.status !== q.status) return false;
  if (q.category && t.category !== q.category) return false;
  if (q.priority && t.priority !== q.priority) return false;
  const search = (q.search ?? "").toLowerCase().trim();
  if (search) {
    const hay = `${t.source.sender} ${t.source.subject} ${t.source.body}`.toLowerCase();
    if (!hay.includes(search)) return false;
  }
  return true;
}

export function page<T>(rows: T[], q: Pick<TicketQuery, "limit" | "offset">): T[] {
  const offset = q.offset ?? 0;
  return q.limit === undefined ? rows.slice(offset) : rows.slice(offset, offset + q.limit);
}
