import sqlite3 from "sqlite3";
import { TicketMutation, TicketStore, formatTicketId, parseTicketId } from "./store.js";
import { AuditEvent, Status, Ticket, TicketDraft, TicketQuery } from "../types/contracts.js";
import { DuplicateIngestionError } from "../core/errors.js";

function run(db: sqlite3.Database, sql: string, params: unknown[] = []) {
  return new Promise<sqlite3.RunResult>((resolve, reject) => {
    db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
      if (err) reject(err);
      else resolve(this);
    });
  });
}
function get<T>(db: sqlite3.Database, sql: string, params: unknown[] = []) {
  return new Promise<T | undefined>((resolve, reject) => {
    db.get(sql, params, (err, row) => (err ? reject(err) : resolve(row as T | undefined)));
  });
}
function all<T>(db: sqlite3.Database, sql: string, params: unknown[] = []) {
  return new Promise<T[]>((resolve, reject) => {
    db.all(sql, params, (err, rows) => (err ? reject(err) : resolve(rows as T[])));
  });
}

interface TicketRow {
  seq: number;
  fingerprint: string;
  sourceJson: string;
  category: Ticket["category"];
  priority: Ticket["priority"];
  ruleId: string | null;
  status: Status;
  assignedTeam: string | null;
  ownerId: string | null;
  createdAt: string;
  updatedAt: string;
  responseDueAt: string;
  resolutionDueAt: string;
  respondedAt: string | null;
  escalatedAt: string | null;
  resolvedAt: string | null;
  resolutionNote: string | null;
  slaJson: string;
  noticesJson: string;
  nextSlaCheckAt: string | null;
  version: number;
}

interface AuditRow {
  id: string;
  ticketId: string;
  type: string;
  actor: string;
  payloadJson: string;
  at: string;
}

const MAX_UPDATE_ATTEMPTS = 8;

function isConstraintError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "SQLITE_CONSTRAINT";
}

export class SqliteStore implements TicketStore {
  private db: sqlite3.Database;

  constructor(private dbPath: string) {
    this.db = new sqlite3.Database(dbPath);
  }

  async init(): Promise<void> {
    if (this.dbPath !== ":memory:") await run(this.db, `pragma journal_mode = wal;`);
    await run(this.db, `
      create table if not exists tickets (
        seq integer primary key autoincrement,
        fingerprint text not null unique,
        sourceJson text not null,
        category text not null,
        priority text not null,
        ruleId text,
        status text not null,
        assignedTeam text,
        ownerId text,
        createdAt text not null,
        updatedAt text not null,
        responseDueAt text not null,
        resolutionDueAt text not null,
        respondedAt text,
        escalatedAt text,
        resolvedAt text,
        resolutionNote text,
        slaJson text not null,
        noticesJson text not null,
        nextSlaCheckAt text,
        version integer not null
      );
    `);
    await run(this.db, `create index if not exists idx_tickets_status on tickets(status);`);
    await run(this.db, `create index if not exists idx_tickets_next_check on tickets(nextSlaCheckAt);`);

    await run(this.db, `
      create table if not exists audit_events (
        id text primary key,
        ticketId text not null,
        type text not null,
        actor text not null,
        payloadJson text not null,
        at text not null
      );
    `);
    await run(this.db, `create index if not exists idx_audit_ticket on audit_events(ticketId, at);`);
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close(err => (err ? reject(err) : resolve()));
    });
  }

  async create(draft: TicketDraft): Promise<Ticket> {
    let res: sqlite3.RunResult;
    try {
      res = await run(this.db, `
        insert into tickets (
          fingerprint, sourceJson, category, priority, ruleId, status, assignedTeam, ownerId,
          createdAt, updatedAt, responseDueAt, resolutionDueAt, respondedAt, escalatedAt,
          resolvedAt, resolutionNote, slaJson, noticesJson, nextSlaCheckAt, version
        ) values (?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?)
      `, [
        draft.fingerprint, JSON.stringify(draft.source), draft.category, draft.priority, draft.ruleId,
        draft.status, draft.assignedTeam, draft.ownerId,
        draft.createdAt, draft.updatedAt, draft.responseDueAt, draft.resolutionDueAt,
        draft.respondedAt, draft.escalatedAt, draft.resolvedAt, draft.resolutionNote,
        JSON.stringify(draft.sla), JSON.stringify(draft.notices), draft.nextSlaCheckAt, 1
      ]);
    } catch (err) {
      if (!isConstraintError(err)) throw err;
      const existing = await this.findByFingerprint(draft.fingerprint);
      if (!existing) throw err;
      throw new DuplicateIngestionError(draft.fingerprint, existing.id);
    }
    return { ...draft, id: formatTicketId(res.lastID), seq: res.lastID, version: 1 };
  }

  async get(id: string): Promise<Ticket | null> {
    const seq = parseTicketId(id);
    if (seq === null) return null;
    const row = await get<TicketRow>(this.db, `select * from tickets where seq=?`, [seq]);
    return row ? this.rowToTicket(row) : null;
  }

  async update(id: string, mutation: TicketMutation): Promise<Ticket | null> {
    for (let attempt = 0; attempt < MAX_UPDATE_ATTEMPTS; attempt++) {
      const cur = await this.get(id);
      if (!cur) return null;

      const next = mutation(cur);
      if (next === cur) return cur;

      const updated: Ticket = { ...next, id: cur.id, seq: cur.seq, version: cur.version + 1 };
      // compare-and-swap: the write only lands if nobody else wrote since our read
      const res = await run(this.db, `
        update tickets set
          priority=?, status=?, assignedTeam=?, ownerId=?, updatedAt=?, responseDueAt=?,
          resolutionDueAt=?, respondedAt=?, escalatedAt=?, resolvedAt=?, resolutionNote=?,
          slaJson=?, noticesJson=?, nextSlaCheckAt=?, version=?
        where seq=? and version=?
      `, [
        updated.priority, updated.status, updated.assignedTeam, updated.ownerId, updated.updatedAt,
        updated.responseDueAt, updated.resolutionDueAt, updated.respondedAt, updated.escalatedAt,
        updated.resolvedAt, updated.resolutionNote, JSON.stringify(updated.sla),
        JSON.stringify(updated.notices), updated.nextSlaCheckAt, updated.version,
        cur.seq, cur.version
      ]);
      if (res.changes === 1) return updated;
    }
    throw new Error(`update_conflict: gave up on ${id} after ${MAX_UPDATE_ATTEMPTS} attempts`);
  }

  async list(q: TicketQuery): Promise<Ticket[]> {
    const where: string[] = [];
    const params: unknown[] = [];

    if (q.status) { where.push(`status = ?`); params.push(q.status); }
    if (q.category) { where.push(`category = ?`); params.push(q.category); }
    if (q.priority) { where.push(`priority = ?`); params.push(q.priority); }
    const search = (q.search ?? "").toLowerCase().trim();
    if (search) {
      // literal substring match, as FileStore does
      where.push(`lower(json_extract(sourceJson, '$.sender') || ' ' || json_extract(sourceJson, '$.subject') || ' ' || json_extract(sourceJson, '$.body')) like ? escape '\\'`);
      params.push(`%${search.replace(/[\\%_]/g, c => `\\${c}`)}%`);
    }

    const sql = `
      select * from tickets
      ${where.length ? `where ${where.join(" and ")}` : ""}
      order by seq desc
      limit ? offset ?
    `;
    params.push(q.limit ?? -1, q.offset ?? 0);
    const rows = await all<TicketRow>(this.db, sql, params);
    return rows.map(r => this.rowToTicket(r));
  }

  async listByStatus(status: Status): Promise<Ticket[]> {
    const rows = await all<TicketRow>(this.db, `select * from tickets where status=? order by seq desc`, [status]);
    return rows.map(r => this.rowToTicket(r));
  }

  async listDueBefore(isoTimestamp: string): Promise<Ticket[]> {
    const rows = await all<TicketRow>(this.db, `
      select * from tickets
      where status not in ('auto_resolved', 'resolved')
        and nextSlaCheckAt is not null and nextSlaCheckAt <= ?
      order by seq asc
    `, [isoTimestamp]);
    return rows.map(r => this.rowToTicket(r));
  }

  async findByFingerprint(fingerprint: string): Promise<Ticket | null> {
    const row = await get<TicketRow>(this.db, `select * from tickets where fingerprint=?`, [fingerprint]);
    return row ? this.rowToTicket(row) : null;
  }

  async appendAudit(ev: AuditEvent): Promise<void> {
    await run(this.db, `
      insert into audit_events (id, ticketId, type, actor, payloadJson, at)
      values (?,?,?,?,?,?)
    `, [ev.id, ev.ticketId, ev.type, ev.actor, JSON.stringify(ev.payload ?? {}), ev.at]);
  }

  async listAudit(ticketId: string, limit: number = 200): Promise<AuditEvent[]> {
    const rows = await all<AuditRow>(this.db, `
      select * from audit_events
      where ticketId=?
      order by at asc, rowid asc
      limit ?
    `, [ticketId, Math.min(limit, 1000)]);
    return rows.map(r => ({
      id: r.id,
      ticketId: r.ticketId,
      type: r.type,
      actor: r.actor,
      payload: JSON.parse(r.payloadJson || "{}"),
      at: r.at
    }));
  }

  private rowToTicket(r: TicketRow): Ticket {
    return {
      id: formatTicketId(r.seq),
      seq: r.seq,
      fingerprint: r.fingerprint,
      source: JSON.parse(r.sourceJson),
      category: r.category,
      priority: r.priority,
      ruleId: r.ruleId,
      status: r.status,
      assignedTeam: r.assignedTeam,
      ownerId: r.ownerId,
      createdAt: r.createdAt,
      updatedAt: r.updatedAt,
      responseDueAt: r.responseDueAt,
      resolutionDueAt: r.resolutionDueAt,
      respondedAt: r.respondedAt,
      escalatedAt: r.escalatedAt,
      resolvedAt: r.resolvedAt,
      resolutionNote: r.resolutionNote,
      sla: JSON.parse(r.slaJson),
      notices: JSON.parse(r.noticesJson),
      nextSlaCheckAt: r.nextSlaCheckAt,
      version: r.version
    };
  }
}
