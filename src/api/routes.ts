import { ErrorRequestHandler, Request, RequestHandler, Response, Router } from "express";
import { z, ZodError } from "zod";
import pino, { Logger } from "pino";
import { Desk } from "../plugin/createDesk.js";
import { Scheduler } from "../scheduler/driver.js";
import { CATEGORIES, PRIORITIES, STATUSES } from "../types/contracts.js";
import { DeskError } from "../core/errors.js";
import { makeRateLimiter } from "./rate-limit.js";

export const INGEST_JOB = "ingest";
export const SLA_SWEEP_JOB = "sla_sweep";

const ListQuery = z.object({
  status: z.enum(STATUSES).optional(),
  category: z.enum(CATEGORIES).optional(),
  priority: z.enum(PRIORITIES).optional(),
  sla: z.enum(["on_track", "at_risk", "breached"]).optional(),
  search: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0)
});

const EventsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(200)
});

const ResolveBody = z.object({
  note: z.string().trim().min(1),
  actor: z.string().trim().min(1).optional()
});

const AcknowledgeBody = z.object({
  ownerId: z.string().trim().min(1)
});

const SweepBody = z.object({
  now: z.string().datetime({ offset: true }).optional()
});

const MessageBody = z.object({
  sender: z.string().trim().min(1).default("test@example.com"),
  subject: z.string().trim().min(1),
  body: z.string().default("")
});

function h(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function makeRoutes(args: {
  desk: Desk;
  scheduler?: Scheduler;
  clock?: () => Date;
  rateLimit?: { windowMs: number; max: number };
}) {
  const r = Router();
  const { desk, scheduler } = args;
  const clock = args.clock ?? (() => new Date());
  const limiter = makeRateLimiter(args.rateLimit ?? { windowMs: 60_000, max: 60 });

  r.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  r.get("/status", (_req, res) => {
    const sched = scheduler?.status();
    res.json({
      ok: true,
      status: "running",
      ...desk.status(),
      autoProcess: sched?.running ?? false,
      jobs: sched?.jobs ?? []
    });
  });

  r.get("/tickets", h(async (req, res) => {
    const q = ListQuery.parse(req.query);
    const items = await desk.listTickets(q, clock());
    res.json({ ok: true, count: items.length, items });
  }));

  r.get("/tickets/:id", h(async (req, res) => {
    const ticket = await desk.viewTicket(req.params.id, clock());
    res.json({ ok: true, ticket });
  }));

  r.get("/tickets/:id/events", h(async (req, res) => {
    const { limit } = EventsQuery.parse(req.query);
    const events = await desk.listAudit(req.params.id, limit);
    res.json({ ok: true, events });
  }));

  r.post("/tickets/:id/resolve", h(async (req, res) => {
    const body = ResolveBody.parse(req.body ?? {});
    const ticket = await desk.resolve(req.params.id, body.note, clock(), body.actor);
    res.json({ ok: true, ticket });
  }));

  r.post("/tickets/:id/acknowledge", h(async (req, res) => {
    const body = AcknowledgeBody.parse(req.body ?? {});
    const ticket = await desk.acknowledge(req.params.id, body.ownerId, clock());
    res.json({ ok: true, ticket });
  }));

  r.get("/sla/summary", h(async (_req, res) => {
    res.json({ ok: true, summary: await desk.slaSummary(clock()) });
  }));

  r.get("/stats", h(async (_req, res) => {
    res.json({ ok: true, ...(await desk.stats(clock())) });
  }));

  r.get("/teams", (_req, res) => {
    res.json({ ok: true, teams: desk.teams() });
  });

  r.post("/triggers/ingest", limiter, h(async (_req, res) => {
    // through the scheduler when one runs, so a manual trigger never overlaps a tick
    const result = scheduler ? await scheduler.trigger(INGEST_JOB) : await desk.runIngestionCycle(clock());
    res.json({ ok: true, result });
  }));

  r.post("/triggers/sla-sweep", limiter, h(async (req, res) => {
    const body = SweepBody.parse(req.body ?? {});
    let result: unknown;
    if (body.now) result = await desk.runSlaSweep(new Date(body.now));
    else if (scheduler) result = await scheduler.trigger(SLA_SWEEP_JOB);
    else result = await desk.runSlaSweep(clock());
    res.json({ ok: true, result });
  }));

  r.post("/messages", limiter, h(async (req, res) => {
    const body = MessageBody.parse(req.body ?? {});
    const message = await desk.addMessage(body, clock());
    res.status(201).json({ ok: true, message });
  }));

  return r;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

export function makeErrorHandler(logger?: Logger): ErrorRequestHandler {
  const log = (logger ?? pino({ level: process.env.LOG_LEVEL || "info" })).child({ component: "http" });

  return (err: unknown, req, res, _next) => {
    if (err instanceof ZodError) {
      res.status(400).json({ ok: false, error: "invalid_request", issues: err.issues });
      return;
    }
    if (err instanceof DeskError) {
      if (err.status >= 500) log.warn({ err, path: req.path }, "request failed");
      res.status(err.status).json({ ok: false, error: err.code, message: err.message });
      return;
    }
    if (isBodyParseError(err)) {
      res.status(400).json({ ok: false, error: "invalid_json" });
      return;
    }
    log.error({ err, path: req.path }, "unhandled error");
    res.status(500).json({ ok: false, error: "internal_error" });
  };
}
