export { createDesk } from "./plugin/createDesk.js";
export type { Desk, TicketWithSla, DeskStats } from "./plugin/createDesk.js";
export { createApp } from "./api/app.js";
export { makeRoutes, makeErrorHandler } from "./api/routes.js";
export { createScheduler } from "./scheduler/driver.js";
export type { Scheduler, ScheduledJob, JobStatus } from "./scheduler/driver.js";
export { loadConfig } from "./config.js";
export type { DeskConfig } from "./config.js";
export { loadPolicy } from "./presets/load.js";
export { resolvePolicy } from "./core/engine.js";
export type { DeskPolicy } from "./core/engine.js";
export { classify } from "./core/classify.js";
export { slaView } from "./core/sla.js";
export { FileStore } from "./store/file.js";
export { SqliteStore } from "./store/sqlite.js";
export type { TicketStore, TicketMutation } from "./store/store.js";
export { FileSource } from "./sources/file.js";
export { GraphSource } from "./sources/graph.js";
export type { MessageSource } from "./sources/source.js";
export { MailNotifier } from "./notify/mailer.js";
export type { Notifier, OutboundMessage, SendResult } from "./notify/notifier.js";
export * from "./core/errors.js";
export type {
  RawMessage,
  Ticket,
  TicketEvent,
  AuditEvent,
  Status,
  Priority,
  Category
} from "./types/contracts.js";
