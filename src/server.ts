import fs from "fs";
import path from "path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import pino from "pino";

import { loadConfig } from "./config.js";
import { loadPolicy } from "./presets/load.js";
import { createApp } from "./api/app.js";
import { INGEST_JOB, SLA_SWEEP_JOB } from "./api/routes.js";
import { createDesk } from "./plugin/createDesk.js";
import { createScheduler } from "./scheduler/driver.js";
import { FileStore } from "./store/file.js";
import { SqliteStore } from "./store/sqlite.js";
import { TicketStore } from "./store/store.js";
import { FileSource } from "./sources/file.js";
import { GraphSource } from "./sources/graph.js";
import { MessageSource } from "./sources/source.js";
import { MailNotifier } from "./notify/mailer.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

async function main() {
  fs.mkdirSync(config.dataDir, { recursive: true });

  const store: TicketStore = config.store === "sqlite" ? new SqliteStore(config.dbPath) : new FileStore(config.dataDir);
  await store.init();

  const source: MessageSource =
    config.source.kind === "graph"
      ? new GraphSource({ ...config.source, logger: log })
      : new FileSource(config.source.emailsFile);

  const notifier = new MailNotifier({
    from: config.notificationFrom,
    smtpUrl: config.smtpUrl ?? undefined,
    outboxDir: path.join(config.dataDir, "outbox")
  });

  const desk = createDesk({
    store,
    policy: loadPolicy(config.rulesPath, config.warningRatio),
    source,
    notifier,
    notifyTimeoutMs: config.notifyTimeoutMs,
    logger: log
  });

  const scheduler = createScheduler({
    jobs: [
      { id: INGEST_JOB, name: "Process incoming emails", intervalMs: config.pollIntervalMs, run: now => desk.runIngestionCycle(now) },
      { id: SLA_SWEEP_JOB, name: "Check SLA deadlines", intervalMs: config.slaIntervalMs, run: now => desk.runSlaSweep(now) }
    ],
    logger: log
  });
  if (config.autoProcess) scheduler.start();

  const app = createApp({ desk, scheduler, rateLimit: config.rateLimit, logger: log });
  const server = app.listen(config.port, () => {
    log.info(
      {
        port: config.port,
        dataDir: config.dataDir,
        store: config.store,
        source: source.name,
        notifier: notifier.mode,
        autoProcess: config.autoProcess
      },
      "service desk running"
    );
  });

  let stopping = false;
  async function shutdown(signal: string) {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, "shutting down");
    await new Promise<void>(resolve => server.close(() => resolve()));
    await scheduler.stop();
    await desk.flushNotifications();
    await store.close();
    process.exit(0);
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(err => {
        log.error({ err }, "shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
