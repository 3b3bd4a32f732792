import express from "express";
import { Logger } from "pino";
import { Desk } from "../plugin/createDesk.js";
import { Scheduler } from "../scheduler/driver.js";
import { makeErrorHandler, makeRoutes } from "./routes.js";

export function createApp(args: {
  desk: Desk;
  scheduler?: Scheduler;
  clock?: () => Date;
  rateLimit?: { windowMs: number; max: number };
  logger?: Logger;
}) {
  const app = express();
  app.use(express.json({ limit: "512kb" }));
  app.use("/api", makeRoutes(args));
  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "not_found" });
  });
  app.use(makeErrorHandler(args.logger));
  return app;
}
