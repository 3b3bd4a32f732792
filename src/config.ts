import path from "node:path";
import { z } from "zod";

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform(v => v === "true" || v === "1" || v === "yes");

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(7090),
    DATA_DIR: z.string().default("./data"),
    STORE: z.enum(["file", "sqlite"]).default("file"),
    DB_PATH: z.string().optional(),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    AUTO_PROCESS: flag.default("false"),
    POLL_INTERVAL_SECONDS: z.coerce.number().positive().default(60),
    SLA_INTERVAL_SECONDS: z.coerce.number().positive().default(300),
    SLA_WARNING_RATIO: z.coerce.number().gt(0).lt(1).default(0.8),
    SOURCE: z.enum(["file", "graph"]).default("file"),
    EMAILS_FILE: z.string().optional(),
    GRAPH_CLIENT_ID: z.string().optional(),
    GRAPH_CLIENT_SECRET: z.string().optional(),
    GRAPH_TENANT_ID: z.string().optional(),
    GRAPH_USER_EMAIL: z.string().optional(),
    SMTP_URL: z.string().optional(),
    NOTIFICATION_FROM: z.string().default("IT Service Desk <no-reply@localhost>"),
    NOTIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    RULES_PATH: z.string().optional(),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60)
  })
  .superRefine((env, ctx) => {
    if (env.SOURCE !== "graph") return;
    for (const key of ["GRAPH_CLIENT_ID", "GRAPH_CLIENT_SECRET", "GRAPH_TENANT_ID", "GRAPH_USER_EMAIL"] as const) {
      if (!env[key]) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "required when SOURCE=graph" });
    }
  });

export interface DeskConfig {
  port: number;
  dataDir: string;
  store: "file" | "sqlite";
  dbPath: string;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  autoProcess: boolean;
  pollIntervalMs: number;
  slaIntervalMs: number;
  warningRatio: number;
  source:
    | { kind: "file"; emailsFile: string }
    | { kind: "graph"; clientId: string; clientSecret: string; tenantId: string; userEmail: string };
  smtpUrl: string | null;
  notificationFrom: string;
  notifyTimeoutMs: number;
  rulesPath: string | null;
  rateLimit: { windowMs: number; max: number };
}

/** Validates the environment. Blank variables count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DeskConfig {
  const present: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") present[k] = v.trim();
  }
  const e = EnvSchema.parse(present);
  const dataDir = path.resolve(e.DATA_DIR);

  return {
    port: e.PORT,
    dataDir,
    store: e.STORE,
    dbPath: e.DB_PATH ?? path.join(dataDir, "service-desk.sqlite"),
    logLevel: e.LOG_LEVEL,
    autoProcess: e.AUTO_PROCESS,
    pollIntervalMs: e.POLL_INTERVAL_SECONDS * 1000,
    slaIntervalMs: e.SLA_INTERVAL_SECONDS * 1000,
    warningRatio: e.SLA_WARNING_RATIO,
    source:
      e.SOURCE === "graph"
        ? {
            kind: "graph",
            clientId: e.GRAPH_CLIENT_ID ?? "",
            clientSecret: e.GRAPH_CLIENT_SECRET ?? "",
            tenantId: e.GRAPH_TENANT_ID ?? "",
            userEmail: e.GRAPH_USER_EMAIL ?? ""
          }
        : { kind: "file", emailsFile: e.EMAILS_FILE ?? path.join(dataDir, "emails.txt") },
    smtpUrl: e.SMTP_URL ?? null,
    notificationFrom: e.NOTIFICATION_FROM,
    notifyTimeoutMs: e.NOTIFY_TIMEOUT_MS,
    rulesPath: e.RULES_PATH ?? null,
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX }
  };
}
