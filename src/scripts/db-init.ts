import path from "node:path";
import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import fs from "node:fs";
import pino from "pino";
import { loadConfig } from "../config.js";
import { SqliteStore } from "../store/sqlite.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

fs.mkdirSync(path.dirname(config.dbPath), { recursive: true });
const store = new SqliteStore(config.dbPath);

store.init()
  .then(() => store.close())
  .then(() => {
    log.info({ dbPath: config.dbPath }, "db initialized");
  })
  .catch((err) => {
    log.error({ err, dbPath: config.dbPath }, "db init failed");
    process.exit(1);
  });
