// backend/services/pages/src/config.ts
/**
 * - No dotenv loading here (bootstrap.ts loads env).
 * - Fail fast at import time if something is missing/invalid.
 * - Optional values default to the bundled assets beside the service.
 */
import path from "path";
import {
  requireEnv,
  requireNumber,
  optionalEnv,
  optionalNumber,
} from "@shared/config/env";

const STATIC_DIR = path.resolve(__dirname, "../static");

export const config = {
  env: process.env.NODE_ENV,

  // required
  port: requireNumber("PAGES_PORT"),
  dbPath: requireEnv("PAGES_DB_PATH"),
  logLevel: requireEnv("LOG_LEVEL"),

  // optional
  seedDir: optionalEnv("PAGES_SEED_DIR", STATIC_DIR),
  templateFile: optionalEnv(
    "PAGES_TEMPLATE_FILE",
    path.join(STATIC_DIR, "amis.hbs")
  ),
  indexPage: optionalEnv("PAGES_INDEX_PAGE", "index"),
  dbTimeoutMs: optionalNumber("PAGES_DB_TIMEOUT_MS", 1_000),
} as const;
