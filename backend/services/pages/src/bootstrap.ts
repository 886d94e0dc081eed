// backend/services/pages/src/bootstrap.ts
import path from "path";
import {
  loadEnvFromFileOrThrow,
  loadEnvFileIfPresent,
  assertRequiredEnv,
} from "@shared/config/env";
import { SERVICE_NAME } from "./serviceName";

// Explicit ENV_FILE must exist; the default .env.dev at the repo root is optional.
const explicit = process.env.ENV_FILE?.trim();
if (explicit) {
  loadEnvFromFileOrThrow(explicit);
  console.log(`[bootstrap] Loaded env from: ${path.resolve(explicit)}`);
} else {
  const loaded = loadEnvFileIfPresent(
    path.resolve(__dirname, "../../../..", ".env.dev")
  );
  if (loaded) console.log(`[bootstrap] Loaded env from: ${loaded}`);
}

process.env.SERVICE_NAME = SERVICE_NAME;

assertRequiredEnv(["LOG_LEVEL", "PAGES_PORT", "PAGES_DB_PATH"]);
