// backend/services/shared/config/env.ts

import path from "path";
import fs from "fs";
import dotenv from "dotenv";
import { expand } from "dotenv-expand";

/** Load a specific env file. Throws if the file is missing or invalid. */
export function loadEnvFromFileOrThrow(envFilePath: string) {
  if (!envFilePath || envFilePath.trim() === "") {
    throw new Error("ENV_FILE is required but was not provided.");
  }
  const resolved = path.resolve(process.cwd(), envFilePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`ENV_FILE not found at: ${resolved}`);
  }

  const parsed = dotenv.config({ path: resolved });
  if (parsed.error) {
    throw new Error(
      `Failed to load ENV_FILE: ${resolved}: ${String(parsed.error)}`
    );
  }
  expand(parsed);
}

/**
 * Load an env file only if it exists. Returns the resolved path when loaded,
 * null when the file is absent (values then come from the process env).
 */
export function loadEnvFileIfPresent(envFilePath: string): string | null {
  const resolved = path.resolve(process.cwd(), envFilePath);
  if (!fs.existsSync(resolved)) return null;
  loadEnvFromFileOrThrow(resolved);
  return resolved;
}

/** Assert required environment variables are present (non-empty). */
export function assertRequiredEnv(keys: string[]) {
  const missing: string[] = [];
  for (const k of keys) {
    const v = process.env[k];
    if (!v || v.trim() === "") missing.push(k);
  }
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}

/** Require a non-empty env var; returns trimmed string. */
export function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env: ${name}`);
  return v.trim();
}

/** Require an env var that parses to a finite number. */
export function requireNumber(name: string): number {
  const v = requireEnv(name);
  const n = Number(v);
  if (!Number.isFinite(n))
    throw new Error(`Env ${name} must be a finite number`);
  return n;
}

/** Optional env var; trimmed value or the given default when unset/blank. */
export function optionalEnv(name: string, fallback: string): string {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : fallback;
}

/** Optional numeric env var; throws only if set to a non-number. */
export function optionalNumber(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v || !v.trim()) return fallback;
  const n = Number(v);
  if (!Number.isFinite(n))
    throw new Error(`Env ${name} must be a finite number`);
  return n;
}
