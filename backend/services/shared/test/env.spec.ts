// backend/services/shared/test/env.spec.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  assertRequiredEnv,
  loadEnvFileIfPresent,
  loadEnvFromFileOrThrow,
  optionalEnv,
  optionalNumber,
  requireEnv,
  requireNumber,
} from "../config/env";

const KEYS = ["T_ENV_A", "T_ENV_B", "T_ENV_NUM", "T_ENV_BASE", "T_ENV_REF"];

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "env-spec-"));
  for (const k of KEYS) delete process.env[k];
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  for (const k of KEYS) delete process.env[k];
});

describe("env helpers", () => {
  it("requireEnv trims and fails on missing/blank", () => {
    process.env.T_ENV_A = "  value ";
    process.env.T_ENV_B = "   ";

    expect(requireEnv("T_ENV_A")).toBe("value");
    expect(() => requireEnv("T_ENV_B")).toThrow("Missing required env: T_ENV_B");
  });

  it("requireNumber parses finite numbers only", () => {
    process.env.T_ENV_NUM = "8080";
    expect(requireNumber("T_ENV_NUM")).toBe(8080);

    process.env.T_ENV_NUM = "eighty";
    expect(() => requireNumber("T_ENV_NUM")).toThrow(
      "Env T_ENV_NUM must be a finite number"
    );
  });

  it("optional helpers fall back only when unset", () => {
    expect(optionalEnv("T_ENV_A", "dflt")).toBe("dflt");
    expect(optionalNumber("T_ENV_NUM", 1000)).toBe(1000);

    process.env.T_ENV_A = "set";
    process.env.T_ENV_NUM = "250";
    expect(optionalEnv("T_ENV_A", "dflt")).toBe("set");
    expect(optionalNumber("T_ENV_NUM", 1000)).toBe(250);

    process.env.T_ENV_NUM = "x";
    expect(() => optionalNumber("T_ENV_NUM", 1000)).toThrow();
  });

  it("assertRequiredEnv lists every missing key", () => {
    process.env.T_ENV_A = "a";
    expect(() => assertRequiredEnv(["T_ENV_A", "T_ENV_B", "T_ENV_NUM"])).toThrow(
      "Missing required env vars: T_ENV_B, T_ENV_NUM"
    );
  });
});

describe("env files", () => {
  it("loads and expands an env file", () => {
    const file = path.join(dir, ".env.test");
    fs.writeFileSync(file, "T_ENV_BASE=data\nT_ENV_REF=${T_ENV_BASE}/pages.db\n");

    loadEnvFromFileOrThrow(file);

    expect(process.env.T_ENV_BASE).toBe("data");
    expect(process.env.T_ENV_REF).toBe("data/pages.db");
  });

  it("throws for a missing explicit file, skips a missing optional one", () => {
    const missing = path.join(dir, "nope.env");

    expect(() => loadEnvFromFileOrThrow(missing)).toThrow(
      `ENV_FILE not found at: ${missing}`
    );
    expect(loadEnvFileIfPresent(missing)).toBeNull();
  });
});
