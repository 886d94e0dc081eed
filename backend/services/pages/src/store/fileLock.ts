// backend/services/pages/src/store/fileLock.ts
import fs from "node:fs";
import { setTimeout as delay } from "node:timers/promises";

const RETRY_MS = 25;

function errnoCode(err: unknown): string | undefined {
  return typeof err === "object" &&
    err !== null &&
    "code" in err &&
    typeof err.code === "string"
    ? err.code
    : undefined;
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else.
    return errnoCode(err) === "EPERM";
  }
}

/**
 * Exclusive lock beside the store file. The lock file holds the owner's pid;
 * a lock left behind by a process that no longer exists is taken over.
 */
export class FileLock {
  private held = false;

  constructor(
    readonly path: string,
    private readonly timeoutMs: number
  ) {}

  async acquire(): Promise<void> {
    const start = Date.now();

    while (!this.tryCreate()) {
      if (this.reclaimStale()) continue;
      if (Date.now() - start >= this.timeoutMs) {
        throw new Error(
          `timed out after ${this.timeoutMs}ms waiting for lock ${this.path}`
        );
      }
      await delay(RETRY_MS);
    }
  }

  release(): void {
    if (!this.held) return;
    this.held = false;
    fs.rmSync(this.path, { force: true });
  }

  private tryCreate(): boolean {
    try {
      fs.writeFileSync(this.path, String(process.pid), {
        flag: "wx",
        mode: 0o600,
      });
    } catch (err) {
      if (errnoCode(err) === "EEXIST") return false;
      throw err;
    }
    this.held = true;
    return true;
  }

  /** True when the lock was free or its owner is gone (and it was removed). */
  private reclaimStale(): boolean {
    let text: string;
    try {
      text = fs.readFileSync(this.path, "utf8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return true;
      throw err;
    }

    // An empty or partial pid means the owner is still writing it.
    const owner = Number.parseInt(text, 10);
    if (!Number.isInteger(owner) || owner <= 0) return false;
    if (owner === process.pid || isAlive(owner)) return false;

    fs.rmSync(this.path, { force: true });
    return true;
  }
}
