// backend/services/pages/src/store/KeyValueStore.ts

/**
 * Single-file, transactional, ordered key-value store on SQLite (sql.js).
 *
 * Layout:
 * - `buckets(name)` registers namespaces.
 * - `entries(bucket, name, value)` holds the data; `name` is a UTF-8 BLOB so
 *   ORDER BY compares raw bytes.
 *
 * Invariants:
 * - The live database is in memory; every committed write is exported and
 *   written over the file atomically (temp file + rename). A commit that
 *   cannot be written is undone in memory too.
 * - Reads run on a snapshot: a separate database built from the last
 *   committed image. An open view keeps its snapshot while writes commit.
 * - One write transaction at a time. Every call is synchronous, so a
 *   transaction commits or rolls back before control returns to the event loop.
 * - `<file>.lock` keeps other processes out while the store is open.
 * - Engine failures surface as StorageUnavailableError; PageStoreErrors
 *   thrown inside a transaction roll it back and propagate unchanged.
 */

import fs from "node:fs";
import path from "node:path";
import initSqlJs, {
  type Database as SqlDatabase,
  type SqlJsStatic,
  type SqlValue,
} from "sql.js";
import { FileLock } from "./fileLock";
import { NameEmptyError, StorageUnavailableError, messageOf } from "./errors";

const FILE_MODE = 0o600;
const DEFAULT_TIMEOUT_MS = 1_000;

const DDL = `
CREATE TABLE IF NOT EXISTS buckets (
  name TEXT PRIMARY KEY
) WITHOUT ROWID;
CREATE TABLE IF NOT EXISTS entries (
  bucket TEXT NOT NULL,
  name   BLOB NOT NULL,
  value  BLOB NOT NULL,
  PRIMARY KEY (bucket, name)
) WITHOUT ROWID;
`;

export type Visit = (name: string, value: Buffer) => void;

export interface ReadBucket {
  readonly name: string;
  get(key: string): Buffer | null;
  forEach(visit: Visit): void;
}

export interface WriteBucket extends ReadBucket {
  put(key: string, value: Uint8Array): void;
  delete(key: string): void;
}

export interface ReadTx {
  /** Throws StorageUnavailableError when the namespace does not exist. */
  bucket(ns: string): ReadBucket;
}

export interface WriteTx {
  bucket(ns: string): WriteBucket;
  createBucketIfNotExists(ns: string): WriteBucket;
}

export interface KeyValueStoreOptions {
  /** How long `open` waits for another process to release the file. */
  timeoutMs?: number;
}

let engine: Promise<SqlJsStatic> | undefined;

/** Loads the WASM engine once per process. */
function loadEngine(): Promise<SqlJsStatic> {
  engine ??= initSqlJs().catch((err: unknown) => {
    engine = undefined;
    throw err;
  });
  return engine;
}

function engineCall<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new StorageUnavailableError(`storage engine: ${messageOf(err)}`, {
      cause: err,
    });
  }
}

function select(db: SqlDatabase, sql: string, params: SqlValue[]): SqlValue[][] {
  return engineCall(() => {
    const stmt = db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: SqlValue[][] = [];
      while (stmt.step()) rows.push(stmt.get());
      return rows;
    } finally {
      stmt.free();
    }
  });
}

function exec(db: SqlDatabase, sql: string, params: SqlValue[] = []): void {
  engineCall(() => db.run(sql, params));
}

function rollback(db: SqlDatabase, cause: unknown): void {
  try {
    db.run("ROLLBACK");
  } catch (err) {
    throw new StorageUnavailableError(`rollback failed: ${messageOf(err)}`, {
      cause,
    });
  }
}

function keyBytes(key: string): Buffer {
  return Buffer.from(key, "utf8");
}

function bytes(value: SqlValue | undefined): Buffer {
  if (value instanceof Uint8Array) return Buffer.from(value);
  throw new StorageUnavailableError("storage engine: malformed entry");
}

function writeAtomic(file: string, data: Uint8Array): void {
  const tmp = `${file}.${process.pid}.tmp`;
  fs.rmSync(tmp, { force: true });
  fs.writeFileSync(tmp, data, { mode: FILE_MODE });
  fs.renameSync(tmp, file);
}

function readBucket(db: SqlDatabase, ns: string): ReadBucket {
  if (select(db, "SELECT 1 FROM buckets WHERE name = ?", [ns]).length === 0) {
    throw new StorageUnavailableError(`bucket "${ns}" not found`);
  }
  return {
    name: ns,
    get: (key) => {
      const [row] = select(
        db,
        "SELECT value FROM entries WHERE bucket = ? AND name = ?",
        [ns, keyBytes(key)]
      );
      return row ? bytes(row[0]) : null;
    },
    forEach: (visit) => {
      const rows = select(
        db,
        "SELECT name, value FROM entries WHERE bucket = ? ORDER BY name",
        [ns]
      );
      for (const [name, value] of rows) {
        visit(bytes(name).toString("utf8"), bytes(value));
      }
    },
  };
}

function writeBucket(db: SqlDatabase, ns: string): WriteBucket {
  return {
    ...readBucket(db, ns),
    put: (key, value) => {
      if (!key) throw new NameEmptyError();
      exec(
        db,
        `INSERT INTO entries (bucket, name, value) VALUES (?, ?, ?)
         ON CONFLICT (bucket, name) DO UPDATE SET value = excluded.value`,
        [ns, keyBytes(key), Buffer.from(value)]
      );
    },
    delete: (key) => {
      exec(db, "DELETE FROM entries WHERE bucket = ? AND name = ?", [
        ns,
        keyBytes(key),
      ]);
    },
  };
}

function writeTx(db: SqlDatabase): WriteTx {
  return {
    bucket: (ns) => writeBucket(db, ns),
    createBucketIfNotExists: (ns) => {
      exec(db, "INSERT OR IGNORE INTO buckets (name) VALUES (?)", [ns]);
      return writeBucket(db, ns);
    },
  };
}

/** Read-only copy of one committed image; closed once retired and unpinned. */
class Snapshot {
  private pins = 0;
  private retired = false;
  private closed = false;

  constructor(readonly db: SqlDatabase) {}

  pin(): void {
    this.pins += 1;
  }

  unpin(): void {
    this.pins -= 1;
    this.closeIfDone();
  }

  retire(): void {
    this.retired = true;
    this.closeIfDone();
  }

  private closeIfDone(): void {
    if (this.closed || !this.retired || this.pins > 0) return;
    this.closed = true;
    this.db.close();
  }
}

export class KeyValueStore {
  private snapshot: Snapshot | null = null;
  private writing = false;

  private constructor(
    readonly file: string,
    private readonly sql: SqlJsStatic,
    private db: SqlDatabase | null,
    private image: Uint8Array,
    private readonly lock: FileLock
  ) {}

  /**
   * Opens (creating if absent, mode 0600) the store file at `file`.
   * Throws StorageUnavailableError if it cannot be created, read, parsed or
   * locked within `timeoutMs`.
   */
  static async open(
    file: string,
    opts: KeyValueStoreOptions = {}
  ): Promise<KeyValueStore> {
    const resolved = path.resolve(file);
    const lock = new FileLock(
      `${resolved}.lock`,
      opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
    );
    let db: SqlDatabase | undefined;

    try {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
      await lock.acquire();
      const sql = await loadEngine();
      const existing = fs.existsSync(resolved)
        ? fs.readFileSync(resolved)
        : Buffer.alloc(0);
      db = existing.length > 0 ? new sql.Database(existing) : new sql.Database();
      db.exec(DDL);

      // The rename leaves the file at FILE_MODE whether or not it existed.

      const image = db.export();
      writeAtomic(resolved, image);
      return new KeyValueStore(resolved, sql, db, image, lock);
    } catch (err) {
      db?.close();
      lock.release();
      throw new StorageUnavailableError(
        `cannot open store at ${resolved}: ${messageOf(err)}`,
        { cause: err }
      );
    }
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  /** Runs `fn` against a stable snapshot of the last commit. */
  view<T>(fn: (tx: ReadTx) => T): T {
    this.requireOpen("view");
    const snap = this.currentSnapshot();
    snap.pin();
    try {
      return fn({ bucket: (ns) => readBucket(snap.db, ns) });
    } finally {
      snap.unpin();
    }
  }

  /** Runs `fn` in a read-write transaction; any throw rolls it back. */
  update<T>(fn: (tx: WriteTx) => T): T {
    const db = this.requireOpen("update");
    if (this.writing) {
      throw new StorageUnavailableError(
        "update failed: a write transaction is already open"
      );
    }

    this.writing = true;
    try {
      const result = this.transact(db, fn);
      this.persist(db);
      return result;
    } finally {
      this.writing = false;
    }
  }

  /** Bulk write (seeding): one transaction for the whole batch. */
  batch<T>(fn: (tx: WriteTx) => T): T {
    return this.update(fn);
  }

  ensureNamespace(ns: string): void {
    this.update((tx) => tx.createBucketIfNotExists(ns));
  }

  get(ns: string, key: string): Buffer | null {
    return this.view((tx) => tx.bucket(ns).get(key));
  }

  put(ns: string, key: string, value: Uint8Array): void {
    if (!key) throw new NameEmptyError();
    this.update((tx) => tx.bucket(ns).put(key, value));
  }

  delete(ns: string, key: string): void {
    this.update((tx) => tx.bucket(ns).delete(key));
  }

  forEach(ns: string, visit: Visit): void {
    this.view((tx) => tx.bucket(ns).forEach(visit));
  }

  close(): void {
    if (this.db === null) return;
    this.db.close();
    this.db = null;
    this.snapshot?.retire();
    this.snapshot = null;
    this.lock.release();
  }

  private requireOpen(op: string): SqlDatabase {
    if (this.db === null) {
      throw new StorageUnavailableError(`${op} failed: store is closed`);
    }
    return this.db;
  }

  private currentSnapshot(): Snapshot {
    this.snapshot ??= new Snapshot(
      engineCall(() => new this.sql.Database(this.image))
    );
    return this.snapshot;
  }

  private transact<T>(db: SqlDatabase, fn: (tx: WriteTx) => T): T {
    exec(db, "BEGIN IMMEDIATE");
    try {
      const result = fn(writeTx(db));
      exec(db, "COMMIT");
      return result;
    } catch (err) {
      rollback(db, err);
      throw err;
    }
  }

  /** Writes the committed state to disk, or restores the last image. */
  private persist(db: SqlDatabase): void {
    let image: Uint8Array;
    try {
      image = db.export();
      writeAtomic(this.file, image);
    } catch (err) {
      db.close();
      this.db = new this.sql.Database(this.image);
      throw new StorageUnavailableError(
        `commit could not be written to ${this.file}: ${messageOf(err)}`,
        { cause: err }
      );
    }
    this.image = image;
    this.snapshot?.retire();
    this.snapshot = null;
  }
}
