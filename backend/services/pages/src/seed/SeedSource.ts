// backend/services/pages/src/seed/SeedSource.ts
import fs from "node:fs";
import path from "node:path";
import { StorageUnavailableError, messageOf, toError } from "../store/errors";

/** One bundled file; `read` is deferred so a bad file fails on its own. */
export interface SeedEntry {
  fileName: string;
  read(): Buffer;
}

export interface SeedFailure {
  name: string;
  error: Error;
}

/** A named, enumerable, read-only document source available at startup. */
export interface SeedSource {
  entries(): SeedEntry[];
  /** Parts of the source that could not be enumerated by the last `entries()`. */
  failures?(): SeedFailure[];
}

const byName = (a: fs.Dirent, b: fs.Dirent): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

/**
 * Walks a directory tree (the service's bundled `static/` by default).
 * Entries are ordered by relative path so enumeration is stable across runs.
 * An unreadable root throws StorageUnavailableError; an unreadable
 * subdirectory is recorded under its relative path and skipped.
 */
export class DirectorySeedSource implements SeedSource {
  readonly root: string;
  private unreadable: SeedFailure[] = [];

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  entries(): SeedEntry[] {
    this.unreadable = [];

    let top: fs.Dirent[];
    try {
      top = this.listDir(this.root);
    } catch (err) {
      throw new StorageUnavailableError(
        `cannot read seed directory ${this.root}: ${messageOf(err)}`,
        { cause: err }
      );
    }

    const out: SeedEntry[] = [];
    this.collect(this.root, top, out);
    return out;
  }

  failures(): SeedFailure[] {
    return [...this.unreadable];
  }

  protected listDir(dir: string): fs.Dirent[] {
    return fs.readdirSync(dir, { withFileTypes: true });
  }

  private collect(dir: string, dirents: fs.Dirent[], out: SeedEntry[]): void {
    for (const d of [...dirents].sort(byName)) {
      const full = path.join(dir, d.name);
      if (d.isDirectory()) {
        let children: fs.Dirent[];
        try {
          children = this.listDir(full);
        } catch (err) {
          this.unreadable.push({
            name: `${path.relative(this.root, full)}/`,
            error: toError(err),
          });
          continue;
        }
        this.collect(full, children, out);
      } else if (d.isFile()) {
        out.push({ fileName: d.name, read: () => fs.readFileSync(full) });
      }
    }
  }
}
