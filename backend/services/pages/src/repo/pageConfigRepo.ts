// backend/services/pages/src/repo/pageConfigRepo.ts
import { z } from "zod";
import { logger } from "@shared/utils/logger";
import type { KeyValueStore } from "../store/KeyValueStore";
import {
  NameEmptyError,
  StorageUnavailableError,
  ValidationError,
} from "../store/errors";

export const PAGE_BUCKET = "page";

/** Served for any name with no stored document. Renders as a normal page. */
export const FALLBACK_PAGE = JSON.stringify({
  type: "page",
  title: "404",
  body: [
    {
      type: "markdown",
      value: "# 🚫 Oops, no page config found for this name\n[👉 Back to the page list](/)",
    },
  ],
  regions: ["body"],
});

export interface PageEntry {
  name: string;
  document: Buffer;
}

export interface PageList {
  items: PageEntry[];
  total: number;
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

const zDocumentText = z
  .string()
  .min(1, "config is empty")
  .refine(isJson, "config must be valid JSON");

export type ReadErrorHandler = (err: StorageUnavailableError, name: string) => void;

export interface PageConfigRepoOptions {
  bucket?: string;
  /** Fallback document text; encoded afresh for each response. */
  fallback?: string;
  /** Called when `get` cannot read the store and serves the fallback. */
  onReadError?: ReadErrorHandler;
}

const logReadError: ReadErrorHandler = (err, name) => {
  logger.warn({ err, name }, "[pages.repo] read failed, serving fallback page");
};

/**
 * Repo layer over the key-value store: one bucket of named page documents.
 * Absent pages resolve to the fallback. `get` also falls back when the store
 * cannot be read; every other operation propagates storage errors.
 */
export class PageConfigRepo {
  readonly bucket: string;
  private readonly fallback: string;
  private readonly onReadError: ReadErrorHandler;

  constructor(
    private readonly store: KeyValueStore,
    opts: PageConfigRepoOptions = {}
  ) {
    this.bucket = opts.bucket ?? PAGE_BUCKET;
    this.fallback = opts.fallback ?? FALLBACK_PAGE;
    this.onReadError = opts.onReadError ?? logReadError;
    this.store.ensureNamespace(this.bucket);
  }

  list(): PageList {
    const items: PageEntry[] = [];
    this.store.forEach(this.bucket, (name, document) => {
      items.push({ name, document });
    });
    return { items, total: items.length };
  }

  /** Like list(), but reports a storage failure and yields an empty list. */
  listOrEmpty(onError: (err: unknown) => void): PageList {
    try {
      return this.list();
    } catch (err) {
      onError(err);
      return { items: [], total: 0 };
    }
  }

  find(name: string): Buffer | null {
    if (!name) return null;
    return this.store.get(this.bucket, name);
  }

  get(name: string): Buffer {
    try {
      const found = this.find(name);
      if (found) return found;
    } catch (err) {
      if (!(err instanceof StorageUnavailableError)) throw err;
      this.onReadError(err, name);
    }
    return Buffer.from(this.fallback, "utf8");
  }

  save(name: string, document: Buffer | string): void {
    if (!name) throw new NameEmptyError();

    const bytes =
      typeof document === "string" ? Buffer.from(document, "utf8") : document;
    const parsed = zDocumentText.safeParse(bytes.toString("utf8"));
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues[0]?.message ?? "invalid config");
    }

    this.store.put(this.bucket, name, bytes);
  }

  remove(name: string): void {
    if (!name) throw new NameEmptyError();
    this.store.delete(this.bucket, name);
  }
}
