// backend/services/pages/src/seed/SeedLoader.ts

/**
 * Merges bundled seed documents into a namespace at startup.
 *
 * Semantics:
 * - Only `*.json` files are documents; the name is the file name minus
 *   the suffix. Anything else (templates, assets) is skipped.
 * - Seeds are upserted unconditionally, so a stored page with a seed's name
 *   is reset to the bundled copy on every start. Other names are untouched.
 * - One batched write transaction covers the whole set. A document that
 *   fails to read or write is logged and recorded; the rest still load.
 *   So is a subdirectory the source could not list.
 */

import path from "node:path";
import { logger } from "@shared/utils/logger";
import type { KeyValueStore } from "../store/KeyValueStore";
import { toError } from "../store/errors";
import type { SeedFailure, SeedSource } from "./SeedSource";

export type { SeedFailure } from "./SeedSource";

export const DOCUMENT_SUFFIX = ".json";

export interface SeedReport {
  loaded: string[];
  skipped: string[];
  failures: SeedFailure[];
}

/** Name for a document file, or null when the file is not a document. */
export function seedName(fileName: string): string | null {
  const ext = path.extname(fileName);
  if (ext !== DOCUMENT_SUFFIX) return null;
  return fileName.slice(0, -ext.length);
}

export function loadSeeds(
  store: KeyValueStore,
  namespace: string,
  source: SeedSource
): SeedReport {
  const report: SeedReport = { loaded: [], skipped: [], failures: [] };
  const entries = source.entries();

  for (const failure of source.failures?.() ?? []) {
    report.failures.push(failure);
    logger.warn(
      { dir: failure.name, err: failure.error },
      "[pages.seed] failed to read seed directory"
    );
  }

  store.batch((tx) => {
    const bucket = tx.createBucketIfNotExists(namespace);

    for (const entry of entries) {
      const name = seedName(entry.fileName);
      if (name === null) {
        report.skipped.push(entry.fileName);
        continue;
      }

      try {
        bucket.put(name, entry.read());
      } catch (err) {
        const error = toError(err);
        report.failures.push({ name, error });
        logger.warn(
          { file: entry.fileName, err: error },
          "[pages.seed] failed to load seed document"
        );
        continue;
      }

      report.loaded.push(name);
      logger.debug({ file: entry.fileName }, "[pages.seed] loaded seed document");
    }
  });

  logger.info(
    {
      namespace,
      loaded: report.loaded.length,
      skipped: report.skipped.length,
      failed: report.failures.length,
    },
    "[pages.seed] seed merge complete"
  );
  return report;
}
