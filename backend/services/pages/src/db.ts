// backend/services/pages/src/db.ts
import { logger } from "@shared/utils/logger";
import { KeyValueStore } from "./store/KeyValueStore";
import { PageConfigRepo, PAGE_BUCKET } from "./repo/pageConfigRepo";
import { DirectorySeedSource } from "./seed/SeedSource";
import { loadSeeds, type SeedReport } from "./seed/SeedLoader";

export interface OpenStoreOptions {
  dbPath: string;
  seedDir: string;
  timeoutMs: number;
}

export interface OpenedStore {
  store: KeyValueStore;
  repo: PageConfigRepo;
  seedReport: SeedReport;
}

/**
 * Opens the single store handle, ensures the page bucket and merges the
 * bundled seeds. Throws StorageUnavailableError if the file can't be opened.
 */
export async function openPageStore(
  opts: OpenStoreOptions
): Promise<OpenedStore> {
  logger.info({ dbPath: opts.dbPath }, "[pages] opening store");
  const store = await KeyValueStore.open(opts.dbPath, { timeoutMs: opts.timeoutMs });

  try {
    const repo = new PageConfigRepo(store, { bucket: PAGE_BUCKET });
    const seedReport = loadSeeds(
      store,
      repo.bucket,
      new DirectorySeedSource(opts.seedDir)
    );
    logger.info(
      { file: store.file, seedFailures: seedReport.failures.length },
      "[pages] store ready"
    );
    return { store, repo, seedReport };
  } catch (err) {
    store.close();
    throw err;
  }
}
