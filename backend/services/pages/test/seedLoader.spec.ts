// backend/services/pages/test/seedLoader.spec.ts
import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DirectorySeedSource, type SeedEntry, type SeedSource } from "../src/seed/SeedSource";
import { StorageUnavailableError } from "../src/store/errors";
import { loadSeeds, seedName } from "../src/seed/SeedLoader";
import { STATIC_DIR, makeTmpDir, makeTmpStore, text, type TmpStore } from "./helpers/tmpStore";

const NS = "page";

function source(entries: SeedEntry[]): SeedSource {
  return { entries: () => entries };
}

function entry(fileName: string, body: string): SeedEntry {
  return { fileName, read: () => Buffer.from(body) };
}

function names(tmp: TmpStore): string[] {
  const out: string[] = [];
  tmp.store.forEach(NS, (name) => out.push(name));
  return out;
}

let tmp: TmpStore;

beforeEach(async () => {
  tmp = await makeTmpStore();
});

afterEach(() => {
  tmp.cleanup();
});

describe("seedName", () => {
  it("strips the .json suffix and rejects other files", () => {
    expect(seedName("home.json")).toBe("home");
    expect(seedName("list.v2.json")).toBe("list.v2");
    expect(seedName("amis.hbs")).toBeNull();
    expect(seedName("README")).toBeNull();
  });
});

describe("loadSeeds", () => {
  it("creates the namespace and loads only documents", () => {
    const report = loadSeeds(
      tmp.store,
      NS,
      source([entry("home.json", '{"a":1}'), entry("amis.hbs", "<html>")])
    );

    expect(report).toEqual({ loaded: ["home"], skipped: ["amis.hbs"], failures: [] });
    expect(text(tmp.store.get(NS, "home"))).toBe('{"a":1}');
  });

  it("overwrites a same-named stored page and leaves other pages alone", () => {
    tmp.store.ensureNamespace(NS);
    tmp.store.put(NS, "home", Buffer.from('{"edited":true}'));
    tmp.store.put(NS, "mine", Buffer.from('{"own":true}'));

    loadSeeds(tmp.store, NS, source([entry("home.json", '{"seed":true}')]));

    expect(text(tmp.store.get(NS, "home"))).toBe('{"seed":true}');
    expect(text(tmp.store.get(NS, "mine"))).toBe('{"own":true}');
  });

  it("records a document that fails to read and still loads the rest", () => {
    const broken: SeedEntry = {
      fileName: "broken.json",
      read: () => {
        throw new Error("EIO: read failed");
      },
    };

    const report = loadSeeds(
      tmp.store,
      NS,
      source([entry("a.json", "{}"), broken, entry("b.json", "[]")])
    );

    expect(report.loaded).toEqual(["a", "b"]);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]?.name).toBe("broken");
    expect(report.failures[0]?.error.message).toBe("EIO: read failed");
    expect(names(tmp)).toEqual(["a", "b"]);
  });

  it("resolves name collisions to the last processed seed", () => {
    loadSeeds(
      tmp.store,
      NS,
      source([entry("dup.json", '"first"'), entry("dup.json", '"second"')])
    );

    expect(text(tmp.store.get(NS, "dup"))).toBe('"second"');
  });

  it("is repeatable across restarts", () => {
    const seeds = source([entry("home.json", "{}")]);
    loadSeeds(tmp.store, NS, seeds);
    loadSeeds(tmp.store, NS, seeds);

    expect(names(tmp)).toEqual(["home"]);
  });
});

describe("DirectorySeedSource", () => {
  it("walks nested directories in a stable order", () => {
    const dir = makeTmpDir("pages-seeds-");
    try {
      fs.mkdirSync(path.join(dir, "nested"));
      fs.writeFileSync(path.join(dir, "b.json"), '{"b":1}');
      fs.writeFileSync(path.join(dir, "a.json"), '{"a":1}');
      fs.writeFileSync(path.join(dir, "nested", "c.json"), '{"c":1}');
      fs.writeFileSync(path.join(dir, "page.hbs"), "<html>");

      const entries = new DirectorySeedSource(dir).entries();

      expect(entries.map((e) => e.fileName)).toEqual([
        "a.json",
        "b.json",
        "c.json",
        "page.hbs",
      ]);
      expect(entries[2]?.read().toString("utf8")).toBe('{"c":1}');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("loads the bundled pages and skips the template", () => {
    const report = loadSeeds(tmp.store, NS, new DirectorySeedSource(STATIC_DIR));

    expect(report.loaded).toEqual(["hello", "index"]);
    expect(report.skipped).toEqual(["amis.hbs"]);
    expect(report.failures).toEqual([]);

    const index = JSON.parse(text(tmp.store.get(NS, "index")) ?? "null");
    expect(index.type).toBe("page");
  });

  it("fails with StorageUnavailableError when the seed directory is missing", () => {
    const missing = new DirectorySeedSource(`${tmp.dir}/no-such-dir`);

    expect(() => missing.entries()).toThrow(StorageUnavailableError);
    expect(() => loadSeeds(tmp.store, NS, missing)).toThrow("cannot read seed directory");
  });

  it("records an unreadable subdirectory and loads the rest", () => {
    class BrokenNested extends DirectorySeedSource {
      protected override listDir(dir: string): fs.Dirent[] {
        if (path.basename(dir) === "nested") {
          throw new Error("EACCES: permission denied");
        }
        return super.listDir(dir);
      }
    }

    const dir = makeTmpDir("pages-seeds-");
    try {
      fs.mkdirSync(path.join(dir, "nested"));
      fs.writeFileSync(path.join(dir, "nested", "hidden.json"), "{}");
      fs.writeFileSync(path.join(dir, "top.json"), '{"top":1}');

      const report = loadSeeds(tmp.store, NS, new BrokenNested(dir));

      expect(report.loaded).toEqual(["top"]);
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0]?.name).toBe("nested/");
      expect(report.failures[0]?.error.message).toBe("EACCES: permission denied");
      expect(names(tmp)).toEqual(["top"]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
