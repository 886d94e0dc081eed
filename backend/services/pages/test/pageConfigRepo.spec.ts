// backend/services/pages/test/pageConfigRepo.spec.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FALLBACK_PAGE, PAGE_BUCKET, PageConfigRepo } from "../src/repo/pageConfigRepo";
import {
  NameEmptyError,
  StorageUnavailableError,
  ValidationError,
} from "../src/store/errors";
import { makeTmpStore, type TmpStore } from "./helpers/tmpStore";

let tmp: TmpStore;
let repo: PageConfigRepo;

const fallbackText = (b: Buffer): string => b.toString("utf8");

beforeEach(async () => {
  tmp = await makeTmpStore();
  repo = new PageConfigRepo(tmp.store);
});

afterEach(() => {
  tmp.cleanup();
});

describe("PageConfigRepo", () => {
  it("creates its bucket on construction", () => {
    expect(repo.bucket).toBe(PAGE_BUCKET);
    expect(repo.list()).toEqual({ items: [], total: 0 });
  });

  it("returns exactly the saved bytes", () => {
    const doc = '{ "type": "page",\n  "title": "Ünïcode" }';
    repo.save("home", doc);

    expect(repo.get("home").toString("utf8")).toBe(doc);
    expect(repo.find("home")?.toString("utf8")).toBe(doc);
  });

  it("serves the fallback page for a miss or an empty name", () => {
    expect(fallbackText(repo.get("nonexistent"))).toBe(FALLBACK_PAGE);
    expect(fallbackText(repo.get(""))).toBe(FALLBACK_PAGE);
    expect(repo.find("nonexistent")).toBeNull();

    const fallback = JSON.parse(FALLBACK_PAGE);
    expect(fallback.type).toBe("page");
    expect(fallback.title).toBe("404");
    expect(fallback.regions).toEqual(["body"]);
  });

  it("uses a custom fallback when given one", () => {
    const custom = '{"type":"page","title":"missing"}';
    const other = new PageConfigRepo(tmp.store, { bucket: "drafts", fallback: custom });

    expect(fallbackText(other.get("x"))).toBe(custom);
  });

  it("hands out a fresh fallback buffer each time", () => {
    const first = repo.get("missing");
    first[2] = 0x58;

    expect(fallbackText(repo.get("missing"))).toBe(FALLBACK_PAGE);
    expect(repo.get("missing")).not.toBe(repo.get("missing"));
  });

  it("rejects an empty name, an empty document and invalid JSON", () => {
    repo.save("x", '{"v":1}');

    expect(() => repo.save("", "{}")).toThrow(NameEmptyError);
    expect(() => repo.save("x", "")).toThrow("config is empty");
    expect(() => repo.save("x", "{not json")).toThrow(ValidationError);
    expect(() => repo.save("x", "{not json")).toThrow("config must be valid JSON");

    expect(repo.get("x").toString("utf8")).toBe('{"v":1}');
    expect(repo.list().total).toBe(1);
  });

  it("keeps the fallback for a name whose save was rejected", () => {
    expect(() => repo.save("fresh", "{oops")).toThrow(ValidationError);
    expect(fallbackText(repo.get("fresh"))).toBe(FALLBACK_PAGE);
  });

  it("lists every saved page in name order with its document", () => {
    repo.save("zeta", '{"n":"zeta"}');
    repo.save("alpha", '{"n":"alpha"}');
    repo.save("mid", '{"n":"mid"}');

    const { items, total } = repo.list();

    expect(total).toBe(3);
    expect(items.map((e) => [e.name, e.document.toString("utf8")])).toEqual([
      ["alpha", '{"n":"alpha"}'],
      ["mid", '{"n":"mid"}'],
      ["zeta", '{"n":"zeta"}'],
    ]);
  });

  it("removes idempotently and rejects an empty name", () => {
    repo.save("page", "{}");

    repo.remove("page");
    repo.remove("page");
    repo.remove("never-there");

    expect(fallbackText(repo.get("page"))).toBe(FALLBACK_PAGE);
    expect(repo.list().total).toBe(0);
    expect(() => repo.remove("")).toThrow(NameEmptyError);
  });

  it("passes storage failures through, or reports them from listOrEmpty", () => {
    tmp.store.close();

    expect(() => repo.list()).toThrow(StorageUnavailableError);
    expect(() => repo.save("x", "{}")).toThrow(StorageUnavailableError);

    const onError = vi.fn();
    expect(repo.listOrEmpty(onError)).toEqual({ items: [], total: 0 });
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(StorageUnavailableError);
  });

  it("serves the fallback and reports the error when get cannot read the store", () => {
    const onReadError = vi.fn();
    const guarded = new PageConfigRepo(tmp.store, { onReadError });
    guarded.save("home", '{"type":"page"}');
    tmp.store.close();

    expect(fallbackText(guarded.get("home"))).toBe(FALLBACK_PAGE);
    expect(onReadError).toHaveBeenCalledTimes(1);
    expect(onReadError.mock.calls[0]?.[0]).toBeInstanceOf(StorageUnavailableError);
    expect(onReadError.mock.calls[0]?.[1]).toBe("home");
    expect(() => guarded.find("home")).toThrow("view failed: store is closed");
  });
});
