import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IndexSyncError } from "../../../src/core/errors";
import { MetricsRegistry } from "../../../src/observability";
import { FullRebuildSync } from "../../../src/search";
import { SqliteStore } from "../../../src/store";
import { InMemorySearchIndex } from "../../helpers/inMemorySearchIndex";
import { createTestLogger } from "../../helpers/logging";

const PAGES = [
  { url: "https://en.wikipedia.org/wiki/Golang", title: "Go (programming language)", content: "Go is a language.\n", language: "en" },
  { url: "https://da.wikipedia.org/wiki/Python", title: "Python", content: "Python er et sprog.\n", language: "da" },
  { url: "https://en.wikipedia.org/wiki/Rust", title: "Rust", content: "Rust is a language.\n", language: "en" },
];

describe("FullRebuildSync", () => {
  let store: SqliteStore;

  beforeEach(async () => {
    store = new SqliteStore(":memory:");
    for (const page of PAGES) {
      await store.upsertPage(page);
    }
  });

  afterEach(async () => {
    await store.close();
  });

  function createSync(index: InMemorySearchIndex, metrics = new MetricsRegistry()): FullRebuildSync {
    const { logger } = createTestLogger();
    return new FullRebuildSync({ index, logger, metrics });
  }

  it("creates an absent index and loads every page", async () => {
    const index = new InMemorySearchIndex();

    const summary = await createSync(index).sync(store);

    expect(summary).toEqual({ indexed: 3, failed: 0, finalState: "present" });
    expect(index.operations).toEqual(["exists", "create"]);
    expect(index.documentCount).toBe(3);
  });

  it("rebuilds an empty existing index", async () => {
    const index = new InMemorySearchIndex(undefined, { exists: true });

    await createSync(index).sync(store);

    expect(index.operations).toEqual(["exists", "delete", "create"]);
    expect(index.documentCount).toBe(3);
  });

  it("replaces stale documents in a populated index", async () => {
    const index = new InMemorySearchIndex();
    index.seed([
      { title: "Old", url: "https://en.wikipedia.org/wiki/Old", content: "old\n", language: "en", lastUpdated: "2020-01-01T00:00:00.000Z" },
      { title: "Gone", url: "https://en.wikipedia.org/wiki/Gone", content: "gone\n", language: "en", lastUpdated: "2020-01-01T00:00:00.000Z" },
    ]);

    await createSync(index).sync(store);

    expect(index.documentCount).toBe(3);
    expect(await index.search("old", 10)).toEqual([]);
  });

  it("copies every page field into the document", async () => {
    const index = new InMemorySearchIndex();

    await createSync(index).sync(store);

    const [document] = await index.search("Rust", 10);
    expect(document).toMatchObject({
      title: "Rust",
      url: "https://en.wikipedia.org/wiki/Rust",
      content: "Rust is a language.\n",
      language: "en",
    });
    expect(document.lastUpdated).not.toBe("");
  });

  it("counts a failing document and keeps loading the rest", async () => {
    const index = new InMemorySearchIndex(undefined, { rejectUrls: ["https://da.wikipedia.org/wiki/Python"] });
    const metrics = new MetricsRegistry();

    const summary = await createSync(index, metrics).sync(store);

    expect(summary).toEqual({ indexed: 2, failed: 1, finalState: "present" });
    expect(index.documentCount).toBe(2);
    expect(metrics.getCounter("docs_failed")).toBe(1);
    expect(metrics.getCounter("docs_indexed")).toBe(2);
  });

  it("aborts when the index cannot be created", async () => {
    const index = new InMemorySearchIndex(undefined, { failOn: ["create"] });

    const error = await createSync(index).sync(store).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(IndexSyncError);
    if (error instanceof IndexSyncError) {
      expect(error.step).toBe("create");
      expect(error.message).toBe("index create failed for 'pages': create refused by test index");
    }
    expect(index.documentCount).toBe(0);
  });

  it("aborts when the existing index cannot be deleted", async () => {
    const index = new InMemorySearchIndex(undefined, { exists: true, failOn: ["delete"] });

    await expect(createSync(index).sync(store)).rejects.toMatchObject({ name: "IndexSyncError", step: "delete" });
    expect(index.operations).toEqual(["exists", "delete"]);
  });

  it("aborts when existence cannot be checked", async () => {
    const index = new InMemorySearchIndex(undefined, { failOn: ["exists"] });

    await expect(createSync(index).sync(store)).rejects.toMatchObject({ step: "exists" });
    expect(index.operations).toEqual(["exists"]);
  });
});
