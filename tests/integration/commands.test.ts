import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AppConfig, DEFAULT_CONFIG } from "../../src/config";
import { CommandContext, runPipeline, runSearch, runStatus, runSync } from "../../src/core/commands";
import { HttpFetch } from "../../src/core/fetch";
import { MetricsRegistry } from "../../src/observability";
import { SqliteStore } from "../../src/store";
import { articleHtml, htmlResponse } from "../helpers/http";
import { InMemorySearchIndex } from "../helpers/inMemorySearchIndex";
import { createTestLogger } from "../helpers/logging";

const CONFIG: AppConfig = {
  ...DEFAULT_CONFIG,
  storePath: ":memory:",
  elastic: { ...DEFAULT_CONFIG.elastic, probeAttempts: 1, probeDelayMs: 0 },
};

describe("commands", () => {
  let tmpDir: string;
  let logPath: string;
  let store: SqliteStore;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "wiki-ingest-cmd-"));
    logPath = path.join(tmpDir, "search.log");
    store = new SqliteStore(":memory:");
  });

  afterEach(async () => {
    await store.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function createContext(index: InMemorySearchIndex): CommandContext {
    const { logger } = createTestLogger();
    const fetchFn: HttpFetch = async (url) =>
      url.startsWith("https://da.")
        ? htmlResponse(404)
        : htmlResponse(200, articleHtml(url.slice(url.lastIndexOf("/") + 1), ["Some TestContent here."]));
    return {
      runId: "run_test",
      config: { ...CONFIG, searchLogPath: logPath },
      store,
      logger,
      metrics: new MetricsRegistry(),
      createIndexClients: () => [index],
      fetchFn,
    };
  }

  it("syncs after an ingestion pass that added pages", async () => {
    fs.writeFileSync(logPath, 'query="golang"\nquery="rust"\n');
    const index = new InMemorySearchIndex();

    const result = await runPipeline(createContext(index));

    expect(result.ingestion).toEqual({ termsFound: 2, skipped: 0, saved: 2, failed: 0 });
    expect(result.sync).toEqual({ indexed: 2, failed: 0, finalState: "present" });
    expect(index.documentCount).toBe(2);
    expect(index.closed).toBe(true);
  });

  it("resyncs when the pass rewrote an existing page", async () => {
    fs.writeFileSync(logPath, 'query="go lang"\n');
    await store.upsertPage({ url: "https://en.wikipedia.org/wiki/Go_lang", title: "Old", content: "Stale text.\n", language: "en" });
    const index = new InMemorySearchIndex();
    index.seed([
      {
        title: "Old",
        url: "https://en.wikipedia.org/wiki/Go_lang",
        content: "Stale text.\n",
        language: "en",
        lastUpdated: "2026-10-01T00:00:00.000Z",
      },
    ]);

    const result = await runPipeline(createContext(index));

    expect(await store.countPages()).toBe(1);
    expect(result.ingestion.saved).toBe(1);
    expect(result.sync).toEqual({ indexed: 1, failed: 0, finalState: "present" });
    expect((await index.search("go_lang", 10)).map((doc) => doc.title)).toEqual(["Go_lang"]);
  });

  it("skips the sync when the pass saved nothing", async () => {
    fs.writeFileSync(logPath, 'query="golang"\n');
    const index = new InMemorySearchIndex();
    await runPipeline(createContext(index));
    const ping = vi.spyOn(index, "ping");

    const result = await runPipeline(createContext(index));

    expect(result.sync).toBeUndefined();
    expect(ping).not.toHaveBeenCalled();
  });

  it("skips the sync when the engine is unreachable", async () => {
    fs.writeFileSync(logPath, 'query="golang"\n');

    const result = await runPipeline(createContext(new InMemorySearchIndex(undefined, { reachable: false })));

    expect(result.ingestion.saved).toBe(1);
    expect(result.sync).toBeUndefined();
  });

  it("refuses to sync without an engine", async () => {
    await expect(runSync(createContext(new InMemorySearchIndex(undefined, { reachable: false })))).rejects.toMatchObject({
      name: "IndexSyncError",
      step: "connect",
    });
  });

  it("serves searches from the store when the engine is unreachable", async () => {
    await store.upsertPage({
      url: "https://en.wikipedia.org/wiki/Test",
      title: "Test",
      content: "A page with TestContent.\n",
      language: "en",
    });

    const hits = await runSearch(createContext(new InMemorySearchIndex(undefined, { reachable: false })), "TestContent");

    expect(hits).toEqual([{ title: "Test", url: "https://en.wikipedia.org/wiki/Test", snippet: "A page with TestContent." }]);
  });

  it("returns every fallback match regardless of the result limit", async () => {
    for (let n = 1; n <= 12; n += 1) {
      await store.upsertPage({
        url: `https://en.wikipedia.org/wiki/Page_${n}`,
        title: `Page ${n}`,
        content: "TestContent\n",
        language: "en",
      });
    }

    const hits = await runSearch(createContext(new InMemorySearchIndex(undefined, { reachable: false })), "TestContent");

    expect(CONFIG.maxResults).toBe(10);
    expect(hits).toHaveLength(12);
    expect(hits[0].title).toBe("Page 1");
    expect(hits[11].title).toBe("Page 12");
  });

  it("serves searches from the engine when it answers", async () => {
    const index = new InMemorySearchIndex(undefined, { exists: true });
    index.seed([
      {
        title: "Golang",
        url: "https://en.wikipedia.org/wiki/Golang",
        content: "Go is a language.\n",
        language: "en",
        lastUpdated: "2026-10-01T00:00:00.000Z",
      },
    ]);

    const hits = await runSearch(createContext(index), "golang");

    expect(hits).toEqual([{ title: "Golang", url: "https://en.wikipedia.org/wiki/Golang", snippet: "Go is a language." }]);
    expect(index.closed).toBe(true);
  });

  it("reports store statistics", async () => {
    await store.upsertPage({ url: "https://en.wikipedia.org/wiki/A", title: "A", content: "a\n", language: "en" });

    await expect(runStatus(createContext(new InMemorySearchIndex()))).resolves.toEqual({
      pages: 1,
      processedTerms: 0,
      pagesByLanguage: { en: 1 },
    });
  });
});
