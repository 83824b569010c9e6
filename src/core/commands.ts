import { AppConfig } from "../config";
import { PageFetcher, PageResolver } from "../crawl";
import { runIngestion } from "../ingest";
import { Logger, MetricsRegistry } from "../observability";
import { FullRebuildSync, QueryDispatcher, SearchBackend, SearchIndexClient, selectSearchBackend } from "../search";
import { ContentStore, ProcessedTermLedger, StoreStats } from "../store";
import { IngestionSummary, SearchHit, SyncSummary } from "../types";
import { IndexSyncError } from "./errors";
import { HttpFetch } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: ContentStore;
  logger: Logger;
  metrics: MetricsRegistry;
  createIndexClients: () => SearchIndexClient[];
  fetchFn?: HttpFetch;
}

async function connectSearchBackend(ctx: CommandContext): Promise<SearchBackend> {
  return selectSearchBackend({
    candidates: ctx.createIndexClients(),
    store: ctx.store,
    attempts: ctx.config.elastic.probeAttempts,
    delayMs: ctx.config.elastic.probeDelayMs,
    logger: ctx.logger,
  });
}

async function releaseBackend(backend: SearchBackend): Promise<void> {
  if (backend.kind === "engine") {
    await backend.index.close();
  }
}

export async function runIngest(ctx: CommandContext, logPath?: string): Promise<IngestionSummary> {
  const { config, store, logger, metrics } = ctx;
  const resolvedLogPath = logPath ?? config.searchLogPath;
  logger.info("ingest_start", { logPath: resolvedLogPath, languages: config.languages });

  const fetcher = new PageFetcher({
    sourceDomain: config.sourceDomain,
    userAgent: config.userAgent,
    requestTimeoutMs: config.requestTimeoutMs,
    maxRedirects: config.maxRedirects,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    logger,
    metrics,
    fetchFn: ctx.fetchFn,
  });
  const resolver = new PageResolver({ fetcher, sourceDomain: config.sourceDomain, logger });
  const ledger = new ProcessedTermLedger(store, logger);

  return runIngestion({ languages: config.languages, resolver, store, ledger, logger, metrics }, resolvedLogPath);
}

async function syncWithBackend(ctx: CommandContext, backend: SearchBackend): Promise<SyncSummary> {
  if (backend.kind !== "engine") {
    throw new IndexSyncError("connect", "search engine is unreachable; index sync aborted");
  }
  const strategy = new FullRebuildSync({ index: backend.index, logger: ctx.logger, metrics: ctx.metrics });
  return strategy.sync(ctx.store);
}

export async function runSync(ctx: CommandContext): Promise<SyncSummary> {
  const backend = await connectSearchBackend(ctx);
  try {
    return await syncWithBackend(ctx, backend);
  } finally {
    await releaseBackend(backend);
  }
}

/** Ingests, then rebuilds the index when the pass saved pages and the engine is reachable. */
export async function runPipeline(
  ctx: CommandContext,
  logPath?: string,
): Promise<{ ingestion: IngestionSummary; sync?: SyncSummary }> {
  const ingestion = await runIngest(ctx, logPath);

  if (ingestion.saved === 0) {
    ctx.logger.info("pipeline_sync_skipped", { reason: "no_pages_saved" });
    return { ingestion };
  }

  const backend = await connectSearchBackend(ctx);
  try {
    if (backend.kind === "fallback") {
      ctx.logger.warn("pipeline_sync_skipped", { reason: "search_engine_unreachable", saved: ingestion.saved });
      return { ingestion };
    }
    ctx.logger.info("pipeline_sync_start", { saved: ingestion.saved });
    const sync = await syncWithBackend(ctx, backend);
    return { ingestion, sync };
  } finally {
    await releaseBackend(backend);
  }
}

export async function runSearch(ctx: CommandContext, query: string): Promise<SearchHit[]> {
  const backend = await connectSearchBackend(ctx);
  try {
    const dispatcher = new QueryDispatcher(backend, {
      maxResults: ctx.config.maxResults,
      snippetLength: ctx.config.snippetLength,
      logger: ctx.logger,
      metrics: ctx.metrics,
    });
    return await dispatcher.search(query);
  } finally {
    await releaseBackend(backend);
  }
}

export async function runStatus(ctx: CommandContext): Promise<StoreStats> {
  ctx.logger.info("status_start");
  const stats = await ctx.store.getStats();
  ctx.logger.info("status_complete", { stats });
  return stats;
}
