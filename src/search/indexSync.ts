import { IndexSyncError, SyncStep } from "../core/errors";
import { describeError, Logger, MetricsRegistry } from "../observability";
import { PageStore } from "../store";
import { IndexState, SyncSummary } from "../types";
import { toIndexDocument } from "./elasticIndex";
import { SearchIndexClient } from "./types";

export type PageSnapshotSource = Pick<PageStore, "streamPages">;

export interface IndexSyncStrategy {
  sync(source: PageSnapshotSource): Promise<SyncSummary>;
}

interface FullRebuildDeps {
  index: SearchIndexClient;
  logger: Logger;
  metrics: MetricsRegistry;
}

/**
 * Drops the index, recreates it with the page mapping and loads every stored
 * page into it. Readers may see a missing or partial index while this runs.
 *
 * exists/delete/create failures abort with an IndexSyncError; a document that
 * fails to index is logged and counted, and the load carries on.
 */
export class FullRebuildSync implements IndexSyncStrategy {
  private readonly deps: FullRebuildDeps;

  constructor(deps: FullRebuildDeps) {
    this.deps = deps;
  }

  async sync(source: PageSnapshotSource): Promise<SyncSummary> {
    const { index, logger, metrics } = this.deps;
    const stopTimer = metrics.startTimer("sync_ms");

    let state: IndexState = (await this.step("exists", () => index.indexExists())) ? "present" : "absent";
    logger.info("sync_start", { index: index.indexName, state });

    if (state === "present") {
      await this.step("delete", () => index.deleteIndex());
      state = "absent";
      logger.info("sync_index_deleted", { index: index.indexName });
    }

    await this.step("create", () => index.createIndex());
    state = "present";
    logger.info("sync_index_created", { index: index.indexName });

    let indexed = 0;
    let failed = 0;
    try {
      for await (const page of source.streamPages()) {
        try {
          await index.indexDocument(toIndexDocument(page));
          indexed += 1;
          metrics.incrementCounter("docs_indexed");
          logger.debug("sync_document_indexed", { url: page.url });
        } catch (error) {
          failed += 1;
          metrics.incrementCounter("docs_failed");
          logger.error("sync_document_failed", { url: page.url, error: describeError(error) });
        }
      }
    } catch (error) {
      throw new IndexSyncError("read", `reading pages for index '${index.indexName}' failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    const durationMs = stopTimer();
    logger.info("sync_complete", { index: index.indexName, indexed, failed, durationMs });
    return { indexed, failed, finalState: state };
  }

  private async step<T>(step: SyncStep, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw new IndexSyncError(step, `index ${step} failed for '${this.deps.index.indexName}': ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
