import { describeError, Logger } from "../observability";
import { PageStore } from "../store";
import { SearchIndexClient } from "./types";

export type SearchBackend =
  | { kind: "engine"; index: SearchIndexClient }
  | { kind: "fallback"; store: Pick<PageStore, "findPagesByContent"> };

export interface BackendSelectionOptions {
  candidates: SearchIndexClient[];
  store: Pick<PageStore, "findPagesByContent">;
  attempts: number;
  delayMs: number;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function ensureIndex(index: SearchIndexClient, logger: Logger): Promise<void> {
  try {
    if (await index.indexExists()) {
      logger.info("search_index_present", { index: index.indexName });
      return;
    }
    await index.createIndex();
    logger.info("search_index_created", { index: index.indexName });
  } catch (error) {
    logger.error("search_index_ensure_failed", { index: index.indexName, error: describeError(error) });
  }
}

async function closeAll(clients: SearchIndexClient[], logger: Logger): Promise<void> {
  for (const client of clients) {
    try {
      await client.close();
    } catch (error) {
      logger.warn("search_engine_close_failed", { endpoint: client.endpoint, error: describeError(error) });
    }
  }
}

/**
 * Picks the query backend once: the first candidate engine endpoint that
 * answers a ping within the allowed rounds, otherwise the page store.
 */
export async function selectSearchBackend(options: BackendSelectionOptions): Promise<SearchBackend> {
  const { candidates, store, logger } = options;
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    for (const candidate of candidates) {
      if (await candidate.ping()) {
        logger.info("search_engine_connected", { endpoint: candidate.endpoint, attempt });
        await ensureIndex(candidate, logger);
        await closeAll(
          candidates.filter((other) => other !== candidate),
          logger,
        );
        return { kind: "engine", index: candidate };
      }
    }

    if (attempt < attempts) {
      logger.warn("search_engine_unreachable", { attempt, attempts, retryInMs: options.delayMs });
      await wait(options.delayMs);
    }
  }

  logger.warn("search_engine_fallback", { attempts, endpoints: candidates.map((candidate) => candidate.endpoint) });
  await closeAll(candidates, logger);
  return { kind: "fallback", store };
}
