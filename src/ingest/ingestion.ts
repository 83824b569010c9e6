import { PageResolver } from "../crawl";
import { describeError, Logger, MetricsRegistry } from "../observability";
import { PageStore, ProcessedTermLedger } from "../store";
import { IngestionSummary } from "../types";
import { extractSearchTerms } from "./termExtractor";

export interface IngestionDeps {
  languages: readonly string[];
  resolver: Pick<PageResolver, "resolve">;
  store: Pick<PageStore, "upsertPage">;
  ledger: ProcessedTermLedger;
  logger: Logger;
  metrics: MetricsRegistry;
}

/**
 * One pass over the search log. Terms are handled strictly one after another;
 * a failure on one term is logged and the pass moves on.
 */
export async function runIngestion(deps: IngestionDeps, logPath: string): Promise<IngestionSummary> {
  const { languages, resolver, store, ledger, logger, metrics } = deps;
  const terms = await extractSearchTerms(logPath, logger);
  metrics.incrementCounter("terms_extracted", terms.length);

  const summary: IngestionSummary = { termsFound: terms.length, skipped: 0, saved: 0, failed: 0 };
  if (terms.length === 0) {
    logger.info("ingest_no_terms", { logPath });
    return summary;
  }

  for (const term of terms) {
    if (await ledger.isProcessed(term)) {
      summary.skipped += 1;
      metrics.incrementCounter("terms_skipped");
      logger.info("ingest_term_skipped", { term });
      continue;
    }

    try {
      const { page, language } = await resolver.resolve(term, languages);
      await store.upsertPage(page);
      await ledger.markProcessed(term);
      summary.saved += 1;
      metrics.incrementCounter("pages_saved");
      logger.info("ingest_term_saved", { term, language, url: page.url, title: page.title });
    } catch (error) {
      summary.failed += 1;
      metrics.incrementCounter("terms_failed");
      logger.error("ingest_term_failed", { term, error: describeError(error) });
    }
  }

  logger.info("ingest_finished", { ...summary });
  return summary;
}
