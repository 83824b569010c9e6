import { describeError, Logger } from "../observability";
import { ProcessedTermStore } from "./types";

export class ProcessedTermLedger {
  private readonly store: ProcessedTermStore;
  private readonly logger: Logger;

  constructor(store: ProcessedTermStore, logger: Logger) {
    this.store = store;
    this.logger = logger;
  }

  /** A failed read counts as "not processed". */
  async isProcessed(term: string): Promise<boolean> {
    try {
      return await this.store.hasProcessedTerm(term);
    } catch (error) {
      this.logger.warn("ledger_read_failed", { term, error: describeError(error) });
      return false;
    }
  }

  async markProcessed(term: string): Promise<void> {
    await this.store.insertProcessedTerm(term);
  }
}
