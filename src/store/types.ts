import { PageInput, StoredPage } from "../types";

export interface StoreStats {
  pages: number;
  processedTerms: number;
  pagesByLanguage: Record<string, number>;
}

export interface PageStore {
  /** @throws InvalidPageError when url, title or content is empty */
  upsertPage(page: PageInput): Promise<void>;
  /** Every stored page, in storage order. */
  streamPages(): AsyncIterable<StoredPage>;
  /** Case-sensitive substring match on content, in storage order. */
  findPagesByContent(fragment: string): Promise<StoredPage[]>;
  countPages(): Promise<number>;
}

export interface ProcessedTermStore {
  hasProcessedTerm(term: string): Promise<boolean>;
  /** Inserting a term that is already present is a no-op. */
  insertProcessedTerm(term: string): Promise<void>;
}

export interface ContentStore extends PageStore, ProcessedTermStore {
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
