import { PageIndexDocument } from "../types";

/** The operations the synchronizer and the dispatcher need from a search engine. */
export interface SearchIndexClient {
  readonly endpoint: string;
  readonly indexName: string;
  ping(): Promise<boolean>;
  indexExists(): Promise<boolean>;
  deleteIndex(): Promise<void>;
  createIndex(): Promise<void>;
  /** Indexes one document and makes it searchable before resolving. */
  indexDocument(document: PageIndexDocument): Promise<void>;
  search(query: string, size: number): Promise<PageIndexDocument[]>;
  close(): Promise<void>;
}
