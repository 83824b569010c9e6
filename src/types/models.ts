export interface PageInput {
  url: string;
  title: string;
  content: string;
  language: string;
}

export interface StoredPage extends PageInput {
  lastUpdated: string;
}

export interface PageIndexDocument {
  title: string;
  url: string;
  content: string;
  language: string;
  lastUpdated: string;
}

export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface IngestionSummary {
  termsFound: number;
  skipped: number;
  saved: number;
  failed: number;
}

export type IndexState = "absent" | "present";

export interface SyncSummary {
  indexed: number;
  failed: number;
  finalState: IndexState;
}
