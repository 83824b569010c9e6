export interface LanguageAttempt {
  language: string;
  url: string;
  outcome: "not_found" | "failed" | "empty_title";
  error?: string;
}

export class PageNotFoundError extends Error {
  readonly term: string;
  readonly attempts: LanguageAttempt[];

  constructor(term: string, attempts: LanguageAttempt[]) {
    super(`no page found for term '${term}'`);
    this.name = "PageNotFoundError";
    this.term = term;
    this.attempts = attempts;
  }
}

export class InvalidPageError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`invalid page data: empty ${missing.join(", ")}`);
    this.name = "InvalidPageError";
    this.missing = missing;
  }
}

export type SyncStep = "connect" | "exists" | "delete" | "create" | "read";

export class IndexSyncError extends Error {
  readonly step: SyncStep;

  constructor(step: SyncStep, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IndexSyncError";
    this.step = step;
  }
}

export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}
