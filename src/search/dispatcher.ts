import { InvalidQueryError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { SearchHit } from "../types";
import { SearchBackend } from "./backend";

export interface DispatcherOptions {
  maxResults: number;
  snippetLength: number;
  logger: Logger;
  metrics?: MetricsRegistry;
}

interface HitSource {
  title: string;
  url: string;
  content: string;
}

export function buildSnippet(content: string, maxLength: number): string {
  const normalized = content.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxLength) {
    return normalized;
  }

  let cut = normalized.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(" ");
  if (lastSpace > maxLength / 2) {
    cut = cut.slice(0, lastSpace);
  }
  return `${cut}…`;
}

export class QueryDispatcher {
  private readonly backend: SearchBackend;
  private readonly options: DispatcherOptions;

  constructor(backend: SearchBackend, options: DispatcherOptions) {
    this.backend = backend;
    this.options = options;
  }

  get backendKind(): SearchBackend["kind"] {
    return this.backend.kind;
  }

  async search(query: string): Promise<SearchHit[]> {
    if (query.trim() === "") {
      throw new InvalidQueryError("search query must not be empty");
    }

    const stopTimer = this.options.metrics?.startTimer("search_ms");
    const sources = await this.fetchSources(query);
    const durationMs = stopTimer?.();
    this.options.metrics?.incrementCounter("searches_served");
    this.options.logger.info("search_served", {
      query,
      backend: this.backend.kind,
      hits: sources.length,
      durationMs,
    });

    return sources.map((source) => ({
      title: source.title,
      url: source.url,
      snippet: buildSnippet(source.content, this.options.snippetLength),
    }));
  }

  private async fetchSources(query: string): Promise<HitSource[]> {
    if (this.backend.kind === "engine") {
      return this.backend.index.search(query, this.options.maxResults);
    }
    return this.backend.store.findPagesByContent(query);
  }
}
