import { getFetchDispatcher, HttpFetch, HttpResponseLike, undiciFetch } from "../core/fetch";
import { describeError, Logger, MetricsRegistry } from "../observability";
import { PageInput } from "../types";
import { languageHost } from "./articleUrl";
import { extractArticle } from "./htmlParser";

export type FetchOutcome =
  | { kind: "found"; page: PageInput }
  | { kind: "not_found"; url: string }
  | { kind: "failed"; url: string; error: string };

export interface PageSource {
  fetch(url: string, language: string): Promise<FetchOutcome>;
}

export interface PageFetcherOptions {
  sourceDomain: string;
  userAgent: string;
  requestTimeoutMs: number;
  maxRedirects: number;
  ignoreHttpsErrors: boolean;
  logger: Logger;
  metrics?: MetricsRegistry;
  fetchFn?: HttpFetch;
}

function isRedirectStatus(status: number): boolean {
  return status === 301 || status === 302 || status === 303 || status === 307 || status === 308;
}

export class PageFetcher implements PageSource {
  private readonly options: PageFetcherOptions;
  private readonly fetchFn: HttpFetch;

  constructor(options: PageFetcherOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? undiciFetch;
  }

  async fetch(url: string, language: string): Promise<FetchOutcome> {
    const allowedHost = languageHost(language, this.options.sourceDomain);
    const stopTimer = this.options.metrics?.startTimer("page_fetch_ms");
    let currentUrl = url;

    try {
      for (let hop = 0; hop <= this.options.maxRedirects; hop += 1) {
        const host = new URL(currentUrl).hostname;
        if (host !== allowedHost) {
          return { kind: "failed", url, error: `domain ${host} is not allowed for language ${language}` };
        }

        const { response, body } = await this.request(currentUrl);
        const location = response.headers.get("location");
        if (isRedirectStatus(response.status) && location) {
          currentUrl = new URL(location, currentUrl).toString();
          this.options.logger.debug("fetch_redirect", { url, language, location: currentUrl });
          continue;
        }

        if (response.status === 404) {
          return { kind: "not_found", url };
        }

        if (response.status < 200 || response.status >= 300) {
          return { kind: "failed", url, error: `HTTP ${response.status} while fetching ${currentUrl}` };
        }

        const article = extractArticle(body);
        return {
          kind: "found",
          page: { url, title: article.title, content: article.content, language },
        };
      }

      return { kind: "failed", url, error: `too many redirects (max ${this.options.maxRedirects})` };
    } catch (error) {
      return { kind: "failed", url, error: describeError(error) };
    } finally {
      stopTimer?.();
    }
  }

  private async request(url: string): Promise<{ response: HttpResponseLike; body: string }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.options.userAgent,
          accept: "text/html,application/xhtml+xml",
        },
        redirect: "manual",
        signal: controller.signal,
        dispatcher: getFetchDispatcher(this.options.ignoreHttpsErrors),
      });
      const body = await response.text();
      return { response, body };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`request timed out after ${this.options.requestTimeoutMs}ms: ${url}`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
