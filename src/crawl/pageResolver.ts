import { LanguageAttempt, PageNotFoundError } from "../core/errors";
import { Logger } from "../observability";
import { PageInput } from "../types";
import { buildArticleUrl } from "./articleUrl";
import { PageSource } from "./pageFetcher";

export interface ResolvedPage {
  page: PageInput;
  language: string;
}

interface PageResolverDeps {
  fetcher: PageSource;
  sourceDomain: string;
  logger: Logger;
}

export class PageResolver {
  private readonly deps: PageResolverDeps;

  constructor(deps: PageResolverDeps) {
    this.deps = deps;
  }

  /**
   * Tries each language in priority order, one request at a time, and stops at
   * the first fetch that yields a page with a title.
   *
   * @throws PageNotFoundError when no language yields a valid page
   */
  async resolve(term: string, languages: readonly string[]): Promise<ResolvedPage> {
    const { fetcher, sourceDomain, logger } = this.deps;
    const attempts: LanguageAttempt[] = [];

    for (const language of languages) {
      const url = buildArticleUrl(term, language, sourceDomain);
      logger.info("resolve_attempt", { term, language, url });
      const outcome = await fetcher.fetch(url, language);

      if (outcome.kind === "found") {
        if (outcome.page.title !== "") {
          return { page: outcome.page, language };
        }
        attempts.push({ language, url, outcome: "empty_title" });
        logger.warn("resolve_empty_title", { term, language, url });
        continue;
      }

      if (outcome.kind === "not_found") {
        attempts.push({ language, url, outcome: "not_found" });
        logger.info("resolve_not_found", { term, language, url });
        continue;
      }

      attempts.push({ language, url, outcome: "failed", error: outcome.error });
      logger.warn("resolve_fetch_failed", { term, language, url, error: outcome.error });
    }

    throw new PageNotFoundError(term, attempts);
  }
}
