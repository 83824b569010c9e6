import fs from "node:fs";
import { describeError, Logger } from "../observability";

const QUERY_MARKER = /query="([^"]+)"/;

export function normalizeTerm(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * Collects the unique terms from `query="..."` markers in a search log, in
 * first-seen order. A missing or unreadable log yields no terms.
 */
export async function extractSearchTerms(logPath: string, logger: Logger): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(logPath, "utf-8");
  } catch (error) {
    logger.warn("search_log_unreadable", { logPath, error: describeError(error) });
    return [];
  }

  const terms = new Set<string>();
  for (const line of raw.split(/\r?\n/)) {
    const match = QUERY_MARKER.exec(line);
    if (!match) {
      continue;
    }

    const term = normalizeTerm(match[1]);
    if (term === "" || terms.has(term)) {
      continue;
    }
    terms.add(term);
    logger.debug("search_term_extracted", { term });
  }

  return [...terms];
}
