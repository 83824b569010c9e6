import { load } from "cheerio";

export interface ParsedArticle {
  title: string;
  content: string;
}

function sanitizeTitle(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Pulls the primary heading and the paragraph text of the main content region
 * out of an article page. Each paragraph is terminated by a newline.
 */
export function extractArticle(html: string): ParsedArticle {
  const $ = load(html);
  const title = sanitizeTitle($("#firstHeading").first().text());

  let content = "";
  $("div.mw-parser-output")
    .first()
    .find("p")
    .each((_, element) => {
      content += `${$(element).text()}\n`;
    });

  return { title, content };
}
