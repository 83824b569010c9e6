// Underscores and apostrophes stay inside a word; anything else non-alphanumeric separates words.
const WORD_PATTERN = /[\p{L}\p{N}_'’]+/gu;

function titleCaseWord(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function toArticleSlug(term: string): string {
  return term.replaceAll(" ", "_").replace(WORD_PATTERN, titleCaseWord);
}

export function languageHost(language: string, sourceDomain: string): string {
  return `${language}.${sourceDomain}`;
}

export function buildArticleUrl(term: string, language: string, sourceDomain: string): string {
  return `https://${languageHost(language, sourceDomain)}/wiki/${toArticleSlug(term)}`;
}
