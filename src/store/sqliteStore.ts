import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { InvalidPageError } from "../core/errors";
import { PageInput, StoredPage } from "../types";
import { ContentStore, StoreStats } from "./types";

const IN_MEMORY = ":memory:";

type LanguageCountRow = {
  language: string;
  count: number;
};

function missingPageFields(page: PageInput): string[] {
  const missing: string[] = [];
  if (page.url === "") {
    missing.push("url");
  }
  if (page.title === "") {
    missing.push("title");
  }
  if (page.content === "") {
    missing.push("content");
  }
  return missing;
}

export class SqliteStore implements ContentStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async upsertPage(page: PageInput): Promise<void> {
    const missing = missingPageFields(page);
    if (missing.length > 0) {
      throw new InvalidPageError(missing);
    }

    this.db
      .prepare(
        `
        INSERT INTO pages (url, title, content, language, lastUpdated)
        VALUES (@url, @title, @content, @language, @lastUpdated)
        ON CONFLICT(url) DO UPDATE SET
          title = excluded.title,
          content = excluded.content,
          language = excluded.language,
          lastUpdated = excluded.lastUpdated
      `,
      )
      .run({
        url: page.url,
        title: page.title,
        content: page.content,
        language: page.language,
        lastUpdated: new Date().toISOString(),
      });
  }

  async *streamPages(): AsyncIterable<StoredPage> {
    const statement = this.db.prepare<[], StoredPage>(`
      SELECT url, title, content, language, lastUpdated
      FROM pages
      ORDER BY rowid ASC
    `);

    for (const row of statement.iterate()) {
      yield row;
    }
  }

  async findPagesByContent(fragment: string): Promise<StoredPage[]> {
    // instr() is case-sensitive, unlike LIKE.
    return this.db
      .prepare<[string], StoredPage>(
        `
        SELECT url, title, content, language, lastUpdated
        FROM pages
        WHERE instr(content, ?) > 0
        ORDER BY rowid ASC
      `,
      )
      .all(fragment);
  }

  async countPages(): Promise<number> {
    return this.count("pages");
  }

  async hasProcessedTerm(term: string): Promise<boolean> {
    const row = this.db
      .prepare<[string], { found: number }>("SELECT EXISTS (SELECT 1 FROM processed_terms WHERE term = ?) AS found")
      .get(term);
    return row?.found === 1;
  }

  async insertProcessedTerm(term: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO processed_terms (term, processedAt)
        VALUES (@term, @processedAt)
        ON CONFLICT(term) DO NOTHING
      `,
      )
      .run({ term, processedAt: new Date().toISOString() });
  }

  async getStats(): Promise<StoreStats> {
    const rows = this.db
      .prepare<[], LanguageCountRow>(
        `
        SELECT language, COUNT(*) AS count
        FROM pages
        GROUP BY language
        ORDER BY language ASC
      `,
      )
      .all();

    const pagesByLanguage: Record<string, number> = {};
    for (const row of rows) {
      pagesByLanguage[row.language] = row.count;
    }

    return {
      pages: this.count("pages"),
      processedTerms: this.count("processed_terms"),
      pagesByLanguage,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private count(tableName: "pages" | "processed_terms"): number {
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${tableName}`).get();
    return row?.count ?? 0;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pages (
        url TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        language TEXT NOT NULL,
        lastUpdated TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS processed_terms (
        term TEXT PRIMARY KEY,
        processedAt TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_pages_language ON pages(language);
    `);
  }
}
