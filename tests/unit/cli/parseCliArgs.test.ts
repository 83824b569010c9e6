import { describe, expect, it } from "vitest";
import { parseCliArgs } from "../../../src/cli";

describe("parseCliArgs", () => {
  it("shows help for unknown commands and -h", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["crawl"])).toBe("help");
    expect(parseCliArgs(["ingest", "--help"])).toBe("help");
  });

  it("parses ingest options", () => {
    expect(parseCliArgs(["ingest", "--log", "logs/today.log", "--languages", "DA, en", "--ignore-https-errors"])).toEqual({
      command: "ingest",
      query: undefined,
      logPath: "logs/today.log",
      languages: ["da", "en"],
      ignoreHttpsErrors: true,
      configPath: undefined,
    });
  });

  it("joins the positional words of a search into one query", () => {
    const parsed = parseCliArgs(["search", "--config", "conf.json", "go", "programming"]);

    expect(parsed).toMatchObject({ command: "search", query: "go programming", configPath: "conf.json" });
  });

  it("needs a query for search", () => {
    expect(parseCliArgs(["search", "--config", "conf.json"])).toBe("help");
  });
});
