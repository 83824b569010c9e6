import { AppConfig, loadConfig } from "../config";
import { CommandContext, runIngest, runPipeline, runSearch, runStatus, runSync } from "../core/commands";
import { createRunId, describeError, Logger, MetricsRegistry } from "../observability";
import { createSearchIndexClients } from "../search";
import { createStore } from "../store";

export type CommandName = "ingest" | "sync" | "run" | "search" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  query?: string;
  logPath?: string;
  languages?: string[];
  ignoreHttpsErrors: boolean;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  wiki-ingest <command> [options]

Commands:
  ingest           Scrape pages for new terms in the search log
  sync             Rebuild the search index from the page store
  run              ingest, then sync when pages were saved
  search <query>   Answer one query and print the hits as JSON
  status           Show page and processed-term counts

Options:
  --config <path>        Optional path to JSON config file
  --log <path>           Search log to read terms from (ingest, run)
  --languages <a,b>      Language priority order, e.g. da,en
  --ignore-https-errors  Ignore TLS certificate errors when fetching pages
  -h, --help             Show this help

Search engine credentials are sent only when both ES_USERNAME and ES_PASSWORD are set.
`;

const OPTIONS_WITH_VALUE = new Set(["--config", "--log", "--languages"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "ingest" || raw === "sync" || raw === "run" || raw === "search" || raw === "status") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

function positionalArgs(argv: string[]): string[] {
  const values: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (OPTIONS_WITH_VALUE.has(arg)) {
      i += 1;
      continue;
    }
    if (arg.startsWith("--")) {
      continue;
    }
    values.push(arg);
  }
  return values;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const rest = argv.slice(1);
  const languagesRaw = optionValue(rest, "--languages");
  const languages = languagesRaw
    ?.split(",")
    .map((language) => language.trim().toLowerCase())
    .filter((language) => language.length > 0);

  let query: string | undefined;
  if (command === "search") {
    query = positionalArgs(rest).join(" ");
    if (query === "") {
      return "help";
    }
  }

  return {
    command,
    query,
    logPath: optionValue(rest, "--log"),
    languages: languages && languages.length > 0 ? languages : undefined,
    ignoreHttpsErrors: rest.includes("--ignore-https-errors"),
    configPath: optionValue(rest, "--config"),
  };
}

function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    languages: parsed.languages ?? config.languages,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId(parsed.command);
  const store = createStore(config);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const context: Omit<CommandContext, "logger"> = {
    runId,
    config,
    store,
    metrics,
    createIndexClients: () => createSearchIndexClients(config.elastic, logger.child("elastic")),
  };

  logger.info("command_start", {
    command: parsed.command,
    languages: config.languages,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    switch (parsed.command) {
      case "ingest":
        await runIngest({ ...context, logger: logger.child("ingest") }, parsed.logPath);
        break;
      case "sync":
        await runSync({ ...context, logger: logger.child("sync") });
        break;
      case "run":
        await runPipeline({ ...context, logger: logger.child("pipeline") }, parsed.logPath);
        break;
      case "search": {
        const hits = await runSearch({ ...context, logger: logger.child("search") }, parsed.query ?? "");
        console.log(JSON.stringify(hits, null, 2));
        break;
      }
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error("command_failed", { command: parsed.command, error: describeError(error) });
    return 1;
  } finally {
    await store.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
