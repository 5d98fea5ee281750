import { AppConfig, loadConfig } from "../config";
import { CommandContext, runCrawl, runStatus, runVerifyMappings } from "../core/commands";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createMappingStore, ProgressStore } from "../store";

export type CommandName = "crawl" | "test" | "verify-mappings" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  apply: boolean;
  ignoreHttpsErrors: boolean;
  strictTitle: boolean;
  retryUnresolved: boolean;
  regions?: string[];
  year?: number;
  workers?: number;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  fiscal-crawler <command> [options]

Commands:
  crawl             Crawl every region in the region list (resumes from progress)
  test              Crawl a few regions without touching progress
  verify-mappings   Re-check stored site roots and suggest replacements
  status            Print statistics from the last summary or progress file

Options:
  --config <path>        Optional path to JSON config file
  --regions <a,b,...>    Comma-separated region names instead of the region list
  --year <yyyy>          Target year of the final accounts
  --workers <n>          Number of concurrent region workers
  --strict-title         Require the finance keyword in a finance portal's <title>
  --retry-unresolved     Retry regions recorded as having no website
  --apply                Write verify-mappings suggestions to the mapping store
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "crawl" || raw === "test" || raw === "verify-mappings" || raw === "status") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

function optionInt(argv: string[], flag: string): number | undefined {
  const raw = optionValue(argv, flag);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const regionsRaw = optionValue(argv, "--regions");
  const regions = regionsRaw
    ?.split(/[,，]/)
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  return {
    command,
    apply: argv.includes("--apply"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    strictTitle: argv.includes("--strict-title"),
    retryUnresolved: argv.includes("--retry-unresolved"),
    regions: regions && regions.length > 0 ? regions : undefined,
    year: optionInt(argv, "--year"),
    workers: optionInt(argv, "--workers"),
    configPath: optionValue(argv, "--config"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    requireFinanceTitle: parsed.strictTitle || config.requireFinanceTitle,
    retryUnresolved: parsed.retryUnresolved || config.retryUnresolved,
    targetYear: parsed.year ?? config.targetYear,
    workers: parsed.workers ?? config.workers,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const store = createMappingStore(config, logger.child("mapping_store"));
  const progress = new ProgressStore(config.outputDirs.data, logger.child("progress_store"));
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    if (!controller.signal.aborted) {
      logger.warn("interrupt_received", { signal });
      controller.abort();
    }
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const context: CommandContext = {
    runId,
    config,
    store,
    progress,
    sink,
    logger,
    metrics,
    signal: controller.signal,
  };

  logger.info("command_start", {
    command: parsed.command,
    targetYear: config.targetYear,
    regions: parsed.regions,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    mappingStore: config.mappingStore.driver,
  });

  try {
    switch (parsed.command) {
      case "crawl":
        await runCrawl({ ...context, logger: logger.child("crawl") }, "full", parsed.regions);
        break;
      case "test":
        await runCrawl({ ...context, logger: logger.child("test") }, "quick", parsed.regions);
        break;
      case "verify-mappings":
        await runVerifyMappings({ ...context, logger: logger.child("verify_mappings") }, parsed.apply, parsed.regions);
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command, interrupted: controller.signal.aborted });
    return controller.signal.aborted ? 130 : 0;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await store.close();
    metrics.printSummary(runId);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
