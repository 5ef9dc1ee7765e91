import { AppConfig, DEFAULT_CONFIG_PATH, DEFAULT_ENV_PATH, loadConfig, loadEnvFile } from "../config";
import { runPrune, runScout, runStatus } from "../core/commands";
import { ScoutError, errorMessage } from "../core/errors";
import { LlmProvider, createLlmProvider } from "../llm";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createLedger, Ledger } from "../store";

export type CommandName = "run" | "status" | "prune";

export interface ParsedCliArgs {
  command: CommandName;
  dryRun: boolean;
  ignoreHttpsErrors: boolean;
  olderThanDays?: number;
  configPath: string;
  envPath: string;
}

const HELP_TEXT = `
Usage:
  scout <command> [options]

Commands:
  run                      Fetch feeds, extract and score candidates, write the ranked output
  status                   Show ledger counts and recent runs
  prune --older-than-days <n>
                           Delete ledger entries first seen more than n days ago

Options:
  --config <path>          Path to the YAML config file (default: ${DEFAULT_CONFIG_PATH})
  --env-file <path>        Variables to load when not already set (default: ${DEFAULT_ENV_PATH})
  --dry-run                Use an in-memory ledger; nothing is remembered after the run
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  --older-than-days <n>    Age cutoff for prune
  -h, --help               Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "run" || raw === "status" || raw === "prune") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const olderThanRaw = optionValue(argv, "--older-than-days");
  const olderThanParsed = olderThanRaw ? Number.parseInt(olderThanRaw, 10) : undefined;
  const olderThanDays = olderThanParsed !== undefined && Number.isFinite(olderThanParsed) && olderThanParsed >= 0
    ? olderThanParsed
    : undefined;

  if (command === "prune" && olderThanDays === undefined) {
    return "help";
  }

  return {
    command,
    dryRun: argv.includes("--dry-run"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    olderThanDays,
    configPath: optionValue(argv, "--config") ?? DEFAULT_CONFIG_PATH,
    envPath: optionValue(argv, "--env-file") ?? DEFAULT_ENV_PATH,
  };
}

export async function runCli(argv: string[], env: Record<string, string | undefined> = process.env): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const runId = createRunId();
  const metrics = new MetricsRegistry();

  // Before the logger, so LOG_LEVEL may come from the file.
  let envFileError: unknown;
  let envFileVariables: string[] = [];
  try {
    envFileVariables = loadEnvFile(env, parsed.envPath);
  } catch (error) {
    envFileError = error;
  }
  const logger = new Logger({ component: "cli", runId });

  let config: AppConfig;
  let provider: LlmProvider | undefined;
  try {
    if (envFileError !== undefined) {
      throw envFileError;
    }
    if (envFileVariables.length > 0) {
      logger.debug("env_file_loaded", { envPath: parsed.envPath, variables: envFileVariables });
    }
    config = loadConfig(parsed.configPath, env);
    if (parsed.ignoreHttpsErrors) {
      config = { ...config, ignoreHttpsErrors: true };
    }
    // Provider keys are checked before the ledger is opened.
    if (parsed.command === "run") {
      provider = createLlmProvider(config.llm, env);
    }
  } catch (error) {
    logger.error("config_invalid", {
      kind: error instanceof ScoutError ? error.code : "UNEXPECTED_ERROR",
      error: errorMessage(error),
    });
    return 1;
  }

  logger.info("command_start", {
    command: parsed.command,
    dryRun: parsed.dryRun,
    configPath: parsed.configPath,
    storePath: parsed.dryRun ? "(memory)" : config.storePath,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  let ledger: Ledger | undefined;
  try {
    ledger = createLedger(config, { dryRun: parsed.dryRun });
    const context = { runId, config, ledger, logger, metrics };

    switch (parsed.command) {
      case "run": {
        if (!provider) {
          return 1;
        }
        const report = await runScout({ ...context, logger: logger.child("scout") }, provider);
        const failed = report.state === "ABORTED" || report.outputError !== undefined;
        logger.info("command_complete", { command: parsed.command, state: report.state });
        return failed ? 1 : 0;
      }
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
      case "prune":
        await runPrune({ ...context, logger: logger.child("prune") }, parsed.olderThanDays ?? 0);
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    if (!(error instanceof ScoutError)) {
      throw error;
    }
    logger.error("command_failed", { command: parsed.command, kind: error.code, error: error.message });
    return 1;
  } finally {
    await ledger?.close();
    metrics.printSummary();
  }
}
