import { selectFailover } from "../sdk/aggregator.js";
import { ProbeConfigError } from "../sdk/errors.js";
import { runBatch } from "../sdk/scheduler.js";
import type { EndpointDescriptor, Logger, Prober } from "../sdk/types.js";
import {
  parseInteger,
  resolveConfigPath,
  resolveRunOptions,
} from "./config.js";
import type { RunOptionInput } from "./config.js";
import {
  ProfileConfigError,
  findActiveProfile,
  loadProfiles,
} from "./profiles.js";
import { ConsoleResultSink } from "./reporter.js";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliArgs {
  command?: string;
  names: string[];
  configPath?: string;
  current?: string;
  overrides: RunOptionInput;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Replaces the HTTP prober, e.g. in tests */
  prober?: Prober;
}

const LIST_COMMANDS = new Set(["list", "ls", "--list", "-l"]);

const USAGE = "Usage: endpoint-switch <list|test|auto> [names...] [options]";

const OPTIONS_HELP = [
  "Options:",
  "  --config <path>        Profiles file (default: model_config.json)",
  "  --concurrency <n>      Probes in flight, 1-10 (default: 5)",
  "  --timeout <ms>         Timeout per request (default: 8000)",
  "  --batch-timeout <ms>   Cap on the whole run",
  "  --warmup               Send a priming request before measuring",
  "  --tls <mode>           fallback | relaxed | strict (default: fallback)",
  "  --current <name>       Profile treated as active by auto",
];

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { names: [], overrides: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const takeValue = (): string => {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new UsageError(`Missing value for ${arg}`);
      }
      i += 1;
      return value;
    };

    switch (arg) {
      case "--config":
        result.configPath = takeValue();
        break;
      case "--current":
        result.current = takeValue();
        break;
      case "--concurrency":
        result.overrides.concurrencyLimit = parseInteger(takeValue());
        break;
      case "--timeout":
        result.overrides.perEndpointTimeoutMs = parseInteger(takeValue());
        break;
      case "--batch-timeout":
        result.overrides.batchTimeoutMs = parseInteger(takeValue());
        break;
      case "--tls":
        result.overrides.tls = takeValue();
        break;
      case "--warmup":
        result.overrides.warmupEnabled = true;
        break;
      default:
        if (result.command === undefined) {
          result.command = arg;
        } else {
          result.names.push(arg);
        }
    }
  }

  return result;
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const logger = deps.logger ?? console;

  try {
    const args = parseArgs(argv);
    const configPath = resolveConfigPath(args.configPath, env);

    if (args.command === undefined) {
      logger.log(USAGE);
      logger.log("");
      listProfiles(await loadProfiles(configPath), logger);
      return 0;
    }

    if (LIST_COMMANDS.has(args.command)) {
      listProfiles(await loadProfiles(configPath), logger);
      return 0;
    }

    if (args.command !== "test" && args.command !== "auto") {
      logger.error(`❌ Unknown command: ${args.command}`);
      logger.error(USAGE);
      for (const line of OPTIONS_HELP) {
        logger.error(line);
      }
      return 1;
    }

    const options = resolveRunOptions(args.overrides, env);
    const profiles = await loadProfiles(configPath);
    const selected = selectProfiles(profiles, args.names);

    const sink = new ConsoleResultSink(logger);
    logger.log(`Probing ${selected.length} profile(s)...`);
    const report = await runBatch(
      selected,
      { ...options, prober: deps.prober, logger },
      (completed, total) => sink.onProgress(completed, total),
    );

    if (args.command === "test") {
      sink.onReport(report);
      return 0;
    }

    const current = args.current ?? findActiveProfile(selected, env.ANTHROPIC_BASE_URL);
    const decision = selectFailover(report, current);
    sink.onReport(report, decision);
    return decision.chosen === null ? 1 : 0;
  } catch (error) {
    if (
      error instanceof UsageError ||
      error instanceof ProbeConfigError ||
      error instanceof ProfileConfigError
    ) {
      logger.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }
}

function listProfiles(profiles: EndpointDescriptor[], logger: Logger): void {
  logger.log("Available profiles:");
  profiles.forEach((profile, index) => {
    logger.log(`  ${index + 1}. ${profile.name}`);
  });
}

function selectProfiles(
  profiles: EndpointDescriptor[],
  names: string[],
): EndpointDescriptor[] {
  if (!names.length) {
    return profiles;
  }

  const unknown = names.filter((name) => !profiles.some((p) => p.name === name));
  if (unknown.length) {
    throw new UsageError(
      `Profile '${unknown[0]}' is not configured. Available: ${profiles
        .map((p) => p.name)
        .join(", ")}`,
    );
  }
  return profiles.filter((p) => names.includes(p.name));
}
