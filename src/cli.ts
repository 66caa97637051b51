import { z } from "zod";
import { createLogger, loadConfig } from "./config";
import { runAccessModeDemo } from "./demo/accessModes";
import { invalidArgumentError } from "./errors";
import type { Logger } from "./models/Logger";
import { formatPlanetWeight, planetWeights } from "./planets/weights";

export interface CLIOptions {
  command?: string;
  positionals: string[];
  data?: string;
  count?: string;
  /** Flag given as the last argument, without its value */
  missingValue?: string;
  help?: boolean;
}

const USAGE = {
  demo: "Usage: guarded-collections demo [--data <n>] [--count <n>]",
  planets: "Usage: guarded-collections planets <earth_weight>",
} as const;

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = { positionals: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--data":
      case "--count":
        if (i + 1 >= args.length) {
          options.missingValue = arg;
          break;
        }
        options[arg === "--data" ? "data" : "count"] = args[++i];
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      default:
        if (options.command === undefined) {
          options.command = arg;
        } else {
          options.positionals.push(arg);
        }
    }
  }

  return options;
}

function showHelp() {
  console.log(`
Guarded Collections

Usage:
  guarded-collections <command> [options]

Commands:
  demo                     Run every collection access mode against counters
  planets <earth_weight>   Print your weight on every planet

Options:
  --data <n>               Amount the demo client adds to each counter (default 13)
  --count <n>              Number of counters in the demo (default 9)
  -h, --help               Show this help message

Environment:
  LOG_LEVEL                trace | debug | info | warn | error | critical | none
  LOG_FORMAT               pretty | plain | json | json_pretty
  NO_COLOR                 Disable ANSI colors
`);
}

function toNumber(argument: string, raw: string): number {
  const parsed = z.coerce.number().finite().safeParse(raw);
  if (!parsed.success || raw.trim() === "") {
    return invalidArgumentError.throw({
      argument,
      value: raw,
      reason: "expected a number",
    });
  }
  return parsed.data;
}

async function runDemo(options: CLIOptions, logger: Logger): Promise<number> {
  const report = await runAccessModeDemo({
    logger,
    data:
      options.data === undefined ? undefined : toNumber("--data", options.data),
    count:
      options.count === undefined
        ? undefined
        : toNumber("--count", options.count),
  });
  const failed = report.results.filter((r) => r.outcome === "error").length;
  await logger.debug("Demo finished", {
    data: { modes: report.results.length, failed },
  });
  return 0;
}

function runPlanets(options: CLIOptions): number {
  if (options.positionals.length !== 1) {
    console.error(USAGE.planets);
    return 1;
  }
  const earthWeight = toNumber("earth weight", options.positionals[0]);
  for (const entry of planetWeights(earthWeight)) {
    console.log(formatPlanetWeight(entry));
  }
  return 0;
}

/**
 * Entry point shared by the binary and the tests. Resolves to the exit code.
 */
export async function main(
  argv: string[],
  logger: Logger = createLogger(loadConfig()),
): Promise<number> {
  const options = parseArgs(argv);

  if (options.help) {
    showHelp();
    return 0;
  }

  try {
    switch (options.command) {
      case "demo":
        if (
          options.positionals.length > 0 ||
          options.missingValue !== undefined
        ) {
          console.error(USAGE.demo);
          return 1;
        }
        return await runDemo(options, logger);
      case "planets":
        return runPlanets(options);
      case undefined:
        showHelp();
        return 1;
      default:
        console.error(`Unknown command: ${options.command}`);
        showHelp();
        return 1;
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    await logger.error(message, { source: "cli", error });
    return 1;
  }
}

/**
 * Used by bin/guarded-collections.js.
 */
export function runCli(argv: string[] = process.argv.slice(2)): Promise<void> {
  return main(argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
