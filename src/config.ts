import { z } from "zod";
import { invalidConfigError } from "./errors";
import { Logger, type LogLevels, type PrintStrategy } from "./models/Logger";

export interface AppConfig {
  logLevel: LogLevels | null;
  logFormat: PrintStrategy;
  useColors: boolean;
}

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "critical", "none"])
    .default("info"),
  LOG_FORMAT: z.enum(["pretty", "plain", "json", "json_pretty"]).default("pretty"),
  NO_COLOR: z.string().optional(),
});

/**
 * Resolve application settings from environment variables.
 * Empty strings count as unset. Colors are on only when `NO_COLOR` is unset
 * and `stream` is a TTY.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  stream: { isTTY?: boolean } = process.stdout,
): AppConfig {
  const raw = {
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    LOG_FORMAT: env.LOG_FORMAT || undefined,
    NO_COLOR: env.NO_COLOR || undefined,
  };
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    return invalidConfigError.throw({
      issues: result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    });
  }

  const { LOG_LEVEL, LOG_FORMAT, NO_COLOR } = result.data;
  return {
    logLevel: LOG_LEVEL === "none" ? null : LOG_LEVEL,
    logFormat: LOG_FORMAT,
    useColors: NO_COLOR ? false : Boolean(stream.isTTY),
  };
}

export function createLogger(config: AppConfig = loadConfig()): Logger {
  return new Logger({
    printThreshold: config.logLevel,
    printStrategy: config.logFormat,
    useColors: config.useColors,
  });
}
