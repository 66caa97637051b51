import { error as errorFn } from "./definers/builders/error";

export { ProtectedCollection } from "./models/ProtectedCollection";
export { UnmodifiableList, type ReadonlyList } from "./models/UnmodifiableList";
export { GuardedIterator } from "./models/GuardedIterator";

export {
  Logger,
  type ILog,
  type ILogInfo,
  type LogLevels,
  type LogListener,
  type LoggerOptions,
  type PrintStrategy,
} from "./models/Logger";
export { LogPrinter, type PrintableLog } from "./models/LogPrinter";
export { safeStringify } from "./models/utils/safeStringify";

export { loadConfig, createLogger, type AppConfig } from "./config";

export { Counter } from "./demo/Counter";
export { Client } from "./demo/Client";
export {
  runAccessModeDemo,
  MAX_COUNTERS,
  type AccessModeDemoOptions,
  type AccessModeOutcome,
  type AccessModeReport,
} from "./demo/accessModes";

export { Planet } from "./planets/Planet";
export {
  planetWeights,
  formatPlanetWeight,
  type PlanetWeight,
} from "./planets/weights";

export * as Errors from "./errors";
export { GuardedError, ErrorHelper, defineError } from "./definers/defineError";
export type {
  DefaultErrorType,
  IErrorDefinition,
  IErrorHelper,
  IGuardedError,
} from "./types/error";
export type { IErrorMeta } from "./types/meta";
export type { IValidationSchema } from "./types/utilities";
export type { ErrorFluentBuilder } from "./definers/builders/error";

// Single namespace for builder entry points
export const r = Object.freeze({
  error: errorFn,
});
