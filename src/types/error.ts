import { symbolError } from "./symbols";
import type { IValidationSchema } from "./utilities";
import type { IErrorMeta } from "./meta";

export type DefaultErrorType = Record<string, unknown>;

export interface IErrorDefinition<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  format?: (data: TData) => string;
  /**
   * Validate error data on throw(). If provided, data is parsed first.
   */
  dataSchema?: IValidationSchema<TData>;
  /**
   * Advice appended to the message on its own line.
   */
  remediation?: string | ((data: TData) => string);
  meta?: IErrorMeta;
}

/**
 * Error instance thrown by an error helper.
 * `name` carries the helper id so errors survive structured logging.
 */
export interface IGuardedError<TData extends DefaultErrorType>
  extends Error {
  readonly id: string;
  readonly data: TData;
}

/**
 * Runtime helper returned by error().build().
 * Contains helpers to throw typed errors and perform type-safe checks.
 */
export interface IErrorHelper<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  /** Unique id, also used as the thrown error's name */
  id: string;
  meta: IErrorMeta;
  /** Throw a typed error with the given data */
  throw(data: TData): never;
  /** Type guard for checking if an unknown error is this error */
  is(error: unknown): error is IGuardedError<TData>;
  toString(error: IGuardedError<TData>): string;
  /** Brand symbol for runtime detection */
  [symbolError]: true;
}
