import type { DefaultErrorType, IErrorHelper } from "../../types/error";
import type { IErrorMeta } from "../../types/meta";
import type { IValidationSchema } from "../../types/utilities";
import { defineError } from "../defineError";

/**
 * Internal state for the ErrorFluentBuilder.
 * Kept immutable and frozen.
 */
type BuilderState<TData extends DefaultErrorType> = Readonly<{
  id: string;
  format?: (data: TData) => string;
  dataSchema?: IValidationSchema<TData>;
  remediation?: string | ((data: TData) => string);
  meta?: IErrorMeta;
}>;

function clone<TData extends DefaultErrorType>(
  s: BuilderState<TData>,
  patch: Partial<BuilderState<TData>>,
): BuilderState<TData> {
  return Object.freeze({ ...s, ...patch });
}

export interface ErrorFluentBuilder<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  format(fn: (data: TData) => string): ErrorFluentBuilder<TData>;
  dataSchema(schema: IValidationSchema<TData>): ErrorFluentBuilder<TData>;
  /**
   * Attach remediation advice that explains how to fix this error.
   * Appears in the error message after the main text.
   */
  remediation(
    advice: string | ((data: TData) => string),
  ): ErrorFluentBuilder<TData>;
  meta<TNewMeta extends IErrorMeta>(m: TNewMeta): ErrorFluentBuilder<TData>;
  build(): IErrorHelper<TData>;
}

function makeErrorBuilder<TData extends DefaultErrorType>(
  state: BuilderState<TData>,
): ErrorFluentBuilder<TData> {
  const builder: ErrorFluentBuilder<TData> = {
    id: state.id,
    format(fn) {
      return makeErrorBuilder(clone(state, { format: fn }));
    },
    dataSchema(schema) {
      return makeErrorBuilder(clone(state, { dataSchema: schema }));
    },
    remediation(advice) {
      return makeErrorBuilder(clone(state, { remediation: advice }));
    },
    meta<TNewMeta extends IErrorMeta>(m: TNewMeta) {
      return makeErrorBuilder(clone(state, { meta: m }));
    },
    build() {
      return Object.freeze(
        defineError<TData>({
          id: state.id,
          format: state.format,
          dataSchema: state.dataSchema,
          remediation: state.remediation,
          meta: state.meta,
        }),
      );
    },
  };
  return builder;
}

/**
 * Entry point for creating an error builder.
 */
export function errorBuilder<TData extends DefaultErrorType = DefaultErrorType>(
  id: string,
): ErrorFluentBuilder<TData> {
  const initial: BuilderState<TData> = Object.freeze({ id, meta: {} });
  return makeErrorBuilder(initial);
}

export const error = errorBuilder;
