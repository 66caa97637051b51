import type {
  DefaultErrorType,
  IErrorDefinition,
  IErrorHelper,
  IGuardedError,
} from "../types/error";
import type { IErrorMeta } from "../types/meta";
import { symbolError } from "../types/symbols";
import { safeStringify } from "../models/utils/safeStringify";

export class GuardedError<TData extends DefaultErrorType = DefaultErrorType>
  extends Error
  implements IGuardedError<TData>
{
  constructor(
    public readonly id: string,
    public readonly data: TData,
    message: string,
  ) {
    super(message);
    this.name = id;
  }
}

export class ErrorHelper<TData extends DefaultErrorType = DefaultErrorType>
  implements IErrorHelper<TData>
{
  [symbolError] = true as const;

  constructor(private readonly definition: IErrorDefinition<TData>) {}

  get id(): string {
    return this.definition.id;
  }

  get meta(): IErrorMeta {
    return this.definition.meta ?? {};
  }

  throw(data: TData): never {
    const parsed = this.definition.dataSchema
      ? this.definition.dataSchema.parse(data)
      : data;
    throw new GuardedError(this.definition.id, parsed, this.message(parsed));
  }

  is(error: unknown): error is GuardedError<TData> {
    return error instanceof GuardedError && error.name === this.definition.id;
  }

  toString(error: IGuardedError<TData>): string {
    return error.message;
  }

  private message(data: TData): string {
    const { format, remediation } = this.definition;
    const base = format
      ? format(data)
      : `${this.definition.id}: ${safeStringify(data)}`;
    if (remediation === undefined) {
      return base;
    }
    const advice =
      typeof remediation === "function" ? remediation(data) : remediation;
    return `${base}\n\nRemediation: ${advice}`;
  }
}

/**
 * Create a new error helper from a plain definition.
 * Prefer the fluent `error(id)` builder for catalogue entries.
 */
export function defineError<TData extends DefaultErrorType = DefaultErrorType>(
  definition: IErrorDefinition<TData>,
) {
  return new ErrorHelper<TData>(definition);
}
