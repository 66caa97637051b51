import { z } from "zod";
import { error } from "./definers/builders/error";
import type { DefaultErrorType } from "./types/error";

// Structural mutation attempted on a read-only view or traversal
export const unsupportedOperationError = error<
  { operation: string; target: string } & DefaultErrorType
>("guarded.errors.unsupportedOperation")
  .dataSchema(z.object({ operation: z.string(), target: z.string() }))
  .format(
    ({ operation, target }) =>
      `Cannot ${operation} "${target}": it is read-only.`,
  )
  .remediation(
    "Call getMutableView() for a private working copy, or mutate the elements themselves.",
  )
  .meta({
    title: "Unsupported operation",
    description:
      "Raised when a caller tries to change the structure of an immutable view.",
  })
  .build();

// Bad CLI or demo input
export const invalidArgumentError = error<
  { argument: string; value: string; reason: string } & DefaultErrorType
>("guarded.errors.invalidArgument")
  .format(
    ({ argument, value, reason }) =>
      `Invalid ${argument} "${value}": ${reason}`,
  )
  .build();

// Environment configuration failed validation
export const invalidConfigError = error<
  { issues: string[] } & DefaultErrorType
>("guarded.errors.invalidConfig")
  .format(({ issues }) => {
    const details = issues.map((issue) => `  • ${issue}`).join("\n");
    return `Invalid configuration:\n${details}`;
  })
  .build();
