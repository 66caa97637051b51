/**
 * Anything with a `parse` method that validates (and may transform) input.
 * zod schemas satisfy this contract.
 */
export interface IValidationSchema<T = unknown> {
  /**
   * Parse and validate the input data.
   * Should throw an error if validation fails.
   */
  parse(input: unknown): T;
}
