/**
 * Brand symbols used to tag created objects at runtime.
 * @internal
 */
export const symbolError: unique symbol = Symbol.for("guarded.error");
