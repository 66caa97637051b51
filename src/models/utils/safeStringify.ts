/**
 * JSON.stringify for log output: cycles become "[Circular]" and nesting
 * beyond `maxDepth` collapses to "[Object]" / "[Array]".
 * Falls back to `String(value)` when JSON cannot represent the value.
 */
export function safeStringify(
  value: unknown,
  space?: number,
  options?: { maxDepth?: number },
): string {
  const maxDepth = options?.maxDepth ?? Infinity;

  try {
    return (
      JSON.stringify(prune(value, 0, maxDepth, []), null, space) ??
      String(value)
    );
  } catch {
    return String(value);
  }
}

function prune(
  value: unknown,
  depth: number,
  maxDepth: number,
  ancestors: object[],
): unknown {
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (ancestors.includes(value)) {
    return "[Circular]";
  }
  if (depth >= maxDepth) {
    return Array.isArray(value) ? "[Array]" : "[Object]";
  }

  ancestors.push(value);
  const pruned = Array.isArray(value)
    ? value.map((item: unknown) => prune(item, depth + 1, maxDepth, ancestors))
    : Object.fromEntries(
        Object.entries(value).map(([key, item]) => [
          key,
          prune(item, depth + 1, maxDepth, ancestors),
        ]),
      );
  ancestors.pop();
  return pruned;
}
