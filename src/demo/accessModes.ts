import { invalidArgumentError } from "../errors";
import type { Logger } from "../models/Logger";
import { ProtectedCollection } from "../models/ProtectedCollection";
import { Client } from "./Client";
import { Counter } from "./Counter";

export type AccessModeOutcome = {
  label: string;
  outcome: "ok" | "error";
  /** Collection content after the loop ran (or failed) */
  content: string;
  error?: string;
};

export type AccessModeReport = {
  original: string;
  results: AccessModeOutcome[];
};

export interface AccessModeDemoOptions {
  /** Amount each client loop adds to every counter */
  data?: number;
  /** Counters are seeded 1..count */
  count?: number;
  logger: Logger;
}

/** Upper bound on `count`, keeping the demo's collection in memory */
export const MAX_COUNTERS = 10_000;

const LOOPS: ReadonlyArray<[label: string, loop: (client: Client) => void]> =
  [
    ["Getter, cleared: ", (client) => client.simpleLoop()],
    ["Immutable, clear attempted: ", (client) => client.immutableLoop()],
    ["Iterator, remove attempted: ", (client) => client.iteratorLoop()],
    ["Callback, not exposed: ", (client) => client.callbackLoop()],
  ];

/**
 * Runs every access mode against one shared collection of counters and
 * reports the content after each. A failing mode is logged and the demo
 * carries on with the next one.
 */
export async function runAccessModeDemo({
  data = 13,
  count = 9,
  logger,
}: AccessModeDemoOptions): Promise<AccessModeReport> {
  if (!Number.isFinite(data)) {
    invalidArgumentError.throw({
      argument: "data",
      value: String(data),
      reason: "expected a finite number",
    });
  }
  if (!Number.isInteger(count) || count < 1 || count > MAX_COUNTERS) {
    invalidArgumentError.throw({
      argument: "count",
      value: String(count),
      reason: `expected an integer between 1 and ${MAX_COUNTERS}`,
    });
  }

  const log = logger.with({ source: "demo", additionalContext: { data } });
  const originals = Array.from({ length: count }, (_, k) => new Counter(k + 1));
  const client = new Client(data, new ProtectedCollection(originals));

  const original = client.toString();
  await log.info(`Original: ${original}`);

  const results: AccessModeOutcome[] = [];
  for (const [label, loop] of LOOPS) {
    try {
      loop(client);
      results.push({ label, outcome: "ok", content: client.toString() });
      await log.info(`${label}${client}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      results.push({
        label,
        outcome: "error",
        content: client.toString(),
        error: message,
      });
      await log.error(`${label}${client}`, { error });
    }
  }

  return { original, results };
}
