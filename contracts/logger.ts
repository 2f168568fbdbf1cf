import pino, { type Logger } from "pino";
import { loadConfig } from "./config";

export type { Logger };

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: "launch-pools",
      level: loadConfig().logLevel,
      // bigint fields (amounts, accumulators) are not JSON-serialisable as-is
      formatters: {
        log: (object) => stringifyBigInts(object),
      },
    });
  }
  return rootLogger;
}

function stringifyBigInts(object: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(object)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}

/**
 * Child logger tagged with the emitting module.
 *
 *   const log = createLogger("LaunchPool");
 *   log.info({ pool, user, amount }, "deposit");
 */
export function createLogger(module: string, bindings: Record<string, unknown> = {}): Logger {
  return getRootLogger().child({ module, ...stringifyBigInts(bindings) });
}
