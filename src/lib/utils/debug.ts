/**
 * Debug logging utility for backend and embedder wire details.
 * Silent until enabled by the entry point from configuration.
 *
 * Usage:
 *   import { debug } from "@/lib/utils/debug";
 *   debug.search("Raw response", { points: 10 });
 */

type LogData = Record<string, unknown> | string | number | boolean | unknown | undefined;

let enabled = false;

/** Turn namespaced debug output on or off */
export function configureDebug(options: { enabled: boolean }): void {
  enabled = options.enabled;
}

function formatArgs(args: LogData[]): unknown[] {
  return args.map(arg => (arg === undefined ? "" : arg));
}

function createLogger(prefix: string) {
  return {
    log: (...args: LogData[]) => {
      if (enabled) console.log(`[${prefix}]`, ...formatArgs(args));
    },
    warn: (...args: LogData[]) => {
      if (enabled) console.warn(`[${prefix}]`, ...formatArgs(args));
    },
  };
}

/** Namespaced debug loggers */
export const debug = {
  /** Search backend requests and raw responses */
  search: createLogger("Search"),

  /** Embedding provider requests */
  embed: createLogger("Embed"),

  /** Worker pool scheduling */
  pool: createLogger("Pool"),
};
