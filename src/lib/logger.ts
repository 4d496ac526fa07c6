import pino, { type Logger } from "pino";
import { parseLogLevel, type LogLevel } from "@/lib/config";

let root: Logger | null = null;

/**
 * Level for the shared root logger. Read on its own rather than through
 * loadConfig, so a bad setting elsewhere in the environment cannot stop a
 * module from loading; an unknown LOG_LEVEL falls back to the default.
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): LogLevel {
  return parseLogLevel(env.LOG_LEVEL) ?? (env.NODE_ENV === "test" ? "silent" : "info");
}

function rootLogger(): Logger {
  if (!root) {
    root = pino({ name: "fifo-tax-ledger", level: resolveLogLevel() });
  }
  return root;
}

/**
 * Named child logger, e.g. getLogger("LotPool").
 */
export function getLogger(component: string): Logger {
  return rootLogger().child({ component });
}
