import { z } from "zod";
import {
  CAPITAL_LOSS_LIMIT_USD,
  DUST_THRESHOLD_USD,
  RECONCILIATION_TOLERANCE,
} from "@/lib/constants";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Case-insensitive match against pino's level names. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const wanted = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted);
}

const EnvSchema = z.object({
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(LOG_LEVELS).optional(),
  ),
  NODE_ENV: z.string().optional(),
  TAX_YEAR: z.coerce.number().int().min(2009).max(2100).optional(),
  DUST_THRESHOLD_USD: z.coerce.number().nonnegative().default(DUST_THRESHOLD_USD),
  RECONCILIATION_TOLERANCE: z
    .string()
    .regex(/^\d+(\.\d+)?(e-?\d+)?$/i, "must be a non-negative number")
    .default(RECONCILIATION_TOLERANCE),
  CAPITAL_LOSS_LIMIT_USD: z.coerce
    .number()
    .nonnegative()
    .default(CAPITAL_LOSS_LIMIT_USD),
});

export interface EngineConfig {
  logLevel: LogLevel;
  taxYear: number | null;
  dustThresholdUsd: number;
  reconciliationTolerance: string;
  capitalLossLimitUsd: number;
}

/**
 * Reads engine settings from environment variables. Jest runs with
 * NODE_ENV=test, which silences logging unless LOG_LEVEL says otherwise.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }

  const vars = parsed.data;
  return {
    logLevel: vars.LOG_LEVEL ?? (vars.NODE_ENV === "test" ? "silent" : "info"),
    taxYear: vars.TAX_YEAR ?? null,
    dustThresholdUsd: vars.DUST_THRESHOLD_USD,
    reconciliationTolerance: vars.RECONCILIATION_TOLERANCE,
    capitalLossLimitUsd: vars.CAPITAL_LOSS_LIMIT_USD,
  };
}
