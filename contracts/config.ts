import * as dotenv from "dotenv";
import { isAddress, getAddress } from "ethers";
import { z } from "zod";

dotenv.config();

// Registry identity used when no FACTORY_ADDRESS is configured
export const DEFAULT_FACTORY_ADDRESS = "0x5FbDB2315678afecb367f032d93F642f64180aa3";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const configSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  FACTORY_ADDRESS: z
    .string()
    .refine((value) => isAddress(value), { message: "FACTORY_ADDRESS must be a hex address" })
    .default(DEFAULT_FACTORY_ADDRESS),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LaunchPoolConfig {
  logLevel: LogLevel;
  factoryAddress: string;
}

/**
 * Reads configuration from the environment (and `.env`, via dotenv).
 * Throws when a variable is present but malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LaunchPoolConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    factoryAddress: getAddress(parsed.data.FACTORY_ADDRESS),
  };
}
