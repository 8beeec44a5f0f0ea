/**
 * @yield-guardian/guardian - Configuration.
 *
 * Two layers, both validated with Zod:
 * - Process settings from environment variables (loadConfig)
 * - Wallet and policy settings from a JSON file (loadGuardianConfig)
 *
 * Any failure is a ConfigurationError carrying the individual issues.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigurationError } from "@yield-guardian/types";
import {
  AAVE_V3_ORIGIN,
  BASE_PUBLIC_RPC,
  DEFAULT_AAVE_APY_PERCENT,
  MANUAL_ORIGIN,
} from "@yield-guardian/chain-observer";

// =============================================================================
// Environment
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Files
  CONFIG_PATH: z.string().min(1).default("config.json"),
  DATA_DIR: z.string().min(1).default("data"),

  // Auth
  OPERATOR_API_KEYS: z.string().default(""),

  // Transfer execution
  AGENT_PRIVATE_KEY: z.string().optional(),

  // Scheduling
  TICK_INTERVAL_MS: z.coerce.number().int().min(1000).default(30_000),
  REFRESH_INTERVAL_MS: z.coerce.number().int().min(1000).default(3_600_000),
  SNAPSHOT_INTERVAL_MS: z.coerce.number().int().min(1000).default(3_600_000),
  ACCRUAL_THRESHOLD_MS: z.coerce.number().int().min(0).default(360_000),

  // Startup
  RESTORE_FROM_SNAPSHOT: z
    .string()
    .transform((v) => v === "true")
    .default("false"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Load and validate configuration from process.env.
 *
 * @throws ConfigurationError if any variable is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid environment configuration",
      formatIssues(result.error),
    );
  }
  return result.data;
}

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse OPERATOR_API_KEYS ("key1,key2") into a key list.
 */
export function parseApiKeys(raw: string): readonly string[] {
  return raw
    .split(",")
    .map((key) => key.trim())
    .filter((key) => key !== "");
}

// =============================================================================
// Guardian file
// =============================================================================

/** Non-negative decimal, as a JSON string or number. */
const DecimalSchema = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .pipe(
    z.string().regex(/^\d+(\.\d{1,6})?$/, "must be a non-negative decimal with at most 6 decimal places"),
  );

const ModeSchema = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(["conservative", "balanced", "growth"]));

export const YieldSourceConfigSchema = z.object({
  name: z.string().min(1),
  origin: z
    .string()
    .min(1)
    .refine((origin) => origin !== AAVE_V3_ORIGIN, {
      message: `origin "${AAVE_V3_ORIGIN}" is reserved for the Aave feed`,
    })
    .default(MANUAL_ORIGIN),
  principalUsd: DecimalSchema,
  annualRatePercent: DecimalSchema,
  protocolAddress: z.string().optional(),
});

export const GuardianFileSchema = z
  .object({
    walletAddress: z.string().min(1).optional(),
    safeAddress: z.string().min(1).optional(),
    principalUsd: DecimalSchema,
    initialYieldUsd: DecimalSchema.default("0"),
    spendingMode: ModeSchema.default("balanced"),
    yieldSources: z.array(YieldSourceConfigSchema).default([]),
    rpcUrl: z.string().url().default(BASE_PUBLIC_RPC),
    destinationAddress: z.string().min(1).optional(),
    aave: z
      .object({
        enabled: z.boolean().default(true),
        estimatedApyPercent: DecimalSchema.default(DEFAULT_AAVE_APY_PERCENT),
      })
      .default({}),
    transferLookbackBlocks: z.number().int().min(0).default(1000),
  })
  .refine((c) => c.walletAddress !== undefined || c.safeAddress !== undefined, {
    message: "walletAddress or safeAddress is required",
    path: ["walletAddress"],
  });

export type GuardianFileConfig = z.infer<typeof GuardianFileSchema>;
export type YieldSourceConfig = z.infer<typeof YieldSourceConfigSchema>;

/**
 * Validate a parsed guardian file.
 *
 * @throws ConfigurationError
 */
export function parseGuardianConfig(raw: unknown): GuardianFileConfig {
  const result = GuardianFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError("Invalid guardian configuration", formatIssues(result.error));
  }
  return result.data;
}

/**
 * Read and validate the guardian JSON file.
 *
 * @throws ConfigurationError if the file is missing, not JSON, or invalid
 */
export function loadGuardianConfig(path: string): GuardianFileConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${path}`, [], { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON`, [], { cause: err });
  }

  return parseGuardianConfig(raw);
}

/**
 * The address whose transfers are watched: the Safe when configured.
 */
export function monitoredAddress(config: GuardianFileConfig): string {
  return config.safeAddress ?? config.walletAddress ?? "";
}

// =============================================================================
// Helpers
// =============================================================================

function formatIssues(error: z.ZodError): readonly string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path === "" ? issue.message : `${path}: ${issue.message}`;
  });
}
