/**
 * @timevault/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { FEE_CEILING } from "@timevault/custody";
import type { Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const FeeAmountSchema = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer")
  .transform((v) => BigInt(v))
  .refine((v) => v <= FEE_CEILING, {
    message: `must not exceed ${FEE_CEILING}`,
  });

const AccountListSchema = z
  .string()
  .transform((v) =>
    v
      .split(",")
      .map((a) => a.trim())
      .filter((a) => a !== ""),
  );

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().default("timevault"),

  // Custody
  ADMIN_ACCOUNT: z.string().min(1).default("admin"),
  CUSTODY_ACCOUNT: z.string().min(1).default("custody"),
  FEE_RECIPIENT: z.string().min(1).default("treasury"),
  CREATION_FEE: FeeAmountSchema.default("0"),
  EXTENSION_FEE: FeeAmountSchema.default("0"),
  FEE_EXEMPT_ACCOUNTS: AccountListSchema.default(""),

  // Persistence (in-memory when unset)
  DATA_DIR: z.string().min(1).optional(),

  // In-process asset registry and fee ledger seeding routes
  SANDBOX_ENABLED: z
    .string()
    .transform((v) => v === "true")
    .default("false"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly accountId: string;
}

function isRole(value: string): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:account1,key2:role2:account2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, role, accountId, ...rest] = entry.trim().split(":");
    if (
      key === undefined ||
      role === undefined ||
      accountId === undefined ||
      rest.length > 0
    ) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:accountId`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (accountId === "") {
      throw new Error("Account ID cannot be empty in API_KEYS");
    }

    keys.push({ key, role, accountId });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
