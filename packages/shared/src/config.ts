// @fairdraw/shared - Configuration system
// All values loaded from environment; only local allows defaults

import { DEFAULT_DECK_SIZE, MAX_DECK_SIZE } from "./permutation.js";
import { type Address, type AppEnv, ENV_VARS } from "./types.js";

/**
 * Authority used in local development when AUTHORITY_ADDRESS is unset
 * (first account of the default anvil/hardhat mnemonic)
 */
export const LOCAL_AUTHORITY: Address = "0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266";

const DEFAULT_PORT = 3001;
const DEFAULT_TABLE_ID = "1";

/**
 * Error thrown when required configuration is missing
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly missingVars?: string[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Dealer configuration resolved from the environment
 */
export interface AppConfig {
  env: AppEnv;
  port: number;
  authority: Address;
  deckSize: number;
  defaultTableId: string;
  corsAllowedOrigins: string[];
}

/**
 * Validates that a string is a valid account address
 */
export function isValidAddress(value: string): value is Address {
  return /^0x[a-fA-F0-9]{40}$/.test(value);
}

/**
 * Lower-cases an address so comparisons are case-insensitive
 */
export function normalizeAddress(address: Address): Address {
  return `0x${address.slice(2).toLowerCase()}`;
}

/**
 * Gets an environment variable or throws if missing
 */
export function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`, [name]);
  }
  return value;
}

/**
 * Gets an address from environment or throws if missing/invalid
 */
export function requireAddress(name: string): Address {
  const value = requireEnv(name);
  if (!isValidAddress(value)) {
    throw new ConfigError(
      `Invalid address for ${name}: "${value}" - must be 0x-prefixed 40 hex characters`
    );
  }
  return value;
}

/**
 * Gets an optional address from environment, returns undefined if not set
 */
export function optionalAddress(name: string): Address | undefined {
  const value = process.env[name];
  if (!value) return undefined;
  if (!isValidAddress(value)) {
    throw new ConfigError(
      `Invalid address for ${name}: "${value}" - must be 0x-prefixed 40 hex characters`
    );
  }
  return value;
}

/**
 * Parses a positive integer from environment, falling back when unset
 */
export function parsePositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Invalid ${name}: "${raw}" - must be a positive integer`);
  }
  return value;
}

/**
 * Validates the environment name
 */
export function parseAppEnv(value: string): AppEnv {
  if (value === "local" || value === "staging" || value === "production") {
    return value;
  }
  throw new ConfigError(
    `Invalid APP_ENV: "${value}" - must be one of: local, staging, production`
  );
}

/**
 * Cached config instance
 */
let cachedConfig: AppConfig | null = null;

/**
 * Loads the dealer configuration from environment variables.
 *
 * Environment variables:
 * - APP_ENV: "local" (default) | "staging" | "production"
 * - AUTHORITY_ADDRESS: required outside local
 * - DECK_SIZE: 1 .. 1024 (default 52)
 * - PORT, DEFAULT_TABLE_ID, CORS_ALLOWED_ORIGINS: optional
 *
 * @param forceReload - If true, ignores cached config and reloads from environment
 * @throws ConfigError if configuration is missing or invalid
 */
export function getAppConfig(forceReload = false): AppConfig {
  if (cachedConfig && !forceReload) {
    return cachedConfig;
  }

  const env = parseAppEnv(process.env[ENV_VARS.APP_ENV] || "local");

  const authority =
    env === "local"
      ? optionalAddress(ENV_VARS.AUTHORITY_ADDRESS) ?? LOCAL_AUTHORITY
      : requireAddress(ENV_VARS.AUTHORITY_ADDRESS);

  const deckSize = parsePositiveInt(ENV_VARS.DECK_SIZE, DEFAULT_DECK_SIZE);
  if (deckSize > MAX_DECK_SIZE) {
    throw new ConfigError(`Invalid DECK_SIZE: ${deckSize} - must not exceed ${MAX_DECK_SIZE}`);
  }

  const corsAllowedOrigins = (process.env[ENV_VARS.CORS_ALLOWED_ORIGINS] || "")
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean);

  cachedConfig = {
    env,
    port: parsePositiveInt(ENV_VARS.PORT, DEFAULT_PORT),
    authority: normalizeAddress(authority),
    deckSize,
    defaultTableId: process.env[ENV_VARS.DEFAULT_TABLE_ID] || DEFAULT_TABLE_ID,
    corsAllowedOrigins,
  };

  return cachedConfig;
}

/**
 * Returns the required variables that are missing for the current APP_ENV.
 * Does not throw - useful for startup validation with custom error handling.
 */
export function validateAppConfigEnv(): string[] {
  const missing: string[] = [];
  const env = process.env[ENV_VARS.APP_ENV];
  const isLocal = !env || env === "local";

  if (!process.env[ENV_VARS.JWT_SECRET]) {
    missing.push(ENV_VARS.JWT_SECRET);
  }
  if (!isLocal && !process.env[ENV_VARS.AUTHORITY_ADDRESS]) {
    missing.push(ENV_VARS.AUTHORITY_ADDRESS);
  }

  return missing;
}

/**
 * Clears the cached configuration.
 * Useful for testing or when environment variables change.
 */
export function clearAppConfigCache(): void {
  cachedConfig = null;
}
