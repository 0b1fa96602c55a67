import dotenv from "dotenv";

import { DEFAULT_SEARCH_CONFIG, type SearchConfig } from "../src/search/types";
import { logger } from "../src/utils/logger";

// Load environment variables from .env file
dotenv.config();

/**
 * Environment variable configuration with type safety and validation
 */

/**
 * Validates that a URL string is properly formatted
 */
function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Get a required environment variable
 */
function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get a required URL environment variable with validation
 */
function getEnvVarUrl(key: string, defaultValue?: string): string {
  const value = getEnvVar(key, defaultValue);
  if (!isValidUrl(value)) {
    throw new Error(`Environment variable ${key} must be a valid URL, got: ${value}`);
  }
  return value;
}

/**
 * Get an environment variable as a number
 */
function getEnvVarAsNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

/**
 * Read the search configuration from the environment
 */
function readSearchConfig(): SearchConfig {
  return {
    baseUrl: getEnvVarUrl("POLYMARKET_API_BASE", DEFAULT_SEARCH_CONFIG.baseUrl),
    requestTimeoutSeconds: getEnvVarAsNumber("API_TIMEOUT_SECONDS", DEFAULT_SEARCH_CONFIG.requestTimeoutSeconds),
    retryAttempts: getEnvVarAsNumber("REQUEST_RETRY_ATTEMPTS", DEFAULT_SEARCH_CONFIG.retryAttempts),
    cacheTtlSeconds: getEnvVarAsNumber("CACHE_TTL_SECONDS", DEFAULT_SEARCH_CONFIG.cacheTtlSeconds),
    pageSize: getEnvVarAsNumber("MARKETS_PAGE_SIZE", DEFAULT_SEARCH_CONFIG.pageSize),
    scoreCutoff: getEnvVarAsNumber("SEARCH_SCORE_CUTOFF", DEFAULT_SEARCH_CONFIG.scoreCutoff),
    highConfidenceThreshold: getEnvVarAsNumber(
      "SEARCH_HIGH_CONFIDENCE",
      DEFAULT_SEARCH_CONFIG.highConfidenceThreshold
    ),
    ambiguityMargin: getEnvVarAsNumber("SEARCH_AMBIGUITY_MARGIN", DEFAULT_SEARCH_CONFIG.ambiguityMargin),
    maxCandidates: getEnvVarAsNumber("SEARCH_MAX_CANDIDATES", DEFAULT_SEARCH_CONFIG.maxCandidates),
    minQueryLength: getEnvVarAsNumber("SEARCH_MIN_QUERY_LENGTH", DEFAULT_SEARCH_CONFIG.minQueryLength),
  };
}

/**
 * All environment configuration with validation
 */
export const env = {
  NODE_ENV: getEnvVar("NODE_ENV", "development"),
  isProduction: getEnvVar("NODE_ENV", "development") === "production",
  isTest: getEnvVar("NODE_ENV", "development") === "test",

  LOG_LEVEL: process.env.LOG_LEVEL,

  search: readSearchConfig(),
} as const;

export type Env = typeof env;

/**
 * Search configuration taken from the environment
 */
export function loadSearchConfig(): SearchConfig {
  return { ...env.search };
}

/**
 * Check a search configuration for values the pipeline cannot work with
 */
export function validateSearchConfig(config: SearchConfig): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isValidUrl(config.baseUrl)) {
    errors.push(`POLYMARKET_API_BASE is not a valid URL: ${config.baseUrl}`);
  }

  if (config.requestTimeoutSeconds <= 0) {
    errors.push("API_TIMEOUT_SECONDS must be positive");
  }

  if (!Number.isInteger(config.retryAttempts) || config.retryAttempts < 1) {
    errors.push("REQUEST_RETRY_ATTEMPTS must be an integer of at least 1");
  }

  if (config.cacheTtlSeconds < 0) {
    errors.push("CACHE_TTL_SECONDS cannot be negative");
  } else if (config.cacheTtlSeconds === 0) {
    warnings.push("CACHE_TTL_SECONDS is 0 - every search will refetch the catalog");
  }

  for (const [key, value] of [
    ["SEARCH_SCORE_CUTOFF", config.scoreCutoff],
    ["SEARCH_HIGH_CONFIDENCE", config.highConfidenceThreshold],
  ] as const) {
    if (value < 0 || value > 100) {
      errors.push(`${key} must be between 0 and 100, got: ${value}`);
    }
  }

  if (config.highConfidenceThreshold < config.scoreCutoff) {
    warnings.push("SEARCH_HIGH_CONFIDENCE is below SEARCH_SCORE_CUTOFF");
  }

  if (!Number.isInteger(config.maxCandidates) || config.maxCandidates < 2) {
    errors.push("SEARCH_MAX_CANDIDATES must be an integer of at least 2");
  }

  if (config.minQueryLength < 1) {
    errors.push("SEARCH_MIN_QUERY_LENGTH must be at least 1");
  }

  if (config.pageSize > 100) {
    warnings.push("MARKETS_PAGE_SIZE above 100 is capped by the API");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate that the environment is properly configured
 */
export function validateEnv(): ReturnType<typeof validateSearchConfig> {
  return validateSearchConfig(env.search);
}

/**
 * Log the current configuration
 */
export function logConfig(): void {
  logger.info("Environment configuration", {
    NODE_ENV: env.NODE_ENV,
    LOG_LEVEL: env.LOG_LEVEL ?? "(default)",
    ...env.search,
  });
}

/**
 * Initialize and validate environment configuration
 * Logs config and throws if critical errors are found
 */
export function initializeEnv(): void {
  if (!env.isTest) {
    logConfig();
  }

  const validation = validateEnv();

  for (const warning of validation.warnings) {
    logger.warn(`Configuration warning: ${warning}`);
  }

  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(`Configuration error: ${error}`);
    }
    throw new Error(`Environment validation failed with ${validation.errors.length} error(s)`);
  }
}

// Export utility functions for testing
export const envUtils = {
  isValidUrl,
  getEnvVarAsNumber,
  readSearchConfig,
};
