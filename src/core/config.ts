/**
 * Configuration for Field Catalog
 *
 * Settings are plain values threaded into the objects that need them; nothing
 * here is mutable process state. `loadConfig` reads them from environment
 * variables and validates them with zod.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { createLogger } from './logging/logger.js';
import type { Logger, LogLevel } from './logging/types.js';

/**
 * What a derived value does when its computation fails
 */
export const FailurePolicy = {
  /** Propagate the error to the reader */
  RAISE: 'raise',
  /** Log a warning, return null and retry on the next read */
  WARN: 'warn',
  /** Return null silently and retry on the next read */
  SKIP: 'skip',
  /** Return null and cache it as valid until invalidated */
  IGNORE: 'ignore',
} as const;

export type FailurePolicyValue = (typeof FailurePolicy)[keyof typeof FailurePolicy];

/**
 * What a snapshot does with fields holding live derived values
 */
export const SnapshotDerivedMode = {
  /** Refuse to snapshot */
  FAIL: 'fail',
  /** Leave the derived values out and log a warning */
  DROP: 'drop',
} as const;

export type SnapshotDerivedModeValue = (typeof SnapshotDerivedMode)[keyof typeof SnapshotDerivedMode];

const failurePolicySchema = z.enum(['raise', 'warn', 'skip', 'ignore']);
const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const catalogConfigSchema = z.object({
  failurePolicy: failurePolicySchema.default('raise'),
  logLevel: logLevelSchema.default('info'),
  snapshot: z
    .object({
      derived: z.enum(['fail', 'drop']).default('drop'),
    })
    .default({}),
  bibliography: z
    .object({
      baseUrl: z.string().url().default('https://api.adsabs.harvard.edu/v1'),
      token: z.string().min(1).optional(),
      cache: z.boolean().default(true),
    })
    .default({}),
});

export type CatalogConfigInput = z.input<typeof catalogConfigSchema>;

export interface CatalogConfig {
  readonly failurePolicy: FailurePolicyValue;
  readonly logLevel: LogLevel;
  readonly snapshot: {
    readonly derived: SnapshotDerivedModeValue;
  };
  readonly bibliography: {
    readonly baseUrl: string;
    readonly token?: string | undefined;
    readonly cache: boolean;
  };
}

/**
 * Environment variables understood by loadConfig
 */
export const CONFIG_ENV_VARS = {
  failurePolicy: 'FIELD_CATALOG_FAILURE_POLICY',
  logLevel: 'FIELD_CATALOG_LOG_LEVEL',
  snapshotDerived: 'FIELD_CATALOG_SNAPSHOT_DERIVED',
  bibliographyUrl: 'FIELD_CATALOG_BIBLIOGRAPHY_URL',
  bibliographyToken: 'FIELD_CATALOG_BIBLIOGRAPHY_TOKEN',
  bibliographyCache: 'FIELD_CATALOG_BIBLIOGRAPHY_CACHE',
} as const;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

/**
 * Validate a partial configuration and fill in defaults
 */
export function parseConfig(input: CatalogConfigInput = {}): CatalogConfig {
  return validateConfig(input);
}

function validateConfig(input: unknown): CatalogConfig {
  const result = catalogConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Build a configuration from environment variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): CatalogConfig {
  const cacheFlag = env[CONFIG_ENV_VARS.bibliographyCache];

  return validateConfig({
    failurePolicy: env[CONFIG_ENV_VARS.failurePolicy],
    logLevel: env[CONFIG_ENV_VARS.logLevel],
    snapshot: {
      derived: env[CONFIG_ENV_VARS.snapshotDerived],
    },
    bibliography: {
      baseUrl: env[CONFIG_ENV_VARS.bibliographyUrl],
      token: env[CONFIG_ENV_VARS.bibliographyToken],
      cache: cacheFlag === undefined ? undefined : cacheFlag !== 'false' && cacheFlag !== '0',
    },
  });
}

/**
 * Configuration read from the process environment when the module loads
 */
export const DEFAULT_CONFIG: CatalogConfig = loadConfig();

/**
 * Logger configured with the config's minimum level
 */
export function createConfiguredLogger(config: CatalogConfig = DEFAULT_CONFIG): Logger {
  return createLogger({ minLevel: config.logLevel });
}

/**
 * Logger used when a caller does not pass one
 */
export const DEFAULT_LOGGER: Logger = createConfiguredLogger(DEFAULT_CONFIG);
