/**
 * Configuration loader
 *
 * Loads configuration from a YAML file, environment variables and CLI
 * arguments, merging them in order of precedence, and validates the result.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from '../migration/errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { getDefaultConfig } from './defaults.js';
import type { CliConfigOverrides, MigrateConfig, PartialMigrateConfig } from './types.js';

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = ['task-bundle-migrate.config.yaml', 'task-bundle-migrate.config.yml'];

/**
 * Environment variable prefix
 */
const ENV_PREFIX = 'TBM_';

const retrySchema = z.object({
  maxRetries: z.number().int().min(0),
  initialDelayMs: z.number().int().min(0),
});

const registrySchema = z.object({
  url: z.string().url().optional(),
  token: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive(),
});

const resolverSchema = z.enum(['linked', 'legacy']);

const configSchema = z.object({
  registry: registrySchema,
  concurrency: z.number().int().min(1).max(32),
  retry: retrySchema,
  dryRun: z.boolean(),
  scriptShell: z.string().min(1),
  resolver: resolverSchema,
  allowedRegistryPrefixes: z.array(z.string().min(1)),
});

const fileConfigSchema = z
  .object({
    registry: registrySchema.partial(),
    concurrency: z.number(),
    retry: retrySchema.partial(),
    dryRun: z.boolean(),
    scriptShell: z.string(),
    resolver: resolverSchema,
    allowedRegistryPrefixes: z.array(z.string()),
  })
  .partial()
  .strict();

export interface LoadConfigOptions {
  cliOverrides?: CliConfigOverrides;
  /** Explicit config file; it must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Directory searched for a config file when no path is given */
  cwd?: string;
}

/**
 * Load configuration with the following precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 *
 * @throws ConfigError when a source is unreadable or the result is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): MigrateConfig {
  const { cliOverrides, configPath, env = process.env, cwd = process.cwd() } = options;

  let config = getDefaultConfig();

  const fileConfig = loadConfigFile(configPath, cwd);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig(env));

  if (cliOverrides) {
    config = mergeConfig(config, convertCliOverrides(cliOverrides));
  }

  return validateConfig(config);
}

function findConfigFile(cwd: string): string | null {
  for (const fileName of CONFIG_FILE_NAMES) {
    const candidate = path.join(cwd, fileName);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Load configuration from file
 */
function loadConfigFile(configPath: string | undefined, cwd: string): PartialMigrateConfig | null {
  const filePath = configPath ? path.resolve(cwd, configPath) : findConfigFile(cwd);
  if (!filePath) {
    return null;
  }

  let content: unknown;
  try {
    content = YAML.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${getErrorMessage(error)}`);
  }

  // An empty file is an empty config
  if (content === undefined || content === null) {
    return {};
  }

  const result = fileConfigSchema.safeParse(content);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${filePath}: ${formatIssue(result.error)}`);
  }
  return result.data;
}

function parseNumber(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): PartialMigrateConfig {
  const config: PartialMigrateConfig = {};
  const read = (name: string): string | undefined => env[`${ENV_PREFIX}${name}`];

  const url = read('REGISTRY_URL');
  const token = read('REGISTRY_TOKEN');
  const timeout = read('REGISTRY_TIMEOUT_MS');
  if (url || token || timeout) {
    config.registry = {};
    if (url) config.registry.url = url;
    if (token) config.registry.token = token;
    if (timeout) config.registry.timeoutMs = parseNumber(timeout);
  }

  const concurrency = read('CONCURRENCY');
  if (concurrency) config.concurrency = parseNumber(concurrency);

  const maxRetries = read('MAX_RETRIES');
  const retryDelay = read('RETRY_DELAY_MS');
  if (maxRetries || retryDelay) {
    config.retry = {};
    if (maxRetries) config.retry.maxRetries = parseNumber(maxRetries);
    if (retryDelay) config.retry.initialDelayMs = parseNumber(retryDelay);
  }

  const dryRun = read('DRY_RUN');
  if (dryRun) config.dryRun = parseBoolean(dryRun);

  const shell = read('SCRIPT_SHELL');
  if (shell) config.scriptShell = shell;

  const legacyResolver = read('USE_LEGACY_RESOLVER');
  if (legacyResolver) config.resolver = parseBoolean(legacyResolver) ? 'legacy' : 'linked';

  const allowAny = read('ALLOW_ANY_REGISTRY');
  if (allowAny && parseBoolean(allowAny)) config.allowedRegistryPrefixes = [];

  return config;
}

/**
 * Convert CLI overrides to partial config
 */
function convertCliOverrides(overrides: CliConfigOverrides): PartialMigrateConfig {
  const config: PartialMigrateConfig = {};

  if (overrides.registry) config.registry = { url: overrides.registry };
  if (overrides.concurrency !== undefined) config.concurrency = overrides.concurrency;
  if (overrides.retries !== undefined || overrides.retryDelay !== undefined) {
    config.retry = {};
    if (overrides.retries !== undefined) config.retry.maxRetries = overrides.retries;
    if (overrides.retryDelay !== undefined) config.retry.initialDelayMs = overrides.retryDelay;
  }
  if (overrides.dryRun !== undefined) config.dryRun = overrides.dryRun;
  if (overrides.shell) config.scriptShell = overrides.shell;
  if (overrides.useLegacyResolver) config.resolver = 'legacy';

  return config;
}

/**
 * Merge a partial configuration over a complete one
 */
export function mergeConfig(base: MigrateConfig, override: PartialMigrateConfig): MigrateConfig {
  return {
    registry: { ...base.registry, ...override.registry },
    concurrency: override.concurrency ?? base.concurrency,
    retry: { ...base.retry, ...override.retry },
    dryRun: override.dryRun ?? base.dryRun,
    scriptShell: override.scriptShell ?? base.scriptShell,
    resolver: override.resolver ?? base.resolver,
    allowedRegistryPrefixes: override.allowedRegistryPrefixes ?? base.allowedRegistryPrefixes,
  };
}

export function validateConfig(config: MigrateConfig): MigrateConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssue(result.error)}`);
  }
  return result.data;
}

function formatIssue(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
