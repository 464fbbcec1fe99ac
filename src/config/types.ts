/**
 * Configuration types for the migration tool
 */

import type { ResolverMode } from '../migration/linked-resolver.js';

/**
 * Complete, validated configuration
 */
export interface MigrateConfig {
  /** Registry access */
  registry: RegistryConfig;

  /** Maximum task references discovered and planned at the same time */
  concurrency: number;

  /** Retry policy for transient registry failures */
  retry: RetryConfig;

  /** Compute and print plans without executing them */
  dryRun: boolean;

  /** Interpreter for migration scripts */
  scriptShell: string;

  /** How the migrations of an upgrade are found */
  resolver: ResolverMode;

  /**
   * Repository prefixes upgrades are accepted from. Empty accepts any
   * registry.
   */
  allowedRegistryPrefixes: string[];
}

export interface RegistryConfig {
  /** Base URL replacing `https://<host>` for every repository */
  url?: string;
  /** Bearer token */
  token?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
}

export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before the first retry, doubled on each subsequent one */
  initialDelayMs: number;
}

/**
 * Partial configuration for merging
 */
export type PartialMigrateConfig = {
  registry?: Partial<RegistryConfig>;
  concurrency?: number;
  retry?: Partial<RetryConfig>;
  dryRun?: boolean;
  scriptShell?: string;
  resolver?: ResolverMode;
  allowedRegistryPrefixes?: string[];
};

/**
 * CLI argument overrides
 */
export interface CliConfigOverrides {
  registry?: string;
  concurrency?: number;
  retries?: number;
  retryDelay?: number;
  dryRun?: boolean;
  shell?: string;
  useLegacyResolver?: boolean;
}
