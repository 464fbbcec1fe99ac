/**
 * Default configuration values
 */

import type { MigrateConfig } from './types.js';

export const DEFAULT_ALLOWED_REGISTRY_PREFIX = 'quay.io/konflux-ci/';

export const DEFAULT_CONFIG: MigrateConfig = {
  registry: {
    timeoutMs: 30000,
  },
  // Kept low to avoid hammering the registry
  concurrency: 4,
  retry: {
    maxRetries: 3,
    initialDelayMs: 500,
  },
  dryRun: false,
  scriptShell: 'bash',
  resolver: 'linked',
  allowedRegistryPrefixes: [DEFAULT_ALLOWED_REGISTRY_PREFIX],
};

/**
 * Fresh copy of the defaults, safe to mutate.
 */
export function getDefaultConfig(): MigrateConfig {
  return {
    ...DEFAULT_CONFIG,
    registry: { ...DEFAULT_CONFIG.registry },
    retry: { ...DEFAULT_CONFIG.retry },
    allowedRegistryPrefixes: [...DEFAULT_CONFIG.allowedRegistryPrefixes],
  };
}
