/**
 * Versions command - lists the released versions of a task bundle
 */

import { loadConfig } from '../../config/loader.js';
import { listVersionGroups } from '../../migration/tag-index.js';
import { hasDivergentDigests, selectTag } from '../../migration/tag-selector.js';
import { formatVersion } from '../../migration/version.js';
import type { RegistryClient } from '../../registry/types.js';
import { logger, setVerbose } from '../../utils/logger.js';
import { ExitCode } from '../exit-codes.js';
import { createRegistryClient } from '../utils/output.js';

export interface VersionsOptions {
  json?: boolean;
  registry?: string;
  config?: string;
  verbose?: boolean;
}

export interface VersionSummary {
  version: string;
  selected: string;
  digest: string;
  divergent: boolean;
  tags: Array<{ name: string; digest: string; createdAt?: number }>;
}

export async function versionsCommand(
  repository: string,
  options: VersionsOptions = {},
  client?: RegistryClient
): Promise<ExitCode> {
  setVerbose(options.verbose ?? false);
  const config = loadConfig({ cliOverrides: { registry: options.registry }, configPath: options.config });

  const groups = await listVersionGroups(client ?? createRegistryClient(config), repository);
  const summaries = groups.map((group): VersionSummary => {
    const selected = selectTag(group);
    return {
      version: formatVersion(group.version),
      selected: selected.name,
      digest: selected.digest,
      divergent: hasDivergentDigests(group),
      tags: group.tags.map(({ name, digest, createdAt }) => ({ name, digest, createdAt })),
    };
  });

  if (options.json) {
    logger.log(JSON.stringify(summaries, null, 2));
    return ExitCode.Success;
  }

  if (summaries.length === 0) {
    logger.warn(`No versioned tags found in ${repository}`);
    return ExitCode.Success;
  }

  logger.section(repository);
  for (const summary of summaries) {
    const others = summary.tags.filter((tag) => tag.name !== summary.selected).map((tag) => tag.name);
    const suffix = others.length > 0 ? ` (also ${others.join(', ')}${summary.divergent ? '; digests differ' : ''})` : '';
    logger.log(`  ${summary.version.padEnd(10)} ${summary.selected}@${summary.digest}${suffix}`);
  }
  return ExitCode.Success;
}
