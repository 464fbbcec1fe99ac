/**
 * Dependency-update input
 *
 * The update agent (Renovate) describes each bumped task bundle with a subset
 * of its `upgrades` template fields. This module validates that data and
 * groups it by the pipeline file it touches.
 */

import * as path from 'node:path';
import { z } from 'zod';
import { InvalidUpgradesError, VersionParseError } from '../migration/errors.js';
import type { MigrationRequest } from '../migration/orchestrator.js';
import { formatVersion, parseTagVersion } from '../migration/version.js';
import { formatBundleReference } from '../pipeline/bundle-reference.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { logger } from '../utils/logger.js';

export const TEKTON_BUNDLE_DEP_TYPE = 'tekton-bundle';

const digest = z.string().regex(/^sha256:[0-9a-f]+$/, 'must be a sha256 digest');
const nonEmpty = z.string().min(1, 'must not be empty');

export const upgradeSchema = z
  .object({
    depName: nonEmpty,
    currentValue: nonEmpty,
    currentDigest: digest,
    newValue: nonEmpty,
    newDigest: digest,
    depTypes: z.array(z.string()),
    packageFile: nonEmpty,
    parentDir: nonEmpty,
  })
  .passthrough();

export type TaskBundleUpgrade = z.infer<typeof upgradeSchema>;

export interface PackageFileUpgrades {
  packageFile: string;
  parentDir: string;
  upgrades: TaskBundleUpgrade[];
}

export interface ParseUpgradesOptions {
  /** Only upgrades of repositories under these prefixes are kept; empty keeps all */
  allowedPrefixes?: readonly string[];
}

/**
 * Parses and validates the JSON upgrades list. Falsy entries are ignored,
 * upgrades of foreign registries or non-bundle dependencies are skipped.
 */
export function parseUpgrades(json: string, options: ParseUpgradesOptions = {}): TaskBundleUpgrade[] {
  const { allowedPrefixes = [] } = options;

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new InvalidUpgradesError(`Input upgrades is not valid JSON: ${getErrorMessage(error)}`);
  }
  if (!Array.isArray(data)) {
    throw new InvalidUpgradesError('Input upgrades is not a list of upgrade mappings');
  }

  const entries: unknown[] = data;
  const upgrades: TaskBundleUpgrade[] = [];
  for (const entry of entries) {
    if (!entry) continue;

    const depName = typeof entry === 'object' && 'depName' in entry ? entry.depName : undefined;
    if (typeof depName !== 'string' || depName.length === 0) {
      throw new InvalidUpgradesError('Upgrade does not have a value for field depName');
    }
    if (allowedPrefixes.length > 0 && !allowedPrefixes.some((prefix) => depName.startsWith(prefix))) {
      logger.info(`Dependency ${depName} is not a task bundle from an allowed registry, skipping`);
      continue;
    }

    const result = upgradeSchema.safeParse(entry);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue?.path.join('.') || '(root)';
      throw new InvalidUpgradesError(`Invalid upgrade of ${depName}: ${field} ${issue?.message ?? 'is invalid'}`);
    }

    if (!result.data.depTypes.includes(TEKTON_BUNDLE_DEP_TYPE)) {
      logger.debug(`Dependency ${depName} is not handled by the ${TEKTON_BUNDLE_DEP_TYPE} manager, skipping`);
      continue;
    }
    upgrades.push(result.data);
  }

  return upgrades;
}

export function currentBundle(upgrade: TaskBundleUpgrade): string {
  return formatBundleReference({
    repository: upgrade.depName,
    tag: upgrade.currentValue,
    digest: upgrade.currentDigest,
  });
}

/**
 * Groups upgrades by package file, in first-seen order. The same bundle
 * upgrade listed twice for one file is kept once.
 */
export function groupUpgradesByFile(upgrades: readonly TaskBundleUpgrade[]): PackageFileUpgrades[] {
  const files = new Map<string, PackageFileUpgrades>();

  for (const upgrade of upgrades) {
    let file = files.get(upgrade.packageFile);
    if (!file) {
      file = { packageFile: upgrade.packageFile, parentDir: upgrade.parentDir, upgrades: [] };
      files.set(upgrade.packageFile, file);
    }
    const key = `${currentBundle(upgrade)}->${upgrade.newValue}`;
    if (!file.upgrades.some((existing) => `${currentBundle(existing)}->${existing.newValue}` === key)) {
      file.upgrades.push(upgrade);
    }
  }

  return [...files.values()];
}

function tagVersion(tag: string): string {
  const parsed = parseTagVersion(tag);
  if (!parsed) {
    throw new VersionParseError(tag);
  }
  return formatVersion(parsed.version);
}

/**
 * One migration request per upgrade, pointing at the package file resolved
 * against `rootDir`. The upgrade's new tag and digest become the target.
 */
export function toMigrationRequests(files: readonly PackageFileUpgrades[], rootDir: string): MigrationRequest[] {
  return files.flatMap((file) =>
    file.upgrades.map(
      (upgrade): MigrationRequest => ({
        repository: upgrade.depName,
        from: tagVersion(upgrade.currentValue),
        to: tagVersion(upgrade.newValue),
        pipelineFile: path.resolve(rootDir, file.packageFile),
        target: { repository: upgrade.depName, tag: upgrade.newValue, digest: upgrade.newDigest },
      })
    )
  );
}
