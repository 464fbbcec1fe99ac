/**
 * Linked migration resolution
 *
 * Every bundle names the closest earlier bundle that has a migration in its
 * `previous-migration-bundle` annotation. Starting at the newest bundle of a
 * plan and following those links visits only the bundles that can carry a
 * migration, so the rest of the range costs no registry call.
 *
 * The walk stops at a bundle without the annotation, or at one whose link
 * points outside the plan (a migration at or before the version the pipeline
 * already uses).
 */

import type { RegistryClient } from '../registry/types.js';
import { wrapError } from '../utils/error-utils.js';
import { logger } from '../utils/logger.js';
import { MigrationToolError, NoScriptAttachedError, TransportFailureError } from './errors.js';
import type { ScriptSource } from './executor.js';
import { ANNOTATION_PREVIOUS_MIGRATION_BUNDLE } from './fetcher.js';
import type { MigrationPlan } from './planner.js';

/**
 * `linked` follows the annotation chain; `legacy` inspects every version in
 * the range.
 */
export type ResolverMode = 'linked' | 'legacy';

export class LinkedMigrationResolver {
  private readonly chains = new WeakMap<MigrationPlan, Promise<ReadonlySet<string>>>();

  constructor(
    private readonly client: RegistryClient,
    private readonly source: ScriptSource
  ) {}

  /**
   * A source for the steps of `plan` that fetches only bundles on the chain
   * and reports every other step as having no migration.
   */
  sourceFor(plan: MigrationPlan): ScriptSource {
    return {
      fetch: async (repository, tag) => {
        const chain = await this.chainOf(plan);
        if (!chain.has(tag.digest)) {
          throw new NoScriptAttachedError(repository, tag.name, 'not linked from a later migration');
        }
        return this.source.fetch(repository, tag);
      },
    };
  }

  /**
   * Digests of the plan's bundles reached from its newest one. Walked once
   * per plan, however many files share it.
   */
  chainOf(plan: MigrationPlan): Promise<ReadonlySet<string>> {
    let chain = this.chains.get(plan);
    if (!chain) {
      chain = this.walk(plan);
      this.chains.set(plan, chain);
    }
    return chain;
  }

  private async walk(plan: MigrationPlan): Promise<ReadonlySet<string>> {
    const { repository } = plan;
    const inRange = new Map(plan.steps.map((step): [string, string] => [step.tag.digest, step.tag.name]));
    const chain = new Set<string>();

    const newest = plan.steps[plan.steps.length - 1];
    if (!newest) {
      logger.debug(`Upgrade range of ${repository} is empty, nothing to resolve`);
      return chain;
    }

    let digest = newest.tag.digest;
    while (!chain.has(digest)) {
      chain.add(digest);
      const label = `${repository}:${inRange.get(digest) ?? digest}`;
      const previous = await this.previousMigrationBundle(repository, digest, label);
      if (!previous) {
        logger.debug(`Migration search stops at ${label}`);
        break;
      }
      if (!inRange.has(previous)) {
        logger.debug(`Migration search stops at ${label}: previous migration bundle ${previous} is not in the upgrade`);
        break;
      }
      digest = previous;
    }
    return chain;
  }

  private async previousMigrationBundle(repository: string, digest: string, label: string): Promise<string | undefined> {
    try {
      const manifest = await this.client.getManifest(repository, digest);
      const previous = manifest.annotations?.[ANNOTATION_PREVIOUS_MIGRATION_BUNDLE]?.trim();
      return previous ? previous : undefined;
    } catch (error) {
      if (MigrationToolError.isMigrationToolError(error)) {
        throw error;
      }
      throw new TransportFailureError(wrapError(error, `Cannot read the manifest of ${label}`).message, undefined, {
        cause: error,
      });
    }
  }
}
