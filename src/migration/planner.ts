/**
 * Builds the ordered migration plan for one task upgrade:
 * discovery → range resolution → one selected tag per version.
 */

import type { RegistryClient } from '../registry/types.js';
import { assertValidRange, resolveRange } from './range.js';
import { listVersionGroups, type Tag } from './tag-index.js';
import { selectTag } from './tag-selector.js';
import { formatVersion, parseVersion, type Version } from './version.js';

export interface PlanStep {
  /** 1-based position in the plan */
  readonly index: number;
  readonly version: Version;
  readonly tag: Tag;
  /** Number of tags the selector chose from */
  readonly candidates: number;
}

export interface MigrationPlan {
  readonly repository: string;
  readonly from: Version;
  readonly to: Version;
  readonly steps: readonly PlanStep[];
}

export interface BuildPlanOptions {
  client: RegistryClient;
  repository: string;
  from: string | Version;
  to: string | Version;
}

function toVersion(value: string | Version): Version {
  return typeof value === 'string' ? parseVersion(value) : value;
}

/**
 * The range is validated before the registry is contacted, so an inverted
 * range never costs a network call.
 */
export async function buildMigrationPlan(options: BuildPlanOptions): Promise<MigrationPlan> {
  const { client, repository } = options;
  const from = toVersion(options.from);
  const to = toVersion(options.to);
  assertValidRange(from, to);

  const groups = await listVersionGroups(client, repository);
  const steps = resolveRange(groups, from, to).map(
    (group, i): PlanStep =>
      Object.freeze({
        index: i + 1,
        version: group.version,
        tag: selectTag(group),
        candidates: group.tags.length,
      })
  );

  return Object.freeze({ repository, from, to, steps: Object.freeze(steps) });
}

/**
 * Stable text form of a plan: same registry state, same output.
 */
export function formatPlan(plan: MigrationPlan): string {
  const header = `${plan.repository} ${formatVersion(plan.from)} -> ${formatVersion(plan.to)}`;
  if (plan.steps.length === 0) {
    return `${header}\n  (no migrations in range)`;
  }
  const lines = plan.steps.map(
    (step) => `  ${step.index}. ${formatVersion(step.version)} ${step.tag.name}@${step.tag.digest}`
  );
  return [header, ...lines].join('\n');
}
