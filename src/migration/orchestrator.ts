/**
 * Drives discovery, planning and execution for a batch of task upgrades.
 *
 * Planning for distinct task references is independent and runs in
 * parallel, bounded by `concurrency`. Execution is grouped by pipeline file:
 * upgrades of one file run one after another in request order, different
 * files may proceed side by side.
 */

import * as path from 'node:path';
import { formatBundleReference, type BundleReference } from '../pipeline/bundle-reference.js';
import { PipelineFile } from '../pipeline/pipeline-file.js';
import type { RegistryClient } from '../registry/types.js';
import { processInParallel } from '../utils/concurrency.js';
import { getErrorMessage, toError } from '../utils/error-utils.js';
import { logger } from '../utils/logger.js';
import { PipelineFileError } from './errors.js';
import {
  MigrationExecutor,
  type MigrationRunReport,
  type ScriptSource,
  type TransitionEvent,
} from './executor.js';
import { MigrationFetcher } from './fetcher.js';
import { LinkedMigrationResolver, type ResolverMode } from './linked-resolver.js';
import { buildMigrationPlan, type MigrationPlan } from './planner.js';
import type { ScriptRunner } from './script-runner.js';
import { compareVersions } from './version.js';

export interface MigrationRequest {
  /** Task bundle repository, e.g. `quay.io/konflux-ci/task-clone` */
  repository: string;
  from: string;
  to: string;
  pipelineFile: string;
  /**
   * Reference written into the pipeline after a successful run. Derived
   * from the plan's last step when absent.
   */
  target?: BundleReference;
}

export interface TaskMigrationOutcome {
  request: MigrationRequest;
  plan?: MigrationPlan;
  report?: MigrationRunReport;
  /** Planning or file-level failure; execution failures live in `report` */
  error?: Error;
  /** Bundle references rewritten to the target */
  referencesUpdated?: number;
}

export interface RunMigrationsOptions {
  client: RegistryClient;
  runner: ScriptRunner;
  /** Defaults to a registry-backed MigrationFetcher over `client` */
  source?: ScriptSource;
  concurrency: number;
  dryRun?: boolean;
  /** Defaults to `linked` */
  resolver?: ResolverMode;
  onTransition?: (request: MigrationRequest, event: TransitionEvent) => void;
}

function planKey(request: MigrationRequest): string {
  return `${request.repository}|${request.from}|${request.to}`;
}

/**
 * Plans every request, then (unless dry-running) executes them. Never
 * throws for a per-request failure; each outcome carries its own.
 */
export async function runMigrations(
  requests: readonly MigrationRequest[],
  options: RunMigrationsOptions
): Promise<TaskMigrationOutcome[]> {
  const { client, concurrency, dryRun = false } = options;

  // Identical upgrades shared by several files are planned once
  const uniqueKeys = [...new Set(requests.map(planKey))];
  const plans = new Map<string, MigrationPlan | Error>();
  await processInParallel(
    uniqueKeys,
    async (key) => {
      const request = requests.find((r) => planKey(r) === key);
      if (!request) return;
      try {
        const plan = await buildMigrationPlan({
          client,
          repository: request.repository,
          from: request.from,
          to: request.to,
        });
        plans.set(key, plan);
      } catch (error) {
        plans.set(key, toError(error));
      }
    },
    concurrency
  );

  const outcomes: TaskMigrationOutcome[] = requests.map((request) => {
    const planned = plans.get(planKey(request));
    return planned instanceof Error || planned === undefined
      ? { request, error: planned ?? new Error(`No plan was computed for ${request.repository}`) }
      : { request, plan: planned };
  });

  if (dryRun) {
    return outcomes;
  }

  const fetcher = options.source ?? new MigrationFetcher(client);
  const linked = options.resolver === 'legacy' ? undefined : new LinkedMigrationResolver(client, fetcher);
  const sourceFor = (plan: MigrationPlan): ScriptSource => (linked ? linked.sourceFor(plan) : fetcher);

  const byFile = new Map<string, TaskMigrationOutcome[]>();
  for (const outcome of outcomes) {
    const file = path.resolve(outcome.request.pipelineFile);
    byFile.set(file, [...(byFile.get(file) ?? []), outcome]);
  }

  await processInParallel(
    [...byFile.entries()],
    ([file, fileOutcomes]) => migrateFile(file, fileOutcomes, sourceFor, options),
    concurrency
  );

  return outcomes;
}

async function migrateFile(
  file: string,
  outcomes: TaskMigrationOutcome[],
  sourceFor: (plan: MigrationPlan) => ScriptSource,
  options: RunMigrationsOptions
): Promise<void> {
  const runnable = outcomes.filter((outcome) => outcome.plan && !outcome.error);
  if (runnable.length === 0) {
    return;
  }

  let pipeline: PipelineFile;
  try {
    pipeline = PipelineFile.load(file);
  } catch (error) {
    const failure = toError(error);
    runnable.forEach((outcome) => (outcome.error = failure));
    return;
  }

  try {
    await pipeline.withMigrationTarget(async (targetFile) => {
      let stopped: string | undefined;
      for (const outcome of runnable) {
        const { plan, request } = outcome;
        if (!plan) continue;
        if (stopped) {
          outcome.error = new Error(`Not attempted: migration of ${stopped} in ${file} failed first`);
          continue;
        }

        const hook = options.onTransition;
        const executor = new MigrationExecutor({
          source: sourceFor(plan),
          runner: options.runner,
          ...(hook ? { onTransition: (event: TransitionEvent) => hook(request, event) } : {}),
        });
        outcome.report = await executor.execute(plan, targetFile);
        if (outcome.report.status === 'failed') {
          stopped = request.repository;
        }
      }
    });
  } catch (error) {
    const failure = toError(error);
    runnable.filter((outcome) => !outcome.error).forEach((outcome) => (outcome.error = failure));
    return;
  }

  for (const outcome of runnable) {
    if (outcome.report?.status !== 'succeeded' || !outcome.plan) continue;
    const target = outcome.request.target ?? targetFromPlan(outcome.plan);
    if (!target) {
      logger.warn(
        `${outcome.request.repository} has no tag for version ${outcome.request.to}; ` +
          `bundle references in ${file} were left unchanged`
      );
      continue;
    }
    try {
      outcome.referencesUpdated = pipeline.updateBundleReferences(outcome.request.repository, target);
    } catch (error) {
      outcome.error = new PipelineFileError(
        `Cannot update bundle references of ${outcome.request.repository} in ${file}: ${getErrorMessage(error)}`,
        { cause: error }
      );
      continue;
    }
    if (outcome.referencesUpdated > 0) {
      logger.debug(`${file}: ${outcome.referencesUpdated} reference(s) now point at ${formatBundleReference(target)}`);
    }
  }
}

/**
 * The selected tag of the target version, when the registry has one.
 */
export function targetFromPlan(plan: MigrationPlan): BundleReference | undefined {
  const last = plan.steps[plan.steps.length - 1];
  if (last && compareVersions(last.version, plan.to) === 0) {
    return { repository: plan.repository, tag: last.tag.name, digest: last.tag.digest };
  }
  return undefined;
}
