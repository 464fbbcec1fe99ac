/**
 * Migrate command - applies task bundle migrations to pipeline files
 *
 * Two ways in: a single task (`--task --from --to --file`) or the upgrades
 * list produced by the dependency-update agent (`-u` / `-f`).
 */

import * as fs from 'fs';
import * as path from 'path';
import { globSync } from 'glob';
import { loadConfig } from '../../config/loader.js';
import type { MigrateConfig } from '../../config/types.js';
import { InvalidUpgradesError, PipelineFileError } from '../../migration/errors.js';
import { runMigrations, type MigrationRequest, type TaskMigrationOutcome } from '../../migration/orchestrator.js';
import { formatPlanReport, formatRunReport } from '../../migration/report.js';
import { ShellScriptRunner, type ScriptRunner } from '../../migration/script-runner.js';
import type { RegistryClient } from '../../registry/types.js';
import { groupUpgradesByFile, parseUpgrades, toMigrationRequests } from '../../upgrades/upgrades.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { logger, setVerbose } from '../../utils/logger.js';
import { ExitCode, UsageError, exitCodeForOutcome, mostSevereExitCode } from '../exit-codes.js';
import { createRegistryClient, printReport } from '../utils/output.js';

export interface MigrateOptions {
  task?: string;
  from?: string;
  to?: string;
  file?: string;
  renovateUpgrades?: string;
  upgradesFile?: string;
  dryRun?: boolean;
  concurrency?: number;
  retries?: number;
  retryDelay?: number;
  registry?: string;
  shell?: string;
  useLegacyResolver?: boolean;
  config?: string;
  verbose?: boolean;
}

/**
 * Collaborators the command builds from configuration unless given.
 */
export interface MigrateCommandContext {
  client?: RegistryClient;
  runner?: ScriptRunner;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export async function migrateCommand(
  options: MigrateOptions,
  context: MigrateCommandContext = {}
): Promise<ExitCode> {
  const { env = process.env, cwd = process.cwd() } = context;
  setVerbose(options.verbose ?? false);

  const config = loadConfig({
    cliOverrides: {
      registry: options.registry,
      concurrency: options.concurrency,
      retries: options.retries,
      retryDelay: options.retryDelay,
      dryRun: options.dryRun,
      shell: options.shell,
      useLegacyResolver: options.useLegacyResolver,
    },
    configPath: options.config,
    env,
    cwd,
  });

  const requests = collectRequests(options, config, cwd);
  if (requests.length === 0) {
    logger.info('No task bundle upgrades to migrate');
    return ExitCode.Success;
  }

  const outcomes = await runMigrations(requests, {
    client: context.client ?? createRegistryClient(config),
    runner: context.runner ?? new ShellScriptRunner({ shell: config.scriptShell }),
    concurrency: config.concurrency,
    dryRun: config.dryRun,
    resolver: config.resolver,
    onTransition: (request, { step, from, to }) =>
      logger.debug(`${request.repository} step ${step.index} (${step.version}): ${from} -> ${to}`),
  });

  for (const outcome of outcomes) {
    printOutcome(outcome, config.dryRun, cwd);
  }

  const failed = outcomes.filter((outcome) => exitCodeForOutcome(outcome) !== ExitCode.Success).length;
  logger.newline();
  if (config.dryRun) {
    logger.info(`Dry run complete: ${outcomes.length - failed} plan(s) computed, ${failed} error(s)`);
  } else {
    logger.info(`Migration complete: ${outcomes.length - failed} task upgrade(s) migrated, ${failed} failed`);
  }

  return mostSevereExitCode(outcomes.map(exitCodeForOutcome));
}

function collectRequests(options: MigrateOptions, config: MigrateConfig, cwd: string): MigrationRequest[] {
  const upgradesJson = readUpgradesInput(options, cwd);
  if (upgradesJson !== undefined) {
    if (options.task) {
      throw new UsageError('--task cannot be combined with an upgrades list');
    }
    const upgrades = parseUpgrades(upgradesJson, { allowedPrefixes: config.allowedRegistryPrefixes });
    return toMigrationRequests(groupUpgradesByFile(upgrades), cwd);
  }

  const { task, from, to, file } = options;
  if (!task || !from || !to || !file) {
    throw new UsageError(
      'Specify --task, --from, --to and --file, or pass an upgrades list with --renovate-upgrades or --upgrades-file'
    );
  }

  return findPipelineFiles(file, cwd).map((pipelineFile) => ({ repository: task, from, to, pipelineFile }));
}

function readUpgradesInput(options: MigrateOptions, cwd: string): string | undefined {
  if (options.renovateUpgrades !== undefined && options.upgradesFile !== undefined) {
    throw new UsageError('--renovate-upgrades and --upgrades-file are mutually exclusive');
  }
  if (options.upgradesFile === undefined) {
    return options.renovateUpgrades;
  }
  const filePath = path.resolve(cwd, options.upgradesFile);
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new InvalidUpgradesError(`Cannot read upgrades file ${filePath}: ${getErrorMessage(error)}`);
  }
}

/**
 * Resolves a path or glob pattern to the pipeline files it names.
 */
export function findPipelineFiles(pattern: string, cwd: string): string[] {
  const files = globSync(pattern, { cwd, nodir: true, ignore: ['**/node_modules/**'] });
  if (files.length === 0) {
    throw new PipelineFileError(`No pipeline file matched ${pattern}`);
  }
  return files.map((file) => path.resolve(cwd, file)).sort();
}

function printOutcome(outcome: TaskMigrationOutcome, dryRun: boolean, cwd: string): void {
  const { request, plan, report, error } = outcome;
  const file = path.relative(cwd, request.pipelineFile) || request.pipelineFile;

  logger.section(`${request.repository} (${file})`);
  if (plan && report) {
    printReport(formatRunReport(plan, { ...report, pipelineFile: file }));
  } else if (plan && dryRun) {
    printReport(formatPlanReport(plan, file));
  }

  if (error) {
    logger.error(getErrorMessage(error));
  } else if (report?.status === 'succeeded') {
    const updated = outcome.referencesUpdated ?? 0;
    logger.success(updated > 0 ? `Updated ${updated} bundle reference(s)` : 'Migrated');
  } else if (report?.status === 'failed') {
    const output = report.steps.find((step) => step.state === 'failed')?.output;
    if (output) {
      logger.log(output.trimEnd());
    }
  }
}
