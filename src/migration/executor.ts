/**
 * Migration Executor
 *
 * Applies a plan to one pipeline file, strictly one step at a time:
 *
 *   step: pending → fetching → applying → applied
 *                            ↘ skipped   (no script for this version)
 *                 ↘ failed   (transport / attachment / script failure)
 *   run:  running → succeeded | failed(at step)
 *
 * There is no rollback. Migrations are forward-only; steps applied before a
 * failure stay applied, the same as if a user had upgraded one release at a
 * time and stopped.
 */

import { toError } from '../utils/error-utils.js';
import { withFileLock } from '../utils/file-lock.js';
import { logger } from '../utils/logger.js';
import { ExecutionFailureError, NoScriptAttachedError } from './errors.js';
import type { MigrationScript } from './fetcher.js';
import type { MigrationPlan, PlanStep } from './planner.js';
import type { ScriptRunner } from './script-runner.js';
import type { Tag } from './tag-index.js';
import { formatVersion } from './version.js';

export type StepState = 'pending' | 'fetching' | 'applying' | 'applied' | 'skipped' | 'failed';
export type RunStatus = 'running' | 'succeeded' | 'failed';

/**
 * Where scripts come from. MigrationFetcher is the registry-backed source.
 */
export interface ScriptSource {
  fetch(repository: string, tag: Tag): Promise<MigrationScript>;
}

export interface StepReport {
  index: number;
  version: string;
  tag: string;
  state: StepState;
  /** Digest of the applied script artifact */
  scriptDigest?: string;
  reason?: string;
  /** Script output, kept for failed steps */
  output?: string;
}

export interface MigrationRunReport {
  repository: string;
  pipelineFile: string;
  status: Exclude<RunStatus, 'running'>;
  steps: StepReport[];
  /** 1-based index of the step the run stopped at */
  failedStep?: number;
  reason?: string;
  error?: Error;
}

export interface TransitionEvent {
  step: Readonly<StepReport>;
  from: StepState;
  to: StepState;
}

export interface MigrationExecutorOptions {
  source: ScriptSource;
  runner: ScriptRunner;
  onTransition?: (event: TransitionEvent) => void;
}

export class MigrationExecutor {
  constructor(private readonly options: MigrationExecutorOptions) {}

  /**
   * Runs every step of `plan` against `pipelineFile`. Failures are reported,
   * not thrown.
   */
  execute(plan: MigrationPlan, pipelineFile: string): Promise<MigrationRunReport> {
    return withFileLock(pipelineFile, () => this.run(plan, pipelineFile));
  }

  private async run(plan: MigrationPlan, pipelineFile: string): Promise<MigrationRunReport> {
    const steps = plan.steps.map(
      (step): StepReport => ({
        index: step.index,
        version: formatVersion(step.version),
        tag: step.tag.name,
        state: 'pending',
      })
    );
    const report: MigrationRunReport = {
      repository: plan.repository,
      pipelineFile,
      status: 'succeeded',
      steps,
    };

    for (const [i, step] of plan.steps.entries()) {
      const failure = await this.runStep(plan.repository, step, steps[i], pipelineFile);
      if (failure) {
        report.status = 'failed';
        report.failedStep = step.index;
        report.reason = failure.message;
        report.error = failure;
        break;
      }
    }

    return report;
  }

  /**
   * Returns the error that stops the run, or undefined to continue.
   */
  private async runStep(
    repository: string,
    step: PlanStep,
    stepReport: StepReport,
    pipelineFile: string
  ): Promise<Error | undefined> {
    const label = `${repository}:${step.tag.name} (${stepReport.version})`;

    this.transition(stepReport, 'fetching');
    let script: MigrationScript;
    try {
      script = await this.options.source.fetch(repository, step.tag);
    } catch (error) {
      if (NoScriptAttachedError.isNoScriptAttachedError(error)) {
        logger.info(`${label} has no migration, skipping`);
        this.transition(stepReport, 'skipped');
        return undefined;
      }
      return this.fail(stepReport, error);
    }

    this.transition(stepReport, 'applying');
    logger.info(`Applying migration of ${label} to ${pipelineFile}`);
    try {
      const result = await this.options.runner.run({ script, pipelineFile });
      logger.debug(`${label} output:\n${result.output}`);
      if (result.exitCode !== 0) {
        const status = result.signal ? `signal ${result.signal}` : `exit code ${result.exitCode}`;
        stepReport.output = result.output;
        return this.fail(
          stepReport,
          new ExecutionFailureError(`Migration script of ${label} failed with ${status}`, result.exitCode, result.output)
        );
      }
    } catch (error) {
      return this.fail(stepReport, error);
    }

    stepReport.scriptDigest = script.digest;
    this.transition(stepReport, 'applied');
    return undefined;
  }

  private fail(stepReport: StepReport, error: unknown): Error {
    const failure = toError(error);
    stepReport.reason = failure.message;
    this.transition(stepReport, 'failed');
    return failure;
  }

  private transition(step: StepReport, to: StepState): void {
    const from = step.state;
    step.state = to;
    this.options.onTransition?.({ step: { ...step }, from, to });
  }
}
