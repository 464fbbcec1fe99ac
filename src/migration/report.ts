/**
 * Human-readable run reports
 */

import type { StepOutcome } from '../utils/logger.js';
import type { MigrationRunReport, StepState } from './executor.js';
import type { MigrationPlan } from './planner.js';
import { formatVersion } from './version.js';

export interface ReportLine {
  /** Present for per-step lines */
  outcome?: StepOutcome;
  text: string;
}

const OUTCOME_BY_STATE: Record<StepState, StepOutcome> = {
  pending: 'pending',
  fetching: 'pending',
  applying: 'pending',
  applied: 'applied',
  skipped: 'skipped',
  failed: 'failed',
};

function header(plan: MigrationPlan, pipelineFile?: string): string {
  const range = `${plan.repository} ${formatVersion(plan.from)} -> ${formatVersion(plan.to)}`;
  return pipelineFile ? `${range} in ${pipelineFile}` : range;
}

/**
 * Lines for a plan that is not going to be executed.
 */
export function formatPlanReport(plan: MigrationPlan, pipelineFile?: string): ReportLine[] {
  const lines: ReportLine[] = [{ text: header(plan, pipelineFile) }];
  if (plan.steps.length === 0) {
    lines.push({ text: 'No migrations in range' });
    return lines;
  }
  for (const step of plan.steps) {
    const alternatives = step.candidates > 1 ? ` (selected from ${step.candidates} tags)` : '';
    lines.push({
      outcome: 'planned',
      text: `${step.index}. ${formatVersion(step.version)} ${step.tag.name}@${step.tag.digest}${alternatives}`,
    });
  }
  return lines;
}

/**
 * Lines for an executed plan: the resolved steps with their outcome, then a
 * summary naming the failed step and what had already been applied.
 */
export function formatRunReport(plan: MigrationPlan, report: MigrationRunReport): ReportLine[] {
  const lines: ReportLine[] = [{ text: header(plan, report.pipelineFile) }];
  if (report.steps.length === 0) {
    lines.push({ text: 'No migrations in range' });
    return lines;
  }

  for (const step of report.steps) {
    let text = `${step.index}. ${step.version} ${step.tag}`;
    if (step.state === 'skipped') {
      text += ' (no migration)';
    } else if (step.state === 'failed' && step.reason) {
      text += `: ${step.reason}`;
    }
    lines.push({ outcome: OUTCOME_BY_STATE[step.state], text });
  }

  const applied = report.steps.filter((step) => step.state === 'applied');
  if (report.status === 'succeeded') {
    const skipped = report.steps.filter((step) => step.state === 'skipped').length;
    lines.push({ text: `${applied.length} applied, ${skipped} skipped` });
    return lines;
  }

  const failed = report.steps.find((step) => step.index === report.failedStep);
  const where = failed ? `step ${failed.index} (${failed.version} ${failed.tag})` : 'an unknown step';
  lines.push({ text: `Stopped at ${where}: ${report.reason ?? 'unknown reason'}` });
  lines.push({
    text:
      applied.length > 0
        ? `Already applied: ${applied.map((step) => step.version).join(', ')}`
        : 'No migration was applied before the failure',
  });
  return lines;
}
