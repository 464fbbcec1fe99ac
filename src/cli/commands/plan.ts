/**
 * Plan command - prints the migrations between two versions without
 * running them
 */

import { loadConfig } from '../../config/loader.js';
import { buildMigrationPlan, formatPlan } from '../../migration/planner.js';
import { assertValidRange } from '../../migration/range.js';
import { parseVersion } from '../../migration/version.js';
import type { RegistryClient } from '../../registry/types.js';
import { logger, setVerbose } from '../../utils/logger.js';
import { ExitCode } from '../exit-codes.js';
import { createRegistryClient } from '../utils/output.js';

export interface PlanOptions {
  registry?: string;
  config?: string;
  verbose?: boolean;
}

export async function planCommand(
  repository: string,
  from: string,
  to: string,
  options: PlanOptions = {},
  client?: RegistryClient
): Promise<ExitCode> {
  setVerbose(options.verbose ?? false);

  // Bad input is reported before any configuration or registry access
  assertValidRange(parseVersion(from), parseVersion(to));

  const config = loadConfig({ cliOverrides: { registry: options.registry }, configPath: options.config });
  const plan = await buildMigrationPlan({ client: client ?? createRegistryClient(config), repository, from, to });
  logger.log(formatPlan(plan));
  return ExitCode.Success;
}
