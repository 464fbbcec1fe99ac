/**
 * task-bundle-migrate command-line program
 */

import * as fs from 'fs';
import { Command } from 'commander';
import { getErrorMessage } from '../utils/error-utils.js';
import { logger } from '../utils/logger.js';
import { migrateCommand, type MigrateOptions } from './commands/migrate.js';
import { planCommand, type PlanOptions } from './commands/plan.js';
import { versionsCommand, type VersionsOptions } from './commands/versions.js';
import { ExitCode, exitCodeForError } from './exit-codes.js';

// package.json sits two levels above both src/cli and dist/cli
function readVersion(): string {
  try {
    const manifest: unknown = JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
      return String(manifest.version);
    }
  } catch (error) {
    logger.debug(`Cannot read package version: ${getErrorMessage(error)}`);
  }
  return '0.0.0-dev';
}

const parseInteger = (value: string): number => parseInt(value, 10);

/**
 * Runs a command body and turns its result, or the error it throws, into
 * the process exit status.
 */
export async function runCommand(command: () => Promise<ExitCode>): Promise<void> {
  try {
    process.exitCode = await command();
  } catch (error) {
    const code = exitCodeForError(error);
    logger.error(code === ExitCode.Unexpected ? `Command failed: ${getErrorMessage(error)}` : getErrorMessage(error));
    process.exitCode = code;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('task-bundle-migrate')
    .description('Apply the migrations shipped with task bundle updates to Tekton pipeline definitions')
    .version(readVersion(), '-v, --version', 'Output the current version');

  program.configureOutput({
    writeErr: (str) => {
      const trimmed = str.replace(/^error:\s*/i, '').trimEnd();
      if (trimmed) {
        logger.error(trimmed);
      }
    },
    writeOut: (str) => process.stdout.write(str),
  });

  // Usage errors are invalid input, not generic failures
  program.exitOverride((err) => {
    process.exit(err.exitCode === 0 ? ExitCode.Success : ExitCode.InvalidInput);
  });

  program
    .command('migrate')
    .description('Run migrations for task bundle upgrades against pipeline files')
    .option('-t, --task <repository>', 'Task bundle repository, e.g. quay.io/konflux-ci/task-clone')
    .option('--from <version>', 'Version currently referenced by the pipeline')
    .option('--to <version>', 'Version to migrate to')
    .option('--file <pattern>', 'Pipeline file path or glob pattern')
    .option('-u, --renovate-upgrades <json>', 'JSON list of upgrades from the dependency-update agent')
    .option('-f, --upgrades-file <path>', 'File holding the JSON list of upgrades')
    .option('--dry-run', 'Print the migration plans without running them')
    .option('--concurrency <n>', 'Task repositories discovered in parallel', parseInteger)
    .option('--retries <n>', 'Retries for transient registry failures', parseInteger)
    .option('--retry-delay <ms>', 'Delay before the first retry', parseInteger)
    .option('--registry <url>', 'Registry base URL used for every repository')
    .option('--shell <path>', 'Interpreter for migration scripts')
    .option('-l, --use-legacy-resolver', 'Inspect every version in range instead of following migration links')
    .option('-c, --config <path>', 'Configuration file')
    .option('--verbose', 'Verbose output', false)
    .action((options: MigrateOptions) => runCommand(() => migrateCommand(options)));

  program
    .command('versions <repository>')
    .description('List the versions of a task bundle and the tag selected for each')
    .option('--json', 'Output JSON', false)
    .option('--registry <url>', 'Registry base URL used for every repository')
    .option('-c, --config <path>', 'Configuration file')
    .option('--verbose', 'Verbose output', false)
    .action((repository: string, options: VersionsOptions) => runCommand(() => versionsCommand(repository, options)));

  program
    .command('plan <repository> <from> <to>')
    .description('Print the ordered migrations between two versions')
    .option('--registry <url>', 'Registry base URL used for every repository')
    .option('-c, --config <path>', 'Configuration file')
    .option('--verbose', 'Verbose output', false)
    .action((repository: string, from: string, to: string, options: PlanOptions) =>
      runCommand(() => planCommand(repository, from, to, options))
    );

  program.on('--help', () => {
    logger.newline();
    logger.section('Examples');
    logger.log('  $ task-bundle-migrate migrate --task quay.io/konflux-ci/task-clone --from 0.1 --to 0.3 --file .tekton/pr.yaml');
    logger.log("  $ task-bundle-migrate migrate --task quay.io/konflux-ci/task-clone --from 0.1 --to 0.3 --file '.tekton/*.yaml' --dry-run");
    logger.log('  $ task-bundle-migrate migrate -f upgrades.json');
    logger.log('  $ task-bundle-migrate versions quay.io/konflux-ci/task-clone --json');
    logger.log('  $ task-bundle-migrate plan quay.io/konflux-ci/task-clone 0.1 0.3');
    logger.newline();
    logger.section('Exit codes');
    logger.log('  0 success, 2 invalid input, 3 discovery or registry failure, 4 migration script failure');
    logger.newline();
  });

  return program;
}
