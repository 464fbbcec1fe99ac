/* eslint-disable no-console */
/**
 * Console logger shared by the CLI and the migration engine
 */

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !process.env.NO_COLOR && process.stdout.isTTY === true;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const GREEN = USE_COLOR ? '\x1b[32m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const YELLOW = USE_COLOR ? '\x1b[33m' : '';
const BLUE = USE_COLOR ? '\x1b[34m' : '';
const BOLD = USE_COLOR ? '\x1b[1m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

export type StepOutcome = 'applied' | 'skipped' | 'failed' | 'pending' | 'planned';

const STEP_MARKS: Record<StepOutcome, string> = {
  applied: `${GREEN}✓`,
  skipped: `${DIM}-`,
  failed: `${RED}✗`,
  pending: `${DIM}·`,
  planned: `${BLUE}→`,
};

let verbose = Boolean(process.env.DEBUG);

/**
 * Enables debug output regardless of the DEBUG environment variable.
 */
export function setVerbose(enabled: boolean): void {
  verbose = enabled || Boolean(process.env.DEBUG);
}

export const logger = {
  info(message: string): void {
    console.log(`${BLUE}ℹ ${message}${RESET}`);
  },

  success(message: string): void {
    console.log(`${GREEN}✓ ${message}${RESET}`);
  },

  error(message: string): void {
    console.error(`${RED}✗ ${message}${RESET}`);
  },

  warn(message: string): void {
    console.warn(`${YELLOW}⚠ ${message}${RESET}`);
  },

  debug(message: string): void {
    if (verbose) {
      console.log(`${DIM}🔍 ${message}${RESET}`);
    }
  },

  log(message: string): void {
    console.log(message);
  },

  newline(): void {
    console.log();
  },

  section(title: string): void {
    console.log();
    console.log(`${BOLD}━━━ ${title} ━━━${RESET}`);
  },

  step(outcome: StepOutcome, message: string): void {
    console.log(`  ${STEP_MARKS[outcome]} ${message}${RESET}`);
  },
};
