/**
 * Runs a migration script against a pipeline file in a subprocess.
 *
 * Contract seen by the script:
 *   - argv[1] is the pipeline file path (absolute)
 *   - PIPELINE_FILE holds the same path
 *   - the working directory is the directory containing the pipeline file
 *   - the host environment is inherited; nothing else is granted
 */

import { spawn } from 'node:child_process';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { MigrationScript } from './fetcher.js';

export interface ScriptRunRequest {
  script: MigrationScript;
  pipelineFile: string;
}

export interface ScriptRunResult {
  /** null when the process was terminated by a signal */
  exitCode: number | null;
  signal?: NodeJS.Signals;
  /** stdout and stderr, interleaved as received */
  output: string;
}

/**
 * Capability the executor applies scripts through. Tests substitute a
 * recording double.
 */
export interface ScriptRunner {
  run(request: ScriptRunRequest): Promise<ScriptRunResult>;
}

export interface ShellScriptRunnerOptions {
  /** Interpreter invoked as `<shell> <script> <pipeline file>` (default: bash) */
  shell?: string;
  /** Extra environment variables layered over the host environment */
  env?: Record<string, string>;
}

export class ShellScriptRunner implements ScriptRunner {
  private readonly shell: string;

  constructor(private readonly options: ShellScriptRunnerOptions = {}) {
    this.shell = options.shell ?? 'bash';
  }

  async run(request: ScriptRunRequest): Promise<ScriptRunResult> {
    const pipelineFile = path.resolve(request.pipelineFile);
    const tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'task-migration-'));
    const scriptFile = path.join(tempDir, 'migration.sh');

    try {
      await fs.promises.writeFile(scriptFile, request.script.content, { mode: 0o700 });
      return await this.spawnScript(scriptFile, pipelineFile);
    } finally {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
    }
  }

  private spawnScript(scriptFile: string, pipelineFile: string): Promise<ScriptRunResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.shell, [scriptFile, pipelineFile], {
        cwd: path.dirname(pipelineFile),
        env: { ...process.env, ...this.options.env, PIPELINE_FILE: pipelineFile },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const chunks: Buffer[] = [];
      child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => chunks.push(chunk));

      child.on('error', reject);
      child.on('close', (code, signal) => {
        const output = Buffer.concat(chunks).toString('utf8');
        resolve(signal ? { exitCode: code, signal, output } : { exitCode: code, output });
      });
    });
  }
}
