/**
 * Pipeline definition files (Tekton `Pipeline` and `PipelineRun` YAML)
 *
 * Migration scripts edit a file holding a Pipeline document. A Pipeline file
 * is handed to them as is; for a PipelineRun, the embedded
 * `spec.pipelineSpec` is extracted to a temporary `{ spec: ... }` document,
 * migrated there, and merged back only if it changed.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as YAML from 'js-yaml';
import { PipelineFileError } from '../migration/errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { formatBundleReference, parseBundleReference, type BundleReference } from './bundle-reference.js';

export type PipelineKind = 'Pipeline' | 'PipelineRun';

type YamlMap = Record<string, unknown>;

export interface TaskBundleUsage {
  /** Name of the pipeline task using the bundle */
  taskName: string;
  /** Raw `bundle` param value */
  reference: string;
  bundle: BundleReference;
}

function isMap(value: unknown): value is YamlMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function fileChecksum(filePath: string): string {
  return crypto.createHash('sha256').update(fs.readFileSync(filePath)).digest('hex');
}

/**
 * True when block sequences sit at their parent key's indentation
 * (`key:\n- item`), the layout most Tekton files use.
 */
export function detectUnindentedSequences(text: string): boolean {
  const lines = text.split('\n');
  for (let i = 0; i < lines.length - 1; i++) {
    const key = /^(\s*)[^\s#-][^:]*:\s*$/.exec(lines[i]);
    const item = /^(\s*)- /.exec(lines[i + 1]);
    if (key && item) {
      return item[1].length === key[1].length;
    }
  }
  return true;
}

export class PipelineFile {
  private constructor(
    readonly filePath: string,
    readonly kind: PipelineKind,
    private document: YamlMap,
    private readonly noArrayIndent: boolean
  ) {}

  static load(filePath: string): PipelineFile {
    const absolute = path.resolve(filePath);
    if (!fs.existsSync(absolute)) {
      throw new PipelineFileError(`Pipeline file does not exist: ${filePath}`);
    }
    const text = fs.readFileSync(absolute, 'utf8');
    let document: unknown;
    try {
      document = YAML.load(text);
    } catch (error) {
      throw new PipelineFileError(`${filePath} is not valid YAML: ${getErrorMessage(error)}`, { cause: error });
    }
    if (!isMap(document)) {
      throw new PipelineFileError(`${filePath} does not contain a YAML mapping`);
    }
    const kind = document.kind;
    if (kind !== 'Pipeline' && kind !== 'PipelineRun') {
      throw new PipelineFileError(`${filePath}: unsupported kind ${String(kind)}, expected Pipeline or PipelineRun`);
    }
    if (kind === 'PipelineRun' && !isMap(isMap(document.spec) ? document.spec.pipelineSpec : undefined)) {
      throw new PipelineFileError(`${filePath}: PipelineRun has no embedded spec.pipelineSpec`);
    }
    return new PipelineFile(absolute, kind, document, detectUnindentedSequences(text));
  }

  /**
   * The Pipeline `spec`, or the PipelineRun's `spec.pipelineSpec`.
   */
  get pipelineSpec(): YamlMap {
    const spec = isMap(this.document.spec) ? this.document.spec : {};
    if (this.kind === 'Pipeline') {
      return spec;
    }
    return isMap(spec.pipelineSpec) ? spec.pipelineSpec : {};
  }

  /**
   * Bundle-resolved task references in `tasks` and `finally`, optionally
   * restricted to one repository.
   */
  findBundleReferences(repository?: string): TaskBundleUsage[] {
    const spec = this.pipelineSpec;
    const usages: TaskBundleUsage[] = [];

    for (const task of [...asList(spec.tasks), ...asList(spec.finally)]) {
      if (!isMap(task) || !isMap(task.taskRef) || task.taskRef.resolver !== 'bundles') continue;

      const bundleParam = asList(task.taskRef.params).find(
        (param): param is YamlMap => isMap(param) && param.name === 'bundle'
      );
      if (!bundleParam || typeof bundleParam.value !== 'string') continue;

      const bundle = parseBundleReference(bundleParam.value);
      if (repository && bundle.repository !== repository) continue;

      usages.push({
        taskName: typeof task.name === 'string' ? task.name : '',
        reference: bundleParam.value,
        bundle,
      });
    }

    return usages;
  }

  /**
   * Hands a file holding a Pipeline document to `migrate`, then folds any
   * change back into this file.
   */
  async withMigrationTarget<T>(migrate: (targetFile: string) => Promise<T>): Promise<T> {
    if (this.kind === 'Pipeline') {
      const result = await migrate(this.filePath);
      this.reload();
      return result;
    }

    const tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'pipeline-spec-'));
    const tempFile = path.join(tempDir, 'pipeline.yaml');
    try {
      fs.writeFileSync(tempFile, this.dump({ spec: this.pipelineSpec }), 'utf8');
      const before = fileChecksum(tempFile);

      const result = await migrate(tempFile);

      if (fileChecksum(tempFile) !== before) {
        const migrated = YAML.load(fs.readFileSync(tempFile, 'utf8'));
        if (!isMap(migrated) || !isMap(migrated.spec)) {
          throw new Error(`Migrated pipeline spec of ${this.filePath} is not a { spec: ... } mapping`);
        }
        this.reload();
        const spec = isMap(this.document.spec) ? this.document.spec : {};
        this.document.spec = { ...spec, pipelineSpec: migrated.spec };
        fs.writeFileSync(this.filePath, this.dump(this.document), 'utf8');
      }
      return result;
    } finally {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
    }
  }

  /**
   * Rewrites every reference to `repository` to point at `target`. Edits the
   * raw text so the rest of the file keeps its formatting and comments.
   * Returns the number of references changed.
   */
  updateBundleReferences(repository: string, target: BundleReference): number {
    const replacement = formatBundleReference(target);
    const usages = this.findBundleReferences(repository).filter((usage) => usage.reference !== replacement);
    if (usages.length === 0) {
      return 0;
    }

    let text = fs.readFileSync(this.filePath, 'utf8');
    for (const reference of new Set(usages.map((usage) => usage.reference))) {
      text = text.split(reference).join(replacement);
    }
    fs.writeFileSync(this.filePath, text, 'utf8');
    this.reload();
    return usages.length;
  }

  private reload(): void {
    const document = YAML.load(fs.readFileSync(this.filePath, 'utf8'));
    if (!isMap(document)) {
      throw new Error(`${this.filePath} no longer contains a YAML mapping`);
    }
    this.document = document;
  }

  private dump(value: unknown): string {
    return YAML.dump(value, { noArrayIndent: this.noArrayIndent, lineWidth: -1, noRefs: true });
  }
}
