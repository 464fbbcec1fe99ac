/**
 * Tests for batch planning and per-file execution of task upgrades
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DiscoveryError, PipelineFileError } from '../../../src/migration/errors.js';
import { runMigrations, targetFromPlan, type MigrationRequest } from '../../../src/migration/orchestrator.js';
import { buildMigrationPlan } from '../../../src/migration/planner.js';
import { FakeRegistry, RecordingRunner } from '../../helpers/fake-registry.js';

const CLONE = 'quay.io/konflux-ci/task-clone';
const LINT = 'quay.io/konflux-ci/task-lint';

const PIPELINE = `apiVersion: tekton.dev/v1
kind: Pipeline
metadata:
  name: build
spec:
  tasks:
    - name: clone
      taskRef:
        resolver: bundles
        params:
          - name: name
            value: git-clone
          - name: bundle
            value: ${CLONE}:0.1@sha256:c01
          - name: kind
            value: task
    - name: lint
      taskRef:
        resolver: bundles
        params:
          - name: bundle
            value: ${LINT}:0.1@sha256:l01
`;

let tempDir: string;
let pipelineFile: string;

function registry(): FakeRegistry {
  return new FakeRegistry()
    .addTags(CLONE, [
      { name: '0.1', digest: 'sha256:c01' },
      { name: '0.2', digest: 'sha256:c02' },
      { name: '0.3', digest: 'sha256:c03' },
    ])
    .attachMigration(CLONE, 'sha256:c02', 'clone-0.2')
    .attachMigration(CLONE, 'sha256:c03', 'clone-0.3')
    .addTags(LINT, [
      { name: '0.1', digest: 'sha256:l01' },
      { name: '0.2', digest: 'sha256:l02' },
    ])
    .attachMigration(LINT, 'sha256:l02', 'lint-0.2');
}

function request(repository: string, from: string, to: string, file = pipelineFile): MigrationRequest {
  return { repository, from, to, pipelineFile: file };
}

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'orchestrator-test-'));
  pipelineFile = path.join(tempDir, 'pipeline.yaml');
  fs.writeFileSync(pipelineFile, PIPELINE, 'utf8');
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('runMigrations', () => {
  it('should run the plan and point the pipeline at the target bundle', async () => {
    const runner = new RecordingRunner();

    const [outcome] = await runMigrations([request(CLONE, '0.1', '0.3')], {
      client: registry(),
      runner,
      concurrency: 2,
    });

    expect(runner.contents).toEqual(['clone-0.2', 'clone-0.3']);
    expect(outcome?.error).toBeUndefined();
    expect(outcome?.report?.status).toBe('succeeded');
    expect(outcome?.referencesUpdated).toBe(1);
    const text = fs.readFileSync(pipelineFile, 'utf8');
    expect(text).toContain(`value: ${CLONE}:0.3@sha256:c03\n`);
    expect(text).toContain(`value: ${LINT}:0.1@sha256:l01\n`);
  });

  it('should prefer an explicit target reference', async () => {
    const target = { repository: CLONE, tag: '0.3-abc', digest: 'sha256:c03' };

    const [outcome] = await runMigrations([{ ...request(CLONE, '0.1', '0.3'), target }], {
      client: registry(),
      runner: new RecordingRunner(),
      concurrency: 1,
    });

    expect(outcome?.referencesUpdated).toBe(1);
    expect(fs.readFileSync(pipelineFile, 'utf8')).toContain(`value: ${CLONE}:0.3-abc@sha256:c03\n`);
  });

  it('should only plan in dry-run mode', async () => {
    const runner = new RecordingRunner();

    const [outcome] = await runMigrations([request(CLONE, '0.1', '0.3')], {
      client: registry(),
      runner,
      concurrency: 1,
      dryRun: true,
    });

    expect(outcome?.plan?.steps.map((s) => s.tag.name)).toEqual(['0.2', '0.3']);
    expect(outcome?.report).toBeUndefined();
    expect(runner.runs).toEqual([]);
    expect(fs.readFileSync(pipelineFile, 'utf8')).toBe(PIPELINE);
  });

  it('should keep a planning failure to its own request', async () => {
    const client = registry().failOn('listTags', LINT, new Error('connection reset'));
    const runner = new RecordingRunner();

    const [lint, clone] = await runMigrations([request(LINT, '0.1', '0.2'), request(CLONE, '0.1', '0.2')], {
      client,
      runner,
      concurrency: 2,
    });

    expect(lint?.error).toBeInstanceOf(DiscoveryError);
    expect(lint?.report).toBeUndefined();
    expect(clone?.report?.status).toBe('succeeded');
    expect(runner.contents).toEqual(['clone-0.2']);
  });

  it('should not start further upgrades of a file after one fails', async () => {
    const runner = new RecordingRunner().respond('clone-0.2', { exitCode: 2, output: 'boom' });

    const [clone, lint] = await runMigrations([request(CLONE, '0.1', '0.3'), request(LINT, '0.1', '0.2')], {
      client: registry(),
      runner,
      concurrency: 2,
    });

    expect(runner.contents).toEqual(['clone-0.2']);
    expect(clone?.report?.status).toBe('failed');
    expect(clone?.report?.failedStep).toBe(1);
    expect(lint?.error?.message).toBe(`Not attempted: migration of ${CLONE} in ${pipelineFile} failed first`);
    expect(fs.readFileSync(pipelineFile, 'utf8')).toBe(PIPELINE);
  });

  it('should run upgrades of one file in request order', async () => {
    const runner = new RecordingRunner();

    await runMigrations([request(LINT, '0.1', '0.2'), request(CLONE, '0.1', '0.3')], {
      client: registry(),
      runner,
      concurrency: 4,
    });

    expect(runner.contents).toEqual(['lint-0.2', 'clone-0.2', 'clone-0.3']);
  });

  it('should plan a repeated task upgrade once for several files', async () => {
    const second = path.join(tempDir, 'push.yaml');
    fs.writeFileSync(second, PIPELINE, 'utf8');
    const client = registry();

    const outcomes = await runMigrations([request(CLONE, '0.1', '0.2'), request(CLONE, '0.1', '0.2', second)], {
      client,
      runner: new RecordingRunner(),
      concurrency: 2,
    });

    expect(client.calls.filter((call) => call === `listTags ${CLONE}`)).toHaveLength(1);
    expect(outcomes.map((o) => o.report?.status)).toEqual(['succeeded', 'succeeded']);
  });

  it('should report a missing pipeline file on the outcome', async () => {
    const [outcome] = await runMigrations([request(CLONE, '0.1', '0.2', path.join(tempDir, 'missing.yaml'))], {
      client: registry(),
      runner: new RecordingRunner(),
      concurrency: 1,
    });

    expect(outcome?.error).toBeInstanceOf(PipelineFileError);
  });

  it('should leave references alone when the target version has no tag', async () => {
    const [outcome] = await runMigrations([request(CLONE, '0.1', '0.5')], {
      client: registry(),
      runner: new RecordingRunner(),
      concurrency: 1,
    });

    expect(outcome?.report?.status).toBe('succeeded');
    expect(outcome?.referencesUpdated).toBeUndefined();
    expect(fs.readFileSync(pipelineFile, 'utf8')).toBe(PIPELINE);
  });

  it('should only run migrations linked from the target bundle', async () => {
    const client = registry().linkPrevious(CLONE, 'sha256:c03', '');
    const runner = new RecordingRunner();

    const [outcome] = await runMigrations([request(CLONE, '0.1', '0.3')], { client, runner, concurrency: 1 });

    expect(runner.contents).toEqual(['clone-0.3']);
    expect(outcome?.report?.steps.map((s) => s.state)).toEqual(['skipped', 'applied']);
    expect(client.calls).not.toContain(`listReferrers ${CLONE} sha256:c02`);
  });

  it('should inspect every version with the legacy resolver', async () => {
    const client = registry().linkPrevious(CLONE, 'sha256:c03', '');
    const runner = new RecordingRunner();

    await runMigrations([request(CLONE, '0.1', '0.3')], { client, runner, concurrency: 1, resolver: 'legacy' });

    expect(runner.contents).toEqual(['clone-0.2', 'clone-0.3']);
  });

  it('should record a failed reference update on its own outcome', async () => {
    const second = path.join(tempDir, 'push.yaml');
    fs.writeFileSync(second, PIPELINE, 'utf8');
    const target = { repository: CLONE, tag: '0.3', digest: 'sha256:c03\n  - [' };

    const [broken, other] = await runMigrations(
      [{ ...request(CLONE, '0.1', '0.3'), target }, request(CLONE, '0.1', '0.3', second)],
      { client: registry(), runner: new RecordingRunner(), concurrency: 2 }
    );

    expect(broken?.report?.status).toBe('succeeded');
    expect(broken?.error).toBeInstanceOf(PipelineFileError);
    expect(broken?.error?.message.startsWith(`Cannot update bundle references of ${CLONE} in ${pipelineFile}: `)).toBe(
      true
    );
    expect(broken?.referencesUpdated).toBeUndefined();
    expect(other?.error).toBeUndefined();
    expect(other?.referencesUpdated).toBe(1);
    expect(fs.readFileSync(second, 'utf8')).toContain(`value: ${CLONE}:0.3@sha256:c03\n`);
  });

  it('should pass every transition to the observer with its request', async () => {
    const seen: string[] = [];

    await runMigrations([request(LINT, '0.1', '0.2')], {
      client: registry(),
      runner: new RecordingRunner(),
      concurrency: 1,
      onTransition: (req, event) => seen.push(`${req.repository} ${event.to}`),
    });

    expect(seen).toEqual([`${LINT} fetching`, `${LINT} applying`, `${LINT} applied`]);
  });
});

describe('targetFromPlan', () => {
  it('should use the selected tag of the target version', async () => {
    const plan = await buildMigrationPlan({ client: registry(), repository: CLONE, from: '0.1', to: '0.3' });
    expect(targetFromPlan(plan)).toEqual({ repository: CLONE, tag: '0.3', digest: 'sha256:c03' });
  });

  it('should return undefined when the target version is not released', async () => {
    const plan = await buildMigrationPlan({ client: registry(), repository: CLONE, from: '0.1', to: '0.4' });
    expect(targetFromPlan(plan)).toBeUndefined();
  });
});
