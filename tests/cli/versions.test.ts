/**
 * Tests for versions command
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  setVerbose: vi.fn(),
  logger: {
    log: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    section: vi.fn(),
  },
}));

import { versionsCommand, type VersionSummary } from '../../src/cli/commands/versions.js';
import { ExitCode } from '../../src/cli/exit-codes.js';
import { DiscoveryError } from '../../src/migration/errors.js';
import { logger } from '../../src/utils/logger.js';
import { FakeRegistry } from '../helpers/fake-registry.js';

const REPO = 'quay.io/konflux-ci/task-clone';

function registry(): FakeRegistry {
  return new FakeRegistry().addTags(REPO, [
    { name: 'latest', digest: 'sha256:c02' },
    { name: '0.1', digest: 'sha256:c01' },
    { name: '0.2', digest: 'sha256:c02' },
    { name: '0.2-b', digest: 'sha256:c02' },
    { name: '0.3-x', digest: 'sha256:c03', createdAt: 100 },
    { name: '0.3-y', digest: 'sha256:c04', createdAt: 50 },
  ]);
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe('versionsCommand', () => {
  it('should list one selected tag per version', async () => {
    const code = await versionsCommand(REPO, {}, registry());

    expect(code).toBe(ExitCode.Success);
    expect(logger.section).toHaveBeenCalledWith(REPO);
    expect(vi.mocked(logger.log).mock.calls).toEqual([
      ['  0.1        0.1@sha256:c01'],
      ['  0.2        0.2@sha256:c02 (also 0.2-b)'],
      ['  0.3        0.3-x@sha256:c03 (also 0.3-y; digests differ)'],
    ]);
  });

  it('should print JSON when asked', async () => {
    await versionsCommand(REPO, { json: true }, registry());

    const [[output]] = vi.mocked(logger.log).mock.calls;
    const summaries: VersionSummary[] = JSON.parse(String(output));
    expect(summaries.map((s) => [s.version, s.selected, s.divergent])).toEqual([
      ['0.1', '0.1', false],
      ['0.2', '0.2', false],
      ['0.3', '0.3-x', true],
    ]);
    expect(summaries[2]?.tags).toEqual([
      { name: '0.3-x', digest: 'sha256:c03', createdAt: 100 },
      { name: '0.3-y', digest: 'sha256:c04', createdAt: 50 },
    ]);
  });

  it('should warn when the repository has no versioned tag', async () => {
    const client = new FakeRegistry().addTags(REPO, [{ name: 'latest', digest: 'sha256:c01' }]);

    expect(await versionsCommand(REPO, {}, client)).toBe(ExitCode.Success);
    expect(logger.warn).toHaveBeenCalledWith(`No versioned tags found in ${REPO}`);
  });

  it('should fail when tags cannot be listed', async () => {
    const client = new FakeRegistry().failOn('listTags', REPO, new Error('unauthorized'));

    await expect(versionsCommand(REPO, {}, client)).rejects.toThrow(DiscoveryError);
  });
});
