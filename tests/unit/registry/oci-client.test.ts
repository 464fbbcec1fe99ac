/**
 * Tests for the HTTP registry client against a stubbed fetch
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ConfigError,
  IncorrectMigrationAttachmentError,
  MalformedRegistryDocumentError,
  TransportFailureError,
} from '../../../src/migration/errors.js';
import { MigrationFetcher } from '../../../src/migration/fetcher.js';
import { OciRegistryClient, splitRepository } from '../../../src/registry/oci-client.js';
import { setDelayFunction } from '../../../src/utils/retry.js';

const REPO = 'quay.io/konflux-ci/task-clone';

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

const fetchMock = vi.fn<(...args: FetchArgs) => Promise<Response>>();

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function requestedUrls(): string[] {
  return fetchMock.mock.calls.map(([input]) => String(input));
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
  setDelayFunction(async () => undefined);
});

afterEach(() => {
  vi.unstubAllGlobals();
  setDelayFunction();
});

describe('splitRepository', () => {
  it('should separate a registry host from the repository name', () => {
    expect(splitRepository(REPO)).toEqual({ host: 'quay.io', name: 'konflux-ci/task-clone' });
    expect(splitRepository('localhost:5000/tasks/lint')).toEqual({ host: 'localhost:5000', name: 'tasks/lint' });
    expect(splitRepository('localhost/tasks/lint')).toEqual({ host: 'localhost', name: 'tasks/lint' });
  });

  it('should not mistake an organisation for a host', () => {
    expect(splitRepository('konflux-ci/task-clone')).toEqual({ name: 'konflux-ci/task-clone' });
    expect(splitRepository('task-clone')).toEqual({ name: 'task-clone' });
  });
});

describe('OciRegistryClient', () => {
  describe('listTags', () => {
    it('should page through the tag API and return tags oldest first', async () => {
      fetchMock
        .mockResolvedValueOnce(
          json({
            page: 1,
            has_additional: true,
            tags: [
              { name: '0.3', manifest_digest: 'sha256:3', start_ts: 300 },
              { name: '0.2', manifest_digest: 'sha256:2', start_ts: 200 },
            ],
          })
        )
        .mockResolvedValueOnce(
          json({ page: 2, has_additional: false, tags: [{ name: '0.1', manifest_digest: 'sha256:1' }] })
        );

      const tags = await new OciRegistryClient().listTags(REPO);

      expect(tags).toEqual([
        { name: '0.1', digest: 'sha256:1' },
        { name: '0.2', digest: 'sha256:2', createdAt: 200 },
        { name: '0.3', digest: 'sha256:3', createdAt: 300 },
      ]);
      expect(requestedUrls()).toEqual([
        'https://quay.io/api/v1/repository/konflux-ci/task-clone/tag/?onlyActiveTags=true&limit=100&page=1',
        'https://quay.io/api/v1/repository/konflux-ci/task-clone/tag/?onlyActiveTags=true&limit=100&page=2',
      ]);
    });

    it('should never cache tag listings', async () => {
      fetchMock.mockImplementation(async () => json({ page: 1, has_additional: false, tags: [] }));
      const client = new OciRegistryClient();

      await client.listTags(REPO);
      await client.listTags(REPO);

      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });

  describe('getManifest', () => {
    it('should request OCI manifests with the bearer token', async () => {
      fetchMock.mockResolvedValueOnce(json({ schemaVersion: 2, layers: [], annotations: { a: 'b' } }));

      const manifest = await new OciRegistryClient({ token: 'test-secret' }).getManifest(REPO, 'sha256:abc');

      expect(manifest.annotations).toEqual({ a: 'b' });
      const [input, init] = fetchMock.mock.calls[0] ?? [];
      expect(String(input)).toBe('https://quay.io/v2/konflux-ci/task-clone/manifests/sha256:abc');
      expect(init?.headers).toEqual({
        Accept: 'application/vnd.oci.image.manifest.v1+json, application/vnd.oci.image.index.v1+json',
        Authorization: 'Bearer test-secret',
      });
    });

    it('should memoise manifests fetched by digest', async () => {
      fetchMock.mockImplementation(async () => json({ schemaVersion: 2, layers: [] }));
      const client = new OciRegistryClient();

      await client.getManifest(REPO, 'sha256:abc');
      await client.getManifest(REPO, 'sha256:abc');

      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should not memoise manifests fetched by tag', async () => {
      fetchMock.mockImplementation(async () => json({ schemaVersion: 2, layers: [] }));
      const client = new OciRegistryClient();

      await client.getManifest(REPO, '0.2');
      await client.getManifest(REPO, '0.2');

      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should fail with the HTTP status and not retry client errors', async () => {
      fetchMock.mockResolvedValue(new Response('', { status: 404, statusText: 'Not Found' }));

      const error = await new OciRegistryClient().getManifest(REPO, 'sha256:abc').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportFailureError);
      expect(error).toMatchObject({
        status: 404,
        message: 'GET https://quay.io/v2/konflux-ci/task-clone/manifests/sha256:abc: 404 Not Found',
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should retry server errors', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('', { status: 503, statusText: 'Service Unavailable' }))
        .mockResolvedValueOnce(json({ schemaVersion: 2, layers: [] }));

      await expect(new OciRegistryClient().getManifest(REPO, 'sha256:abc')).resolves.toEqual({
        schemaVersion: 2,
        layers: [],
      });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should retry network failures up to the configured limit', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      const client = new OciRegistryClient({ retry: { maxRetries: 2, initialDelayMs: 1 } });
      const error = await client.getManifest(REPO, 'sha256:abc').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportFailureError);
      expect(error).toMatchObject({
        message: 'GET https://quay.io/v2/konflux-ci/task-clone/manifests/sha256:abc: fetch failed',
        status: undefined,
      });
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });
  });

  describe('malformed documents', () => {
    it('should reject a manifest without layers', async () => {
      fetchMock.mockResolvedValueOnce(json({ schemaVersion: 2 }));

      const error = await new OciRegistryClient().getManifest(REPO, 'sha256:abc').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MalformedRegistryDocumentError);
      expect(error).toMatchObject({
        message:
          'GET https://quay.io/v2/konflux-ci/task-clone/manifests/sha256:abc returned a malformed document: layers: Required',
      });
    });

    it('should reject a body that is not JSON without retrying', async () => {
      fetchMock.mockResolvedValue(new Response('<html>maintenance</html>'));

      await expect(new OciRegistryClient().getManifest(REPO, 'sha256:abc')).rejects.toThrow(
        /^GET https:\/\/quay\.io\/v2\/konflux-ci\/task-clone\/manifests\/sha256:abc returned a malformed document: not JSON/
      );
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should reject a referrers index without manifests', async () => {
      fetchMock.mockResolvedValueOnce(json({ schemaVersion: 2 }));

      await expect(new OciRegistryClient().listReferrers(REPO, 'sha256:abc')).rejects.toThrow(
        /returned a malformed document: manifests: Required$/
      );
    });

    it('should reject a tag page with a tag lacking its digest', async () => {
      fetchMock.mockResolvedValueOnce(json({ page: 1, has_additional: false, tags: [{ name: '0.1' }] }));

      await expect(new OciRegistryClient().listTags(REPO)).rejects.toThrow(
        /returned a malformed document: tags\.0\.manifest_digest: Required$/
      );
    });

    it('should not cache a malformed manifest', async () => {
      fetchMock
        .mockResolvedValueOnce(json({ schemaVersion: 2 }))
        .mockResolvedValueOnce(json({ schemaVersion: 2, layers: [] }));
      const client = new OciRegistryClient();

      await expect(client.getManifest(REPO, 'sha256:abc')).rejects.toBeInstanceOf(MalformedRegistryDocumentError);
      await expect(client.getManifest(REPO, 'sha256:abc')).resolves.toEqual({ schemaVersion: 2, layers: [] });
    });

    it('should report a layer-less migration artifact as an incorrect attachment', async () => {
      const base = 'https://quay.io/v2/konflux-ci/task-clone';
      const responses: Record<string, unknown> = {
        [`${base}/manifests/sha256:b2`]: {
          schemaVersion: 2,
          layers: [],
          annotations: { 'dev.konflux-ci.task.has-migration': 'true' },
        },
        [`${base}/referrers/sha256:b2?artifactType=text%2Fx-shellscript`]: {
          schemaVersion: 2,
          manifests: [
            {
              mediaType: 'application/vnd.oci.image.manifest.v1+json',
              digest: 'sha256:m2',
              size: 10,
              artifactType: 'text/x-shellscript',
              annotations: { 'dev.konflux-ci.task.is-migration': 'true' },
            },
          ],
        },
        [`${base}/manifests/sha256:m2`]: { schemaVersion: 2 },
      };
      fetchMock.mockImplementation(async (input) => {
        const body = responses[String(input)];
        return body === undefined ? new Response('', { status: 404 }) : json(body);
      });

      const error = await new MigrationFetcher(new OciRegistryClient())
        .fetch(REPO, { name: '0.2', version: { major: 0, minor: 2 }, digest: 'sha256:b2', position: 0 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IncorrectMigrationAttachmentError);
      expect(error).toMatchObject({
        message: `Migration artifact sha256:m2 of ${REPO}:0.2 is malformed: GET ${base}/manifests/sha256:m2 returned a malformed document: layers: Required`,
      });
    });
  });

  describe('getBlob', () => {
    it('should return the blob bytes', async () => {
      fetchMock.mockResolvedValueOnce(new Response('echo hi\n'));

      const blob = await new OciRegistryClient().getBlob(REPO, 'sha256:layer');

      expect(new TextDecoder().decode(blob)).toBe('echo hi\n');
      expect(requestedUrls()).toEqual(['https://quay.io/v2/konflux-ci/task-clone/blobs/sha256:layer']);
    });
  });

  describe('listReferrers', () => {
    it('should filter referrers by artifact type', async () => {
      fetchMock.mockResolvedValueOnce(json({ schemaVersion: 2, manifests: [] }));

      await new OciRegistryClient().listReferrers(REPO, 'sha256:abc', 'text/x-shellscript');

      expect(requestedUrls()).toEqual([
        'https://quay.io/v2/konflux-ci/task-clone/referrers/sha256:abc?artifactType=text%2Fx-shellscript',
      ]);
    });
  });

  describe('registry location', () => {
    it('should send every repository to a configured base URL', async () => {
      fetchMock.mockResolvedValueOnce(json({ schemaVersion: 2, layers: [] }));

      await new OciRegistryClient({ baseUrl: 'http://localhost:5000/' }).getManifest(REPO, 'sha256:abc');

      expect(requestedUrls()).toEqual(['http://localhost:5000/v2/konflux-ci/task-clone/manifests/sha256:abc']);
    });

    it('should refuse a repository without host when no base URL is configured', async () => {
      await expect(new OciRegistryClient().getManifest('konflux-ci/task-clone', 'sha256:abc')).rejects.toBeInstanceOf(
        ConfigError
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
