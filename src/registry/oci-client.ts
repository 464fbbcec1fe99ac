/**
 * HTTP registry client
 *
 * Tag enumeration goes through Quay's repository tag API, which reports a
 * creation timestamp per tag. Manifests, blobs and referrers go through the
 * OCI distribution API. Content-addressed documents are memoised; tag
 * listings never are, since they change as releases are pushed.
 */

import type { z } from 'zod';
import { ConfigError, MalformedRegistryDocumentError, TransportFailureError } from '../migration/errors.js';
import { logger } from '../utils/logger.js';
import { LRUCache } from '../utils/lru-cache.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import {
  MEDIA_TYPE_OCI_IMAGE_INDEX_V1,
  MEDIA_TYPE_OCI_IMAGE_MANIFEST_V1,
  type OciImageIndex,
  type OciManifest,
  type RegistryClient,
  type TagInfo,
} from './types.js';
import {
  describeIssue,
  ociImageIndexSchema,
  ociManifestSchema,
  quayTagPageSchema,
  type QuayTag,
} from './schemas.js';

const TAG_PAGE_SIZE = 100;
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_CACHE_SIZE = 256;

export interface OciRegistryClientOptions {
  /**
   * Base URL used for every repository instead of `https://<host>`, e.g. a
   * local registry at `http://localhost:5000`
   */
  baseUrl?: string;
  /** Bearer token sent with every request */
  token?: string;
  timeoutMs?: number;
  retry?: Pick<RetryOptions, 'maxRetries' | 'initialDelayMs'>;
  cacheSize?: number;
}

interface RepositoryLocation {
  baseUrl: string;
  /** Repository path without the registry host, e.g. `konflux-ci/task-clone` */
  name: string;
}

/**
 * Split `quay.io/org/repo` into registry host and repository name. A first
 * segment without a dot, colon or `localhost` is not a host.
 */
export function splitRepository(repository: string): { host?: string; name: string } {
  const slash = repository.indexOf('/');
  if (slash === -1) {
    return { name: repository };
  }
  const first = repository.slice(0, slash);
  if (first.includes('.') || first.includes(':') || first === 'localhost') {
    return { host: first, name: repository.slice(slash + 1) };
  }
  return { name: repository };
}

export class OciRegistryClient implements RegistryClient {
  private readonly manifests: LRUCache<string, OciManifest>;
  private readonly referrers: LRUCache<string, OciImageIndex>;
  private readonly blobs: LRUCache<string, Uint8Array>;

  constructor(private readonly options: OciRegistryClientOptions = {}) {
    const cacheSize = options.cacheSize ?? DEFAULT_CACHE_SIZE;
    this.manifests = new LRUCache(cacheSize);
    this.referrers = new LRUCache(cacheSize);
    this.blobs = new LRUCache(cacheSize);
  }

  /**
   * Tags oldest first. Quay pages newest first, so pages are concatenated
   * and reversed.
   */
  async listTags(repository: string): Promise<TagInfo[]> {
    const { baseUrl, name } = this.locate(repository);
    const collected: QuayTag[] = [];

    for (let page = 1; ; page++) {
      const url = new URL(`${baseUrl}/api/v1/repository/${name}/tag/`);
      url.searchParams.set('onlyActiveTags', 'true');
      url.searchParams.set('limit', String(TAG_PAGE_SIZE));
      url.searchParams.set('page', String(page));

      const data = await this.getJson(url.toString(), 'application/json', quayTagPageSchema);
      collected.push(...data.tags);
      if (!data.has_additional) break;
    }

    return collected.reverse().map((tag) => ({
      name: tag.name,
      digest: tag.manifest_digest,
      ...(tag.start_ts !== undefined ? { createdAt: tag.start_ts } : {}),
    }));
  }

  async getManifest(repository: string, reference: string): Promise<OciManifest> {
    const { baseUrl, name } = this.locate(repository);
    const load = () =>
      this.getJson(
        `${baseUrl}/v2/${name}/manifests/${reference}`,
        [MEDIA_TYPE_OCI_IMAGE_MANIFEST_V1, MEDIA_TYPE_OCI_IMAGE_INDEX_V1].join(', '),
        ociManifestSchema
      );

    // Tag references can move; only digests are safe to memoise
    if (!reference.startsWith('sha256:')) {
      return load();
    }
    return this.manifests.getOrLoad(`${repository}@${reference}`, load);
  }

  async getBlob(repository: string, digest: string): Promise<Uint8Array> {
    const { baseUrl, name } = this.locate(repository);
    return this.blobs.getOrLoad(`${repository}@${digest}`, async () => {
      const response = await this.request(`${baseUrl}/v2/${name}/blobs/${digest}`, '*/*');
      return new Uint8Array(await response.arrayBuffer());
    });
  }

  async listReferrers(
    repository: string,
    digest: string,
    artifactType?: string
  ): Promise<OciImageIndex> {
    const { baseUrl, name } = this.locate(repository);
    const url = new URL(`${baseUrl}/v2/${name}/referrers/${digest}`);
    if (artifactType) {
      url.searchParams.set('artifactType', artifactType);
    }
    return this.referrers.getOrLoad(`${repository}@${digest}?${artifactType ?? ''}`, () =>
      this.getJson(url.toString(), MEDIA_TYPE_OCI_IMAGE_INDEX_V1, ociImageIndexSchema)
    );
  }

  private locate(repository: string): RepositoryLocation {
    const { host, name } = splitRepository(repository);
    if (this.options.baseUrl) {
      return { baseUrl: this.options.baseUrl.replace(/\/+$/, ''), name };
    }
    if (!host) {
      throw new ConfigError(
        `Repository ${repository} has no registry host and no registry URL is configured`
      );
    }
    return { baseUrl: `https://${host}`, name };
  }

  private async getJson<T>(url: string, accept: string, schema: z.ZodType<T>): Promise<T> {
    const response = await this.request(url, accept);

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new MalformedRegistryDocumentError(url, `not JSON (${getErrorMessage(error)})`, { cause: error });
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw new MalformedRegistryDocumentError(url, describeIssue(result.error));
    }
    return result.data;
  }

  private request(url: string, accept: string): Promise<Response> {
    return withRetry(() => this.requestOnce(url, accept), {
      ...this.options.retry,
      onRetry: (error, attempt, delayMs) => {
        logger.debug(`GET ${url} failed (${error.message}); retry ${attempt + 1} in ${delayMs}ms`);
      },
    });
  }

  private async requestOnce(url: string, accept: string): Promise<Response> {
    const headers: Record<string, string> = { Accept: accept };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    const controller = new AbortController();
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, { headers, signal: controller.signal });
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : getErrorMessage(error);
      throw new TransportFailureError(`GET ${url}: ${reason}`, undefined, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new TransportFailureError(
        `GET ${url}: ${response.status} ${response.statusText}`.trimEnd(),
        response.status
      );
    }
    return response;
  }
}
