/**
 * Migration Fetcher
 *
 * A task bundle announces a migration with an annotation on its own
 * manifest. The script itself is a separate artifact that refers to the
 * bundle (OCI referrers API), carries the is-migration annotation, and holds
 * the script as its first layer.
 */

import type { OciDescriptor, OciManifest, RegistryClient } from '../registry/types.js';
import { wrapError } from '../utils/error-utils.js';
import {
  IncorrectMigrationAttachmentError,
  MalformedRegistryDocumentError,
  MigrationToolError,
  NoScriptAttachedError,
  TransportFailureError,
} from './errors.js';
import type { Tag } from './tag-index.js';
import { formatVersion, type Version } from './version.js';

export const ANNOTATION_HAS_MIGRATION = 'dev.konflux-ci.task.has-migration';
export const ANNOTATION_IS_MIGRATION = 'dev.konflux-ci.task.is-migration';
/** Digest of the closest earlier bundle of the repository that has a migration */
export const ANNOTATION_PREVIOUS_MIGRATION_BUNDLE = 'dev.konflux-ci.task.previous-migration-bundle';
export const MIGRATION_ARTIFACT_TYPE = 'text/x-shellscript';

export interface MigrationScript {
  version: Version;
  /** Tag the script was resolved from */
  tag: string;
  /** Digest of the referrer artifact holding the script */
  digest: string;
  content: string;
}

export function isTrue(value: string | undefined): boolean {
  return value?.trim().toLowerCase() === 'true';
}

export class MigrationFetcher {
  private readonly decoder = new TextDecoder('utf-8');

  constructor(private readonly client: RegistryClient) {}

  /**
   * @throws NoScriptAttachedError when the version ships no migration
   * @throws TransportFailureError when the registry cannot be reached
   * @throws IncorrectMigrationAttachmentError when the attachment is ambiguous or malformed
   */
  async fetch(repository: string, tag: Tag): Promise<MigrationScript> {
    try {
      return await this.resolve(repository, tag);
    } catch (error) {
      if (MigrationToolError.isMigrationToolError(error)) {
        throw error;
      }
      throw new TransportFailureError(
        wrapError(error, `Cannot fetch migration of ${repository}:${tag.name}`).message,
        undefined,
        { cause: error }
      );
    }
  }

  private async resolve(repository: string, tag: Tag): Promise<MigrationScript> {
    const bundleManifest = await this.client.getManifest(repository, tag.digest);
    if (!isTrue(bundleManifest.annotations?.[ANNOTATION_HAS_MIGRATION])) {
      throw new NoScriptAttachedError(repository, tag.name, 'bundle is not annotated as having a migration');
    }

    const attachment = await this.findAttachment(repository, tag);
    const scriptManifest = await this.getAttachmentManifest(repository, tag, attachment.digest);
    const [layer] = scriptManifest.layers;
    if (!layer) {
      throw new IncorrectMigrationAttachmentError(
        `Migration artifact ${attachment.digest} of ${repository}:${tag.name} has no layers`
      );
    }

    const blob = await this.client.getBlob(repository, layer.digest);
    return {
      version: tag.version,
      tag: tag.name,
      digest: attachment.digest,
      content: this.decoder.decode(blob),
    };
  }

  private async getAttachmentManifest(repository: string, tag: Tag, digest: string): Promise<OciManifest> {
    try {
      return await this.client.getManifest(repository, digest);
    } catch (error) {
      if (MalformedRegistryDocumentError.isMalformedRegistryDocumentError(error)) {
        throw new IncorrectMigrationAttachmentError(
          `Migration artifact ${digest} of ${repository}:${tag.name} is malformed: ${error.message}`,
          { cause: error }
        );
      }
      throw error;
    }
  }

  private async findAttachment(repository: string, tag: Tag): Promise<OciDescriptor> {
    let descriptors: OciDescriptor[];
    try {
      const index = await this.client.listReferrers(repository, tag.digest, MIGRATION_ARTIFACT_TYPE);
      descriptors = index.manifests;
    } catch (error) {
      if (TransportFailureError.isTransportFailureError(error) && error.status === 404) {
        throw new NoScriptAttachedError(repository, tag.name, 'bundle has no referrers');
      }
      throw error;
    }

    const migrations = descriptors.filter((d) => isTrue(d.annotations?.[ANNOTATION_IS_MIGRATION]));
    if (migrations.length > 1) {
      throw new IncorrectMigrationAttachmentError(
        `${migrations.length} referrers of ${repository}:${tag.name} (version ` +
          `${formatVersion(tag.version)}) claim to be its migration script; there should be one`
      );
    }
    const [attachment] = migrations;
    if (!attachment) {
      throw new NoScriptAttachedError(repository, tag.name);
    }
    return attachment;
  }
}
