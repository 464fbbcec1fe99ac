/**
 * Tag Repository Index
 *
 * The registry is a flat, append-only list of tags, not a history. The index
 * treats it as an unordered source: release tags are parsed, bucketed by
 * version and sorted here. Listing order survives only as `position`, the
 * tie-break the selector falls back to.
 */

import type { RegistryClient, TagInfo } from '../registry/types.js';
import { logger } from '../utils/logger.js';
import { DiscoveryError } from './errors.js';
import { compareVersions, formatVersion, parseTagVersion, type Version } from './version.js';

export interface Tag {
  name: string;
  version: Version;
  digest: string;
  /** Epoch seconds, when the registry reports it */
  createdAt?: number;
  /** Index in the registry listing; larger means appended later */
  position: number;
}

export interface VersionGroup {
  version: Version;
  /** Non-empty, in registry listing order */
  tags: Tag[];
}

export async function listVersionGroups(
  client: RegistryClient,
  repository: string
): Promise<VersionGroup[]> {
  let listing: TagInfo[];
  try {
    listing = await client.listTags(repository);
  } catch (error) {
    throw new DiscoveryError(repository, error);
  }

  const groups = new Map<string, VersionGroup>();
  let ignored = 0;

  listing.forEach((info, position) => {
    const parsed = parseTagVersion(info.name);
    if (!parsed) {
      ignored++;
      logger.debug(`${repository}: ignoring tag ${info.name}, it encodes no version`);
      return;
    }

    const tag: Tag = {
      name: info.name,
      version: parsed.version,
      digest: info.digest,
      position,
      ...(info.createdAt !== undefined ? { createdAt: info.createdAt } : {}),
    };

    const key = formatVersion(parsed.version);
    const group = groups.get(key);
    if (group) {
      group.tags.push(tag);
    } else {
      groups.set(key, { version: parsed.version, tags: [tag] });
    }
  });

  logger.debug(
    `${repository}: ${listing.length - ignored} release tag(s) in ${groups.size} version group(s), ${ignored} ignored`
  );

  return [...groups.values()].sort((a, b) => compareVersions(a.version, b.version));
}
