/**
 * Picks the tag whose attached migration is authoritative for a version group.
 *
 * Every tag of a released version is expected to carry bit-identical
 * migration content; publish-time CI enforces that, not this tool. When the
 * digests of a group disagree, the gate was bypassed and the most recently
 * created tag is taken as the author's latest intent. This is best effort:
 * anyone who already applied the older script will never see the new one.
 */

import { logger } from '../utils/logger.js';
import type { Tag, VersionGroup } from './tag-index.js';
import { formatVersion } from './version.js';

export function selectTag(group: VersionGroup): Tag {
  const [first, ...rest] = group.tags;
  if (!first) {
    throw new RangeError(`Version group ${formatVersion(group.version)} has no tags`);
  }
  if (rest.length === 0) {
    return first;
  }

  if (rest.every((tag) => tag.digest === first.digest)) {
    // Any tag would do; the lexically lowest keeps runs reproducible
    return group.tags.reduce((lowest, tag) => (tag.name < lowest.name ? tag : lowest));
  }

  const latest = latestTag(group.tags);
  logger.warn(
    `Tags of version ${formatVersion(group.version)} point at different content ` +
      `(${group.tags.map((t) => t.name).join(', ')}); using the latest, ${latest.name}`
  );
  return latest;
}

/**
 * Latest creation time wins when every tag has one and a single tag holds
 * the maximum; otherwise the tag appended last to the listing wins.
 */
function latestTag(tags: readonly Tag[]): Tag {
  const byPosition = tags.reduce((a, b) => (b.position > a.position ? b : a));

  const created: number[] = [];
  for (const tag of tags) {
    if (tag.createdAt === undefined) return byPosition;
    created.push(tag.createdAt);
  }
  const newest = Math.max(...created);
  const candidates = tags.filter((tag) => tag.createdAt === newest);
  return candidates.length === 1 ? candidates[0] : byPosition;
}

/**
 * True when the tags of a group disagree on content.
 */
export function hasDivergentDigests(group: VersionGroup): boolean {
  return new Set(group.tags.map((tag) => tag.digest)).size > 1;
}
