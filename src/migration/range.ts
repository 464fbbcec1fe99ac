import { InvalidRangeError } from './errors.js';
import type { VersionGroup } from './tag-index.js';
import { compareVersions, formatVersion, type Version } from './version.js';

/**
 * Throws InvalidRangeError unless `from <= to`.
 */
export function assertValidRange(from: Version, to: Version): void {
  if (compareVersions(from, to) > 0) {
    throw new InvalidRangeError(formatVersion(from), formatVersion(to));
  }
}

/**
 * Groups with `from < version <= to`, in ascending order. Versions need not
 * be contiguous; missing ones simply contribute nothing.
 */
export function resolveRange(
  groups: readonly VersionGroup[],
  from: Version,
  to: Version
): VersionGroup[] {
  assertValidRange(from, to);
  return groups
    .filter(
      (group) => compareVersions(group.version, from) > 0 && compareVersions(group.version, to) <= 0
    )
    .sort((a, b) => compareVersions(a.version, b.version));
}
