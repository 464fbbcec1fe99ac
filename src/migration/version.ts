/**
 * Task version model
 *
 * Task bundles are versioned as `<major>.<minor>` or `<major>.<minor>.<patch>`.
 * Ordering is numeric segment by segment, and a version without a patch
 * segment sorts before every patch release of the same minor line:
 *
 *   0.2 < 0.2.1 < 0.3 < 0.3.1
 */

import { VersionParseError } from './errors.js';

export interface Version {
  readonly major: number;
  readonly minor: number;
  /** Absent for two-segment versions such as `0.3` */
  readonly patch?: number;
}

export type Ordering = -1 | 0 | 1;

const VERSION_RE = /^(\d+)\.(\d+)(?:\.(\d+))?$/;

// `<version>` or `<version>-<discriminator>`, e.g. 0.2-18a61693389c
const TAG_RE = /^(\d+\.\d+(?:\.\d+)?)(?:-(.+))?$/;

// Larger segments lose precision and would merge distinct versions
function toSegment(digits: string, input: string): number {
  const value = Number(digits);
  if (!Number.isSafeInteger(value)) {
    throw new VersionParseError(input);
  }
  return value;
}

export function parseVersion(text: string): Version {
  const match = VERSION_RE.exec(text);
  if (!match) {
    throw new VersionParseError(text);
  }
  const [, majorText, minorText, patchText] = match;
  const major = toSegment(majorText, text);
  const minor = toSegment(minorText, text);
  return patchText === undefined ? { major, minor } : { major, minor, patch: toSegment(patchText, text) };
}

/**
 * Like parseVersion, but returns null instead of throwing.
 */
export function tryParseVersion(text: string): Version | null {
  try {
    return parseVersion(text);
  } catch (error) {
    if (VersionParseError.isVersionParseError(error)) {
      return null;
    }
    throw error;
  }
}

export function compareVersions(a: Version, b: Version): Ordering {
  if (a.major !== b.major) return a.major < b.major ? -1 : 1;
  if (a.minor !== b.minor) return a.minor < b.minor ? -1 : 1;
  if (a.patch === b.patch) return 0;
  // A missing patch sorts before any explicit patch, including .0
  if (a.patch === undefined) return -1;
  if (b.patch === undefined) return 1;
  return a.patch < b.patch ? -1 : 1;
}

export function versionsEqual(a: Version, b: Version): boolean {
  return compareVersions(a, b) === 0;
}

export function formatVersion(version: Version): string {
  const base = `${version.major}.${version.minor}`;
  return version.patch === undefined ? base : `${base}.${version.patch}`;
}

export interface ParsedTagName {
  version: Version;
  /** Text after the first `-`, e.g. a commit hash or build revision */
  discriminator?: string;
}

/**
 * Recover the version from a release tag name. Tags that encode no version
 * (moving pointers, digest-named tags, segments too large to compare) yield
 * null.
 */
export function parseTagVersion(tagName: string): ParsedTagName | null {
  const match = TAG_RE.exec(tagName);
  const version = match ? tryParseVersion(match[1]) : null;
  if (!match || !version) {
    return null;
  }
  return match[2] === undefined ? { version } : { version, discriminator: match[2] };
}
