/**
 * Pure version decisions over a remote's advertised tags and head.
 * Nothing here touches the filesystem or the network.
 */

import * as semver from 'semver';
import type { SemVer } from 'semver';
import { UnknownTagError, VcsError } from '../../errors.js';

export type RefKind = 'tag' | 'commit';

export interface ResolvedRef {
  kind: RefKind;
  ref: string;
}

export interface ResolutionResult extends ResolvedRef {
  /** Install: the ref was resolved. Update check: the ref differs from, and supersedes, the current one. */
  available: boolean;
}

export interface RemoteState {
  tags: readonly string[];
  /** Default-branch head commit, when known. */
  head: string | null;
}

export interface CurrentVersion {
  tag?: string;
  commit: string;
}

const VERSION_SHAPE = /^[vV]?(\d+)(?:\.(\d+))?(?:\.(\d+))?([-+].*)?$/;

/**
 * Parse a tag as a version. `v1.2` reads as 1.2.0; tags that are not numeric versions give null.
 */
export function parseTagVersion(tag: string): SemVer | null {
  const m = VERSION_SHAPE.exec(tag.trim());
  if (!m) return null;
  const [, major, minor = '0', patch = '0', suffix = ''] = m;
  return semver.parse(`${major}.${minor}.${patch}${suffix}`);
}

/** Stable version tags, newest first. Equal versions order by tag name. */
export function sortTags(tags: Iterable<string>): string[] {
  const parsed: { tag: string; version: SemVer }[] = [];
  for (const tag of new Set(tags)) {
    const version = parseTagVersion(tag);
    if (version && version.prerelease.length === 0) parsed.push({ tag, version });
  }
  parsed.sort((a, b) => semver.rcompare(a.version, b.version) || a.tag.localeCompare(b.tag));
  return parsed.map((p) => p.tag);
}

export function latestTag(tags: Iterable<string>): string | null {
  return sortTags(tags)[0] ?? null;
}

/**
 * What should be checked out. An explicit pin must exist upstream; otherwise the newest stable
 * tag wins, falling back to the head commit when there are no version tags.
 */
export function resolveTarget(input: { pin?: string } & RemoteState): ResolutionResult {
  if (input.pin) {
    if (!input.tags.includes(input.pin)) throw new UnknownTagError(input.pin);
    return { kind: 'tag', ref: input.pin, available: true };
  }
  const latest = latestTag(input.tags);
  if (latest) return { kind: 'tag', ref: latest, available: true };
  if (input.head) return { kind: 'commit', ref: input.head, available: true };
  throw new VcsError('resolve', 'remote advertises neither version tags nor a head commit');
}

/**
 * Compare the current version against the remote.
 *
 * A plugin on a tag only moves to a newer tag; a plugin tracking a commit moves to any
 * different head.
 */
export function compareWithCurrent(current: CurrentVersion, remote: RemoteState): ResolutionResult {
  if (current.tag) {
    const latest = latestTag(remote.tags);
    if (!latest) return { kind: 'tag', ref: current.tag, available: false };
    return { kind: 'tag', ref: latest, available: isNewerTag(latest, current.tag) };
  }
  if (remote.head && remote.head !== current.commit) {
    return { kind: 'commit', ref: remote.head, available: true };
  }
  return { kind: 'commit', ref: current.commit, available: false };
}

/** Candidate strictly newer than current. A current tag that is not a version compares by name. */
export function isNewerTag(candidate: string, current: string): boolean {
  const a = parseTagVersion(candidate);
  const b = parseTagVersion(current);
  if (a && b) return semver.gt(a, b);
  return candidate !== current;
}
