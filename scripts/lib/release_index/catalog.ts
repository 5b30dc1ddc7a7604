import { DuplicateReleaseError, MalformedEntryError } from '../errors.js';
import { compareBuilds, compareCodeUnits, compareVersions, parseVersion, type Version } from '../version.js';
import { parseReleaseEntry } from './entry_schema.js';
import type { RawRelease, Release, ReleaseCatalog } from './types.js';

interface SortableRelease {
  release: Release;
  version: Version;
}

function requireVersion(release: Release): Version {
  const version = parseVersion(release.version);
  if (!version) {
    throw new Error(`Release '${release.version}' has an unparsable version`);
  }
  return version;
}

function publishedMs(release: Release): number | null {
  return release.publishedAt === undefined ? null : Date.parse(release.publishedAt);
}

/**
 * Newest first: version precedence, then build metadata, then publish time, then
 * display name ascending.
 */
export function compareReleases(left: SortableRelease, right: SortableRelease): number {
  const byVersion = compareVersions(right.version, left.version);
  if (byVersion !== 0) {
    return byVersion;
  }

  const byBuild = compareBuilds(right.version, left.version);
  if (byBuild !== 0) {
    return byBuild;
  }

  const leftPublished = publishedMs(left.release);
  const rightPublished = publishedMs(right.release);
  if (leftPublished !== rightPublished) {
    if (leftPublished === null) {
      return 1;
    }
    if (rightPublished === null) {
      return -1;
    }
    return Math.sign(rightPublished - leftPublished);
  }

  return compareCodeUnits(
    left.release.name ?? left.release.version,
    right.release.name ?? right.release.version
  );
}

export function sortReleases(releases: readonly Release[]): Release[] {
  return releases
    .map((release) => ({ release, version: requireVersion(release) }))
    .sort(compareReleases)
    .map((entry) => entry.release);
}

function sameVersion(left: string, right: string): boolean {
  return parseVersion(left)?.normalized === parseVersion(right)?.normalized;
}

/**
 * Walks newest to oldest. A release's upper bound is the `requires` of its newer
 * neighbour when that differs from its own, otherwise the neighbour's upper bound.
 */
export function withCompatibilityRanges(releases: readonly Release[]): Release[] {
  const result: Release[] = [];
  let newer: Release | null = null;

  for (const release of releases) {
    if (release.requires === undefined) {
      result.push(release);
      newer = release;
      continue;
    }

    let max: string | undefined;
    if (newer?.requires !== undefined) {
      max = sameVersion(newer.requires, release.requires) ? newer.compatibility?.max : newer.requires;
    }

    const next: Release = {
      ...release,
      compatibility: max === undefined ? { min: release.requires } : { min: release.requires, max }
    };
    result.push(next);
    newer = next;
  }

  return result;
}

export function formatCompatibility(release: Release): string | null {
  if (!release.compatibility) {
    return null;
  }
  const { min, max } = release.compatibility;
  return max === undefined ? `>=${min}` : `>=${min},<${max}`;
}

function freezeRelease(release: Release): Release {
  return Object.freeze({
    ...release,
    ...(release.compatibility ? { compatibility: Object.freeze({ ...release.compatibility }) } : {}),
    ...(release.runtimes ? { runtimes: Object.freeze([...release.runtimes]) } : {}),
    ...(release.overrides ? { overrides: Object.freeze({ ...release.overrides }) } : {}),
    artifacts: Object.freeze(release.artifacts.map((artifact) => Object.freeze({ ...artifact })))
  });
}

export interface ParsedReleases {
  releases: Release[];
  warnings: MalformedEntryError[];
}

export function parseRawReleases(
  rawReleases: readonly RawRelease[],
  sourceWarnings: readonly MalformedEntryError[] = []
): ParsedReleases {
  const warnings: MalformedEntryError[] = [...sourceWarnings];
  const byVersion = new Map<string, RawRelease>();
  const releases: Release[] = [];

  for (const raw of rawReleases) {
    const parsed = parseReleaseEntry(raw);
    if (parsed instanceof MalformedEntryError) {
      warnings.push(parsed);
      continue;
    }

    const key = requireVersion(parsed).normalized;
    const existing = byVersion.get(key);
    if (existing) {
      throw new DuplicateReleaseError(key, `Duplicate release version '${key}' (${existing.label} and ${raw.label})`);
    }

    byVersion.set(key, raw);
    releases.push(parsed);
  }

  return { releases, warnings };
}

export function assembleCatalog(
  releases: readonly Release[],
  warnings: readonly MalformedEntryError[] = []
): ReleaseCatalog {
  const ordered = withCompatibilityRanges(sortReleases(releases));

  return Object.freeze({
    releases: Object.freeze(ordered.map(freezeRelease)),
    warnings: Object.freeze([...warnings])
  });
}

export function buildCatalog(
  rawReleases: readonly RawRelease[],
  sourceWarnings: readonly MalformedEntryError[] = []
): ReleaseCatalog {
  const { releases, warnings } = parseRawReleases(rawReleases, sourceWarnings);
  return assembleCatalog(releases, warnings);
}
