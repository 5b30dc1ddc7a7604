import { z } from 'zod';

import { MalformedEntryError } from '../errors.js';
import { isContainedRelativePath } from '../io.js';
import { parseVersion } from '../version.js';
import { RELEASE_STREAMS, type Artifact, type RawRelease, type Release } from './types.js';

const URL_SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:/;

export function isSafeDownloadReference(value: string): boolean {
  const scheme = value.match(URL_SCHEME_PATTERN);
  if (!scheme) {
    return !value.startsWith('//');
  }

  const lowered = scheme[0].toLowerCase();
  if (lowered !== 'http:' && lowered !== 'https:') {
    return false;
  }

  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

const versionField = z
  .string()
  .min(1)
  .refine((value) => parseVersion(value) !== null, 'expected a version like 1.2.3, 1.2.3-rc.1 or 1.2.3+build.1');

const timestampField = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'expected an ISO-8601 timestamp');

export const artifactSchema = z
  .object({
    name: z
      .string()
      .trim()
      .min(1)
      .refine(isContainedRelativePath, 'artifact name must be a file name or a relative path without . or .. segments'),
    url: z
      .string()
      .trim()
      .min(1)
      .refine(isSafeDownloadReference, 'url must be an http(s) URL or a relative path'),
    size: z.number().int().nonnegative().optional(),
    sha256: z
      .string()
      .regex(/^[A-Fa-f0-9]{64}$/, 'sha256 must be 64 hex characters')
      .transform((value) => value.toLowerCase())
      .optional()
  })
  .strict();

export const releaseEntrySchema = z.object({
  name: z.string().trim().min(1).optional(),
  // YAML turns unquoted timestamps into strings under the core schema; JSON feeds send strings too.
  published_at: timestampField.optional(),
  stream: z.enum(RELEASE_STREAMS).default('stable'),
  requires: versionField.optional(),
  notes: z.string().optional(),
  runtimes: z.array(z.number().int().positive(), { invalid_type_error: 'expected a list of runtime versions' }).optional(),
  overrides: z.record(z.string(), z.unknown(), { invalid_type_error: 'expected a mapping' }).optional(),
  artifacts: z.array(artifactSchema).default([])
});

export type ReleaseEntry = z.infer<typeof releaseEntrySchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : 'entry';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

function versionText(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  // Unquoted YAML keys such as `1.0` come through as numbers; they are never valid versions.
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}

export function parseReleaseEntry(raw: RawRelease): Release | MalformedEntryError {
  const text = versionText(raw.version);
  if (text === null) {
    return new MalformedEntryError(raw.label, `${raw.label}: expected the version to be a string`);
  }

  const version = parseVersion(text);
  if (!version) {
    return new MalformedEntryError(raw.label, `${raw.label}: '${text}' is not a valid version identifier`);
  }

  const result = releaseEntrySchema.safeParse(raw.data ?? {});
  if (!result.success) {
    return new MalformedEntryError(raw.label, `${raw.label}: ${formatIssues(result.error)}`);
  }

  const entry = result.data;
  const seen = new Set<string>();
  for (const artifact of entry.artifacts) {
    if (seen.has(artifact.name)) {
      return new MalformedEntryError(raw.label, `${raw.label}: duplicate artifact '${artifact.name}'`);
    }
    seen.add(artifact.name);
  }

  const artifacts: Artifact[] = entry.artifacts.map((artifact) => ({
    name: artifact.name,
    url: artifact.url,
    ...(artifact.size !== undefined ? { size: artifact.size } : {}),
    ...(artifact.sha256 !== undefined ? { sha256: artifact.sha256 } : {})
  }));

  return {
    version: version.raw,
    ...(entry.name !== undefined ? { name: entry.name } : {}),
    ...(entry.published_at !== undefined
      ? { publishedAt: new Date(entry.published_at).toISOString() }
      : {}),
    stream: entry.stream,
    ...(entry.requires !== undefined ? { requires: entry.requires.trim() } : {}),
    ...(entry.notes !== undefined ? { notes: entry.notes } : {}),
    ...(entry.runtimes !== undefined ? { runtimes: entry.runtimes } : {}),
    ...(entry.overrides !== undefined ? { overrides: entry.overrides } : {}),
    artifacts
  };
}
