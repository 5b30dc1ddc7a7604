import fg from 'fast-glob';
import fs from 'fs-extra';
import { createHash } from 'node:crypto';
import path from 'node:path';
import { parse } from 'yaml';

import { MalformedEntryError, SourceUnavailableError, describeCause } from '../../errors.js';
import { toPosixRelative } from '../../io.js';
import type { RawRelease, ReleaseSource } from '../types.js';
import { isRecord } from './document.js';

export const RELEASE_METADATA_FILES = ['release.yaml', 'release.yml'] as const;

export interface DirectorySourceOptions {
  baseUrl?: string;
}

export function downloadReference(directory: string, file: string, baseUrl?: string): string {
  const relative = [directory, ...file.split('/')].map((segment) => encodeURIComponent(segment)).join('/');
  return baseUrl ? `${baseUrl.replace(/\/+$/, '')}/${relative}` : relative;
}

async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

async function readMetadata(releaseDir: string, label: string): Promise<Record<string, unknown> | MalformedEntryError> {
  for (const fileName of RELEASE_METADATA_FILES) {
    const metadataPath = path.join(releaseDir, fileName);
    if (!(await fs.pathExists(metadataPath))) {
      continue;
    }

    let data: unknown;
    try {
      data = parse(await fs.readFile(metadataPath, 'utf8'));
    } catch (error) {
      return new MalformedEntryError(label, `${label}: cannot parse ${fileName}: ${describeCause(error)}`);
    }

    if (data === null || data === undefined) {
      return {};
    }
    if (!isRecord(data)) {
      return new MalformedEntryError(label, `${label}: expected ${fileName} to be a mapping`);
    }
    return data;
  }

  return {};
}

async function readReleaseDirectory(
  rootDir: string,
  directory: string,
  baseUrl: string | undefined
): Promise<RawRelease | MalformedEntryError> {
  const label = `release directory '${directory}'`;
  const releaseDir = path.join(rootDir, directory);
  const metadata = await readMetadata(releaseDir, label);
  if (metadata instanceof MalformedEntryError) {
    return metadata;
  }

  const files = (
    await fg('**/*', {
      cwd: releaseDir,
      dot: false,
      onlyFiles: true
    })
  )
    // Metadata files only count as such at the top of the release folder.
    .filter((file) => !RELEASE_METADATA_FILES.some((name) => name === file))
    .sort();

  const artifacts = await Promise.all(
    files.map(async (file) => {
      const filePath = path.join(releaseDir, file);
      const [stat, sha256] = await Promise.all([fs.stat(filePath), sha256File(filePath)]);
      return {
        name: file,
        url: downloadReference(directory, file, baseUrl),
        size: stat.size,
        sha256
      };
    })
  );

  return {
    label,
    version: directory,
    data: { ...metadata, artifacts }
  };
}

/**
 * Every immediate subdirectory of `rootDir` is one release named by its version. Every
 * file below it is an artifact named by its POSIX path within the folder; an optional
 * release.yaml at the top carries the remaining metadata.
 */
export function createDirectorySource(rootDir: string, options: DirectorySourceOptions = {}): ReleaseSource {
  const origin = toPosixRelative(rootDir);

  return {
    kind: 'directory',
    location: rootDir,
    async enumerateReleases() {
      let directories: string[];
      try {
        const entries = await fs.readdir(rootDir, { withFileTypes: true });
        directories = entries
          .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
          .map((entry) => entry.name)
          .sort();
      } catch (error) {
        throw new SourceUnavailableError(`Cannot read release directory ${origin}: ${describeCause(error)}`, {
          cause: error
        });
      }

      let results: Array<RawRelease | MalformedEntryError>;
      try {
        results = await Promise.all(
          directories.map((directory) => readReleaseDirectory(rootDir, directory, options.baseUrl))
        );
      } catch (error) {
        throw new SourceUnavailableError(`Cannot read release files under ${origin}: ${describeCause(error)}`, {
          cause: error
        });
      }

      const releases: RawRelease[] = [];
      const warnings: MalformedEntryError[] = [];
      for (const result of results) {
        if (result instanceof MalformedEntryError) {
          warnings.push(result);
        } else {
          releases.push(result);
        }
      }

      return { releases, warnings };
    }
  };
}
