import fs from 'fs-extra';

import { SourceUnavailableError, describeCause } from '../../errors.js';
import { toPosixRelative } from '../../io.js';
import type { ReleaseSource } from '../types.js';
import { rawReleasesFromText } from './document.js';

export function createManifestSource(filePath: string): ReleaseSource {
  const origin = toPosixRelative(filePath);

  return {
    kind: 'manifest',
    location: filePath,
    async enumerateReleases() {
      let text: string;
      try {
        text = await fs.readFile(filePath, 'utf8');
      } catch (error) {
        throw new SourceUnavailableError(`Cannot read release manifest ${origin}: ${describeCause(error)}`, {
          cause: error
        });
      }

      return { releases: rawReleasesFromText(text, origin), warnings: [] };
    }
  };
}
