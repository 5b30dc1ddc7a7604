import type { Dispatcher } from 'undici';

import { isDirectory } from '../../io.js';
import type { ReleaseSource } from '../types.js';
import { createDirectorySource } from './directory_source.js';
import { createFeedSource } from './feed_source.js';
import { createManifestSource } from './manifest_source.js';

export interface SourceOptions {
  baseUrl?: string;
  dispatcher?: Dispatcher;
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export async function createReleaseSource(location: string, options: SourceOptions = {}): Promise<ReleaseSource> {
  if (isHttpUrl(location)) {
    return createFeedSource(location, { dispatcher: options.dispatcher });
  }

  if (await isDirectory(location)) {
    return createDirectorySource(location, { baseUrl: options.baseUrl });
  }

  return createManifestSource(location);
}

export { createDirectorySource, createFeedSource, createManifestSource };
