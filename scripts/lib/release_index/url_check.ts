import { request, type Dispatcher } from 'undici';

import { MalformedEntryError, describeCause } from '../errors.js';
import { isHttpUrl } from './sources/index.js';
import type { Release } from './types.js';

export interface UrlCheckOptions {
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

async function headStatus(url: string, options: UrlCheckOptions): Promise<string | null> {
  try {
    const response = await request(url, {
      method: 'HEAD',
      signal: options.signal,
      dispatcher: options.dispatcher
    });
    await response.body.dump();
    return response.statusCode >= 400 ? `HTTP ${response.statusCode}` : null;
  } catch (error) {
    return describeCause(error);
  }
}

// Site-relative references only resolve once the index is hosted, so they are not checked.
export async function verifyReleaseUrls(
  release: Release,
  options: UrlCheckOptions
): Promise<MalformedEntryError | null> {
  const remote = release.artifacts.filter((artifact) => isHttpUrl(artifact.url));
  const failures = await Promise.all(
    remote.map(async (artifact) => {
      const reason = await headStatus(artifact.url, options);
      return reason === null ? null : `expected ${artifact.name} to be available at ${artifact.url} (${reason})`;
    })
  );

  const messages = failures.filter((failure): failure is string => failure !== null);
  if (messages.length === 0) {
    return null;
  }

  const label = `release '${release.version}'`;
  return new MalformedEntryError(label, `${label}: ${messages.join('; ')}`);
}
