import { request, type Dispatcher } from 'undici';

import { SourceUnavailableError, describeCause } from '../../errors.js';
import type { ReleaseSource, SourceContext } from '../types.js';
import { isRecord, rawReleasesFromText } from './document.js';

const URL_SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:/;

export interface FeedSourceOptions {
  dispatcher?: Dispatcher;
}

// Artifact URLs in a feed are relative to the feed itself, not to the generated site.
export function resolveFeedArtifactUrls(data: unknown, feedUrl: string): unknown {
  if (!isRecord(data) || !Array.isArray(data.artifacts)) {
    return data;
  }

  const artifacts: unknown[] = data.artifacts;
  return {
    ...data,
    artifacts: artifacts.map((artifact) => {
      if (!isRecord(artifact) || typeof artifact.url !== 'string' || URL_SCHEME_PATTERN.test(artifact.url)) {
        return artifact;
      }
      return { ...artifact, url: new URL(artifact.url, feedUrl).href };
    })
  };
}

async function fetchFeed(url: string, context: SourceContext, dispatcher?: Dispatcher): Promise<string> {
  try {
    const response = await request(url, {
      method: 'GET',
      signal: context.signal,
      dispatcher,
      headers: {
        accept: 'application/json, application/yaml;q=0.9, */*;q=0.5'
      }
    });

    if (response.statusCode < 200 || response.statusCode >= 300) {
      await response.body.dump();
      throw new SourceUnavailableError(`Release feed ${url} responded with HTTP ${response.statusCode}`);
    }

    return await response.body.text();
  } catch (error) {
    if (error instanceof SourceUnavailableError) {
      throw error;
    }
    throw new SourceUnavailableError(`Cannot fetch release feed ${url}: ${describeCause(error)}`, {
      cause: error
    });
  }
}

export function createFeedSource(url: string, options: FeedSourceOptions = {}): ReleaseSource {
  return {
    kind: 'feed',
    location: url,
    async enumerateReleases(context) {
      context.reporter.info(`Fetching ${url}...`);
      const text = await fetchFeed(url, context, options.dispatcher);
      const releases = rawReleasesFromText(text, url).map((raw) => ({
        ...raw,
        data: resolveFeedArtifactUrls(raw.data, url)
      }));
      return { releases, warnings: [] };
    }
  };
}
