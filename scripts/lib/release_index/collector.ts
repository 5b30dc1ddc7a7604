import type { Dispatcher } from 'undici';

import { MalformedEntryError, ReleaseIndexError, SourceUnavailableError, describeCause } from '../errors.js';
import { assembleCatalog, parseRawReleases } from './catalog.js';
import {
  silentReporter,
  type RawReleaseBatch,
  type ReleaseCatalog,
  type ReleaseSource,
  type Reporter
} from './types.js';
import { verifyReleaseUrls } from './url_check.js';

export interface CollectOptions {
  timeoutMs: number;
  strict?: boolean;
  verifyUrls?: boolean;
  reporter?: Reporter;
  dispatcher?: Dispatcher;
}

function deadlineError(source: ReleaseSource, timeoutMs: number): SourceUnavailableError {
  return new SourceUnavailableError(`Timed out after ${timeoutMs} ms reading ${source.location}`);
}

async function withinDeadline<T>(
  work: Promise<T>,
  signal: AbortSignal,
  onTimeout: () => Error
): Promise<T> {
  if (signal.aborted) {
    throw onTimeout();
  }

  let listener: (() => void) | undefined;
  const expired = new Promise<never>((_, reject) => {
    listener = () => reject(onTimeout());
    signal.addEventListener('abort', listener, { once: true });
  });

  try {
    return await Promise.race([work, expired]);
  } finally {
    if (listener) {
      signal.removeEventListener('abort', listener);
    }
  }
}

export function strictModeError(warnings: readonly MalformedEntryError[]): MalformedEntryError {
  const noun = warnings.length === 1 ? 'entry' : 'entries';
  return new MalformedEntryError(
    'catalog',
    `${warnings.length} malformed release ${noun}:\n${warnings.map((warning) => `- ${warning.message}`).join('\n')}`
  );
}

async function collectWithin(
  source: ReleaseSource,
  options: CollectOptions,
  reporter: Reporter,
  signal: AbortSignal
): Promise<ReleaseCatalog> {
  const onTimeout = (): Error => deadlineError(source, options.timeoutMs);

  let batch: RawReleaseBatch;
  try {
    batch = await withinDeadline(source.enumerateReleases({ signal, reporter }), signal, onTimeout);
  } catch (error) {
    if (error instanceof ReleaseIndexError) {
      throw error;
    }
    if (signal.aborted) {
      throw onTimeout();
    }
    throw new SourceUnavailableError(`Cannot enumerate releases from ${source.location}: ${describeCause(error)}`, {
      cause: error
    });
  }

  for (const raw of batch.releases) {
    reporter.info(`Processing ${raw.label}...`);
  }

  const parsed = parseRawReleases(batch.releases, batch.warnings);
  let releases = parsed.releases;
  const warnings = [...parsed.warnings];

  if (options.verifyUrls) {
    const checks = await withinDeadline(
      Promise.all(
        releases.map(async (release) => ({
          release,
          failure: await verifyReleaseUrls(release, { signal, dispatcher: options.dispatcher })
        }))
      ),
      signal,
      onTimeout
    );
    releases = checks.filter((check) => check.failure === null).map((check) => check.release);
    for (const check of checks) {
      if (check.failure) {
        warnings.push(check.failure);
      }
    }
  }

  for (const warning of warnings) {
    reporter.warn(`Skipping ${warning.message}`);
  }

  if (options.strict && warnings.length > 0) {
    throw strictModeError(warnings);
  }

  return assembleCatalog(releases, warnings);
}

export async function collect(source: ReleaseSource, options: CollectOptions): Promise<ReleaseCatalog> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    return await collectWithin(source, options, options.reporter ?? silentReporter, controller.signal);
  } finally {
    clearTimeout(timer);
  }
}
