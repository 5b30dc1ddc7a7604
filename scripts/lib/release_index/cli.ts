import path from 'node:path';
import type { Dispatcher } from 'undici';

import { ReleaseIndexError, UsageError } from '../errors.js';
import { toPosixRelative } from '../io.js';
import { collect } from './collector.js';
import { parseCliArgs, resolveConfig, type IndexConfig } from './config.js';
import { pluralize } from './html.js';
import { render } from './render.js';
import { createReleaseSource } from './sources/index.js';
import { consoleReporter, type Reporter } from './types.js';
import { diffOutput, writeOutput } from './writer.js';

export const USAGE = `Usage: generate-index <output-directory> [options]

Options:
  --source <path-or-url>  Release manifest, release directory or feed URL (RELEASE_INDEX_SOURCE, default releases.yaml)
  --base-url <url>        Download base URL for directory sources (RELEASE_INDEX_BASE_URL)
  --title <text>          Index page title (RELEASE_INDEX_TITLE)
  --timeout <ms>          Deadline for reading the source (RELEASE_INDEX_TIMEOUT_MS, default 30000)
  --single-page           List artifacts on the index page instead of per-release pages
  --strict                Fail when any release entry is malformed
  --verify-urls           Check that remote artifact URLs respond to HEAD requests
  --check                 Report whether the output directory is up to date without writing`;

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  reporter?: Reporter;
  dispatcher?: Dispatcher;
}

function outputPath(outputDir: string, page?: string): string {
  const absolute = page === undefined ? path.resolve(outputDir) : path.resolve(outputDir, ...page.split('/'));
  return toPosixRelative(absolute) || '.';
}

export async function generateIndex(
  config: IndexConfig,
  dependencies: Omit<CliDependencies, 'env'> = {}
): Promise<number> {
  const reporter = dependencies.reporter ?? consoleReporter;
  const source = await createReleaseSource(config.source, {
    baseUrl: config.baseUrl,
    dispatcher: dependencies.dispatcher
  });
  reporter.info(`Reading ${source.kind} source ${source.location}`);

  const catalog = await collect(source, {
    timeoutMs: config.timeoutMs,
    strict: config.strict,
    verifyUrls: config.verifyUrls,
    reporter,
    dispatcher: dependencies.dispatcher
  });

  const pages = render(catalog, {
    title: config.title,
    perReleasePages: config.perReleasePages
  });

  if (config.check) {
    const diff = await diffOutput(pages, config.outputDir);
    for (const page of diff.changed) {
      reporter.error(`Would update ${outputPath(config.outputDir, page)}`);
    }
    for (const page of diff.stale) {
      reporter.error(`Would remove ${outputPath(config.outputDir, page)}`);
    }
    if (diff.changed.length > 0 || diff.stale.length > 0) {
      return 1;
    }
    reporter.info('generate-index check passed.');
    return 0;
  }

  await writeOutput(pages, config.outputDir);
  reporter.info(
    `Updated ${outputPath(config.outputDir)} (${pluralize(catalog.releases.length, 'release')}, ${pluralize(pages.length, 'file')})`
  );
  return 0;
}

export async function runReleaseIndexCli(
  argv: string[] = process.argv.slice(2),
  dependencies: CliDependencies = {}
): Promise<number> {
  const reporter = dependencies.reporter ?? consoleReporter;

  try {
    const args = parseCliArgs(argv);
    if (args.flags.has('help')) {
      reporter.info(USAGE);
      return 0;
    }
    if (args.command !== 'generate-index') {
      throw new UsageError(
        args.command === undefined
          ? 'Missing command. Expected generate-index'
          : `Unknown command '${args.command}'. Expected generate-index`
      );
    }

    const config = resolveConfig(args, dependencies.env ?? process.env);
    return await generateIndex(config, dependencies);
  } catch (error) {
    if (error instanceof UsageError) {
      reporter.error(error.message);
      reporter.error(USAGE);
      return 2;
    }
    if (error instanceof ReleaseIndexError) {
      reporter.error(`generate-index failed during ${error.stage}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
