import fs from 'fs-extra';
import path from 'node:path';

import { WriteError, describeCause } from '../errors.js';
import { ensureParentDir, isContainedRelativePath, listFiles } from '../io.js';
import type { RenderedPage } from './types.js';

export interface OutputDiff {
  changed: string[];
  stale: string[];
}

function pageFilePath(rootDir: string, page: RenderedPage): string {
  if (!isContainedRelativePath(page.path)) {
    throw new WriteError(`Refusing to write page outside the output directory: '${page.path}'`);
  }
  return path.join(rootDir, ...page.path.split('/'));
}

function assertReplaceable(target: string): void {
  const relativeToTarget = path.relative(target, process.cwd());
  const containsCwd =
    relativeToTarget === '' || (!relativeToTarget.startsWith('..') && !path.isAbsolute(relativeToTarget));
  if (containsCwd || path.dirname(target) === target) {
    throw new WriteError(`Refusing to replace ${target}: it contains the working directory`);
  }
}

async function removeStaging(staging: string): Promise<string> {
  try {
    await fs.remove(staging);
    return '';
  } catch (error) {
    return ` (staging directory ${staging} was left behind: ${describeCause(error)})`;
  }
}

async function swapIntoPlace(staging: string, target: string): Promise<void> {
  const previous = `${staging}.previous`;
  const hadTarget = await fs.pathExists(target);
  if (hadTarget) {
    await fs.move(target, previous);
  }

  try {
    await fs.move(staging, target);
  } catch (error) {
    if (hadTarget) {
      try {
        await fs.move(previous, target);
      } catch (restoreError) {
        throw new WriteError(
          `Cannot move ${staging} into place (${describeCause(error)}) or restore ${target} from ${previous}: ${describeCause(restoreError)}`,
          { cause: restoreError }
        );
      }
    }
    throw error;
  }

  if (hadTarget) {
    try {
      await fs.remove(previous);
    } catch (error) {
      throw new WriteError(`Wrote ${target} but cannot remove the previous output at ${previous}: ${describeCause(error)}`, {
        cause: error
      });
    }
  }
}

/**
 * Replaces the contents of `targetDir` with exactly `pages`. Pages are staged in a sibling
 * directory first; the old tree is moved aside, and only deleted once the new one is in
 * place, so a failure leaves the previous output untouched.
 */
export async function writeOutput(pages: readonly RenderedPage[], targetDir: string): Promise<void> {
  const target = path.resolve(targetDir);
  assertReplaceable(target);

  const staged = pages.map((page) => ({ page, relative: pageFilePath('', page) }));

  let staging: string;
  try {
    await fs.ensureDir(path.dirname(target));
    staging = await fs.mkdtemp(path.join(path.dirname(target), `${path.basename(target)}.staging-`));
  } catch (error) {
    throw new WriteError(`Cannot create a staging directory beside ${target}: ${describeCause(error)}`, {
      cause: error
    });
  }

  try {
    for (const { page, relative } of staged) {
      const filePath = path.join(staging, relative);
      await ensureParentDir(filePath);
      await fs.writeFile(filePath, page.content);
    }
    await swapIntoPlace(staging, target);
  } catch (error) {
    if (error instanceof WriteError) {
      throw error;
    }
    const leftover = await removeStaging(staging);
    throw new WriteError(`Cannot write ${target}: ${describeCause(error)}${leftover}`, { cause: error });
  }
}

export async function diffOutput(pages: readonly RenderedPage[], targetDir: string): Promise<OutputDiff> {
  const target = path.resolve(targetDir);
  const expected = new Set(pages.map((page) => page.path));
  const changed: string[] = [];

  try {
    for (const page of pages) {
      const filePath = pageFilePath(target, page);
      const current = (await fs.pathExists(filePath)) ? await fs.readFile(filePath) : null;
      if (current === null || !current.equals(page.content)) {
        changed.push(page.path);
      }
    }

    const existing = await listFiles(target);
    return {
      changed: changed.sort(),
      stale: existing.filter((file) => !expected.has(file))
    };
  } catch (error) {
    if (error instanceof WriteError) {
      throw error;
    }
    throw new WriteError(`Cannot compare output in ${target}: ${describeCause(error)}`, { cause: error });
  }
}
