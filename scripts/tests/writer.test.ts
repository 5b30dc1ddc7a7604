import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'node:path';
import test from 'node:test';

import { WriteError } from '../lib/errors.js';
import { listFiles } from '../lib/io.js';
import type { RenderedPage } from '../lib/release_index/types.js';
import { diffOutput, writeOutput } from '../lib/release_index/writer.js';
import { readOutput, withTempCwd, writeFixtureFile } from './test_fs.js';

function page(pagePath: string, content: string): RenderedPage {
  return { path: pagePath, content: Buffer.from(content, 'utf8') };
}

const PAGES = [
  page('index.html', '<h1>Index</h1>\n'),
  page('releases/v1.0.0/index.html', '<h1>v1.0.0</h1>\n'),
  page('style.css', 'body {}\n')
];

async function stagingLeftovers(root: string): Promise<string[]> {
  return (await fs.readdir(root)).filter((entry) => entry.includes('.staging-'));
}

test('writeOutput creates the target and nested directories', async () => {
  await withTempCwd('release-index-writer-', async (root) => {
    await writeOutput(PAGES, 'site/out');

    assert.deepEqual(await listFiles(path.join(root, 'site', 'out')), [
      'index.html',
      'releases/v1.0.0/index.html',
      'style.css'
    ]);
    assert.equal(await readOutput(root, 'site/out/releases/v1.0.0/index.html'), '<h1>v1.0.0</h1>\n');
    assert.deepEqual(await stagingLeftovers(path.join(root, 'site')), []);
  });
});

test('writeOutput removes files that are not part of the new render', async () => {
  await withTempCwd('release-index-writer-stale-', async (root) => {
    await writeFixtureFile(root, 'out/releases/v0.9.0/index.html', 'old');
    await writeFixtureFile(root, 'out/.nojekyll', '');
    await writeFixtureFile(root, 'out/index.html', 'old index');

    await writeOutput(PAGES, 'out');

    assert.deepEqual(await listFiles(path.join(root, 'out')), [
      'index.html',
      'releases/v1.0.0/index.html',
      'style.css'
    ]);
    assert.equal(await readOutput(root, 'out/index.html'), '<h1>Index</h1>\n');
  });
});

test('writeOutput leaves the previous output in place when writing fails', async () => {
  await withTempCwd('release-index-writer-fail-', async (root) => {
    await writeFixtureFile(root, 'out/index.html', 'previous');

    // `a` is written as a file, so `a/b` cannot get its parent directory.
    await assert.rejects(writeOutput([page('a', 'file'), page('a/b', 'nested')], 'out'), WriteError);

    assert.deepEqual(await listFiles(path.join(root, 'out')), ['index.html']);
    assert.equal(await readOutput(root, 'out/index.html'), 'previous\n');
    assert.deepEqual(await stagingLeftovers(root), []);
  });
});

test('writeOutput refuses pages outside the target and targets containing the cwd', async () => {
  await withTempCwd('release-index-writer-guard-', async (root) => {
    await assert.rejects(writeOutput([page('../escape.html', 'x')], 'out'), (error: unknown) => {
      assert.ok(error instanceof WriteError);
      assert.equal(error.message, "Refusing to write page outside the output directory: '../escape.html'");
      return true;
    });
    assert.equal(await fs.pathExists(path.join(root, 'escape.html')), false);
    assert.equal(await fs.pathExists(path.join(root, 'out')), false);

    await assert.rejects(writeOutput(PAGES, '.'), /contains the working directory/);
    await assert.rejects(writeOutput(PAGES, '..'), /contains the working directory/);
  });
});

test('diffOutput reports changed and stale files without writing', async () => {
  await withTempCwd('release-index-writer-diff-', async (root) => {
    assert.deepEqual(await diffOutput(PAGES, 'out'), {
      changed: ['index.html', 'releases/v1.0.0/index.html', 'style.css'],
      stale: []
    });

    await writeOutput(PAGES, 'out');
    assert.deepEqual(await diffOutput(PAGES, 'out'), { changed: [], stale: [] });

    await writeFixtureFile(root, 'out/index.html', 'edited');
    await writeFixtureFile(root, 'out/extra.txt', 'extra');
    assert.deepEqual(await diffOutput(PAGES, 'out'), { changed: ['index.html'], stale: ['extra.txt'] });
    assert.equal(await readOutput(root, 'out/index.html'), 'edited\n');
  });
});

test('writeOutput restores the previous output when the new tree cannot be moved into place', async (t) => {
  await withTempCwd('release-index-writer-swap-', async (root) => {
    await writeOutput(PAGES, 'out');

    const move = fs.move.bind(fs);
    t.mock.method(fs, 'move', async (source: string, destination: string) => {
      if (path.basename(source).includes('.staging-') && !source.endsWith('.previous')) {
        throw new Error('disk full');
      }
      return move(source, destination);
    });

    await assert.rejects(writeOutput([page('index.html', '<h1>New</h1>\n')], 'out'), (error: unknown) => {
      assert.ok(error instanceof WriteError);
      assert.equal(error.message, `Cannot write ${path.join(root, 'out')}: disk full`);
      return true;
    });

    assert.deepEqual(await listFiles(path.join(root, 'out')), ['index.html', 'releases/v1.0.0/index.html', 'style.css']);
    assert.equal(await readOutput(root, 'out/index.html'), '<h1>Index</h1>\n');
    assert.deepEqual(await stagingLeftovers(root), []);
  });
});
