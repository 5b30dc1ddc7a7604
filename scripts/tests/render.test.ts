import assert from 'node:assert/strict';
import test from 'node:test';

import { RenderError } from '../lib/errors.js';
import { assembleCatalog } from '../lib/release_index/catalog.js';
import { PageSet, downloadHref, render, releasePagePath } from '../lib/release_index/render.js';
import type { Release, ReleaseCatalog, RenderedPage } from '../lib/release_index/types.js';

const CHECKSUM = 'ab'.repeat(32);

function sampleCatalog(): ReleaseCatalog {
  const releases: Release[] = [
    {
      version: 'v1.0.0',
      name: 'First',
      publishedAt: '2024-01-02T00:00:00.000Z',
      stream: 'stable',
      artifacts: [{ name: 'app-1.0.0.zip', url: 'v1.0.0/app-1.0.0.zip', size: 1536, sha256: CHECKSUM }]
    },
    {
      version: 'v2.0.0',
      stream: 'preview',
      requires: '3.5.0',
      notes: 'Second <release>',
      artifacts: [
        { name: 'app-2.0.0.zip', url: 'https://downloads.example.invalid/app-2.0.0.zip' },
        { name: 'app-2.0.0.tar.gz', url: 'https://downloads.example.invalid/app-2.0.0.tar.gz', size: 10 }
      ]
    }
  ];
  return assembleCatalog(releases);
}

function pageText(pages: RenderedPage[], pagePath: string): string {
  const page = pages.find((candidate) => candidate.path === pagePath);
  assert.ok(page, `expected page ${pagePath}`);
  return page.content.toString('utf8');
}

test('render produces an index, one page per release, JSON indexes and a stylesheet', () => {
  const pages = render(sampleCatalog());
  assert.deepEqual(
    pages.map((page) => page.path),
    [
      'index.html',
      'index.json',
      'index.min.json',
      'releases/v1.0.0/index.html',
      'releases/v2.0.0/index.html',
      'style.css'
    ]
  );
});

test('render is deterministic for the same catalog', () => {
  const first = render(sampleCatalog());
  const second = render(sampleCatalog());

  assert.equal(first.length, second.length);
  first.forEach((page, index) => {
    assert.equal(page.path, second[index].path);
    assert.ok(page.content.equals(second[index].content), `${page.path} differs between renders`);
  });
});

test('the index lists releases newest first and links their pages', () => {
  const index = pageText(render(sampleCatalog()), 'index.html');
  const newer = index.indexOf('<a class="version" href="releases/v2.0.0/index.html">v2.0.0</a>');
  const older = index.indexOf('<a class="version" href="releases/v1.0.0/index.html">v1.0.0</a>');

  assert.ok(newer !== -1);
  assert.ok(older !== -1);
  assert.ok(newer < older);
  assert.ok(index.includes('<p class="summary">2 releases &middot; <a href="index.json">index.json</a> &middot; <a href="index.min.json">index.min.json</a></p>'));
  assert.ok(
    index.includes(
      '  <li><a class="version" href="releases/v1.0.0/index.html">v1.0.0</a> <span class="name">First</span> <span class="stream stream-stable">stable</span> <time datetime="2024-01-02T00:00:00.000Z">2024-01-02</time> <span class="muted">1 artifact</span></li>'
    )
  );
});

test('every artifact appears on exactly one HTML page', () => {
  const catalog = sampleCatalog();
  const htmlPages = render(catalog).filter((page) => page.path.endsWith('.html'));

  for (const release of catalog.releases) {
    for (const artifact of release.artifacts) {
      const containing = htmlPages.filter((page) => page.content.toString('utf8').includes(`>${artifact.name}</a>`));
      assert.deepEqual(
        containing.map((page) => page.path),
        [releasePagePath(release)]
      );
    }
  }
});

test('release pages rebase relative downloads and omit missing fields', () => {
  const pages = render(sampleCatalog());
  const first = pageText(pages, 'releases/v1.0.0/index.html');
  const second = pageText(pages, 'releases/v2.0.0/index.html');

  assert.ok(
    first.includes(
      `    <tr><td><a href="../../v1.0.0/app-1.0.0.zip">app-1.0.0.zip</a></td><td>1.5 KiB</td><td><code>${CHECKSUM}</code></td></tr>`
    )
  );
  assert.ok(first.includes('<p><a href="../../index.html">&larr; All releases</a></p>'));
  assert.ok(
    second.includes(
      '    <tr><td><a href="https://downloads.example.invalid/app-2.0.0.zip">app-2.0.0.zip</a></td><td></td><td></td></tr>'
    )
  );
  assert.ok(second.includes('  <dt>Compatibility</dt><dd><code>&gt;=3.5.0</code></dd>'));
  assert.ok(second.includes('<div class="notes">Second &lt;release&gt;</div>'));
  assert.ok(!second.includes('<dt>Published</dt>'));
});

test('single-page mode keeps artifacts in sections of the index', () => {
  const pages = render(sampleCatalog(), { title: 'Downloads', perReleasePages: false });
  assert.deepEqual(
    pages.map((page) => page.path),
    ['index.html', 'index.json', 'index.min.json', 'style.css']
  );

  const index = pageText(pages, 'index.html');
  assert.ok(index.includes('<a class="version" href="#release-v2.0.0">v2.0.0</a>'));
  assert.ok(index.includes('<section id="release-v2.0.0">'));
  assert.ok(index.includes('<a href="v1.0.0/app-1.0.0.zip">app-1.0.0.zip</a>'));
  assert.ok(index.includes('  <title>Downloads</title>'));
});

test('render escapes release and artifact names', () => {
  const catalog = assembleCatalog([
    {
      version: '1.0.0',
      name: '<script>alert(1)</script>',
      stream: 'stable',
      artifacts: [{ name: '<img src=x onerror=alert(1)>.zip', url: 'https://downloads.example.invalid/a?x=1&y="2"' }]
    }
  ]);
  const pages = render(catalog);
  const index = pageText(pages, 'index.html');
  const releasePage = pageText(pages, 'releases/1.0.0/index.html');

  assert.ok(index.includes('<span class="name">&lt;script&gt;alert(1)&lt;/script&gt;</span>'));
  assert.ok(!index.includes('<script>'));
  assert.ok(
    releasePage.includes(
      '<a href="https://downloads.example.invalid/a?x=1&amp;y=&quot;2&quot;">&lt;img src=x onerror=alert(1)&gt;.zip</a>'
    )
  );
  assert.ok(!releasePage.includes('<img'));
});

test('build metadata versions get distinct page paths', () => {
  const catalog = assembleCatalog([
    { version: '1.0.0+red.1', stream: 'stable', artifacts: [] },
    { version: '1.0.0-red.1', stream: 'stable', artifacts: [] }
  ]);
  const paths = render(catalog).map((page) => page.path);

  assert.ok(paths.includes('releases/1.0.0_red.1/index.html'));
  assert.ok(paths.includes('releases/1.0.0-red.1/index.html'));
});

test('an empty catalog renders an empty listing', () => {
  const pages = render(assembleCatalog([]));

  assert.deepEqual(
    pages.map((page) => page.path),
    ['index.html', 'index.json', 'index.min.json', 'style.css']
  );
  const index = pageText(pages, 'index.html');
  assert.ok(index.includes('<p class="muted">No releases have been published yet.</p>'));
  assert.ok(index.includes('<p class="summary">0 releases &middot;'));
  assert.equal(pageText(pages, 'index.min.json'), '{"schema_version":1,"releases":[]}');
});

test('the JSON index omits missing fields', () => {
  const index = JSON.parse(pageText(render(sampleCatalog()), 'index.json'));

  assert.deepEqual(index, {
    schema_version: 1,
    releases: [
      {
        version: 'v2.0.0',
        stream: 'preview',
        compatibility: '>=3.5.0',
        notes: 'Second <release>',
        artifacts: [
          { name: 'app-2.0.0.zip', url: 'https://downloads.example.invalid/app-2.0.0.zip' },
          { name: 'app-2.0.0.tar.gz', url: 'https://downloads.example.invalid/app-2.0.0.tar.gz', size: 10 }
        ]
      },
      {
        version: 'v1.0.0',
        name: 'First',
        published_at: '2024-01-02T00:00:00.000Z',
        stream: 'stable',
        artifacts: [{ name: 'app-1.0.0.zip', url: 'v1.0.0/app-1.0.0.zip', size: 1536, sha256: CHECKSUM }]
      }
    ]
  });
});

test('PageSet rejects duplicate and escaping paths', () => {
  const pages = new PageSet();
  pages.add('index.html', 'one');

  assert.throws(() => pages.add('index.html', 'two'), (error: unknown) => {
    assert.ok(error instanceof RenderError);
    assert.equal(error.message, "Duplicate page path 'index.html'");
    return true;
  });
  assert.throws(() => pages.add('../escape.html', 'x'), RenderError);
  assert.throws(() => pages.add('/abs.html', 'x'), RenderError);
});

test('downloadHref only rebases site-relative references', () => {
  assert.equal(downloadHref('v1.0.0/a.zip', 2), '../../v1.0.0/a.zip');
  assert.equal(downloadHref('v1.0.0/a.zip', 0), 'v1.0.0/a.zip');
  assert.equal(downloadHref('https://downloads.example.invalid/a.zip', 2), 'https://downloads.example.invalid/a.zip');
  assert.equal(downloadHref('/files/a.zip', 2), '/files/a.zip');
});

test('runtimes and configuration overrides appear on the release page and in the JSON index', () => {
  const catalog = assembleCatalog([
    {
      version: '1.0.0',
      stream: 'stable',
      runtimes: [17, 21],
      overrides: { server: { port: 8080 } },
      artifacts: []
    }
  ]);
  const pages = render(catalog);
  const releasePage = pageText(pages, 'releases/1.0.0/index.html');

  assert.ok(releasePage.includes('  <dt>Runtimes</dt><dd>17, 21</dd>'));
  assert.ok(
    releasePage.includes(
      '  <dt>Overrides</dt><dd><pre>{\n  &quot;server&quot;: {\n    &quot;port&quot;: 8080\n  }\n}</pre></dd>'
    )
  );
  assert.deepEqual(JSON.parse(pageText(pages, 'index.json')).releases[0], {
    version: '1.0.0',
    stream: 'stable',
    runtimes: [17, 21],
    overrides: { server: { port: 8080 } },
    artifacts: []
  });
});
