import { RenderError } from '../errors.js';
import { compactJson, isContainedRelativePath, stableJson } from '../io.js';
import { formatCompatibility } from './catalog.js';
import { STYLESHEET, escapeHtml, formatBytes, formatDate, pluralize, relativeRoot, renderLayout } from './html.js';
import type { Release, ReleaseCatalog, RenderedPage } from './types.js';

export const INDEX_SCHEMA_VERSION = 1;

export interface RenderOptions {
  title: string;
  perReleasePages: boolean;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  title: 'Release index',
  perReleasePages: true
};

export class PageSet {
  private readonly pages = new Map<string, RenderedPage>();

  add(pagePath: string, content: string | Buffer): void {
    if (!isContainedRelativePath(pagePath)) {
      throw new RenderError(`Invalid page path '${pagePath}'`);
    }
    if (this.pages.has(pagePath)) {
      throw new RenderError(`Duplicate page path '${pagePath}'`);
    }

    this.pages.set(
      pagePath,
      Object.freeze({
        path: pagePath,
        content: typeof content === 'string' ? Buffer.from(content, 'utf8') : Buffer.from(content)
      })
    );
  }

  toArray(): RenderedPage[] {
    return [...this.pages.values()].sort((left, right) => (left.path < right.path ? -1 : left.path > right.path ? 1 : 0));
  }
}

// Versions only contain `[0-9A-Za-z.+-]`, so swapping `+` for `_` keeps slugs distinct.
export function releaseSlug(version: string): string {
  return version.replaceAll('+', '_');
}

export function releasePagePath(release: Release): string {
  return `releases/${releaseSlug(release.version)}/index.html`;
}

export function releaseAnchor(release: Release): string {
  return `release-${releaseSlug(release.version)}`;
}

const URL_SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:/;

export function downloadHref(url: string, depth: number): string {
  if (URL_SCHEME_PATTERN.test(url) || url.startsWith('/')) {
    return url;
  }
  return `${relativeRoot(depth)}${url}`;
}

function renderArtifactTable(release: Release, depth: number): string[] {
  if (release.artifacts.length === 0) {
    return ['<p class="muted">No artifacts.</p>'];
  }

  const lines = [
    '<table class="artifacts">',
    '  <thead><tr><th>File</th><th>Size</th><th>SHA-256</th></tr></thead>',
    '  <tbody>'
  ];

  for (const artifact of release.artifacts) {
    const size = artifact.size === undefined ? '' : escapeHtml(formatBytes(artifact.size));
    const checksum = artifact.sha256 === undefined ? '' : `<code>${escapeHtml(artifact.sha256)}</code>`;
    lines.push(
      `    <tr><td><a href="${escapeHtml(downloadHref(artifact.url, depth))}">${escapeHtml(artifact.name)}</a></td><td>${size}</td><td>${checksum}</td></tr>`
    );
  }

  lines.push('  </tbody>', '</table>');
  return lines;
}

function renderReleaseMeta(release: Release): string[] {
  const lines = ['<dl class="meta">'];
  lines.push(`  <dt>Stream</dt><dd>${escapeHtml(release.stream)}</dd>`);

  if (release.publishedAt !== undefined) {
    lines.push(
      `  <dt>Published</dt><dd><time datetime="${escapeHtml(release.publishedAt)}">${escapeHtml(formatDate(release.publishedAt))}</time></dd>`
    );
  }

  const compatibility = formatCompatibility(release);
  if (compatibility !== null) {
    lines.push(`  <dt>Compatibility</dt><dd><code>${escapeHtml(compatibility)}</code></dd>`);
  }

  if (release.runtimes !== undefined && release.runtimes.length > 0) {
    lines.push(`  <dt>Runtimes</dt><dd>${escapeHtml(release.runtimes.join(', '))}</dd>`);
  }

  if (release.overrides !== undefined && Object.keys(release.overrides).length > 0) {
    lines.push(`  <dt>Overrides</dt><dd><pre>${escapeHtml(stableJson(release.overrides).trimEnd())}</pre></dd>`);
  }

  lines.push('</dl>');

  if (release.notes !== undefined && release.notes.trim().length > 0) {
    lines.push(`<div class="notes">${escapeHtml(release.notes.trim())}</div>`);
  }

  return lines;
}

function renderReleaseListItem(release: Release, href: string): string {
  const parts = [`<a class="version" href="${escapeHtml(href)}">${escapeHtml(release.version)}</a>`];

  if (release.name !== undefined && release.name !== release.version) {
    parts.push(`<span class="name">${escapeHtml(release.name)}</span>`);
  }

  parts.push(`<span class="stream stream-${escapeHtml(release.stream)}">${escapeHtml(release.stream)}</span>`);

  if (release.publishedAt !== undefined) {
    parts.push(
      `<time datetime="${escapeHtml(release.publishedAt)}">${escapeHtml(formatDate(release.publishedAt))}</time>`
    );
  }

  const compatibility = formatCompatibility(release);
  if (compatibility !== null) {
    parts.push(`<span class="compat">requires <code>${escapeHtml(compatibility)}</code></span>`);
  }

  parts.push(`<span class="muted">${pluralize(release.artifacts.length, 'artifact')}</span>`);

  return `  <li>${parts.join(' ')}</li>`;
}

function renderIndexPage(catalog: ReleaseCatalog, options: RenderOptions): string {
  const body = [
    `<h1>${escapeHtml(options.title)}</h1>`,
    `<p class="summary">${pluralize(catalog.releases.length, 'release')} &middot; <a href="index.json">index.json</a> &middot; <a href="index.min.json">index.min.json</a></p>`
  ];

  if (catalog.releases.length === 0) {
    body.push('<p class="muted">No releases have been published yet.</p>');
  } else {
    body.push('<ul class="releases">');
    for (const release of catalog.releases) {
      const href = options.perReleasePages ? releasePagePath(release) : `#${releaseAnchor(release)}`;
      body.push(renderReleaseListItem(release, href));
    }
    body.push('</ul>');
  }

  if (!options.perReleasePages) {
    for (const release of catalog.releases) {
      body.push(
        `<section id="${escapeHtml(releaseAnchor(release))}">`,
        `<h2>${escapeHtml(release.name ?? release.version)}</h2>`,
        ...(release.name !== undefined && release.name !== release.version
          ? [`<p class="muted">${escapeHtml(release.version)}</p>`]
          : []),
        ...renderReleaseMeta(release),
        ...renderArtifactTable(release, 0),
        '</section>'
      );
    }
  }

  return renderLayout({ title: options.title, depth: 0, body });
}

function renderReleasePage(release: Release, options: RenderOptions): string {
  const depth = 2;
  const body = [
    `<p><a href="${relativeRoot(depth)}index.html">&larr; All releases</a></p>`,
    `<h1>${escapeHtml(release.version)}</h1>`,
    ...(release.name !== undefined && release.name !== release.version
      ? [`<p class="summary">${escapeHtml(release.name)}</p>`]
      : []),
    ...renderReleaseMeta(release),
    ...renderArtifactTable(release, depth)
  ];

  return renderLayout({ title: `${release.version} - ${options.title}`, depth, body });
}

export function toJsonIndex(catalog: ReleaseCatalog): Record<string, unknown> {
  return {
    schema_version: INDEX_SCHEMA_VERSION,
    releases: catalog.releases.map((release) => ({
      version: release.version,
      name: release.name,
      published_at: release.publishedAt,
      stream: release.stream,
      compatibility: formatCompatibility(release) ?? undefined,
      notes: release.notes,
      runtimes: release.runtimes,
      overrides: release.overrides,
      artifacts: release.artifacts.map((artifact) => ({
        name: artifact.name,
        url: artifact.url,
        size: artifact.size,
        sha256: artifact.sha256
      }))
    }))
  };
}

export function render(catalog: ReleaseCatalog, options: RenderOptions = DEFAULT_RENDER_OPTIONS): RenderedPage[] {
  const pages = new PageSet();

  pages.add('index.html', renderIndexPage(catalog, options));
  if (options.perReleasePages) {
    for (const release of catalog.releases) {
      pages.add(releasePagePath(release), renderReleasePage(release, options));
    }
  }

  const jsonIndex = toJsonIndex(catalog);
  pages.add('index.json', stableJson(jsonIndex));
  pages.add('index.min.json', compactJson(jsonIndex));
  pages.add('style.css', STYLESHEET);

  return pages.toArray();
}
