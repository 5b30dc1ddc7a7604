const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

const BYTE_UNITS = ['KiB', 'MiB', 'GiB', 'TiB'] as const;

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }

  let value = bytes;
  let unit = -1;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }

  return `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

export function formatDate(isoTimestamp: string): string {
  return isoTimestamp.slice(0, 10);
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

export function relativeRoot(depth: number): string {
  return '../'.repeat(depth);
}

export interface LayoutOptions {
  title: string;
  depth: number;
  body: string[];
}

export function renderLayout(options: LayoutOptions): string {
  const root = relativeRoot(options.depth);
  const lines = [
    '<!doctype html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="utf-8">',
    '  <meta name="viewport" content="width=device-width, initial-scale=1">',
    `  <title>${escapeHtml(options.title)}</title>`,
    `  <link rel="stylesheet" href="${root}style.css">`,
    '</head>',
    '<body>',
    '<main>',
    ...options.body,
    '</main>',
    '</body>',
    '</html>',
    ''
  ];

  return lines.join('\n');
}

export const STYLESHEET = `body {
  font-family: system-ui, -apple-system, "Segoe UI", Roboto, sans-serif;
  line-height: 1.45;
  margin: 0 auto;
  max-width: 980px;
  padding: 24px;
}
a { color: #2563eb; text-decoration: none; }
a:hover { text-decoration: underline; }
code { background: #f3f4f6; border-radius: 6px; font-size: 0.85em; padding: 2px 6px; word-break: break-all; }
.muted, .summary { color: #4b5563; }
.releases { list-style: none; padding: 0; }
.releases li { border-bottom: 1px solid #e5e7eb; display: flex; flex-wrap: wrap; gap: 12px; padding: 10px 0; }
.version { font-weight: 600; }
.stream { border-radius: 999px; font-size: 0.8em; padding: 1px 8px; }
.stream-stable { background: #dcfce7; color: #166534; }
.stream-preview { background: #fef3c7; color: #92400e; }
.notes { white-space: pre-line; }
table.artifacts { border-collapse: collapse; width: 100%; }
table.artifacts th, table.artifacts td { border-bottom: 1px solid #e5e7eb; padding: 6px 8px; text-align: left; vertical-align: top; }
dl.meta { display: grid; gap: 4px 16px; grid-template-columns: max-content 1fr; }
dl.meta dt { color: #4b5563; }
dl.meta dd { margin: 0; }
`;
