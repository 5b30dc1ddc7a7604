import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';

export function toPosixRelative(filePath: string): string {
  return toPosix(path.relative(process.cwd(), filePath));
}

export function toPosix(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
}

export function stableJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

export function compactJson(data: unknown): string {
  return JSON.stringify(data);
}

// Relative POSIX path that stays inside whatever directory it is joined to.
export function isContainedRelativePath(relativePath: string): boolean {
  if (!relativePath || relativePath.startsWith('/') || relativePath.includes('\\')) {
    return false;
  }

  return relativePath.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..');
}

export async function listFiles(rootDir: string, pattern = '**/*'): Promise<string[]> {
  if (!(await fs.pathExists(rootDir))) {
    return [];
  }

  const files = await fg(pattern, {
    cwd: rootDir,
    dot: true,
    onlyFiles: true
  });

  return files.sort();
}

export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isDirectory();
  } catch {
    return false;
  }
}
