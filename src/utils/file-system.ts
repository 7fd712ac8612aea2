/**
 * @arch hexgraph.infra.fs
 *
 * File system access for manifests, configuration and exported documents.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

export const DEFAULT_IGNORE = ['**/node_modules/**', '**/dist/**'];

export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Find files matching glob patterns, sorted so that manifest order is stable
 * across platforms.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
  } = {}
): Promise<string[]> {
  const files = await fg(patterns, {
    cwd: options.cwd ?? process.cwd(),
    ignore: options.ignore ?? DEFAULT_IGNORE,
    absolute: options.absolute ?? true,
    onlyFiles: true,
  });
  return files.sort();
}
