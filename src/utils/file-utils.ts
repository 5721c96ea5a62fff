/**
 * File Utilities
 *
 * Utility functions for file system operations.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PipelineErrorFactory } from '../errors';

/**
 * Check if a path is a directory
 */
export function isDirectory(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a regular file
 */
export function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Size of a regular file, 0 when missing
 */
export function fileSize(filePath: string): number {
  try {
    const stats = fs.statSync(filePath);
    return stats.isFile() ? stats.size : 0;
  } catch {
    return 0;
  }
}

/**
 * Create directory and any parents; no error if it exists
 */
export function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/**
 * Find files with one of `extensions` directly inside `dirPath`.
 * Returns absolute paths sorted alphabetically.
 */
export function findFilesByExtension(dirPath: string, extensions: readonly string[]): string[] {
  if (!isDirectory(dirPath)) {
    return [];
  }

  const wanted = extensions.map(ext => ext.toLowerCase());
  return fs.readdirSync(dirPath)
    .filter(file => wanted.includes(path.extname(file).toLowerCase()))
    .map(file => path.resolve(dirPath, file))
    .filter(isFile)
    .sort();
}

/**
 * List file names with one of `extensions` in a directory.
 * Recursive listings report paths relative to `dirPath`.
 */
export function listFilesByExtension(dirPath: string, extensions: readonly string[], recursive = false): string[] {
  if (!isDirectory(dirPath)) {
    return [];
  }

  const wanted = extensions.map(ext => ext.toLowerCase());
  const out: string[] = [];
  for (const name of fs.readdirSync(dirPath)) {
    const full = path.join(dirPath, name);
    if (isFile(full) && wanted.includes(path.extname(name).toLowerCase())) {
      out.push(name);
    } else if (recursive && isDirectory(full)) {
      for (const sub of listFilesByExtension(full, extensions, true)) {
        out.push(path.join(name, sub));
      }
    }
  }
  return out.sort();
}

/**
 * Move a file, falling back to copy + unlink across devices
 */
export async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await fs.promises.rename(source, destination);
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code !== 'EXDEV') {
      throw PipelineErrorFactory.fileSystemError(
        `Could not move ${source}: ${error instanceof Error ? error.message : String(error)}`,
        source,
        'move',
        { destination }
      );
    }
    await fs.promises.copyFile(source, destination);
    await fs.promises.unlink(source);
  }
}

/**
 * True when both paths point at the same location
 */
export function isSamePath(a: string, b: string): boolean {
  return path.resolve(a) === path.resolve(b);
}
