/**
 * File system operations - reading, probing, globbing and removal.
 */
import * as fs from 'node:fs';
import fg from 'fast-glob';
import { FilesystemError } from './errors.js';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    // file not found
    return false;
  }
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch {
    // path not found or not accessible
    return false;
  }
}

/**
 * Modification time in milliseconds, or null when the path does not exist.
 */
export async function modifiedTime(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.mtimeMs;
  } catch {
    // path not found
    return null;
  }
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.promises.mkdir(dirPath, { recursive: true });
  } catch (error) {
    throw new FilesystemError('Failed to create directory', dirPath, error);
  }
}

/**
 * Remove a file if it exists.
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (error) {
    throw new FilesystemError('Failed to remove file', filePath, error);
  }
}

/**
 * Recursively remove a directory tree. A missing tree is not an error.
 */
export async function removeDir(dirPath: string): Promise<void> {
  try {
    await fs.promises.rm(dirPath, { recursive: true, force: true });
  } catch (error) {
    throw new FilesystemError('Failed to remove directory', dirPath, error);
  }
}

/**
 * Find files matching glob patterns.
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
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**'],
    absolute: options.absolute ?? true,
    onlyFiles: true,
    dot: false,
  });
  return files.sort();
}
