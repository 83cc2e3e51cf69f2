import { readdirSync, readFileSync, statSync, type Stats } from 'node:fs';
import { join } from 'node:path';
import { FileSystemError } from './errors.js';

/**
 * Lists the files directly inside a directory that end in the given extension.
 * Hidden files are skipped; subdirectories are not descended into.
 *
 * @param directory - Directory to scan
 * @param extension - File extension including the dot, e.g. ".md"
 * @returns File names (not paths), sorted alphabetically
 *
 * @example
 * ```typescript
 * const files = scanFiles('/path/to/docs', '.md');
 * // Returns: ['architecture.md', 'overview.md']
 * ```
 */
export function scanFiles(directory: string, extension: string): string[] {
  let entries: string[];
  try {
    entries = readdirSync(directory);
  } catch (error) {
    throw new FileSystemError(`Failed to read directory ${directory}: ${error}`);
  }

  const files: string[] = [];
  for (const entry of entries) {
    if (entry.startsWith('.') || !entry.endsWith(extension)) {
      continue;
    }

    let stat: Stats;
    try {
      stat = statSync(join(directory, entry));
    } catch (error) {
      throw new FileSystemError(`Failed to stat ${entry}: ${error}`);
    }

    if (stat.isFile()) {
      files.push(entry);
    }
  }

  return files.sort();
}

/**
 * Read a UTF-8 text file, reporting failures as FileSystemError
 */
export function readTextFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new FileSystemError(`Failed to read ${path}: ${error}`);
  }
}
