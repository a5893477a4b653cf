import { readdir, realpath, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { STORE_DIR_NAME } from '../store/persistence.js';

export const SQL_EXTENSIONS = new Set(['.sql']);

const IGNORED_DIRS = new Set([
  'node_modules',
  '.git',
  '.hg',
  '.svn',
  'dist',
  'build',
  'vendor',
  '__pycache__',
  '.venv',
  'venv',
  STORE_DIR_NAME,
]);

export interface DiscoveryResult {
  /** Absolute, de-duplicated, sorted. */
  files: string[];
  /** Paths given on the command line that do not exist. */
  missing: string[];
}

/**
 * Expand the given paths into SQL files. Directories are walked
 * recursively, skipping ignored and hidden directories; files named
 * explicitly are taken whatever their extension.
 */
export async function discoverSqlFiles(paths: readonly string[], cwd: string): Promise<DiscoveryResult> {
  const found = new Set<string>();
  const missing: string[] = [];

  for (const path of paths) {
    const absolute = resolve(cwd, path);
    let resolved: string;
    try {
      resolved = await realpath(absolute);
    } catch {
      missing.push(path);
      continue;
    }

    const entryStat = await stat(resolved);
    if (entryStat.isDirectory()) {
      await walk(resolved, found);
    } else if (entryStat.isFile()) {
      found.add(resolved);
    }
  }

  return { files: [...found].sort(), missing };
}

async function walk(dir: string, found: Set<string>): Promise<void> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch {
    return;
  }

  // Sort for deterministic ordering
  entries.sort();

  for (const entry of entries) {
    const entryPath = join(dir, entry);
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(entryPath)).isDirectory();
    } catch {
      continue;
    }

    if (isDirectory) {
      if (IGNORED_DIRS.has(entry) || entry.startsWith('.')) continue;
      await walk(entryPath, found);
    } else if (SQL_EXTENSIONS.has(extname(entry).toLowerCase())) {
      found.add(entryPath);
    }
  }
}
