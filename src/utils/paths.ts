import { access } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { CONFIG_FILE_NAME } from '../config/defaults.js';
import { STORE_DIR_NAME } from '../store/persistence.js';

const PROJECT_ROOT_MARKERS = ['.git', 'package.json', CONFIG_FILE_NAME, STORE_DIR_NAME];

/**
 * Find the project root by walking up from `startDir` looking for marker files/dirs.
 * Stops at the home directory and never returns $HOME itself as a project root.
 * Returns null if no marker is found.
 */
export async function findProjectRoot(startDir: string): Promise<string | null> {
  let current = resolve(startDir);
  const home = homedir();

  while (true) {
    // Don't treat home directory as a project root
    if (current === home) return null;

    for (const marker of PROJECT_ROOT_MARKERS) {
      if (await exists(join(current, marker))) return current;
    }

    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
