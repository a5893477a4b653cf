import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export const STORE_DIR_NAME = '.reflowlint';

/**
 * Read and parse a JSON file. Returns null if the file doesn't exist or is invalid.
 */
export async function readJson(filePath: string): Promise<unknown> {
  try {
    const raw = await readFile(filePath, 'utf-8');
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/**
 * Initialize the .reflowlint directory (backups + history) with a .gitignore.
 * Returns the path to the .reflowlint directory.
 */
export async function initStoreDir(projectDir: string): Promise<string> {
  const storeDir = join(projectDir, STORE_DIR_NAME);
  await mkdir(join(storeDir, 'backups'), { recursive: true });

  const gitignorePath = join(storeDir, '.gitignore');
  try {
    await readFile(gitignorePath, 'utf-8');
  } catch {
    await writeFile(gitignorePath, '*\n', 'utf-8');
  }

  return storeDir;
}

export function historyPath(storeDir: string): string {
  return join(storeDir, 'history.jsonl');
}
