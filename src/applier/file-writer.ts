import { copyFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { dirname, join, relative, resolve } from 'node:path';
import { errorMessage } from '../errors.js';
import type { WriteOptions, WriteResult } from './types.js';

/**
 * Write fixed content over an existing file.
 * Backs the original up first (unless disabled), writes atomically
 * (temp file + rename) and reads the file back to validate it.
 */
export async function writeFixedFile(
  filePath: string,
  content: string,
  options: WriteOptions,
): Promise<WriteResult> {
  const targetPath = resolve(filePath);
  let backupPath: string | null = null;

  try {
    if (options.backup) {
      backupPath = await backupFile(targetPath, options);
    }
    await atomicWrite(targetPath, content);
    await validateWrite(targetPath, content);
  } catch (err) {
    return {
      success: false,
      filePath: targetPath,
      backupPath,
      error: errorMessage(err),
    };
  }

  return { success: true, filePath: targetPath, backupPath };
}

/**
 * Backups keep the file's path relative to the project root, so two files
 * with the same name never collide within a run.
 */
export function getBackupPath(filePath: string, options: Pick<WriteOptions, 'projectRoot' | 'storeDir' | 'runId'>): string {
  return join(options.storeDir, 'backups', options.runId, relativePath(filePath, options.projectRoot));
}

async function backupFile(filePath: string, options: WriteOptions): Promise<string> {
  const backupPath = getBackupPath(filePath, options);
  await mkdir(dirname(backupPath), { recursive: true });
  await copyFile(filePath, backupPath);
  return backupPath;
}

/**
 * Atomically write a file using temp file + rename.
 */
async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });

  const tempPath = join(dir, `.tmp-${randomUUID()}`);
  await writeFile(tempPath, content, 'utf-8');
  await rename(tempPath, filePath);
}

/**
 * Validate that a write succeeded by reading the file back.
 */
async function validateWrite(filePath: string, expectedContent: string): Promise<void> {
  const actual = await readFile(filePath, 'utf-8');
  if (actual !== expectedContent) {
    throw new Error(`Validation failed: ${filePath} does not contain the fixed content`);
  }
}

/**
 * Compute relative path from projectRoot for display. Files outside the
 * project keep their absolute path.
 */
export function relativePath(filePath: string, projectRoot: string): string {
  const rel = relative(projectRoot, filePath);
  if (rel === '' || rel.startsWith('..')) return filePath;
  return rel;
}
