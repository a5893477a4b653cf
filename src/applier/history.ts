import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { FixHistoryEntry } from './types.js';

/**
 * Append a single history entry to the JSONL file.
 * Creates parent directories if needed. Append-only, never rewrites the file.
 */
export async function appendHistoryEntry(
  historyPath: string,
  entry: FixHistoryEntry,
): Promise<void> {
  await mkdir(dirname(historyPath), { recursive: true });
  const line = JSON.stringify(entry) + '\n';
  await appendFile(historyPath, line, 'utf-8');
}

/**
 * Read every entry back. Lines that are not valid JSON are skipped.
 */
export async function readHistory(historyPath: string): Promise<FixHistoryEntry[]> {
  let text: string;
  try {
    text = await readFile(historyPath, 'utf-8');
  } catch {
    return [];
  }

  const entries: FixHistoryEntry[] = [];
  for (const line of text.split('\n')) {
    if (line.trim().length === 0) continue;
    const entry = parseEntry(line);
    if (entry) entries.push(entry);
  }
  return entries;
}

function parseEntry(line: string): FixHistoryEntry | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    // partial line from an interrupted run
    return null;
  }
  return isHistoryEntry(value) ? value : null;
}

function isHistoryEntry(value: unknown): value is FixHistoryEntry {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.runId === 'string' &&
    typeof record.file === 'string' &&
    typeof record.appliedFixes === 'number' &&
    Array.isArray(record.rules)
  );
}

/**
 * Build a history entry for one fixed file.
 */
export function buildHistoryEntry(
  runId: string,
  file: string,
  backupPath: string | null,
  appliedFixes: number,
  loops: number,
  rules: readonly string[],
  before: string,
  after: string,
): FixHistoryEntry {
  return {
    timestamp: new Date().toISOString(),
    runId,
    file,
    backupPath,
    appliedFixes,
    loops,
    rules: [...new Set(rules)].sort(),
    bytesBefore: Buffer.byteLength(before, 'utf-8'),
    bytesAfter: Buffer.byteLength(after, 'utf-8'),
  };
}
