export interface WriteOptions {
  projectRoot: string;
  storeDir: string;
  runId: string;
  /** Copy the original into the run's backup directory first. */
  backup: boolean;
}

export interface WriteResult {
  success: boolean;
  filePath: string;
  backupPath: string | null;
  error?: string;
}

export interface FixHistoryEntry {
  timestamp: string;
  runId: string;
  /** Relative to the project root. */
  file: string;
  backupPath: string | null;
  appliedFixes: number;
  loops: number;
  /** Rule codes whose fixes were applied, sorted. */
  rules: string[];
  bytesBefore: number;
  bytesAfter: number;
}
