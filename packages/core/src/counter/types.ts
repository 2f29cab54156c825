import type { ErrorCode } from '@tokentally/shared';

export interface RunTotals {
  totalTokens: number;
  /** Files that passed the size filter, including those that failed to read */
  totalFiles: number;
  /** Files skipped because they exceed the size threshold */
  skippedFiles: number;
  /** Processed files that contributed zero tokens because they failed */
  failedFiles: number;
}

interface BaseFileRecord {
  path: string;
  /** True when the file was named directly rather than found by the walk */
  explicit: boolean;
}

export interface CountedFileRecord extends BaseFileRecord {
  status: 'counted';
  sizeBytes: number;
  tokens: number;
}

export interface FailedFileRecord extends BaseFileRecord {
  status: 'failed';
  /** Unknown when the stat itself failed */
  sizeBytes: number | null;
  tokens: 0;
  error: { code: ErrorCode; message: string };
}

export interface SkippedFileRecord extends BaseFileRecord {
  status: 'skipped';
  sizeBytes: number;
  tokens: 0;
}

export type ProcessedFileRecord = CountedFileRecord | FailedFileRecord;
export type FileRecord = ProcessedFileRecord | SkippedFileRecord;

/**
 * Receives each file as soon as it has been handled.
 */
export interface CountObserver {
  onFileCounted?(record: ProcessedFileRecord): void;
  onFileSkipped?(record: SkippedFileRecord): void;
}

export interface RunOptions {
  extensions: readonly string[];
  maxFileSize: number;
  observer?: CountObserver;
  /** Keep every File Record in the report; otherwise each is dropped once totalled */
  collectRecords?: boolean;
}

export interface RunReport {
  root: string;
  encoding: string;
  totals: RunTotals;
  /** Empty unless the run was asked to collect records */
  files: FileRecord[];
}
