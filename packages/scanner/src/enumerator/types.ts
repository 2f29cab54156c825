import type { Dirent, Stats } from 'node:fs';

/** The subset of `fs/promises` the scanner touches. */
export interface ScanFs {
  stat(path: string): Promise<Stats>;
  readdir(path: string, options: { withFileTypes: true }): Promise<Dirent[]>;
}

export interface EnumerateOptions {
  /** Normalized extension set, every entry starting with `.` */
  extensions: readonly string[];
}

export interface CandidateFile {
  /** Root joined with the path relative to it */
  path: string;
  /** True when the root itself is this file; the extension filter did not apply. */
  explicit: boolean;
}
