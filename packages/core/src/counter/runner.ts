import nodeFs from 'node:fs/promises';
import { AppError, errorMessage, logger as defaultLogger, type Logger } from '@tokentally/shared';
import { FileEnumerator, SizeFilter, type CandidateFile, type ScanFs } from '@tokentally/scanner';
import { FileTokenCounter, type ReadFs } from '../tokenizer';
import type { FileRecord, RunOptions, RunReport, RunTotals } from './types';

export interface TokenCountRunnerDeps {
  fs?: ScanFs & ReadFs;
  counter?: FileTokenCounter;
  logger?: Logger;
}

export function emptyTotals(): RunTotals {
  return { totalTokens: 0, totalFiles: 0, skippedFiles: 0, failedFiles: 0 };
}

/** Folds one record into the running totals. */
export function addToTotals(totals: RunTotals, record: FileRecord): void {
  switch (record.status) {
    case 'skipped':
      totals.skippedFiles += 1;
      return;
    case 'failed':
      totals.totalFiles += 1;
      totals.failedFiles += 1;
      return;
    case 'counted':
      totals.totalFiles += 1;
      totals.totalTokens += record.tokens;
      return;
  }
}

/**
 * Drives a single counting run: enumerate, size-filter, tokenize, accumulate.
 * Files are handled strictly one at a time.
 */
export class TokenCountRunner {
  private readonly enumerator: FileEnumerator;
  private readonly counter: FileTokenCounter;
  private readonly logger: Logger;
  private readonly fs: ScanFs & ReadFs;

  constructor(deps: TokenCountRunnerDeps = {}) {
    this.fs = deps.fs ?? nodeFs;
    this.enumerator = new FileEnumerator(this.fs);
    this.counter = deps.counter ?? new FileTokenCounter(undefined, this.fs);
    this.logger = deps.logger ?? defaultLogger;
  }

  get encoding(): string {
    return this.counter.tokenizer.encoding;
  }

  async run(root: string, options: RunOptions): Promise<RunReport> {
    const totals = emptyTotals();
    const files: FileRecord[] = [];
    const sizeFilter = new SizeFilter(options.maxFileSize, this.fs);

    for await (const candidate of this.enumerator.enumerate(root, {
      extensions: options.extensions,
    })) {
      const record = await this.processFile(candidate, sizeFilter);
      addToTotals(totals, record);
      if (options.collectRecords) {
        files.push(record);
      }

      if (record.status === 'skipped') {
        options.observer?.onFileSkipped?.(record);
      } else {
        options.observer?.onFileCounted?.(record);
      }
    }

    return { root, encoding: this.encoding, totals, files };
  }

  private async processFile(candidate: CandidateFile, sizeFilter: SizeFilter): Promise<FileRecord> {
    const { path, explicit } = candidate;
    let sizeBytes: number | null = null;
    try {
      const check = await sizeFilter.check(path);
      sizeBytes = check.sizeBytes;
      if (check.verdict === 'skip-too-large') {
        return { status: 'skipped', path, explicit, sizeBytes, tokens: 0 };
      }

      const tokens = await this.counter.count(path);
      return { status: 'counted', path, explicit, sizeBytes, tokens };
    } catch (e) {
      // A single bad file never aborts the run.
      const message = errorMessage(e);
      await this.logger.warn(`Error processing ${path}: ${message}`);
      return {
        status: 'failed',
        path,
        explicit,
        sizeBytes,
        tokens: 0,
        error: { code: e instanceof AppError ? e.code : 'UnknownError', message },
      };
    }
  }
}
