import pc from 'picocolors';
import {
  AppError,
  errorMessage,
  estimateCostUsd,
  formatCount,
  formatTokenCount,
} from '@tokentally/shared';
import type {
  CountObserver,
  ProcessedFileRecord,
  RunReport,
  SkippedFileRecord,
} from '@tokentally/core';

export interface RenderOptions {
  verbose: boolean;
  json: boolean;
}

export interface JsonReport {
  root: string;
  encoding: string;
  totals: {
    files: number;
    skipped: number;
    failed: number;
    tokens: number;
    estimatedCostUsd: number;
  };
  files: RunReport['files'];
}

/**
 * Prints per-file lines while the run is in progress and the summary once it
 * completes. In JSON mode nothing is printed until the summary.
 */
export class ReportRenderer implements CountObserver {
  constructor(private readonly options: RenderOptions) {}

  onFileCounted(record: ProcessedFileRecord): void {
    if (this.options.json || !this.options.verbose) return;
    console.log(`${record.path}: ${formatTokenCount(record.tokens)}`);
  }

  onFileSkipped(record: SkippedFileRecord): void {
    if (this.options.json) return;
    // A file named on the command line is always announced.
    if (this.options.verbose || record.explicit) {
      console.log(`Skipped ${record.path}: File too large`);
    }
  }

  renderSummary(report: RunReport): void {
    if (this.options.json) {
      console.log(JSON.stringify(toJsonReport(report), null, 2));
      return;
    }

    const { totals } = report;
    console.log('\nSummary:');
    console.log(`Total files processed: ${formatCount(totals.totalFiles)}`);
    console.log(`Files skipped (too large): ${formatCount(totals.skippedFiles)}`);
    console.log(`Total: ${formatTokenCount(totals.totalTokens)}`);
  }
}

export function toJsonReport(report: RunReport): JsonReport {
  const { totals } = report;
  return {
    root: report.root,
    encoding: report.encoding,
    totals: {
      files: totals.totalFiles,
      skipped: totals.skippedFiles,
      failed: totals.failedFiles,
      tokens: totals.totalTokens,
      estimatedCostUsd: estimateCostUsd(totals.totalTokens),
    },
    files: report.files,
  };
}

/**
 * Renders a fatal error. JSON mode keeps stdout parseable.
 */
export function renderError(error: unknown, options: RenderOptions): void {
  if (options.json) {
    console.log(
      JSON.stringify({
        error: {
          code: error instanceof AppError ? error.code : 'UnknownError',
          message: errorMessage(error),
          details: error instanceof AppError ? error.details : undefined,
        },
      }),
    );
    return;
  }

  console.error(pc.red(`❌ Error: ${errorMessage(error)}`));
  if (error instanceof AppError && error.details) {
    console.error(
      `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
    );
  }
  if (options.verbose && error instanceof Error && error.stack) {
    console.error(`\nStack Trace:\n${error.stack}`);
  } else {
    console.error(pc.gray(`\nFor more details, run with the --verbose flag.`));
  }
}
