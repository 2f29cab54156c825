import type { Command } from 'commander';
import { DEFAULT_EXTENSIONS, DEFAULT_MAX_FILE_SIZE, parseCountConfig } from '@tokentally/shared';
import { TokenCountRunner } from '@tokentally/core';
import { ReportRenderer } from '../output';
import type { CliOptions } from '../types';

export interface CountCommandDeps {
  createRunner?: () => TokenCountRunner;
}

export function registerCountCommand(program: Command, deps: CountCommandDeps = {}) {
  program
    .argument('<path>', 'Path to file or directory')
    .option(
      '--extensions <list>',
      'Comma-separated list of file extensions to process (e.g., .py,.js,.txt)',
      DEFAULT_EXTENSIONS.join(','),
    )
    .option('--verbose', 'Show token count for each file', false)
    .option(
      '--max-file-size <bytes>',
      'Maximum file size to process in bytes',
      String(DEFAULT_MAX_FILE_SIZE),
    )
    .option('--json', 'Output results as JSON', false)
    .action(async (target: string, options: CliOptions) => {
      const config = parseCountConfig(options);
      const renderer = new ReportRenderer({ verbose: config.verbose, json: config.json });
      const runner = deps.createRunner?.() ?? new TokenCountRunner();

      const report = await runner.run(target, {
        extensions: config.extensions,
        maxFileSize: config.maxFileSize,
        observer: renderer,
        collectRecords: config.json,
      });
      renderer.renderSummary(report);
    });
}
