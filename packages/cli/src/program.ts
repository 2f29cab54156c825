import { Command, CommanderError } from 'commander';
import { exitCodeFor } from '@tokentally/shared';
import { version } from '../package.json';
import { registerCountCommand, type CountCommandDeps } from './commands/count';
import { renderError } from './output';
import type { CliOptions } from './types';

export const name = '@tokentally/cli';

export function createProgram(deps: CountCommandDeps = {}): Command {
  const program = new Command();

  program
    .name('tokentally')
    .description("Count tokens in code files using the cl100k_base tokenizer and estimate cost")
    .version(version);

  registerCountCommand(program, deps);
  return program;
}

/**
 * Parses argv, runs the count and returns the process exit code.
 */
export async function run(argv: string[], deps: CountCommandDeps = {}): Promise<number> {
  const program = createProgram(deps).exitOverride();

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already written its own message; help and version exit 0.
      return e.exitCode === 0 ? 0 : 2;
    }
    const opts = program.opts<CliOptions>();
    renderError(e, { verbose: opts.verbose === true, json: opts.json === true });
    return exitCodeFor(e);
  }
}
