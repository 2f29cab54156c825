import nodeFs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';
import { PathNotFoundError, ScanError, errorMessage } from '@tokentally/shared';
import type { CandidateFile, EnumerateOptions, ScanFs } from './types';
import { compareNames, isNotFound, matchesExtension } from './utils';

export * from './types';
export { fileSuffix, matchesExtension } from './utils';

/**
 * Produces the files a run should look at. Each call to `enumerate` starts a
 * fresh walk, so the sequence can be restarted.
 */
export class FileEnumerator {
  private fs: ScanFs;

  constructor(fs: ScanFs = nodeFs) {
    this.fs = fs;
  }

  async *enumerate(root: string, options: EnumerateOptions): AsyncGenerator<CandidateFile> {
    let stats: Stats;
    try {
      stats = await this.fs.stat(root);
    } catch (e) {
      if (isNotFound(e)) {
        throw new PathNotFoundError(root, { cause: e });
      }
      throw new ScanError(`Cannot access ${root}: ${errorMessage(e)}`, { cause: e });
    }

    if (stats.isFile()) {
      yield { path: path.normalize(root), explicit: true };
      return;
    }
    if (!stats.isDirectory()) {
      return;
    }

    yield* this.walk(path.normalize(root), new Set(options.extensions));
  }

  private async *walk(dir: string, extensions: ReadonlySet<string>): AsyncGenerator<CandidateFile> {
    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(dir, { withFileTypes: true });
    } catch (e) {
      throw new ScanError(`Cannot read directory ${dir}: ${errorMessage(e)}`, {
        cause: e,
        details: { path: dir },
      });
    }
    entries.sort((a, b) => compareNames(a.name, b.name));

    // Files of this directory first, then its subdirectories.
    const subdirs: string[] = [];
    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      const kind = await this.classify(entry, entryPath);
      if (kind === 'directory') {
        subdirs.push(entryPath);
      } else if (kind === 'file' && matchesExtension(entry.name, extensions)) {
        yield { path: entryPath, explicit: false };
      }
    }

    for (const subdir of subdirs) {
      yield* this.walk(subdir, extensions);
    }
  }

  /**
   * Symbolic links are resolved but linked directories are not descended.
   * A dangling link counts as a file.
   */
  private async classify(
    entry: Dirent,
    entryPath: string,
  ): Promise<'file' | 'directory' | 'linked-directory' | 'other'> {
    if (entry.isDirectory()) return 'directory';
    if (entry.isFile()) return 'file';
    if (!entry.isSymbolicLink()) return 'other';

    try {
      const target = await this.fs.stat(entryPath);
      if (target.isDirectory()) return 'linked-directory';
      return target.isFile() ? 'file' : 'other';
    } catch (e) {
      if (isNotFound(e)) return 'file';
      throw new ScanError(`Cannot resolve link ${entryPath}: ${errorMessage(e)}`, { cause: e });
    }
  }
}
