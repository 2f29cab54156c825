import path from 'node:path';

/**
 * Returns the suffix the extension filter matches against: the base name from
 * its last dot onward, or '' for dotfiles (`.bashrc`) and names ending in a dot.
 */
export function fileSuffix(filePath: string): string {
  const ext = path.extname(filePath);
  return ext === '.' ? '' : ext;
}

/** Case-sensitive exact match of the file's suffix against the set. */
export function matchesExtension(filePath: string, extensions: ReadonlySet<string>): boolean {
  const suffix = fileSuffix(filePath);
  return suffix !== '' && extensions.has(suffix);
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
