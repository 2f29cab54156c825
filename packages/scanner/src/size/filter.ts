import nodeFs from 'node:fs/promises';
import { DEFAULT_MAX_FILE_SIZE, FileReadError, errorMessage } from '@tokentally/shared';
import type { ScanFs } from '../enumerator/types';

export type SizeVerdict = 'process' | 'skip-too-large';

export interface SizeCheck {
  verdict: SizeVerdict;
  sizeBytes: number;
}

/** `maxFileSize` is an inclusive upper bound. */
export function classifyFileSize(sizeBytes: number, maxFileSize: number): SizeVerdict {
  return sizeBytes <= maxFileSize ? 'process' : 'skip-too-large';
}

export class SizeFilter {
  constructor(
    readonly maxFileSize: number = DEFAULT_MAX_FILE_SIZE,
    private readonly fs: Pick<ScanFs, 'stat'> = nodeFs,
  ) {}

  /**
   * Stats the file and classifies it without reading its content.
   * @throws FileReadError when the file cannot be stat'ed
   */
  async check(filePath: string): Promise<SizeCheck> {
    let sizeBytes: number;
    try {
      sizeBytes = (await this.fs.stat(filePath)).size;
    } catch (e) {
      throw new FileReadError(errorMessage(e), { cause: e, details: { path: filePath } });
    }
    return { verdict: classifyFileSize(sizeBytes, this.maxFileSize), sizeBytes };
  }
}
