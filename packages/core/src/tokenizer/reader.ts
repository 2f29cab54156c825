import nodeFs from 'node:fs/promises';
import { DecodeError, FileReadError, errorMessage } from '@tokentally/shared';
import { TiktokenTokenizer, type Tokenizer } from './tokenizer';

export interface ReadFs {
  readFile(path: string): Promise<Buffer>;
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Reads a whole file and decodes it as strict UTF-8.
 * @throws FileReadError on I/O or permission failures
 * @throws DecodeError when the bytes are not valid UTF-8
 */
export async function readUtf8File(filePath: string, fs: ReadFs = nodeFs): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (e) {
    throw new FileReadError(errorMessage(e), { cause: e, details: { path: filePath } });
  }

  try {
    return utf8.decode(bytes);
  } catch (e) {
    throw new DecodeError('File is not valid UTF-8 text', { cause: e, details: { path: filePath } });
  }
}

/**
 * Counts the tokens of one file on disk.
 */
export class FileTokenCounter {
  constructor(
    readonly tokenizer: Tokenizer = new TiktokenTokenizer(),
    private readonly fs: ReadFs = nodeFs,
  ) {}

  async count(filePath: string): Promise<number> {
    const text = await readUtf8File(filePath, this.fs);
    return this.tokenizer.count(text);
  }
}
