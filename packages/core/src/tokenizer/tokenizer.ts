import { getEncoding, type Tiktoken } from 'js-tiktoken';
import { TokenizeError, errorMessage } from '@tokentally/shared';

/**
 * Turns text into a token count. Implementations must be pure functions of
 * the text and their vocabulary.
 */
export interface Tokenizer {
  /** Name of the byte-pair encoding, e.g. `cl100k_base` */
  readonly encoding: string;
  count(text: string): number;
}

export class TiktokenTokenizer implements Tokenizer {
  readonly encoding = 'cl100k_base' as const;
  private encoder: Tiktoken | null = null;

  count(text: string): number {
    if (!text) return 0;
    try {
      // Special-token strings such as <|endoftext|> are rejected.
      return this.getEncoder().encode(text).length;
    } catch (e) {
      throw new TokenizeError(`Tokenization failed: ${errorMessage(e)}`, { cause: e });
    }
  }

  private getEncoder(): Tiktoken {
    if (!this.encoder) {
      this.encoder = getEncoding(this.encoding);
    }
    return this.encoder;
  }
}
