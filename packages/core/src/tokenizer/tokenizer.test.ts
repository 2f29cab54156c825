import { describe, it, expect } from 'vitest';
import { TokenizeError } from '@tokentally/shared';
import { TiktokenTokenizer } from './tokenizer';

describe('TiktokenTokenizer', () => {
  const tokenizer = new TiktokenTokenizer();

  it('uses the cl100k_base encoding', () => {
    expect(tokenizer.encoding).toBe('cl100k_base');
  });

  it('counts nothing for empty text', () => {
    expect(tokenizer.count('')).toBe(0);
  });

  it('counts byte-pair tokens', () => {
    expect(tokenizer.count('hello')).toBe(1);
    expect(tokenizer.count('hello world')).toBe(2);
  });

  it('is a pure function of the text', () => {
    const text = 'def f(): pass';
    expect(tokenizer.count(text)).toBe(new TiktokenTokenizer().count(text));
  });

  it('rejects text containing special-token strings', () => {
    expect(() => tokenizer.count('x = "<|endoftext|>"')).toThrow(TokenizeError);
    expect(() => tokenizer.count('<|endoftext|>')).toThrow(/^Tokenization failed: /);
  });
});
