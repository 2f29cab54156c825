import { describe, it, expect } from 'vitest';
import { name, TokenCountRunner, TiktokenTokenizer } from './index';

describe('core package', () => {
  it('exports name', () => {
    expect(name).toBe('@tokentally/core');
  });

  it('defaults to the cl100k_base tokenizer', () => {
    expect(new TokenCountRunner().encoding).toBe(new TiktokenTokenizer().encoding);
  });
});
