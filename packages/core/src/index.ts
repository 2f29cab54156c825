export const name = '@tokentally/core';

export * from './tokenizer';
export * from './counter';
