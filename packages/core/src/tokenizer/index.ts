export * from './tokenizer';
export * from './reader';
