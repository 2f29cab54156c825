export const name = '@tokentally/scanner';

export * from './enumerator';
export * from './size/filter';
