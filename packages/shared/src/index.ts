export const name = '@tokentally/shared';

export * from './errors';
export * from './logger';
export * from './config/schema';
export * from './format/tokens';
