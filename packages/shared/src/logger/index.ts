import { ConsoleLogger } from './consoleLogger';
export type { Logger, MaybePromise } from './types';

export const logger = new ConsoleLogger();
export { ConsoleLogger };
