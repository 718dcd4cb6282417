export { consoleLogger, silentLogger } from './logger';
export type { ILogger } from './logger';
