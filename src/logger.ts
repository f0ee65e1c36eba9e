// logger.ts

import type { Logger } from 'homebridge';

/**
 * The slice of the Homebridge logger the reconciler writes to.
 * A plugin passes its platform `log` straight through.
 */
export type EngineLogger = Pick<Logger, 'info' | 'warn' | 'error' | 'debug'>;

export const consoleLogger: EngineLogger = console;
