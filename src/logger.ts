import debug from 'debug';
import { format } from 'util';

import { DEBUG_NAMESPACE } from './lib/utils/debug.js';

export type LogFunction = (message: string) => void;

let logger: LogFunction | undefined;
const debugLogger = debug(DEBUG_NAMESPACE);

/** Route warnings to an additional sink, e.g. a test reporter. Pass undefined to detach. */
export function setLogger(fn: LogFunction | undefined): void {
  logger = fn;
}

export function logWarn(message: string, ...args: unknown[]): void {
  const warnMessage = `WARN: ${message}`;

  if (logger) {
    logger(format(warnMessage, ...args));
  }

  debugLogger(warnMessage, ...args);
}
