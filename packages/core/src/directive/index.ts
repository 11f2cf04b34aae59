/**
 * Directive module: line classification, entry parsing and config building.
 */

export { isNewTransaction } from './boundary.js';
export { parseArgument } from './argument.js';
export type { Argument } from './argument.js';
export { parseEntry, tryParseEntry } from './entry.js';
export type { Entry } from './entry.js';
export { buildTransactionConfig, isStageDisabled } from './config.js';
export type { TransactionConfig } from './config.js';
