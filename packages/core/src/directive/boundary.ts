import { DIRECTIVE_PREFIX, NEW_TRANSACTION_TOKEN } from '../types/index.js';

/**
 * Check whether a line opens a new transaction block.
 *
 * Only the line's ends and the gap after `//!` may hold whitespace:
 * `//!   new-transaction` opens a block, `//! new - transaction` does not.
 */
export function isNewTransaction(line: string): boolean {
    const trimmed = line.trim();
    if (!trimmed.startsWith(DIRECTIVE_PREFIX)) {
        return false;
    }
    return trimmed.slice(DIRECTIVE_PREFIX.length).trimStart() === NEW_TRANSACTION_TOKEN;
}
