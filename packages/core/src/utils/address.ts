/**
 * Account address helpers.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 so the core stays free of node:crypto
 * and runs unchanged outside Node.
 */

import { sha256 } from 'js-sha256';
import { ADDRESS } from '../types/index.js';
import { DirectiveError } from '../errors/directive-error.js';

const ADDRESS_LITERAL = new RegExp(`^0x([0-9a-fA-F]{1,${ADDRESS.HEX_LENGTH}})$`);

/**
 * Check whether text is an address literal: 0x + 1 to 32 hex digits.
 */
export function isAddressLiteral(text: string): boolean {
    return ADDRESS_LITERAL.test(text);
}

/**
 * Normalize an address literal to 0x + 32 lowercase hex digits.
 * Short literals are left-padded with zeros (0x1 is the same account as 0x00..01).
 *
 * @param text - Address literal, e.g. "0xA550C18"
 * @returns Normalized address
 */
export function normalizeAddress(text: string): string {
    const match = text.match(ADDRESS_LITERAL);
    if (!match) {
        throw new DirectiveError(`invalid address '${text}'`);
    }
    return `0x${match[1].toLowerCase().padStart(ADDRESS.HEX_LENGTH, '0')}`;
}

/**
 * Derive a deterministic address from an account name.
 *
 * Payload: the account name, as given (no case folding).
 * The address is the first 16 bytes of its SHA-256 digest.
 */
export function deriveAddress(name: string): string {
    return `0x${sha256(name).slice(0, ADDRESS.HEX_LENGTH)}`;
}
