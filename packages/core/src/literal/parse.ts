/**
 * Typed literal grammar for transaction arguments.
 *
 * Accepted forms, tried in order:
 * - true / false
 * - decimal integer, optional type suffix: 42, 42u64, 7u8, 1000u128
 * - address: 0x + 1 to 32 hex digits
 * - byte vector: x"0aff" or b"0aff" (hex, even length, may be empty)
 */

import type { TransactionArgument } from '../types/index.js';
import { parseUnsigned } from '../utils/uint.js';
import { isAddressLiteral, normalizeAddress } from '../utils/address.js';

const INTEGER_LITERAL = /^(\d+)(u8|u64|u128)?$/;
const BYTE_VECTOR_LITERAL = /^[xb]"((?:[0-9a-fA-F]{2})*)"$/;

/**
 * Parse a token as a self-contained typed literal.
 *
 * @param token - Trimmed token text
 * @returns Parsed argument, or null if the token is not a literal
 */
export function parseTransactionArgument(token: string): TransactionArgument | null {
    if (token === 'true' || token === 'false') {
        return { type: 'bool', value: token === 'true' };
    }

    const integer = token.match(INTEGER_LITERAL);
    if (integer) {
        return parseIntegerLiteral(integer[1], integer[2]);
    }

    if (isAddressLiteral(token)) {
        return { type: 'address', value: normalizeAddress(token) };
    }

    const bytes = token.match(BYTE_VECTOR_LITERAL);
    if (bytes) {
        return { type: 'u8vector', value: hexToBytes(bytes[1]) };
    }

    return null;
}

function parseIntegerLiteral(digits: string, suffix: string | undefined): TransactionArgument | null {
    switch (suffix) {
        case 'u8': {
            const result = parseUnsigned(digits, 'u8');
            return 'value' in result ? { type: 'u8', value: Number(result.value) } : null;
        }
        case 'u128': {
            const result = parseUnsigned(digits, 'u128');
            return 'value' in result ? { type: 'u128', value: result.value } : null;
        }
        default: {
            const result = parseUnsigned(digits, 'u64');
            return 'value' in result ? { type: 'u64', value: result.value } : null;
        }
    }
}

/**
 * Render an argument in the literal form parseTransactionArgument accepts.
 * Plain u64 values carry no suffix.
 */
export function formatTransactionArgument(arg: TransactionArgument): string {
    switch (arg.type) {
        case 'u8':
            return `${arg.value}u8`;
        case 'u64':
            return arg.value.toString();
        case 'u128':
            return `${arg.value}u128`;
        case 'bool':
            return arg.value ? 'true' : 'false';
        case 'address':
            return arg.value;
        case 'u8vector':
            return `x"${bytesToHex(arg.value)}"`;
    }
}

function hexToBytes(hex: string): Uint8Array {
    const bytes = new Uint8Array(hex.length / 2);
    for (let i = 0; i < bytes.length; i++) {
        bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
    }
    return bytes;
}

function bytesToHex(bytes: Uint8Array): string {
    return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
}
