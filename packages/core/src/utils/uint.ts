/**
 * Unsigned integer parsing for directive values.
 * Values are bigint: a u64 does not fit in a double.
 */

import { INTEGER_LIMITS } from '../types/index.js';
import { DirectiveError } from '../errors/directive-error.js';

export type UnsignedIntegerType = keyof typeof INTEGER_LIMITS;

/**
 * Parse decimal digits (optionally preceded by `+`) as an unsigned integer.
 *
 * @returns The value, or the reason it was rejected
 */
export function parseUnsigned(
    text: string,
    type: UnsignedIntegerType
): { value: bigint } | { error: string } {
    const digits = text.startsWith('+') ? text.slice(1) : text;
    if (digits.length === 0) {
        return { error: 'cannot parse integer from empty string' };
    }
    if (!/^\d+$/.test(digits)) {
        return { error: 'invalid digit found in string' };
    }

    const value = BigInt(digits);
    if (value > INTEGER_LIMITS[type]) {
        return { error: 'number too large to fit in target type' };
    }
    return { value };
}

/**
 * Parse a u64 directive value, throwing on failure.
 */
export function parseU64(text: string): bigint {
    const result = parseUnsigned(text, 'u64');
    if ('error' in result) {
        throw new DirectiveError(`failed to parse '${text}' as u64: ${result.error}`);
    }
    return result.value;
}
