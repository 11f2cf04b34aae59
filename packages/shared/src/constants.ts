/**
 * Constants for transaction directive parsing.
 */

/**
 * Marker that starts every directive line in a test script.
 */
export const DIRECTIVE_PREFIX = '//!';

/**
 * Directive body that opens a new transaction block.
 */
export const NEW_TRANSACTION_TOKEN = 'new-transaction';

/**
 * Sender used when a transaction block has no `sender:` directive.
 * Whether this account exists is checked by the harness, not the config builder.
 */
export const DEFAULT_SENDER = 'default';

/**
 * Keyword prefixes of the per-transaction directives, delimiter included.
 */
export const DIRECTIVE_KEYWORDS = {
    SENDER: 'sender:',
    ARGS: 'args:',
    NO_RUN: 'no-run:',
    MAX_GAS: 'max-gas:',
    SEQUENCE_NUMBER: 'sequence-number:',
} as const;

/**
 * Account address layout: 16 bytes, rendered as 0x + 32 lowercase hex digits.
 */
export const ADDRESS = {
    LENGTH: 16,
    HEX_LENGTH: 32,
} as const;

/**
 * Inclusive upper bounds of the unsigned integer literal types.
 */
export const INTEGER_LIMITS = {
    u8: 0xffn,
    u64: 0xffff_ffff_ffff_ffffn,
    u128: 0xffff_ffff_ffff_ffff_ffff_ffff_ffff_ffffn,
} as const;
