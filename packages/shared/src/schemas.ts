/**
 * Zod schemas for transaction directive data structures.
 *
 * IMPORTANT: u64 and u128 values are bigint, never number.
 * A u64 does not fit in a double above 2^53.
 */

import { z } from 'zod';
import { ADDRESS, INTEGER_LIMITS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Normalized account address: 0x + 32 lowercase hex digits.
 */
const normalizedAddress = z.string().regex(
    new RegExp(`^0x[0-9a-f]{${ADDRESS.HEX_LENGTH}}$`),
    `Must be 0x followed by ${ADDRESS.HEX_LENGTH} lowercase hex digits`
);

/**
 * Address as written by a user: 0x + 1 to 32 hex digits, any case.
 * Left-padded with zeros on load.
 */
const addressLiteral = z.string().regex(
    new RegExp(`^0x[0-9a-fA-F]{1,${ADDRESS.HEX_LENGTH}}$`),
    `Must be 0x followed by 1-${ADDRESS.HEX_LENGTH} hex digits`
);

// ============================================================================
// Transaction Argument Schema
// ============================================================================

/**
 * Self-describing typed literal passed to a transaction.
 */
export const TransactionArgumentSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('u8'), value: z.number().int().min(0).max(Number(INTEGER_LIMITS.u8)) }),
    z.object({ type: z.literal('u64'), value: z.bigint().nonnegative().lte(INTEGER_LIMITS.u64) }),
    z.object({ type: z.literal('u128'), value: z.bigint().nonnegative().lte(INTEGER_LIMITS.u128) }),
    z.object({ type: z.literal('bool'), value: z.boolean() }),
    z.object({ type: z.literal('address'), value: normalizedAddress }),
    // Any backing buffer: z.instanceof would narrow the type to Uint8Array<ArrayBuffer>
    z.object({
        type: z.literal('u8vector'),
        value: z.custom<Uint8Array>((v) => v instanceof Uint8Array, 'Expected Uint8Array'),
    }),
]);

export type TransactionArgument = z.infer<typeof TransactionArgumentSchema>;

export type TransactionArgumentType = TransactionArgument['type'];

// ============================================================================
// Account Schemas
// ============================================================================

/**
 * Account data as the config builder sees it.
 */
export const AccountDataSchema = z.object({
    address: normalizedAddress,
});

export type AccountData = z.infer<typeof AccountDataSchema>;

/**
 * Read-only account registry consulted when building a transaction config.
 * Maps, not records: account names are user input and must never hit
 * Object.prototype keys.
 */
export interface GlobalConfig {
    accounts: ReadonlyMap<string, AccountData>;
    genesisAccounts: ReadonlyMap<string, AccountData>;
}

/**
 * One account in a registry file. A missing address is derived from the name.
 */
export const AccountEntrySchema = z.object({
    address: addressLiteral.optional(),
});

export type AccountEntry = z.infer<typeof AccountEntrySchema>;

/**
 * Registry file (accounts.yaml).
 */
export const AccountRegistryFileSchema = z.object({
    accounts: z.record(z.string().min(1), AccountEntrySchema.nullable()).default({}),
    genesis_accounts: z.record(z.string().min(1), AccountEntrySchema.nullable()).default({}),
});

export type AccountRegistryFile = z.infer<typeof AccountRegistryFileSchema>;
