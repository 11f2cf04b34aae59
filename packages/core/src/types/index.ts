/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    TransactionArgument,
    TransactionArgumentType,
    AccountData,
    AccountEntry,
    AccountRegistryFile,
    GlobalConfig,
} from '@txn-directives/shared';

export {
    TransactionArgumentSchema,
    AccountDataSchema,
    AccountEntrySchema,
    AccountRegistryFileSchema,
    DIRECTIVE_PREFIX,
    NEW_TRANSACTION_TOKEN,
    DEFAULT_SENDER,
    DIRECTIVE_KEYWORDS,
    ADDRESS,
    INTEGER_LIMITS,
} from '@txn-directives/shared';
