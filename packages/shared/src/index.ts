// Schemas
export {
    TransactionArgumentSchema,
    AccountDataSchema,
    AccountEntrySchema,
    AccountRegistryFileSchema,
} from './schemas.js';

// Types
export type {
    TransactionArgument,
    TransactionArgumentType,
    AccountData,
    AccountEntry,
    AccountRegistryFile,
    GlobalConfig,
} from './schemas.js';

// Constants
export {
    DIRECTIVE_PREFIX,
    NEW_TRANSACTION_TOKEN,
    DEFAULT_SENDER,
    DIRECTIVE_KEYWORDS,
    ADDRESS,
    INTEGER_LIMITS,
} from './constants.js';
