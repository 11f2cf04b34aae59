// Types (re-exported from shared)
export type {
    TransactionArgument,
    TransactionArgumentType,
    AccountData,
    AccountEntry,
    AccountRegistryFile,
    GlobalConfig,
} from './types/index.js';

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
} from './types/index.js';

// Errors
export { DirectiveError } from './errors/directive-error.js';

// Utils
export { normalizeAddress, deriveAddress, isAddressLiteral, parseU64, parseUnsigned } from './utils/index.js';
export type { UnsignedIntegerType } from './utils/index.js';

// Literals
export { parseTransactionArgument, formatTransactionArgument } from './literal/index.js';

// Stages
export { STAGES, parseStage, compareStages } from './stage/index.js';
export type { Stage } from './stage/index.js';

// Directives
export {
    isNewTransaction,
    parseArgument,
    parseEntry,
    tryParseEntry,
    buildTransactionConfig,
    isStageDisabled,
} from './directive/index.js';
export type { Argument, Entry, TransactionConfig } from './directive/index.js';

// Scripts
export { splitTransactions, buildScriptConfigs } from './script/index.js';
export type { TransactionBlock, ScriptTransaction } from './script/index.js';
