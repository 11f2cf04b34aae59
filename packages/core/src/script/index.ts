export { splitTransactions, buildScriptConfigs } from './split.js';
export type { TransactionBlock, ScriptTransaction } from './split.js';
