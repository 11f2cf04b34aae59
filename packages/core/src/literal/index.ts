export { parseTransactionArgument, formatTransactionArgument } from './parse.js';
