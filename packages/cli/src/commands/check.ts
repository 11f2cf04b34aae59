import { readFileSync } from 'node:fs';
import {
    buildScriptConfigs,
    compareStages,
    formatTransactionArgument,
    type ScriptTransaction,
    type TransactionBlock,
    type TransactionConfig,
} from '@txn-directives/core';
import { loadGlobalConfig } from '../config/accounts.js';
import { log, success, arrow, info, warn } from '../utils/console.js';
import type { CheckOptions } from '../types.js';

/**
 * Parses every transaction block of a script and prints its config.
 * Throws on the first bad directive; the caller reports it.
 */
export function checkScript(scriptPath: string, options: CheckOptions): ScriptTransaction[] {
    const globalConfig = loadGlobalConfig(options.accounts);
    info(`Accounts: ${globalConfig.accounts.size} regular, ${globalConfig.genesisAccounts.size} genesis`);

    const text = readFileSync(scriptPath, 'utf-8');
    const transactions = buildScriptConfigs(text, globalConfig);

    for (const { block, config } of transactions) {
        log(`\nTransaction ${block.index + 1} (line ${block.startLine})`);
        if (isEmptyBlock(block)) {
            warn(`Transaction ${block.index + 1} has no directives and no body`);
        }
        for (const line of describeConfig(config)) {
            arrow(line);
        }
    }

    log('');
    success(`${transactions.length} transaction config(s) built from ${scriptPath}`);
    return transactions;
}

/**
 * Renders a config as one line per option. Unset options are shown as "-".
 */
export function describeConfig(config: TransactionConfig): string[] {
    const args = config.args.map(formatTransactionArgument);
    const stages = [...config.disabledStages].sort(compareStages);

    return [
        `sender: ${config.sender}`,
        `args: ${args.length > 0 ? args.join(', ') : '-'}`,
        `max-gas: ${config.maxGas ?? '-'}`,
        `sequence-number: ${config.sequenceNumber ?? '-'}`,
        `no-run: ${stages.length > 0 ? stages.join(', ') : '-'}`,
    ];
}

/**
 * A block with nothing but blank lines, e.g. before a leading `//! new-transaction`.
 */
function isEmptyBlock(block: TransactionBlock): boolean {
    return block.entries.length === 0 && block.body.every((line) => line.trim().length === 0);
}
