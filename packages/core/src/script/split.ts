/**
 * Splits a test script into transaction blocks and builds their configs.
 *
 * Headless: takes the script text, not a path.
 */

import type { GlobalConfig } from '../types/index.js';
import { DirectiveError } from '../errors/directive-error.js';
import { isNewTransaction } from '../directive/boundary.js';
import { tryParseEntry, type Entry } from '../directive/entry.js';
import { buildTransactionConfig, type TransactionConfig } from '../directive/config.js';

/**
 * Lines of one transaction, between two `//! new-transaction` boundaries.
 */
export interface TransactionBlock {
    /** 0-based position in the script */
    index: number;
    /** 1-based line of the first line in the block (the boundary line is excluded) */
    startLine: number;
    /** Parsed directives, in script order */
    entries: Entry[];
    /** Non-directive lines (the transaction source), in script order */
    body: string[];
}

/**
 * A block with its built config.
 */
export interface ScriptTransaction {
    block: TransactionBlock;
    config: TransactionConfig;
}

/**
 * Split script text into transaction blocks.
 *
 * A boundary line closes the current block, so a script starting with
 * `//! new-transaction` yields an empty first block. Blocks are never dropped:
 * block numbers always follow the script.
 *
 * @throws DirectiveError carrying the 1-based line of the bad directive
 */
export function splitTransactions(text: string): TransactionBlock[] {
    const lines = text.split(/\r?\n/);
    const blocks: TransactionBlock[] = [];
    let current: TransactionBlock = { index: 0, startLine: 1, entries: [], body: [] };

    lines.forEach((line, i) => {
        const lineNumber = i + 1;

        if (isNewTransaction(line)) {
            blocks.push(current);
            current = { index: blocks.length, startLine: lineNumber + 1, entries: [], body: [] };
            return;
        }

        let entry: Entry | null;
        try {
            entry = tryParseEntry(line);
        } catch (err) {
            throw locate(err, lineNumber, line);
        }

        if (entry) {
            current.entries.push(entry);
        } else {
            current.body.push(line);
        }
    });

    blocks.push(current);
    return blocks;
}

/**
 * Split a script and build one config per block.
 *
 * @param text - Script text
 * @param globalConfig - Account registry shared by every block
 * @throws DirectiveError pinned to the failing line, or to the block's first line
 *   when the failure comes from combining entries
 */
export function buildScriptConfigs(text: string, globalConfig: GlobalConfig): ScriptTransaction[] {
    return splitTransactions(text).map((block) => {
        try {
            return { block, config: buildTransactionConfig(globalConfig, block.entries) };
        } catch (err) {
            throw locate(err, block.startLine);
        }
    });
}

function locate(err: unknown, line: number, directive?: string): unknown {
    return err instanceof DirectiveError ? err.atLine(line, directive) : err;
}
