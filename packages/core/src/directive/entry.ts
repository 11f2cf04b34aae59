/**
 * Per-transaction directive entries.
 *
 * Grammar (all whitespace inside the line is ignored):
 *   //! sender: <account-name>
 *   //! args: <arg>, <arg>, ...
 *   //! no-run: <stage>, <stage>, ...
 *   //! max-gas: <u64>
 *   //! sequence-number: <u64>
 */

import { DIRECTIVE_PREFIX, DIRECTIVE_KEYWORDS } from '../types/index.js';
import { DirectiveError } from '../errors/directive-error.js';
import { parseStage, type Stage } from '../stage/index.js';
import { parseU64 } from '../utils/uint.js';
import { parseArgument, type Argument } from './argument.js';

/**
 * A raw entry extracted from one directive line.
 * Consumed once by buildTransactionConfig.
 */
export type Entry =
    | { kind: 'disable-stages'; stages: Stage[] }
    | { kind: 'sender'; name: string }
    | { kind: 'arguments'; args: Argument[] }
    | { kind: 'max-gas'; amount: bigint }
    | { kind: 'sequence-number'; value: bigint };

/**
 * Parse one directive line into an entry.
 *
 * @param line - Raw script line
 * @throws DirectiveError for a missing prefix, unknown keyword or bad value
 */
export function parseEntry(line: string): Entry {
    const cleaned = line.replace(/\s+/g, '');
    if (!cleaned.startsWith(DIRECTIVE_PREFIX)) {
        throw new DirectiveError(`txn config entry must start with ${DIRECTIVE_PREFIX}`);
    }
    const body = cleaned.slice(DIRECTIVE_PREFIX.length);

    if (body.startsWith(DIRECTIVE_KEYWORDS.SENDER)) {
        const name = body.slice(DIRECTIVE_KEYWORDS.SENDER.length);
        if (name.length === 0) {
            throw new DirectiveError('sender cannot be empty');
        }
        return { kind: 'sender', name: toAsciiLowercase(name) };
    }
    if (body.startsWith(DIRECTIVE_KEYWORDS.ARGS)) {
        const args = splitList(body.slice(DIRECTIVE_KEYWORDS.ARGS.length)).map(parseArgument);
        return { kind: 'arguments', args };
    }
    if (body.startsWith(DIRECTIVE_KEYWORDS.NO_RUN)) {
        const stages = splitList(body.slice(DIRECTIVE_KEYWORDS.NO_RUN.length)).map(parseStage);
        return { kind: 'disable-stages', stages };
    }
    if (body.startsWith(DIRECTIVE_KEYWORDS.MAX_GAS)) {
        return { kind: 'max-gas', amount: parseU64(body.slice(DIRECTIVE_KEYWORDS.MAX_GAS.length)) };
    }
    if (body.startsWith(DIRECTIVE_KEYWORDS.SEQUENCE_NUMBER)) {
        return {
            kind: 'sequence-number',
            value: parseU64(body.slice(DIRECTIVE_KEYWORDS.SEQUENCE_NUMBER.length)),
        };
    }

    throw new DirectiveError(`failed to parse '${body}' as transaction config entry`);
}

/**
 * Parse a line if it is a directive.
 *
 * The raw line must begin with `//!`; an indented directive is not one.
 *
 * @returns The entry, or null for a non-directive line
 */
export function tryParseEntry(line: string): Entry | null {
    if (!line.startsWith(DIRECTIVE_PREFIX)) {
        return null;
    }
    return parseEntry(line);
}

/**
 * Split a comma-separated list, dropping empty pieces.
 */
function splitList(text: string): string[] {
    return text
        .split(',')
        .map((piece) => piece.trim())
        .filter((piece) => piece.length > 0);
}

/**
 * Account names are ASCII; other letters keep their case.
 */
function toAsciiLowercase(text: string): string {
    return text.replace(/[A-Z]/g, (c) => c.toLowerCase());
}
