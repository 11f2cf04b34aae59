import type { TransactionArgument } from '../types/index.js';
import { DirectiveError } from '../errors/directive-error.js';
import { parseTransactionArgument } from '../literal/parse.js';

/**
 * A partially parsed transaction argument.
 * `address-of` names an account whose address is filled in by the config builder.
 */
export type Argument =
    | { kind: 'self-contained'; value: TransactionArgument }
    | { kind: 'address-of'; name: string };

/**
 * Parse one `args:` token.
 *
 * The typed literal grammar wins over `{{name}}`: a token valid both ways is
 * self-contained.
 *
 * @param token - Trimmed token, e.g. "42", "0x1" or "{{alice}}"
 */
export function parseArgument(token: string): Argument {
    const literal = parseTransactionArgument(token);
    if (literal) {
        return { kind: 'self-contained', value: literal };
    }

    if (token.startsWith('{{') && token.endsWith('}}')) {
        return { kind: 'address-of', name: token.slice(2, -2) };
    }

    throw new DirectiveError(`failed to parse '${token}' as argument`);
}
