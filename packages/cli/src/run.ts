import { DirectiveError } from '@txn-directives/core';
import { checkScript } from './commands/check.js';
import { log, error } from './utils/console.js';
import { parseArgs } from './args.js';

function printUsage(): void {
    log('txncfg v0.1.0');
    log('');
    log('Usage: txncfg <script> [--accounts <accounts.yaml>]');
    log('');
    log('Example:');
    log('  txncfg tests/transfer.mvir --accounts tests/accounts.yaml');
}

/**
 * Runs the CLI against argv (without node and script path).
 * Reports any failure on stderr.
 *
 * @returns Process exit code
 */
export function run(argv: string[]): number {
    try {
        const { script, options } = parseArgs(argv);
        if (script === undefined) {
            printUsage();
            return 0;
        }
        checkScript(script, options);
        return 0;
    } catch (err) {
        if (err instanceof DirectiveError) {
            error(err.toLocatedMessage());
        } else {
            error(err instanceof Error ? err.message : String(err));
        }
        return 1;
    }
}
