import type { CheckOptions } from './types.js';

/**
 * Splits argv into the script path and options.
 */
export function parseArgs(argv: string[]): { script?: string; options: CheckOptions } {
    const options: CheckOptions = {};
    let script: string | undefined;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--accounts' || arg === '-a') {
            const value = argv[i + 1];
            if (value === undefined) {
                throw new Error(`${arg} requires a file path`);
            }
            options.accounts = value;
            i++;
        } else if (arg.startsWith('-')) {
            throw new Error(`Unknown option: ${arg}`);
        } else if (script === undefined) {
            script = arg;
        } else {
            throw new Error(`Unexpected argument: ${arg}`);
        }
    }

    return { script, options };
}
