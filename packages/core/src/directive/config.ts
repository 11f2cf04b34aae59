import type { GlobalConfig, TransactionArgument } from '../types/index.js';
import { DEFAULT_SENDER } from '../types/index.js';
import { DirectiveError } from '../errors/directive-error.js';
import type { Stage } from '../stage/index.js';
import type { Argument } from './argument.js';
import type { Entry } from './entry.js';

/**
 * Options specific to one transaction, tweaking how the harness runs it.
 * Frozen once built.
 */
export interface TransactionConfig {
    readonly disabledStages: ReadonlySet<Stage>;
    readonly sender: string;
    readonly args: readonly TransactionArgument[];
    readonly maxGas?: bigint;
    readonly sequenceNumber?: bigint;
}

/**
 * Build a transaction config from the entries of one transaction block.
 *
 * Entries are folded in order. Each single-valued option may be set once;
 * the second occurrence fails whatever its value. Names are checked against
 * the account registry, which is only read.
 *
 * PURE FUNCTION: Does not mutate the registry or the entries.
 *
 * @param globalConfig - Account registry
 * @param entries - Entries in script order
 * @throws DirectiveError on the first violation
 */
export function buildTransactionConfig(
    globalConfig: GlobalConfig,
    entries: readonly Entry[]
): TransactionConfig {
    const disabledStages = new Set<Stage>();
    let sender: string | undefined;
    let args: TransactionArgument[] | undefined;
    let maxGas: bigint | undefined;
    let sequenceNumber: bigint | undefined;

    for (const entry of entries) {
        switch (entry.kind) {
            case 'sender':
                if (sender !== undefined) {
                    throw new DirectiveError('sender already set');
                }
                if (!globalConfig.accounts.has(entry.name) && !globalConfig.genesisAccounts.has(entry.name)) {
                    throw new DirectiveError(`account '${entry.name}' does not exist`);
                }
                sender = entry.name;
                break;

            case 'arguments':
                if (args !== undefined) {
                    throw new DirectiveError('transaction arguments already set');
                }
                args = entry.args.map((arg) => resolveArgument(globalConfig, arg));
                break;

            case 'disable-stages':
                for (const stage of entry.stages) {
                    if (disabledStages.has(stage)) {
                        throw new DirectiveError(`duplicate stage '${stage}' in black list`);
                    }
                    disabledStages.add(stage);
                }
                break;

            case 'max-gas':
                if (maxGas !== undefined) {
                    throw new DirectiveError('max gas amount already set');
                }
                maxGas = entry.amount;
                break;

            case 'sequence-number':
                if (sequenceNumber !== undefined) {
                    throw new DirectiveError('sequence number already set');
                }
                sequenceNumber = entry.value;
                break;
        }
    }

    return Object.freeze({
        disabledStages: readOnlySet(disabledStages),
        sender: sender ?? DEFAULT_SENDER,
        args: Object.freeze(args ?? []),
        maxGas,
        sequenceNumber,
    });
}

/**
 * Snapshot of a set whose mutators throw. Object.freeze alone does not stop Set.add.
 */
function readOnlySet<T>(values: Iterable<T>): ReadonlySet<T> {
    const set = new Set(values);
    const reject = (): never => {
        throw new TypeError('disabled stages are read-only');
    };
    Object.defineProperties(set, {
        add: { value: reject },
        delete: { value: reject },
        clear: { value: reject },
    });
    return Object.freeze(set);
}

/**
 * `{{name}}` arguments resolve against regular accounts only, never genesis ones.
 */
function resolveArgument(globalConfig: GlobalConfig, arg: Argument): TransactionArgument {
    if (arg.kind === 'self-contained') {
        return arg.value;
    }
    const account = globalConfig.accounts.get(arg.name);
    if (!account) {
        throw new DirectiveError(`account '${arg.name}' does not exist`);
    }
    return { type: 'address', value: account.address };
}

/**
 * Check whether a stage was excluded with `no-run:`.
 */
export function isStageDisabled(config: TransactionConfig, stage: Stage): boolean {
    return config.disabledStages.has(stage);
}
