/**
 * Pipeline stages a transaction passes through in the test harness.
 * A `no-run:` directive excludes a transaction from one or more of them.
 */

import { DirectiveError } from '../errors/directive-error.js';

/**
 * Stages in pipeline order. The order is the total order used for sorting.
 */
export const STAGES = ['compiler', 'verifier', 'serializer', 'runtime'] as const;

export type Stage = (typeof STAGES)[number];

/**
 * Parse a stage token. Matching is exact: `Runtime` is not a stage.
 */
export function parseStage(token: string): Stage {
    const stage = STAGES.find((s) => s === token);
    if (stage === undefined) {
        throw new DirectiveError(`unrecognized stage '${token}'`);
    }
    return stage;
}

/**
 * Compare two stages by pipeline position, for Array.prototype.sort.
 */
export function compareStages(a: Stage, b: Stage): number {
    return STAGES.indexOf(a) - STAGES.indexOf(b);
}
