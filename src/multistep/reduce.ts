/**
 * @module multistep/reduce
 * @description Collapse the inner steps of a macro-step into one reward and one done flag
 */

import { EmptyReductionInputError, UnsupportedReductionError } from '../core/errors';

export const REDUCE_MODES = ['max', 'min', 'mean', 'sum'] as const;

export type ReduceMode = (typeof REDUCE_MODES)[number];

export interface ReducedStep {
    reward: number;
    done: boolean;
}

const REDUCERS: Record<ReduceMode, (values: readonly number[]) => number> = {
    max: values => values.reduce((a, b) => Math.max(a, b)),
    min: values => values.reduce((a, b) => Math.min(a, b)),
    sum: values => values.reduce((a, b) => a + b, 0),
    mean: values => values.reduce((a, b) => a + b, 0) / values.length,
};

export function isReduceMode(value: unknown): value is ReduceMode {
    return REDUCE_MODES.some(mode => mode === value);
}

/**
 * Reduce per-inner-step rewards with `mode` and OR the done flags.
 *
 * @throws UnsupportedReductionError for an unknown mode
 * @throws EmptyReductionInputError when no inner step was recorded
 */
export function reduceStep(
    rewards: readonly number[],
    dones: readonly boolean[],
    mode: string
): ReducedStep {
    if (!isReduceMode(mode)) {
        throw new UnsupportedReductionError(mode);
    }
    if (rewards.length === 0) {
        throw new EmptyReductionInputError();
    }

    return {
        reward: REDUCERS[mode](rewards),
        done: dones.some(Boolean),
    };
}
