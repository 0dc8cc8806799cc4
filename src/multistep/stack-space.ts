/**
 * @module multistep/stack-space
 * @description Space descriptions for n stacked copies of a space
 */

import { ErrorCodes, UnsupportedSpaceKindError, ValidationError } from '../core/errors';
import type { BoxDtype, BoxSpace, DictSpace, Space } from '../core/space';

export interface StackSpaceOptions {
    /**
     * Element type for every stacked box. When omitted the input dtype is kept;
     * `'uint8'` reproduces the older behaviour of forcing 8-bit unsigned output.
     */
    dtype?: BoxDtype;
}

function repeatBound(bound: number | readonly number[], n: number): number | number[] {
    if (typeof bound === 'number') return bound;
    const result: number[] = [];
    for (let i = 0; i < n; i++) {
        result.push(...bound);
    }
    return result;
}

function stackBox(space: BoxSpace, n: number, options: StackSpaceOptions): BoxSpace {
    return {
        kind: 'box',
        shape: [n, ...space.shape],
        low: repeatBound(space.low, n),
        high: repeatBound(space.high, n),
        dtype: options.dtype ?? space.dtype,
    };
}

/**
 * Describe `n` copies of `space` stacked along a new leading axis.
 *
 * Box bounds given per element are tiled `n` times in row-major order; scalar
 * bounds already cover the new axis and are kept as they are. Dict spaces are
 * stacked entry by entry with their key order preserved.
 *
 * @throws UnsupportedSpaceKindError for discrete, multiDiscrete and tuple spaces
 */
export function stackSpace(space: Space, n: number, options: StackSpaceOptions = {}): Space {
    if (!Number.isInteger(n) || n < 1) {
        throw new ValidationError(
            `Stack size must be a positive integer, got ${n}`,
            { n },
            ErrorCodes.INVALID_CONFIG
        );
    }

    switch (space.kind) {
        case 'box':
            return stackBox(space, n, options);

        case 'dict': {
            const spaces: Record<string, Space> = {};
            for (const [key, subSpace] of Object.entries(space.spaces)) {
                spaces[key] = stackSpace(subSpace, n, options);
            }
            const stacked: DictSpace = { kind: 'dict', spaces };
            return stacked;
        }

        default:
            throw new UnsupportedSpaceKindError(space.kind);
    }
}
