/**
 * @module multistep/frames
 * @description Fixed-length frame stacking
 *
 * Stacks the most recent frames of a history along a new leading axis. A short
 * history is left-padded with copies of its oldest frame, so a freshly reset
 * episode presents `n` copies of the initial observation. Every returned entry
 * is a fresh copy, so callers may edit a stack without touching the history.
 */

import { EmptyHistoryError, ErrorCodes, ValidationError } from '../core/errors';
import { isFrameRecord, type Frame, type FrameRecord, type Space } from '../core/space';

/**
 * Stack the `n` most recent entries of a chronological history.
 *
 * Entries must be structured-cloneable.
 *
 * @returns exactly `n` entries, oldest first
 */
export function stackLast<T>(history: readonly T[], n: number): T[] {
    if (!Number.isInteger(n) || n < 1) {
        throw new ValidationError(
            `Stack size must be a positive integer, got ${n}`,
            { n },
            ErrorCodes.INVALID_CONFIG
        );
    }
    if (history.length === 0) {
        throw new EmptyHistoryError();
    }

    const core = history.slice(-n);
    const pad = n - core.length;
    const stacked: T[] = [];
    for (let i = 0; i < pad; i++) {
        stacked.push(structuredClone(core[0]));
    }
    for (const entry of core) {
        stacked.push(structuredClone(entry));
    }
    return stacked;
}

/**
 * Stack observation frames following the structure of their space.
 *
 * Dict spaces produce a record of per-key stacks, matching `stackSpace(space, n)`;
 * every other space stacks whole frames.
 */
export function stackFrames(space: Space, history: readonly Frame[], n: number): Frame {
    if (space.kind !== 'dict') {
        return stackLast(history, n);
    }

    const records: FrameRecord[] = history.map((frame, index) => {
        if (!isFrameRecord(frame)) {
            throw new ValidationError(
                `Expected a record observation for a dict space at history index ${index}`,
                { index },
                ErrorCodes.INVALID_OBSERVATION
            );
        }
        return frame;
    });

    const result: FrameRecord = {};
    for (const [key, subSpace] of Object.entries(space.spaces)) {
        const column = records.map((record, index) => {
            if (!(key in record)) {
                throw new ValidationError(
                    `Observation at history index ${index} is missing key '${key}'`,
                    { index, key },
                    ErrorCodes.INVALID_OBSERVATION
                );
            }
            return record[key];
        });
        result[key] = stackFrames(subSpace, column, n);
    }
    return result;
}
