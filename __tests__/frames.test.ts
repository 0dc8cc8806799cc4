/**
 * Frame Stacking Tests
 */

import { describe, it, expect } from 'vitest';
import {
    box,
    dict,
    EmptyHistoryError,
    ErrorCodes,
    ValidationError,
} from '../src/core';
import { stackFrames, stackLast } from '../src/multistep';

describe('stackLast', () => {
    const A = [1, 1];
    const B = [2, 2];
    const C = [3, 3];
    const D = [4, 4];
    const E = [5, 5];

    it('should return the last n frames oldest first', () => {
        expect(stackLast([A, B, C, D, E], 3)).toEqual([C, D, E]);
    });

    it('should return the history unchanged when its length equals n', () => {
        expect(stackLast([A, B, C], 3)).toEqual([A, B, C]);
    });

    it('should pad with the oldest frame when the history is short', () => {
        expect(stackLast([A, B], 4)).toEqual([A, A, A, B]);
    });

    it('should replicate a single frame n times', () => {
        const stacked = stackLast([A], 4);
        expect(stacked).toHaveLength(4);
        stacked.forEach(frame => expect(frame).toEqual(A));
    });

    it('should always produce exactly n frames', () => {
        for (let length = 1; length <= 6; length++) {
            const history = Array.from({ length }, (_, i) => [i, i]);
            expect(stackLast(history, 4)).toHaveLength(4);
        }
    });

    it('should not modify the history', () => {
        const history = [A, B];
        stackLast(history, 4);
        expect(history).toEqual([A, B]);
    });

    it('should keep multi-dimensional frames intact', () => {
        const image = [[0, 1], [2, 3]];
        expect(stackLast([image], 2)).toEqual([image, image]);
    });

    it('should reject an empty history', () => {
        expect(() => stackLast([], 3)).toThrow(EmptyHistoryError);
    });

    it.each([0, -1, 2.5])('should reject a stack size of %s', n => {
        try {
            stackLast([A, B], n);
            expect.unreachable('stackLast should have thrown');
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({ code: ErrorCodes.INVALID_CONFIG, details: { n } });
        }
    });

    it('should return copies that are independent of the history', () => {
        const history = [[1, 1], [2, 2]];
        const stacked = stackLast(history, 4);

        stacked[0][0] = 99;
        stacked[3][1] = 42;

        expect(history).toEqual([[1, 1], [2, 2]]);
        expect(stacked).toEqual([[99, 1], [1, 1], [1, 1], [2, 42]]);
    });
});

describe('stackFrames', () => {
    it('should stack box frames whole', () => {
        expect(stackFrames(box([2]), [[1, 1], [2, 2]], 3)).toEqual([[1, 1], [1, 1], [2, 2]]);
    });

    it('should stack dict frames per key', () => {
        const space = dict({ position: box([2]), speed: box([]) });
        const history = [
            { position: [0, 0], speed: 1 },
            { position: [1, 0], speed: 2 },
        ];

        expect(stackFrames(space, history, 3)).toEqual({
            position: [[0, 0], [0, 0], [1, 0]],
            speed: [1, 1, 2],
        });
    });

    it('should follow nested dict spaces', () => {
        const space = dict({ arm: dict({ angle: box([]) }) });
        const history = [{ arm: { angle: 10 } }, { arm: { angle: 20 } }];
        expect(stackFrames(space, history, 2)).toEqual({ arm: { angle: [10, 20] } });
    });

    it('should reject a non-record frame for a dict space', () => {
        expect(() => stackFrames(dict({ a: box([1]) }), [[1]], 2)).toThrow(ValidationError);
    });

    it('should reject a record missing a key', () => {
        try {
            stackFrames(dict({ a: box([1]), b: box([1]) }), [{ a: [1] }], 2);
            expect.unreachable('stackFrames should have thrown');
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({
                code: ErrorCodes.INVALID_OBSERVATION,
                details: { index: 0, key: 'b' },
            });
        }
    });
});
