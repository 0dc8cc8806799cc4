/**
 * Reward Reduction Tests
 */

import { describe, it, expect } from 'vitest';
import {
    EmptyReductionInputError,
    UnsupportedReductionError,
} from '../src/core';
import { isReduceMode, reduceStep, REDUCE_MODES } from '../src/multistep';

describe('reduceStep', () => {
    const rewards = [1.0, 3.0, 2.0];

    it('should take the max and OR the done flags', () => {
        expect(reduceStep(rewards, [false, false, true], 'max')).toEqual({ reward: 3, done: true });
    });

    it('should sum rewards', () => {
        expect(reduceStep(rewards, [false, false, false], 'sum')).toEqual({ reward: 6, done: false });
    });

    it('should take the min', () => {
        expect(reduceStep(rewards, [false, false, false], 'min').reward).toBe(1);
    });

    it('should take the mean', () => {
        expect(reduceStep(rewards, [false, false, false], 'mean').reward).toBe(2);
    });

    it('should handle negative rewards', () => {
        expect(reduceStep([-4, -1], [false, false], 'max').reward).toBe(-1);
        expect(reduceStep([-4, -1], [false, false], 'min').reward).toBe(-4);
    });

    it('should reduce a single inner step', () => {
        expect(reduceStep([0.5], [true], 'mean')).toEqual({ reward: 0.5, done: true });
    });

    it('should reject an unknown mode', () => {
        expect(() => reduceStep(rewards, [false], 'median')).toThrow(UnsupportedReductionError);
        expect(() => reduceStep(rewards, [false], 'median')).toThrow("Unsupported reward reduction 'median'");
    });

    it('should reject an empty reward sequence', () => {
        expect(() => reduceStep([], [], 'max')).toThrow(EmptyReductionInputError);
    });
});

describe('isReduceMode', () => {
    it('should accept every listed mode', () => {
        expect(REDUCE_MODES.every(mode => isReduceMode(mode))).toBe(true);
    });

    it('should reject other values', () => {
        expect(isReduceMode('avg')).toBe(false);
        expect(isReduceMode(undefined)).toBe(false);
    });
});
