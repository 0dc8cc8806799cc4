/**
 * Step Buffer Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { StepBuffer } from '../src/multistep';

describe('StepBuffer', () => {
    let buffer: StepBuffer;

    beforeEach(() => {
        buffer = new StepBuffer(2);
    });

    it('should size windows to nObs + 1', () => {
        expect(buffer.capacity).toBe(3);
    });

    it('should bound the observation window', () => {
        [[0], [1], [2], [3], [4]].forEach(frame => buffer.appendObservation(frame));
        expect(buffer.observationCount).toBe(3);
        expect(buffer.observationHistory()).toEqual([[2], [3], [4]]);
        expect(buffer.observationHistory(2)).toEqual([[3], [4]]);
    });

    it('should record rewards and terminations in parallel', () => {
        buffer.appendReward(1.5);
        buffer.appendTermination(false);
        buffer.appendReward(-2);
        buffer.appendTermination(true);

        expect(buffer.rewards).toEqual([1.5, -2]);
        expect(buffer.terminations).toEqual([false, true]);
        expect(buffer.lastTermination).toBe(true);
        expect(buffer.totalInnerSteps).toBe(2);
    });

    it('should report no termination when empty', () => {
        expect(buffer.lastTermination).toBe(false);
    });

    it('should create info windows lazily and bound them', () => {
        buffer.appendInfo({ speed: 1 });
        buffer.appendInfo({ speed: 2, lap: 'a' });
        buffer.appendInfo({ speed: 3, lap: 'b' });
        buffer.appendInfo({ speed: 4 });

        const history = buffer.infoHistory();
        expect([...history.keys()]).toEqual(['speed', 'lap']);
        expect(history.get('speed')).toEqual([2, 3, 4]);
        expect(history.get('lap')).toEqual(['a', 'b']);
    });

    it('should clear step results but keep observations and the step count', () => {
        buffer.appendObservation([0]);
        buffer.appendReward(1);
        buffer.appendTermination(true);

        buffer.clearStepResults();

        expect(buffer.rewards).toEqual([]);
        expect(buffer.terminations).toEqual([]);
        expect(buffer.lastTermination).toBe(false);
        expect(buffer.totalInnerSteps).toBe(1);
        expect(buffer.observationCount).toBe(1);
    });

    it('should discard everything on reset and apply a new window size', () => {
        buffer.appendObservation([0]);
        buffer.appendReward(1);
        buffer.appendTermination(false);
        buffer.appendInfo({ speed: 1 });

        buffer.reset(4);

        expect(buffer.capacity).toBe(5);
        expect(buffer.observationCount).toBe(0);
        expect(buffer.rewards).toEqual([]);
        expect(buffer.terminations).toEqual([]);
        expect(buffer.infoHistory().size).toBe(0);
        expect(buffer.totalInnerSteps).toBe(0);
    });
});
