/**
 * @module multistep/buffer
 * @description Per-episode temporal store for the multistep wrapper
 *
 * Observations and info fields live in sliding windows of capacity `nObs + 1`.
 * Rewards and termination flags are recorded per inner step of the current
 * macro-step. A new buffer is created on every reset.
 */

import type { Frame } from '../core/space';
import { SlidingWindow } from './window';

export class StepBuffer {
    private nObs: number;
    private obsWindow: SlidingWindow<Frame>;
    private infoWindows = new Map<string, SlidingWindow<unknown>>();
    private rewardList: number[] = [];
    private terminationList: boolean[] = [];
    private innerSteps = 0;

    constructor(nObs: number) {
        this.nObs = nObs;
        this.obsWindow = new SlidingWindow<Frame>(nObs + 1);
    }

    /** Window capacity (`nObs + 1`) */
    get capacity(): number {
        return this.obsWindow.capacity;
    }

    /** Rewards of the current macro-step */
    get rewards(): readonly number[] {
        return this.rewardList;
    }

    /** Termination flags of the current macro-step, parallel to `rewards` */
    get terminations(): readonly boolean[] {
        return this.terminationList;
    }

    /** Most recent termination flag, false when none is recorded */
    get lastTermination(): boolean {
        return this.terminationList.length > 0 &&
            this.terminationList[this.terminationList.length - 1];
    }

    /** Inner steps recorded since the buffer was created or reset */
    get totalInnerSteps(): number {
        return this.innerSteps;
    }

    get observationCount(): number {
        return this.obsWindow.length;
    }

    // ==================== Appends ====================

    appendObservation(frame: Frame): void {
        this.obsWindow.push(frame);
    }

    appendReward(reward: number): void {
        this.rewardList.push(Number(reward));
        this.innerSteps++;
    }

    appendTermination(flag: boolean): void {
        this.terminationList.push(Boolean(flag));
    }

    /**
     * Append every field of an info record to its own window.
     * Fields seen for the first time start a new window.
     */
    appendInfo(info: Readonly<Record<string, unknown>>): void {
        for (const [key, value] of Object.entries(info)) {
            let window = this.infoWindows.get(key);
            if (!window) {
                window = new SlidingWindow<unknown>(this.nObs + 1);
                this.infoWindows.set(key, window);
            }
            window.push(value);
        }
    }

    // ==================== Reads ====================

    /** The last `k` observations (default: all), oldest first */
    observationHistory(k?: number): Frame[] {
        return this.obsWindow.tail(k);
    }

    /** Window contents per info field, in first-seen order */
    infoHistory(): Map<string, unknown[]> {
        const result = new Map<string, unknown[]>();
        for (const [key, window] of this.infoWindows) {
            result.set(key, window.toArray());
        }
        return result;
    }

    // ==================== Lifecycle ====================

    /**
     * Drop the rewards and terminations of the previous macro-step
     */
    clearStepResults(): void {
        this.rewardList = [];
        this.terminationList = [];
    }

    /**
     * Discard all state, optionally with a new window size
     */
    reset(nObs: number = this.nObs): void {
        this.nObs = nObs;
        this.obsWindow = new SlidingWindow<Frame>(nObs + 1);
        this.infoWindows = new Map();
        this.clearStepResults();
        this.innerSteps = 0;
    }
}
