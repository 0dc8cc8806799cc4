/**
 * @module multistep/window
 * @description Fixed-capacity sliding window
 *
 * Ring buffer over a plain array: O(1) push that evicts the oldest entry when
 * full, O(k) read of the k most recent entries in chronological order.
 */

import { ValidationError, ErrorCodes } from '../core/errors';

export class SlidingWindow<T> {
    private readonly data: T[] = [];
    private head = 0;
    private count = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new ValidationError(
                `Window capacity must be a positive integer, got ${capacity}`,
                { capacity },
                ErrorCodes.INVALID_CONFIG
            );
        }
    }

    get length(): number {
        return this.count;
    }

    /**
     * Append a value, overwriting the oldest if at capacity
     */
    push(value: T): void {
        this.data[this.head] = value;
        this.head = (this.head + 1) % this.capacity;
        if (this.count < this.capacity) this.count++;
    }

    /**
     * Most recent value, or undefined when empty
     */
    last(): T | undefined {
        if (this.count === 0) return undefined;
        return this.data[(this.head - 1 + this.capacity) % this.capacity];
    }

    /**
     * The last `k` values, oldest first (all values when k exceeds length)
     */
    tail(k: number = this.count): T[] {
        const size = Math.max(0, Math.min(k, this.count));
        const result = new Array<T>(size);
        const start = (this.head - size + this.capacity) % this.capacity;
        for (let i = 0; i < size; i++) {
            result[i] = this.data[(start + i) % this.capacity];
        }
        return result;
    }

    /** Snapshot of every value, oldest first */
    toArray(): T[] {
        return this.tail(this.count);
    }

    clear(): void {
        this.data.length = 0;
        this.head = 0;
        this.count = 0;
    }
}
