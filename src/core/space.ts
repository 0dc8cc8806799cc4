/**
 * @module core/space
 * @description Declarative space definitions for environment observations and actions
 *
 * Spaces describe the structure of the values an environment emits and accepts.
 * They carry no runtime data; the multistep wrapper derives stacked spaces from them.
 */

// ==================== Value Types ====================

/**
 * n-dimensional numeric array as plain (possibly nested) JS arrays
 */
export type NdArray = number | NdArray[];

/**
 * Record frame for dict spaces
 */
export interface FrameRecord {
    [key: string]: Frame;
}

/**
 * One observation conforming to a space (a stack of frames is itself a frame)
 */
export type Frame = NdArray | FrameRecord | Frame[];

// ==================== Space Types ====================

/**
 * Element types a box can declare
 */
export type BoxDtype =
    | 'float32'
    | 'float64'
    | 'int8'
    | 'int16'
    | 'int32'
    | 'uint8'
    | 'uint16'
    | 'uint32';

/**
 * Discrete space - finite set of possible values [0, n)
 */
export interface DiscreteSpace {
    readonly kind: 'discrete';
    /** Number of discrete values */
    readonly n: number;
    /** Optional labels for each value */
    readonly labels?: readonly string[];
}

/**
 * Box space - n-dimensional bounded numeric array
 */
export interface BoxSpace {
    readonly kind: 'box';
    /** Shape of the space (e.g., [3] for 3D vector) */
    readonly shape: readonly number[];
    /** Lower bound (scalar or flat per-element, row-major) */
    readonly low: number | readonly number[];
    /** Upper bound (scalar or flat per-element, row-major) */
    readonly high: number | readonly number[];
    /** Element type */
    readonly dtype: BoxDtype;
}

/**
 * MultiDiscrete space - multiple discrete spaces combined
 */
export interface MultiDiscreteSpace {
    readonly kind: 'multiDiscrete';
    /** Number of values for each dimension */
    readonly nvec: readonly number[];
}

/**
 * Dict space - named sub-spaces, insertion order preserved
 */
export interface DictSpace {
    readonly kind: 'dict';
    /** Named sub-spaces */
    readonly spaces: Readonly<Record<string, Space>>;
}

/**
 * Tuple space - ordered sequence of spaces
 */
export interface TupleSpace {
    readonly kind: 'tuple';
    /** Sub-spaces in order */
    readonly spaces: readonly Space[];
}

export type Space =
    | DiscreteSpace
    | BoxSpace
    | MultiDiscreteSpace
    | DictSpace
    | TupleSpace;

export type SpaceKind = Space['kind'];

// ==================== Space Factories ====================

export function discrete(n: number, labels?: string[]): DiscreteSpace {
    return { kind: 'discrete', n, labels };
}

/**
 * Create a box space
 */
export function box(
    shape: number[],
    low: number | number[] = -Infinity,
    high: number | number[] = Infinity,
    dtype: BoxDtype = 'float32'
): BoxSpace {
    return { kind: 'box', shape, low, high, dtype };
}

export function multiDiscrete(nvec: number[]): MultiDiscreteSpace {
    return { kind: 'multiDiscrete', nvec };
}

/**
 * Create a dict space
 */
export function dict(spaces: Record<string, Space>): DictSpace {
    return { kind: 'dict', spaces };
}

export function tuple(spaces: Space[]): TupleSpace {
    return { kind: 'tuple', spaces };
}

// ==================== Space Operations ====================

/**
 * Number of elements in a box of the given shape
 */
export function getShapeSize(shape: readonly number[]): number {
    return shape.reduce((a, b) => a * b, 1);
}

/**
 * Check whether a value is a record frame (plain object, not an array)
 */
export function isFrameRecord(value: unknown): value is FrameRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function flattenNumbers(value: unknown, out: unknown[]): void {
    if (Array.isArray(value)) {
        for (const item of value) flattenNumbers(item, out);
    } else {
        out.push(value);
    }
}

/**
 * Check if a value is contained within a space
 */
export function contains(space: Space, value: unknown): boolean {
    switch (space.kind) {
        case 'discrete':
            return (
                typeof value === 'number' &&
                Number.isInteger(value) &&
                value >= 0 &&
                value < space.n
            );

        case 'box': {
            const flat: unknown[] = [];
            flattenNumbers(value, flat);
            if (flat.length !== getShapeSize(space.shape)) return false;

            const { low, high } = space;
            return flat.every((v, i) => {
                const lo = typeof low === 'number' ? low : (low[i] ?? -Infinity);
                const hi = typeof high === 'number' ? high : (high[i] ?? Infinity);
                return typeof v === 'number' && v >= lo && v <= hi;
            });
        }

        case 'multiDiscrete': {
            if (!Array.isArray(value)) return false;
            if (value.length !== space.nvec.length) return false;
            return value.every(
                (v: unknown, i) =>
                    typeof v === 'number' &&
                    Number.isInteger(v) &&
                    v >= 0 &&
                    v < space.nvec[i]
            );
        }

        case 'dict': {
            if (!isFrameRecord(value)) return false;
            return Object.entries(space.spaces).every(([key, subSpace]) =>
                key in value ? contains(subSpace, value[key]) : false
            );
        }

        case 'tuple': {
            if (!Array.isArray(value)) return false;
            if (value.length !== space.spaces.length) return false;
            return space.spaces.every((subSpace, i) => contains(subSpace, value[i]));
        }
    }
}
