/**
 * @module core/environment
 * @description Single-step environment contract consumed by the wrappers
 *
 * An environment accepts one action per call and reports one observation,
 * reward and termination signal. Wrappers hold an environment by composition
 * and never extend it.
 */

import { box, type Frame, type Space } from './space';

// ==================== Core Interfaces ====================

/**
 * Options forwarded to `Environment.reset`
 */
export interface ResetOptions {
    /** Optional seed for reproducibility */
    seed?: number;
    [key: string]: unknown;
}

/**
 * Result of one inner environment step
 */
export interface EnvStepResult<Obs = Frame> {
    observation: Obs;
    reward: number;
    /** Terminal state reached */
    terminated: boolean;
    /** Episode cut short (time limit) */
    truncated: boolean;
    info: Record<string, unknown>;
}

/**
 * Single-step decision environment
 */
export interface Environment<Obs = Frame, Act = unknown> {
    /** Observation space definition */
    readonly observationSpace: Space;
    /** Action space definition */
    readonly actionSpace: Space;

    /**
     * Reset the environment to initial state
     * @returns Initial observation
     */
    reset(options?: ResetOptions): Promise<Obs>;

    /**
     * Execute one step
     * @param action - Action to apply
     */
    step(action: Act): Promise<EnvStepResult<Obs>>;

    /**
     * Release resources
     */
    close?(): void;
}

// ==================== Dummy Environment (for testing) ====================

export interface DummyEnvironmentOptions {
    /** Observation vector length */
    obsDim?: number;
    /** Action vector length */
    actionDim?: number;
    /** Inner step at which the episode terminates (never when omitted) */
    episodeLength?: number;
    /** Reward for inner step t (1-based); defaults to t */
    reward?: (t: number) => number;
    /** Info record for inner step t */
    info?: (t: number) => Record<string, unknown>;
}

/**
 * Deterministic environment whose observation at inner step t is `[t, t, ...]`.
 *
 * The observation after reset is all zeros.
 */
export function createDummyEnvironment(
    options: DummyEnvironmentOptions = {}
): Environment<number[], number[]> & { readonly actions: number[][] } {
    const obsDim = options.obsDim ?? 3;
    const actionDim = options.actionDim ?? 1;
    const rewardFn = options.reward ?? ((t: number) => t);
    const infoFn = options.info ?? (() => ({}));
    const actions: number[][] = [];
    let t = 0;

    return {
        observationSpace: box([obsDim], 0, Infinity),
        actionSpace: box([actionDim], -1, 1),
        actions,

        async reset() {
            t = 0;
            actions.length = 0;
            return Array<number>(obsDim).fill(0);
        },

        async step(action) {
            t++;
            actions.push(action);
            return {
                observation: Array<number>(obsDim).fill(t),
                reward: rewardFn(t),
                terminated: options.episodeLength !== undefined && t >= options.episodeLength,
                truncated: false,
                info: infoFn(t),
            };
        },

        close() { /* no-op */ },
    };
}
