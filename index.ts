/**
 * @packageDocumentation
 * @module stepstack
 *
 * stepstack: macro-step wrappers for single-step decision environments
 *
 * Turns an environment that takes one action per call into one that takes a
 * short sequence of actions and returns a temporally stacked window of the
 * most recent observations with an aggregated reward and termination flag.
 *
 * ## Modules
 * - `core` - Spaces, environment contract, logging, errors
 * - `multistep` - Action-repeat + frame-stack wrapper
 *
 * ## Usage Example
 * ```typescript
 * import { core, multistep } from 'stepstack';
 *
 * const env = new multistep.MultiStepEnv(core.createDummyEnvironment(), {
 *     nObs: 4,
 *     nAction: 2,
 *     rewardReduce: 'sum',
 * });
 *
 * const observation = await env.reset();
 * const { reward, done, info } = await env.step([[0], [0]]);
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as multistep from './src/multistep';

export { MultiStepEnv } from './src/multistep';
export type { MacroStepResult, MultiStepConfig } from './src/multistep';

// ==================== Version ====================
export const VERSION = '1.0.0';
