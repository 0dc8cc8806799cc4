/**
 * @module multistep
 * @description Macro-step wrapper: action repeat plus frame stacking
 *
 * ## Modules
 * - `wrapper`: `MultiStepEnv`, the macro-step controller
 * - `buffer`: Per-episode observation/reward/termination/info store
 * - `window`: Fixed-capacity sliding window
 * - `frames`: Fixed-length frame stacking with boundary-frame padding
 * - `stack-space`: Stacked space descriptions
 * - `reduce`: Reward and done aggregation
 * - `config`: Wrapper configuration and validation
 */

export { MultiStepEnv } from './wrapper';
export type { MacroStepResult } from './wrapper';

export { StepBuffer } from './buffer';
export { SlidingWindow } from './window';
export { stackLast, stackFrames } from './frames';

export { stackSpace } from './stack-space';
export type { StackSpaceOptions } from './stack-space';

export { REDUCE_MODES, isReduceMode, reduceStep } from './reduce';
export type { ReduceMode, ReducedStep } from './reduce';

export {
    DEFAULT_MULTI_STEP_CONFIG,
    validateMultiStepConfig,
    resolveMultiStepConfig,
} from './config';
export type { MultiStepConfig, MultiStepConfigInput, ValidationResult } from './config';
