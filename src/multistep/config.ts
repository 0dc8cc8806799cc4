/**
 * @module multistep/config
 * @description MultiStep wrapper configuration
 */

import { ErrorCodes, UnsupportedReductionError, ValidationError } from '../core/errors';
import type { Logger } from '../core/logging';
import type { BoxDtype } from '../core/space';
import { isReduceMode, REDUCE_MODES, type ReduceMode } from './reduce';

// ==================== Configuration ====================

/**
 * MultiStep wrapper configuration
 */
export interface MultiStepConfig {
    /** Size of the observation/info stacking window */
    nObs: number;
    /** Inner steps per macro-step */
    nAction: number;
    /** Reduction applied to inner-step rewards */
    rewardReduce: ReduceMode;
    /** Force done once the episode has taken this many inner steps */
    maxEpisodeSteps?: number;
    /** Element type of stacked box spaces (input dtype kept when omitted) */
    stackedDtype?: BoxDtype;
    /** Check every inner observation against the wrapped observation space */
    checkObservations: boolean;
    /** Loggers receiving macro-step and episode entries */
    loggers: Logger[];
    /** Task name written to log entries */
    taskName: string;
}

/**
 * Configuration as accepted from callers; `rewardReduce` is validated at runtime
 */
export type MultiStepConfigInput = Partial<Omit<MultiStepConfig, 'rewardReduce'>> & {
    rewardReduce?: string;
};

/**
 * Default configuration
 */
export const DEFAULT_MULTI_STEP_CONFIG: MultiStepConfig = {
    nObs: 4,
    nAction: 2,
    rewardReduce: 'max',
    checkObservations: false,
    loggers: [],
    taskName: 'multistep',
};

// ==================== Validation ====================

/**
 * Validation result for MultiStepConfig
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

function isPositiveInteger(value: unknown): boolean {
    return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate a configuration (defaults applied first)
 */
export function validateMultiStepConfig(input: MultiStepConfigInput): ValidationResult {
    const config = { ...DEFAULT_MULTI_STEP_CONFIG, ...input };
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!isPositiveInteger(config.nObs)) {
        errors.push(`nObs must be a positive integer, got ${config.nObs}`);
    }

    if (!isPositiveInteger(config.nAction)) {
        errors.push(`nAction must be a positive integer, got ${config.nAction}`);
    }

    if (!isReduceMode(config.rewardReduce)) {
        errors.push(
            `rewardReduce must be one of ${REDUCE_MODES.join(', ')}, got '${config.rewardReduce}'`
        );
    }

    if (config.maxEpisodeSteps !== undefined && !isPositiveInteger(config.maxEpisodeSteps)) {
        errors.push(`maxEpisodeSteps must be a positive integer, got ${config.maxEpisodeSteps}`);
    }

    if (config.stackedDtype !== undefined) {
        warnings.push(
            `stackedDtype '${config.stackedDtype}' overrides the dtype of every stacked box space`
        );
    }

    if (config.maxEpisodeSteps !== undefined && isPositiveInteger(config.nAction) &&
        config.maxEpisodeSteps % config.nAction !== 0) {
        warnings.push(
            `maxEpisodeSteps (${config.maxEpisodeSteps}) is not a multiple of nAction ` +
            `(${config.nAction}); the limit is detected on the first macro-step that reaches it`
        );
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

/**
 * Merge defaults and validate.
 *
 * @throws UnsupportedReductionError when `rewardReduce` names an unknown mode
 * @throws ValidationError (INVALID_CONFIG) listing every other problem
 */
export function resolveMultiStepConfig(input: MultiStepConfigInput = {}): MultiStepConfig {
    const { rewardReduce = DEFAULT_MULTI_STEP_CONFIG.rewardReduce, ...rest } = input;
    if (!isReduceMode(rewardReduce)) {
        throw new UnsupportedReductionError(rewardReduce);
    }

    const result = validateMultiStepConfig(input);
    if (!result.valid) {
        throw new ValidationError(
            `Invalid multistep configuration: ${result.errors.join('; ')}`,
            result,
            ErrorCodes.INVALID_CONFIG
        );
    }

    return { ...DEFAULT_MULTI_STEP_CONFIG, ...rest, rewardReduce };
}
