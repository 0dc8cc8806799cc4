/**
 * @module multistep/wrapper
 * @description Action-repeat and frame-stack wrapper
 *
 * Each `step` call consumes `nAction` actions, drives the wrapped environment
 * through up to that many inner steps and reports the last `nObs` observations
 * stacked along a new leading axis, with one aggregated reward and done flag.
 *
 * @example
 * ```typescript
 * const env = new MultiStepEnv(createDummyEnvironment(), { nObs: 4, nAction: 2 });
 * const observation = await env.reset({ seed: 7 });
 * const { reward, done } = await env.step([[0.1], [0.2]]);
 * ```
 */

import type { Environment, ResetOptions } from '../core/environment';
import { ActionCountMismatchError, ErrorCodes, NotInitializedError, ValidationError } from '../core/errors';
import { MultiLogger } from '../core/logging';
import { contains, type Frame, type Space } from '../core/space';
import { StepBuffer } from './buffer';
import { resolveMultiStepConfig, type MultiStepConfig, type MultiStepConfigInput } from './config';
import { stackFrames, stackLast } from './frames';
import { reduceStep } from './reduce';
import { stackSpace } from './stack-space';

// ==================== Types ====================

/**
 * Result of one macro-step. There is no separate truncated flag: inner
 * truncation counts as termination.
 */
export interface MacroStepResult {
    /** Last `nObs` observations, oldest first */
    observation: Frame;
    /** Inner rewards reduced with `rewardReduce` */
    reward: number;
    done: boolean;
    /** Last `nObs` values of every info field seen this episode */
    info: Record<string, unknown[]>;
}

// ==================== Wrapper ====================

export class MultiStepEnv<Obs extends Frame = Frame, Act = unknown> {
    readonly config: MultiStepConfig;
    /** Wrapped observation space stacked `nObs` times */
    readonly observationSpace: Space;
    /** Wrapped action space stacked `nAction` times */
    readonly actionSpace: Space;

    private readonly env: Environment<Obs, Act>;
    private readonly logger: MultiLogger;
    private buf: StepBuffer | null = null;
    private episodeIndex = -1;
    private macroStepCount = 0;
    private episodeReward = 0;
    private episodeFinished = false;
    private seed = 0;

    constructor(env: Environment<Obs, Act>, config: MultiStepConfigInput = {}) {
        this.env = env;
        this.config = resolveMultiStepConfig(config);

        const stackOptions = { dtype: this.config.stackedDtype };
        this.observationSpace = stackSpace(env.observationSpace, this.config.nObs, stackOptions);
        this.actionSpace = stackSpace(env.actionSpace, this.config.nAction, stackOptions);
        this.logger = new MultiLogger(this.config.loggers);
    }

    /** Buffer of the running episode */
    get buffer(): StepBuffer {
        if (!this.buf) {
            throw new NotInitializedError();
        }
        return this.buf;
    }

    /** Episode index, starting at 0 on the first reset (-1 before it) */
    get episode(): number {
        return this.episodeIndex;
    }

    /** Macro-steps taken in the running episode */
    get macroSteps(): number {
        return this.macroStepCount;
    }

    /**
     * Reset the wrapped environment and start a new buffer.
     *
     * @returns `nObs` copies of the initial observation
     */
    async reset(options?: ResetOptions): Promise<Frame> {
        const observation = await this.env.reset(options);
        this.checkObservation(observation);

        this.buf = new StepBuffer(this.config.nObs);
        this.buf.appendObservation(observation);

        this.episodeIndex++;
        this.macroStepCount = 0;
        this.episodeReward = 0;
        this.episodeFinished = false;
        this.seed = options?.seed ?? 0;

        return this.stackObservations(this.buf);
    }

    /**
     * Run one macro-step of `nAction` inner steps.
     *
     * Stops early once an inner step terminates. When the previous macro-step
     * already ended in termination no inner step runs, and the result repeats
     * the reward and done flag recorded by that macro-step.
     *
     * @throws ActionCountMismatchError before touching the environment
     * @throws NotInitializedError when called before `reset`
     */
    async step(actions: readonly Act[]): Promise<MacroStepResult> {
        if (actions.length !== this.config.nAction) {
            throw new ActionCountMismatchError(this.config.nAction, actions.length);
        }
        const buffer = this.buffer;

        const latched = buffer.lastTermination;
        let innerSteps = 0;
        for (const action of actions) {
            if (buffer.lastTermination) break;

            const result = await this.env.step(action);
            this.checkObservation(result.observation);

            if (innerSteps === 0) buffer.clearStepResults();
            innerSteps++;

            buffer.appendObservation(result.observation);
            buffer.appendReward(result.reward);
            buffer.appendTermination(result.terminated || result.truncated);
            buffer.appendInfo(result.info);
        }

        if (latched) {
            this.logger.debug({
                task: this.config.taskName,
                seed: this.seed,
                message: 'macro-step started after termination; repeating previous reward',
                data: { episode: this.episodeIndex, rewards: [...buffer.rewards] },
            });
        }

        const reduced = reduceStep(buffer.rewards, buffer.terminations, this.config.rewardReduce);
        const { maxEpisodeSteps } = this.config;
        const hitStepLimit = maxEpisodeSteps !== undefined && buffer.totalInnerSteps >= maxEpisodeSteps;
        const done = reduced.done || hitStepLimit;

        this.macroStepCount++;
        this.episodeReward += reduced.reward;
        this.logStep(innerSteps, reduced.reward, done, latched);
        if (done && !this.episodeFinished) {
            this.episodeFinished = true;
            this.logEpisode(buffer, hitStepLimit && !reduced.done);
        }

        return {
            observation: this.stackObservations(buffer),
            reward: reduced.reward,
            done,
            info: this.stackInfo(buffer),
        };
    }

    /**
     * Close the wrapped environment and the loggers
     */
    close(): void {
        this.env.close?.();
        this.logger.flush();
        this.logger.close();
        this.buf = null;
    }

    // ==================== Internals ====================

    private stackObservations(buffer: StepBuffer): Frame {
        const { nObs } = this.config;
        return stackFrames(this.env.observationSpace, buffer.observationHistory(nObs), nObs);
    }

    private stackInfo(buffer: StepBuffer): Record<string, unknown[]> {
        const info: Record<string, unknown[]> = {};
        for (const [key, values] of buffer.infoHistory()) {
            info[key] = stackLast(values, this.config.nObs);
        }
        return info;
    }

    private checkObservation(observation: Obs): void {
        if (this.config.checkObservations && !contains(this.env.observationSpace, observation)) {
            throw new ValidationError(
                'Observation is outside the wrapped observation space',
                { observation },
                ErrorCodes.INVALID_OBSERVATION
            );
        }
    }

    private logStep(innerSteps: number, reward: number, done: boolean, latched: boolean): void {
        this.logger.logStep({
            task: this.config.taskName,
            seed: this.seed,
            episode: this.episodeIndex,
            step: this.macroStepCount,
            innerSteps,
            reward,
            done,
            latched,
        });
    }

    private logEpisode(buffer: StepBuffer, hitStepLimit: boolean): void {
        this.logger.logEpisode({
            task: this.config.taskName,
            seed: this.seed,
            episode: this.episodeIndex,
            macroSteps: this.macroStepCount,
            innerSteps: buffer.totalInnerSteps,
            totalReward: this.episodeReward,
            avgReward: this.episodeReward / this.macroStepCount,
            hitStepLimit,
        });
    }
}
