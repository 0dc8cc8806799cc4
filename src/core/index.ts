/**
 * @module core
 * @description Shared foundation for environment wrappers
 *
 * ## Modules
 * - `space`: Declarative observation/action space definitions
 * - `environment`: Single-step environment contract and a dummy environment
 * - `logging`: Structured macro-step and episode logging
 * - `errors`: Unified error types and codes
 */

// ==================== Space ====================

export type {
    NdArray,
    Frame,
    FrameRecord,
    BoxDtype,
    DiscreteSpace,
    BoxSpace,
    MultiDiscreteSpace,
    DictSpace,
    TupleSpace,
    Space,
    SpaceKind,
} from './space';

export {
    discrete,
    box,
    multiDiscrete,
    dict,
    tuple,
    contains,
    getShapeSize,
    isFrameRecord,
} from './space';

// ==================== Environment ====================

export type {
    Environment,
    EnvStepResult,
    ResetOptions,
    DummyEnvironmentOptions,
} from './environment';

export { createDummyEnvironment } from './environment';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    MacroStepLogEntry,
    EpisodeLogEntry,
    DebugLogEntry,
    LogEntry,
    MacroStepLogInput,
    EpisodeLogInput,
    DebugLogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    DEFAULT_SCHEMA_VERSION,
    MultiLogger,
    ConsoleLogger,
    MemoryLogger,
    createLogger,
} from './logging';

// ==================== Errors ====================

export {
    ErrorCodes,
    StepStackError,
    ValidationError,
    UnsupportedSpaceKindError,
    UnsupportedReductionError,
    ActionCountMismatchError,
    EmptyReductionInputError,
    EmptyHistoryError,
    NotInitializedError,
    isStepStackError,
    hasErrorCode,
    wrapError,
} from './errors';

export type { ErrorCode } from './errors';
