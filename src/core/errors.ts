/**
 * @module core/errors
 * @description Unified error types and error codes
 *
 * Every failure raised by the library is a configuration or programming error
 * surfaced synchronously to the caller. Nothing here is retried.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for the stepstack library
 */
export const ErrorCodes = {
    // Validation Errors
    /** Generic validation failure */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Configuration validation failed */
    INVALID_CONFIG: 'INVALID_CONFIG',
    /** Observation does not match the observation space */
    INVALID_OBSERVATION: 'INVALID_OBSERVATION',

    // Space Errors
    /** Space kind cannot be stacked */
    UNSUPPORTED_SPACE_KIND: 'UNSUPPORTED_SPACE_KIND',

    // Step Errors
    /** Unknown reward reduction mode */
    UNSUPPORTED_REDUCTION: 'UNSUPPORTED_REDUCTION',
    /** Action sequence length differs from nAction */
    ACTION_COUNT_MISMATCH: 'ACTION_COUNT_MISMATCH',
    /** Reduction over zero rewards */
    EMPTY_REDUCTION_INPUT: 'EMPTY_REDUCTION_INPUT',
    /** Frame stacking over an empty history */
    EMPTY_HISTORY: 'EMPTY_HISTORY',
    /** step() called before reset() */
    NOT_INITIALIZED: 'NOT_INITIALIZED',

    /** Internal framework error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the library
 */
export class StepStackError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'StepStackError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, StepStackError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Validation error (invalid config or observation)
 */
export class ValidationError extends StepStackError {
    constructor(
        message: string,
        details?: unknown,
        code: ErrorCode = ErrorCodes.VALIDATION_ERROR
    ) {
        super(code, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * A space kind that has no stacked form
 */
export class UnsupportedSpaceKindError extends StepStackError {
    readonly kind: string;

    constructor(kind: string) {
        super(
            ErrorCodes.UNSUPPORTED_SPACE_KIND,
            `Unsupported space kind '${kind}': only 'box' and 'dict' spaces can be stacked`,
            { kind }
        );
        this.name = 'UnsupportedSpaceKindError';
        this.kind = kind;
    }
}

export class UnsupportedReductionError extends StepStackError {
    readonly mode: string;

    constructor(mode: string) {
        super(
            ErrorCodes.UNSUPPORTED_REDUCTION,
            `Unsupported reward reduction '${mode}'`,
            { mode }
        );
        this.name = 'UnsupportedReductionError';
        this.mode = mode;
    }
}

/**
 * Action sequence length differs from the configured nAction
 */
export class ActionCountMismatchError extends StepStackError {
    readonly expected: number;
    readonly actual: number;

    constructor(expected: number, actual: number) {
        super(
            ErrorCodes.ACTION_COUNT_MISMATCH,
            `Expected ${expected} actions per step, got ${actual}`,
            { expected, actual }
        );
        this.name = 'ActionCountMismatchError';
        this.expected = expected;
        this.actual = actual;
    }
}

export class EmptyReductionInputError extends StepStackError {
    constructor(message = 'Cannot reduce an empty reward sequence') {
        super(ErrorCodes.EMPTY_REDUCTION_INPUT, message);
        this.name = 'EmptyReductionInputError';
    }
}

export class EmptyHistoryError extends StepStackError {
    constructor(message = 'Cannot stack frames from an empty history') {
        super(ErrorCodes.EMPTY_HISTORY, message);
        this.name = 'EmptyHistoryError';
    }
}

/**
 * Not initialized error (step called before reset)
 */
export class NotInitializedError extends StepStackError {
    constructor(message = 'Environment not initialized. Call reset() first.') {
        super(ErrorCodes.NOT_INITIALIZED, message);
        this.name = 'NotInitializedError';
    }
}

// ==================== Error Utilities ====================

export function isStepStackError(error: unknown): error is StepStackError {
    return error instanceof StepStackError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isStepStackError(error) && error.code === code;
}

/**
 * Wrap any error into a StepStackError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): StepStackError {
    if (isStepStackError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new StepStackError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new StepStackError(defaultCode, String(error));
}
