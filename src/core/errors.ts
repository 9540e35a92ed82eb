/**
 * @module core/errors
 * @description Unified error types and error codes for the planning pipeline
 *
 * Only input-contract violations surface as exceptions. Search outcomes
 * (primary search giving up, descent halting early) are reported through
 * extraction metrics instead.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for gridfield-nav
 */
export const ErrorCodes = {
    // Input Errors
    /** Non-rectangular rows, zero dimensions, unknown cell code, missing/duplicate start or goal */
    MALFORMED_GRID: 'MALFORMED_GRID',
    /** Generic argument validation failure (out-of-bounds position, bad footprint) */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Planner configuration validation failed */
    INVALID_CONFIG: 'INVALID_CONFIG',

    // Scenario & I/O Errors
    /** Scenario id not registered */
    SCENARIO_NOT_FOUND: 'SCENARIO_NOT_FOUND',
    /** Map file could not be read */
    MAP_LOAD_ERROR: 'MAP_LOAD_ERROR',

    /** Internal framework error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for gridfield-nav
 */
export class NavError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'NavError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, NavError);
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
 * Grid violates the loader contract
 */
export class MalformedGridError extends NavError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.MALFORMED_GRID, message, details);
        this.name = 'MalformedGridError';
    }
}

/**
 * Invalid argument passed to a pipeline stage
 */
export class ValidationError extends NavError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Planner configuration rejected by validation
 */
export class InvalidConfigError extends NavError {
    readonly errors: string[];

    constructor(errors: string[]) {
        super(ErrorCodes.INVALID_CONFIG, `Invalid planner config: ${errors.join('; ')}`, errors);
        this.name = 'InvalidConfigError';
        this.errors = errors;
    }
}

/**
 * Scenario lookup failed
 */
export class ScenarioNotFoundError extends NavError {
    readonly scenarioId: number;

    constructor(scenarioId: number) {
        super(ErrorCodes.SCENARIO_NOT_FOUND, `Scenario ${scenarioId} does not exist`, { scenarioId });
        this.name = 'ScenarioNotFoundError';
        this.scenarioId = scenarioId;
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a NavError
 */
export function isNavError(error: unknown): error is NavError {
    return error instanceof NavError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isNavError(error) && error.code === code;
}

/**
 * Wrap any error into a NavError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): NavError {
    if (isNavError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new NavError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new NavError(defaultCode, String(error));
}
