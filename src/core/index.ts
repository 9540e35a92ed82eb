/**
 * @module core
 * @description Shared infrastructure for the planner
 *
 * Browser-compatible. The file logger lives in `./logging-node`.
 *
 * ## Modules
 * - `config`: PlannerConfig defaults, validation and hashing
 * - `logging`: structured stage/fallback/report logging
 * - `repro`: deterministic hashing and seeded RNG
 * - `errors`: error codes and error classes
 */

// ==================== Config ====================

export type { PlannerConfig, ValidationResult } from './config';

export {
    DEFAULT_PLANNER_CONFIG,
    validatePlannerConfig,
    createPlannerConfig,
    computeConfigHash,
} from './config';

// ==================== Logging ====================

export type {
    LogLevel,
    PlanningStage,
    BaseLogEntry,
    StageLogEntry,
    FallbackLogEntry,
    ReportLogEntry,
    LogEntry,
    StageLogInput,
    FallbackLogInput,
    ReportLogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    DEFAULT_SCHEMA_VERSION,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Repro ====================

export {
    createHash,
    sortObjectKeys,
    computeObjectHash,
    SeededRandom,
    createRng,
} from './repro';

// ==================== Errors ====================

export {
    ErrorCodes,
    NavError,
    MalformedGridError,
    ValidationError,
    InvalidConfigError,
    ScenarioNotFoundError,
    isNavError,
    hasErrorCode,
    wrapError,
} from './errors';

export type { ErrorCode } from './errors';
