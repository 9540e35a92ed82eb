/**
 * @module core/config
 * @description Planner configuration
 *
 * Every tunable of the pipeline lives in one value that is threaded into
 * each call, so two requests can run with different gains side by side.
 */

import { InvalidConfigError } from './errors';
import { computeObjectHash } from './repro';

// ==================== Configuration ====================

/**
 * Planner configuration
 */
export interface PlannerConfig {
    /** Goal attraction coefficient */
    attractiveGain: number;
    /** Obstacle repulsion coefficient */
    repulsiveGain: number;
    /** Repulsive field radius ρ (grid cells) */
    obstacleInfluence: number;
    /** Horizontal robot footprint (grid cells) */
    robotWidth: number;
    /** Vertical robot footprint (grid cells) */
    robotHeight: number;
    /** Floor applied to a zero nearest-obstacle distance before dividing */
    minObstacleDistance: number;
    /** A* pops are capped at factor × rows × cols */
    searchIterationFactor: number;
    /** Descent steps are capped at factor × rows × cols */
    descentStepFactor: number;
    /** Capacity of the descent position history */
    cycleWindow: number;
    /** Occurrences tolerated in the history before a move counts as a cycle */
    cycleMaxRepeats: number;
    /** Descent steps taken before cycle checks begin */
    cycleWarmupSteps: number;
}

/**
 * Default configuration
 */
export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
    attractiveGain: 1.0,
    repulsiveGain: 50.0,
    obstacleInfluence: 3,
    robotWidth: 2,
    robotHeight: 2,
    minObstacleDistance: 1e-6,
    searchIterationFactor: 4,
    descentStepFactor: 2,
    cycleWindow: 20,
    cycleMaxRepeats: 2,
    cycleWarmupSteps: 10,
};

/**
 * Validation result for PlannerConfig
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// ==================== Validation ====================

const POSITIVE_INTEGER_FIELDS = [
    'robotWidth',
    'robotHeight',
    'cycleWindow',
] as const;

const NON_NEGATIVE_INTEGER_FIELDS = [
    'searchIterationFactor',
    'descentStepFactor',
    'cycleMaxRepeats',
    'cycleWarmupSteps',
] as const;

/**
 * Validate a PlannerConfig
 */
export function validatePlannerConfig(config: PlannerConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!Number.isFinite(config.attractiveGain) || config.attractiveGain < 0) {
        errors.push('attractiveGain must be a finite number >= 0');
    }

    if (!Number.isFinite(config.repulsiveGain) || config.repulsiveGain < 0) {
        errors.push('repulsiveGain must be a finite number >= 0');
    }

    if (!Number.isFinite(config.obstacleInfluence) || config.obstacleInfluence <= 0) {
        errors.push('obstacleInfluence must be a finite number > 0');
    }

    if (!Number.isFinite(config.minObstacleDistance) || config.minObstacleDistance <= 0) {
        errors.push('minObstacleDistance must be a finite number > 0');
    }

    for (const field of POSITIVE_INTEGER_FIELDS) {
        if (!Number.isInteger(config[field]) || config[field] < 1) {
            errors.push(`${field} must be an integer >= 1`);
        }
    }

    for (const field of NON_NEGATIVE_INTEGER_FIELDS) {
        if (!Number.isInteger(config[field]) || config[field] < 0) {
            errors.push(`${field} must be an integer >= 0`);
        }
    }

    // Warnings
    if (config.searchIterationFactor === 0) {
        warnings.push('searchIterationFactor is 0: primary search is disabled and descent always runs');
    }

    if (config.cycleMaxRepeats >= config.cycleWindow) {
        warnings.push('cycleMaxRepeats >= cycleWindow: cycle detection can never trigger');
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

// ==================== Factory Functions ====================

/**
 * Create a PlannerConfig with defaults, throwing InvalidConfigError when invalid
 */
export function createPlannerConfig(overrides: Partial<PlannerConfig> = {}): PlannerConfig {
    const config: PlannerConfig = { ...DEFAULT_PLANNER_CONFIG, ...overrides };
    const result = validatePlannerConfig(config);
    if (!result.valid) {
        throw new InvalidConfigError(result.errors);
    }
    return config;
}

/**
 * Compute a hash of the configuration for report correlation
 */
export function computeConfigHash(config: PlannerConfig): string {
    return computeObjectHash(config);
}
