/**
 * @module planning/types
 * @description Potential field, path and extraction result types
 */

import type { Position } from '../grid/types';

// ==================== Potential Field ====================

/**
 * Sentinel potential of cells the robot may not enter
 */
export const IMPASSABLE = Number.POSITIVE_INFINITY;

/**
 * Scalar cost surface over a grid, row-major.
 *
 * Obstacle cells hold IMPASSABLE; every other cell holds a finite,
 * non-negative value. Produced once per request and only read afterwards.
 */
export interface PotentialField {
    readonly rows: number;
    readonly cols: number;
    readonly values: Float64Array;
}

// ==================== Path ====================

/**
 * Ordered waypoints, first entry is the requested start and consecutive
 * entries are 8-connected neighbours.
 */
export type Path = Position[];

// ==================== Primary Search ====================

export type PrimaryOutcome = 'found' | 'frontier_exhausted' | 'iteration_limit';

export interface PrimarySearchResult {
    /** Empty unless outcome is 'found' */
    path: Path;
    /** Heap pops that were not stale, the goal pop included */
    nodesExpanded: number;
    /** All heap pops, stale entries included */
    iterations: number;
    outcome: PrimaryOutcome;
}

// ==================== Descent ====================

export type PartialReason = 'dead_end' | 'cycle' | 'step_limit';

export interface DescentResult {
    path: Path;
    /** Moves made */
    steps: number;
    reachedGoal: boolean;
    /** Set when the walk stopped before the goal */
    haltReason?: PartialReason;
}

// ==================== Extraction ====================

export type ExtractionStrategy = 'primary' | 'fallback';
export type ExtractionStatus = 'success' | 'partial';
export type FallbackTrigger = Exclude<PrimaryOutcome, 'found'>;

/**
 * What happened while extracting a path
 */
export interface ExtractionMetrics {
    /** Strategy that produced the returned path */
    strategy: ExtractionStrategy;
    status: ExtractionStatus;
    /** Nodes expanded by the primary search */
    nodesExpanded: number;
    primaryIterations: number;
    primaryOutcome: PrimaryOutcome;
    /** Why descent ran; set only when strategy is 'fallback' */
    fallbackTrigger?: FallbackTrigger;
    fallbackSteps?: number;
    /** Why the path stops short of the goal; set only when status is 'partial' */
    partialReason?: PartialReason;
}

export interface ExtractionResult {
    path: Path;
    metrics: ExtractionMetrics;
}
