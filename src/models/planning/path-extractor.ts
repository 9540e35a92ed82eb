/**
 * @module planning/path-extractor
 * @description Two-tier path extraction over a potential field
 *
 * SearchPrimary ──found──────────────────────────▶ Success
 *      │
 *      └─frontier exhausted / iteration limit──▶ Fallback ──goal──▶ Success
 *                                                   │
 *                                                   └─dead end / cycle / step limit──▶ Partial
 *
 * Neither branch throws: the caller always gets a non-empty path starting at
 * `start`, plus metrics describing which branch produced it.
 */

import type { PlannerConfig } from '../../core/config';
import type { Logger } from '../../core/logging';
import { assertInBounds } from '../grid/grid';
import type { Position } from '../grid/types';
import { searchPrimary } from './astar';
import { descend } from './descent';
import type { ExtractionResult, PotentialField } from './types';

type ExtractionParams = Pick<
    PlannerConfig,
    'searchIterationFactor' | 'descentStepFactor' | 'cycleWindow' | 'cycleMaxRepeats' | 'cycleWarmupSteps'
>;

/**
 * Extract a trajectory from start to goal.
 *
 * @param field - Potential field of the inflated grid
 * @param start - Requested start cell
 * @param goal - Requested goal cell
 * @param config - Search caps and cycle-detection settings
 * @param logger - Receives search/descent stage timings and fallback events
 * @throws ValidationError if start or goal lies outside the field
 */
export function extractPath(
    field: PotentialField,
    start: Position,
    goal: Position,
    config: ExtractionParams,
    logger?: Logger
): ExtractionResult {
    assertInBounds(field, start, 'start');
    assertInBounds(field, goal, 'goal');

    const searchBegin = performance.now();
    const primary = searchPrimary(field, start, goal, config);
    logger?.logStage({
        stage: 'search',
        durationMs: performance.now() - searchBegin,
        details: { outcome: primary.outcome, nodesExpanded: primary.nodesExpanded },
    });

    if (primary.outcome === 'found') {
        return {
            path: primary.path,
            metrics: {
                strategy: 'primary',
                status: 'success',
                nodesExpanded: primary.nodesExpanded,
                primaryIterations: primary.iterations,
                primaryOutcome: primary.outcome,
            },
        };
    }

    logger?.logFallback({
        trigger: primary.outcome,
        nodesExpanded: primary.nodesExpanded,
        iterations: primary.iterations,
    });

    const descentBegin = performance.now();
    const fallback = descend(field, start, goal, config);
    logger?.logStage({
        stage: 'descent',
        durationMs: performance.now() - descentBegin,
        details: { steps: fallback.steps, reachedGoal: fallback.reachedGoal },
    });

    return {
        path: fallback.path,
        metrics: {
            strategy: 'fallback',
            status: fallback.reachedGoal ? 'success' : 'partial',
            nodesExpanded: primary.nodesExpanded,
            primaryIterations: primary.iterations,
            primaryOutcome: primary.outcome,
            fallbackTrigger: primary.outcome,
            fallbackSteps: fallback.steps,
            partialReason: fallback.haltReason,
        },
    };
}
