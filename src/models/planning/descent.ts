/**
 * @module planning/descent
 * @description Fallback path extraction: steepest descent on the potential field
 */

import type { PlannerConfig } from '../../core/config';
import { positionsEqual } from '../grid/grid';
import { NEIGHBOR_OFFSETS, type Position } from '../grid/types';
import type { DescentResult, Path, PotentialField } from './types';
import { PositionHistory } from './utils';

type DescentParams = Pick<
    PlannerConfig,
    'descentStepFactor' | 'cycleWindow' | 'cycleMaxRepeats' | 'cycleWarmupSteps'
>;

/**
 * Lowest-potential in-bounds neighbour of `current`.
 * Ties go to the first neighbour in NEIGHBOR_OFFSETS order.
 *
 * @returns undefined when every neighbour is impassable or out of bounds
 */
export function lowestNeighbor(field: PotentialField, current: Position): Position | undefined {
    let best: Position | undefined;
    let bestPotential = Infinity;

    for (const [dRow, dCol] of NEIGHBOR_OFFSETS) {
        const row = current.row + dRow;
        const col = current.col + dCol;
        if (row < 0 || row >= field.rows || col < 0 || col >= field.cols) continue;

        const potential = field.values[row * field.cols + col];
        if (potential < bestPotential) {
            bestPotential = potential;
            best = { row, col };
        }
    }

    return best;
}

/**
 * Greedy walk that always moves to the lowest neighbour, regardless of
 * whether that is downhill from the current cell.
 *
 * Halts with:
 * - `dead_end` when no neighbour has a finite potential
 * - `cycle` when, after `cycleWarmupSteps` moves, the next cell already
 *   appears more than `cycleMaxRepeats` times among the last `cycleWindow`
 *   positions
 * - `step_limit` after `descentStepFactor × rows × cols` moves
 */
export function descend(
    field: PotentialField,
    start: Position,
    goal: Position,
    config: DescentParams
): DescentResult {
    const path: Path = [start];
    const history = new PositionHistory(config.cycleWindow);
    history.push(start);

    const stepLimit = config.descentStepFactor * field.rows * field.cols;
    let current = start;

    for (let step = 0; step < stepLimit; step++) {
        if (positionsEqual(current, goal)) {
            return { path, steps: step, reachedGoal: true };
        }

        const next = lowestNeighbor(field, current);
        if (next === undefined) {
            return { path, steps: step, reachedGoal: false, haltReason: 'dead_end' };
        }

        if (step > config.cycleWarmupSteps && history.count(next) > config.cycleMaxRepeats) {
            return { path, steps: step, reachedGoal: false, haltReason: 'cycle' };
        }

        path.push(next);
        history.push(next);
        current = next;
    }

    if (positionsEqual(current, goal)) {
        return { path, steps: stepLimit, reachedGoal: true };
    }
    return { path, steps: stepLimit, reachedGoal: false, haltReason: 'step_limit' };
}
