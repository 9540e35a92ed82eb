/**
 * @module planning/potential-field
 * @description Attractive + repulsive potential field synthesis
 *
 * U(q) = k_att · |q − goal| + U_rep(q), where
 *
 *   U_rep(q) = k_rep · (1/d − 1/ρ)²   if d ≤ ρ
 *            = 0                      otherwise
 *
 * d is the Euclidean distance from q to the nearest obstacle cell and ρ the
 * influence radius. The cutoff at ρ is hard (no smoothing).
 */

import type { PlannerConfig } from '../../core/config';
import { ValidationError } from '../../core/errors';
import { assertInBounds, assertValidGrid, euclideanDistance, obstaclePositions, pos } from '../grid/grid';
import { CellType, type Grid, type Position } from '../grid/types';
import { IMPASSABLE, type PotentialField } from './types';

type RepulsionParams = Pick<PlannerConfig, 'repulsiveGain' | 'obstacleInfluence' | 'minObstacleDistance'>;
type FieldParams = RepulsionParams & Pick<PlannerConfig, 'attractiveGain'>;

/**
 * Repulsive term for a nearest-obstacle distance.
 *
 * A distance of zero (or less) is floored to `minObstacleDistance`, so the
 * result is always finite. `Infinity` (no obstacles) yields 0.
 */
export function repulsivePotential(distance: number, config: RepulsionParams): number {
    if (distance > config.obstacleInfluence) {
        return 0;
    }
    const d = Math.max(distance, config.minObstacleDistance);
    const term = 1.0 / d - 1.0 / config.obstacleInfluence;
    return config.repulsiveGain * term * term;
}

/**
 * Attractive term: grows linearly with distance to the goal
 */
export function attractivePotential(cell: Position, goal: Position, config: Pick<PlannerConfig, 'attractiveGain'>): number {
    return config.attractiveGain * euclideanDistance(cell, goal);
}

/**
 * Distance from a cell to the closest obstacle, scanning every obstacle.
 *
 * @returns Infinity when the grid has no obstacles
 */
export function nearestObstacleDistance(grid: Grid, cell: Position): number {
    return nearestDistance(obstaclePositions(grid), cell);
}

function nearestDistance(obstacles: ReadonlyArray<Position>, cell: Position): number {
    let minimum = Infinity;
    for (const obstacle of obstacles) {
        const d = euclideanDistance(cell, obstacle);
        if (d < minimum) {
            minimum = d;
        }
    }
    return minimum;
}

/**
 * Compute the potential field of a grid for a goal.
 *
 * Obstacle cells receive IMPASSABLE, all others a finite value. The grid is
 * expected to be inflated already; the field treats its obstacles as exact.
 *
 * @param grid - Inflated grid
 * @param goal - Attraction point
 * @param config - Gains and influence radius
 */
export function computeField(grid: Grid, goal: Position, config: FieldParams): PotentialField {
    assertValidGrid(grid);
    assertInBounds(grid, goal, 'goal');

    const { rows, cols } = grid;
    const values = new Float64Array(rows * cols);
    const obstacles = obstaclePositions(grid);

    for (let r = 0; r < rows; r++) {
        for (let c = 0; c < cols; c++) {
            const idx = r * cols + c;
            if (grid.cells[idx] === CellType.OBSTACLE) {
                values[idx] = IMPASSABLE;
                continue;
            }

            const cell = pos(r, c);
            const attractive = attractivePotential(cell, goal, config);
            const repulsive = repulsivePotential(nearestDistance(obstacles, cell), config);
            values[idx] = attractive + repulsive;
        }
    }

    return { rows, cols, values };
}

// ==================== Accessors ====================

export function isImpassable(value: number): boolean {
    return value === IMPASSABLE;
}

export function getPotential(field: PotentialField, p: Position): number {
    return field.values[p.row * field.cols + p.col];
}

/**
 * Build a field directly from a matrix of values.
 * Non-finite entries become IMPASSABLE.
 */
export function fieldFromMatrix(matrix: ReadonlyArray<ReadonlyArray<number>>): PotentialField {
    const rows = matrix.length;
    const cols = rows > 0 ? matrix[0].length : 0;
    const values = new Float64Array(rows * cols);
    for (let r = 0; r < rows; r++) {
        if (matrix[r].length !== cols) {
            throw new ValidationError(`Field row ${r} has ${matrix[r].length} values, expected ${cols}`);
        }
        for (let c = 0; c < cols; c++) {
            const v = matrix[r][c];
            values[r * cols + c] = Number.isFinite(v) ? v : IMPASSABLE;
        }
    }
    return { rows, cols, values };
}

/**
 * Row-major matrix copy of a field
 */
export function fieldToMatrix(field: PotentialField): number[][] {
    const matrix: number[][] = [];
    for (let r = 0; r < field.rows; r++) {
        matrix.push(Array.from(field.values.subarray(r * field.cols, (r + 1) * field.cols)));
    }
    return matrix;
}
