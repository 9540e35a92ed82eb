/**
 * @module grid/generator
 * @description Seeded random occupancy grids for property tests and benchmarks
 */

import { ValidationError } from '../../core/errors';
import { createRng } from '../../core/repro';
import { assertInBounds, positionsEqual } from './grid';
import { CellType, type Grid, type Position } from './types';

export interface RandomGridOptions {
    rows: number;
    cols: number;
    /** Probability that a non-terminal cell is an obstacle, in [0, 1] */
    density: number;
    seed: number;
    /** Default: top-left corner */
    start?: Position;
    /** Default: bottom-right corner */
    goal?: Position;
}

/**
 * Generate a random grid. The same options always give the same grid.
 */
export function generateRandomGrid(options: RandomGridOptions): Grid {
    const { rows, cols, density, seed } = options;

    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
        throw new ValidationError(`Grid dimensions must be positive integers, got ${rows}x${cols}`);
    }
    if (!(density >= 0 && density <= 1)) {
        throw new ValidationError(`density must be within [0, 1], got ${density}`);
    }

    const bounds = { rows, cols };
    const start = options.start ?? { row: 0, col: 0 };
    const goal = options.goal ?? { row: rows - 1, col: cols - 1 };
    assertInBounds(bounds, start, 'start');
    assertInBounds(bounds, goal, 'goal');
    if (positionsEqual(start, goal)) {
        throw new ValidationError('start and goal must be different cells', { start, goal });
    }

    const rng = createRng(seed);
    const cells = new Uint8Array(rows * cols);
    for (let i = 0; i < cells.length; i++) {
        cells[i] = rng.random() < density ? CellType.OBSTACLE : CellType.FREE;
    }
    cells[start.row * cols + start.col] = CellType.START;
    cells[goal.row * cols + goal.col] = CellType.GOAL;

    return { rows, cols, cells, start, goal };
}
