/**
 * @module planning/inflation
 * @description Footprint inflation and placement collision checks
 *
 * Inflating obstacles by the robot's half-extents lets the rest of the
 * pipeline plan for a point robot.
 */

import { ValidationError } from '../../core/errors';
import { assertValidGrid } from '../grid/grid';
import { CellType, type Grid, type Position } from '../grid/types';

function assertFootprint(width: number, height: number): void {
    if (!Number.isInteger(width) || width < 1 || !Number.isInteger(height) || height < 1) {
        throw new ValidationError(
            `Robot footprint must be positive integers, got ${width}x${height}`,
            { width, height }
        );
    }
}

/**
 * Expand every obstacle by the robot footprint.
 *
 * Margins are `(height - 1) div 2` rows and `(width - 1) div 2` columns.
 * Only FREE cells are overwritten: a START or GOAL cell inside an inflated
 * region keeps its tag. The input grid is left untouched.
 *
 * @param grid - Source grid
 * @param width - Footprint width in cells (columns)
 * @param height - Footprint height in cells (rows)
 * @returns New grid with independent storage
 */
export function inflate(grid: Grid, width: number, height: number): Grid {
    assertValidGrid(grid);
    assertFootprint(width, height);

    const { rows, cols } = grid;
    const source = grid.cells;
    const expanded = source.slice();

    const verticalMargin = Math.floor((height - 1) / 2);
    const horizontalMargin = Math.floor((width - 1) / 2);

    if (verticalMargin > 0 || horizontalMargin > 0) {
        for (let r = 0; r < rows; r++) {
            for (let c = 0; c < cols; c++) {
                // Only obstacles of the input grow; cells marked in this pass do not
                if (source[r * cols + c] !== CellType.OBSTACLE) continue;

                const rMin = Math.max(0, r - verticalMargin);
                const rMax = Math.min(rows - 1, r + verticalMargin);
                const cMin = Math.max(0, c - horizontalMargin);
                const cMax = Math.min(cols - 1, c + horizontalMargin);

                for (let tr = rMin; tr <= rMax; tr++) {
                    for (let tc = cMin; tc <= cMax; tc++) {
                        const idx = tr * cols + tc;
                        if (expanded[idx] === CellType.FREE) {
                            expanded[idx] = CellType.OBSTACLE;
                        }
                    }
                }
            }
        }
    }

    return {
        rows,
        cols,
        cells: expanded,
        start: grid.start,
        goal: grid.goal,
    };
}

/**
 * Check whether a robot centred at `center` would collide.
 *
 * The footprint spans `height div 2` rows and `width div 2` columns on each
 * side of the centre. Any footprint cell outside the grid or on an obstacle
 * counts as a collision.
 */
export function collides(grid: Grid, center: Position, width: number, height: number): boolean {
    assertValidGrid(grid);
    assertFootprint(width, height);
    if (!Number.isInteger(center.row) || !Number.isInteger(center.col)) {
        throw new ValidationError(`center must be an integer cell, got (${center.row}, ${center.col})`);
    }

    const halfHeight = Math.floor(height / 2);
    const halfWidth = Math.floor(width / 2);

    for (let dr = -halfHeight; dr <= halfHeight; dr++) {
        for (let dc = -halfWidth; dc <= halfWidth; dc++) {
            const r = center.row + dr;
            const c = center.col + dc;

            // Boundary collision
            if (r < 0 || r >= grid.rows || c < 0 || c >= grid.cols) {
                return true;
            }

            // Obstacle collision
            if (grid.cells[r * grid.cols + c] === CellType.OBSTACLE) {
                return true;
            }
        }
    }

    return false;
}
