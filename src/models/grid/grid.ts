/**
 * @module grid/grid
 * @description Grid construction, validation and accessors
 */

import { MalformedGridError, ValidationError } from '../../core/errors';
import { CellType, type Grid, type Position } from './types';

const KNOWN_CELLS: ReadonlySet<number> = new Set<number>(Object.values(CellType));

// ==================== Positions ====================

/**
 * Create a position
 */
export function pos(row: number, col: number): Position {
    return { row, col };
}

/**
 * Structural position equality
 */
export function positionsEqual(a: Position, b: Position): boolean {
    return a.row === b.row && a.col === b.col;
}

/**
 * Stable string key for maps and sets
 */
export function positionKey(p: Position): string {
    return `${p.row},${p.col}`;
}

/**
 * Euclidean distance between two cells
 */
export function euclideanDistance(a: Position, b: Position): number {
    return Math.hypot(a.row - b.row, a.col - b.col);
}

/**
 * True when `a` and `b` are distinct 8-connected neighbours
 */
export function areNeighbors(a: Position, b: Position): boolean {
    const dr = Math.abs(a.row - b.row);
    const dc = Math.abs(a.col - b.col);
    return dr <= 1 && dc <= 1 && (dr !== 0 || dc !== 0);
}

// ==================== Construction ====================

/**
 * Build a grid from a matrix of cell codes.
 *
 * @throws MalformedGridError on empty or ragged input, unknown codes,
 *         or anything other than exactly one START and one GOAL
 */
export function createGrid(matrix: ReadonlyArray<ReadonlyArray<number>>): Grid {
    const rows = matrix.length;
    if (rows === 0) {
        throw new MalformedGridError('Grid has no rows');
    }

    const cols = matrix[0].length;
    if (cols === 0) {
        throw new MalformedGridError('Grid has no columns');
    }

    const cells = new Uint8Array(rows * cols);
    const starts: Position[] = [];
    const goals: Position[] = [];

    for (let r = 0; r < rows; r++) {
        const line = matrix[r];
        if (line.length !== cols) {
            throw new MalformedGridError(
                `Row ${r} has ${line.length} cells, expected ${cols}`,
                { row: r, length: line.length, expected: cols }
            );
        }
        for (let c = 0; c < cols; c++) {
            const value = line[c];
            if (!KNOWN_CELLS.has(value)) {
                throw new MalformedGridError(
                    `Unknown cell value ${value} at (${r}, ${c})`,
                    { row: r, col: c, value }
                );
            }
            if (value === CellType.START) starts.push(pos(r, c));
            if (value === CellType.GOAL) goals.push(pos(r, c));
            cells[r * cols + c] = value;
        }
    }

    return {
        rows,
        cols,
        cells,
        start: requireSingle(starts, 'start'),
        goal: requireSingle(goals, 'goal'),
    };
}

function requireSingle(found: Position[], label: 'start' | 'goal'): Position {
    if (found.length !== 1) {
        throw new MalformedGridError(
            `Grid must contain exactly one ${label} cell, found ${found.length}`,
            { [label]: found }
        );
    }
    return found[0];
}

/**
 * Re-check the shape and start/goal tags of a grid object.
 *
 * Every public pipeline entry point calls this before doing any work.
 */
export function assertValidGrid(grid: Grid): void {
    if (!Number.isInteger(grid.rows) || !Number.isInteger(grid.cols) || grid.rows < 1 || grid.cols < 1) {
        throw new MalformedGridError(`Invalid grid dimensions ${grid.rows}x${grid.cols}`);
    }
    if (grid.cells.length !== grid.rows * grid.cols) {
        throw new MalformedGridError(
            `Grid storage holds ${grid.cells.length} cells, expected ${grid.rows * grid.cols}`
        );
    }
    if (!isInBounds(grid, grid.start) || getCell(grid, grid.start) !== CellType.START) {
        throw new MalformedGridError(`Grid start (${grid.start.row}, ${grid.start.col}) is not a START cell`);
    }
    if (!isInBounds(grid, grid.goal) || getCell(grid, grid.goal) !== CellType.GOAL) {
        throw new MalformedGridError(`Grid goal (${grid.goal.row}, ${grid.goal.col}) is not a GOAL cell`);
    }
}

/**
 * Copy a grid into new storage
 */
export function cloneGrid(grid: Grid): Grid {
    return {
        rows: grid.rows,
        cols: grid.cols,
        cells: grid.cells.slice(),
        start: grid.start,
        goal: grid.goal,
    };
}

// ==================== Accessors ====================

export function isInBounds(grid: { rows: number; cols: number }, p: Position): boolean {
    return p.row >= 0 && p.row < grid.rows && p.col >= 0 && p.col < grid.cols;
}

/**
 * Throw ValidationError unless `p` is an integer cell inside the grid
 */
export function assertInBounds(grid: { rows: number; cols: number }, p: Position, label: string): void {
    if (!Number.isInteger(p.row) || !Number.isInteger(p.col) || !isInBounds(grid, p)) {
        throw new ValidationError(
            `${label} (${p.row}, ${p.col}) is outside the ${grid.rows}x${grid.cols} grid`,
            { [label]: p }
        );
    }
}

export function cellIndex(grid: { cols: number }, p: Position): number {
    return p.row * grid.cols + p.col;
}

export function getCell(grid: Grid, p: Position): CellType {
    const value = grid.cells[cellIndex(grid, p)];
    switch (value) {
        case CellType.OBSTACLE:
            return CellType.OBSTACLE;
        case CellType.START:
            return CellType.START;
        case CellType.GOAL:
            return CellType.GOAL;
        default:
            return CellType.FREE;
    }
}

export function isObstacle(grid: Grid, p: Position): boolean {
    return grid.cells[cellIndex(grid, p)] === CellType.OBSTACLE;
}

/**
 * Convert back to a row-major matrix of cell codes
 */
export function gridToMatrix(grid: Grid): number[][] {
    const matrix: number[][] = [];
    for (let r = 0; r < grid.rows; r++) {
        matrix.push(Array.from(grid.cells.subarray(r * grid.cols, (r + 1) * grid.cols)));
    }
    return matrix;
}

/**
 * All obstacle positions in row-major order
 */
export function obstaclePositions(grid: Grid): Position[] {
    const result: Position[] = [];
    for (let i = 0; i < grid.cells.length; i++) {
        if (grid.cells[i] === CellType.OBSTACLE) {
            result.push(pos(Math.floor(i / grid.cols), i % grid.cols));
        }
    }
    return result;
}

/**
 * Number of cells carrying the given tag
 */
export function countCells(grid: Grid, type: CellType): number {
    let count = 0;
    for (let i = 0; i < grid.cells.length; i++) {
        if (grid.cells[i] === type) count++;
    }
    return count;
}

/**
 * Cell-by-cell equality of two grids
 */
export function gridsEqual(a: Grid, b: Grid): boolean {
    if (a.rows !== b.rows || a.cols !== b.cols) return false;
    for (let i = 0; i < a.cells.length; i++) {
        if (a.cells[i] !== b.cells[i]) return false;
    }
    return true;
}
