/**
 * @module grid/types
 * @description Occupancy grid data model
 */

// ==================== Cell ====================

/**
 * Cell tags. Numeric codes double as the text map symbols.
 */
export const CellType = {
    /** Navigable free space */
    FREE: 0,
    /** Impassable obstacle */
    OBSTACLE: 1,
    /** Initial robot position */
    START: 2,
    /** Target destination */
    GOAL: 3,
} as const;

export type CellType = (typeof CellType)[keyof typeof CellType];

// ==================== Position ====================

/**
 * Integer (row, column) cell coordinate, 0-indexed
 */
export interface Position {
    readonly row: number;
    readonly col: number;
}

// ==================== Grid ====================

/**
 * Fixed-size rectangular occupancy grid.
 *
 * `cells` is row-major (`row * cols + col`). A grid holds exactly one
 * START and one GOAL cell; `start` and `goal` point at them.
 */
export interface Grid {
    readonly rows: number;
    readonly cols: number;
    readonly cells: Uint8Array;
    readonly start: Position;
    readonly goal: Position;
}

/**
 * 8-connected neighbour offsets: N, S, W, E, NW, NE, SW, SE
 */
export const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
    [-1, 0],
    [1, 0],
    [0, -1],
    [0, 1],
    [-1, -1],
    [-1, 1],
    [1, -1],
    [1, 1],
];
