/**
 * @module grid/parser
 * @description Text map format
 *
 * One grid row per line, either as whitespace-separated tokens
 * (`0 0 1 2`) or as a run of characters (`..#S`). Symbols:
 *
 * | code | char | meaning  |
 * |------|------|----------|
 * | 0    | .    | free     |
 * | 1    | #    | obstacle |
 * | 2    | S    | start    |
 * | 3    | G    | goal     |
 *
 * Blank lines and lines starting with `;` are ignored.
 */

import { MalformedGridError } from '../../core/errors';
import { createGrid, getCell, pos, positionKey } from './grid';
import { CellType, type Grid, type Position } from './types';

const SYMBOLS: Readonly<Partial<Record<string, CellType>>> = {
    '0': CellType.FREE,
    '.': CellType.FREE,
    '1': CellType.OBSTACLE,
    '#': CellType.OBSTACLE,
    '2': CellType.START,
    'S': CellType.START,
    '3': CellType.GOAL,
    'G': CellType.GOAL,
};

const ASCII: Readonly<Record<CellType, string>> = {
    [CellType.FREE]: '.',
    [CellType.OBSTACLE]: '#',
    [CellType.START]: 'S',
    [CellType.GOAL]: 'G',
};

const COMMENT_PREFIX = ';';

/**
 * Parse a text map into a validated grid
 *
 * @throws MalformedGridError on unknown symbols or contract violations
 */
export function parseGridText(text: string): Grid {
    const matrix: number[][] = [];
    const lines = text.split(/\r?\n/);

    for (let lineNo = 0; lineNo < lines.length; lineNo++) {
        const line = lines[lineNo].trim();
        if (line.length === 0 || line.startsWith(COMMENT_PREFIX)) continue;

        const tokens = /\s/.test(line) ? line.split(/\s+/) : Array.from(line);
        const row: number[] = [];
        for (let col = 0; col < tokens.length; col++) {
            const value = SYMBOLS[tokens[col]];
            if (value === undefined) {
                throw new MalformedGridError(
                    `Unknown map symbol '${tokens[col]}' at line ${lineNo + 1}, column ${col + 1}`,
                    { line: lineNo + 1, column: col + 1, symbol: tokens[col] }
                );
            }
            row.push(value);
        }
        matrix.push(row);
    }

    return createGrid(matrix);
}

/**
 * Serialize a grid as space-separated cell codes, one row per line
 */
export function formatGridText(grid: Grid): string {
    const lines: string[] = [];
    for (let r = 0; r < grid.rows; r++) {
        lines.push(Array.from(grid.cells.subarray(r * grid.cols, (r + 1) * grid.cols)).join(' '));
    }
    return lines.join('\n') + '\n';
}

/**
 * Character rendering of a grid, optionally overlaying a path with `*`.
 * Start, goal and obstacle symbols always win over the overlay.
 */
export function renderGridAscii(grid: Grid, path: ReadonlyArray<Position> = []): string {
    const onPath = new Set(path.map(positionKey));
    const lines: string[] = [];

    for (let r = 0; r < grid.rows; r++) {
        let line = '';
        for (let c = 0; c < grid.cols; c++) {
            const cell = getCell(grid, pos(r, c));
            line += cell === CellType.FREE && onPath.has(`${r},${c}`) ? '*' : ASCII[cell];
        }
        lines.push(line);
    }

    return lines.join('\n');
}
