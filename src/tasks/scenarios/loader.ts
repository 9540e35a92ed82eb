/**
 * @module tasks/scenarios/loader
 * @description Map file loading (Node.js only)
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorCodes, NavError } from '../../core/errors';
import { parseGridText } from '../../models/grid/parser';
import type { Grid } from '../../models/grid/types';

/**
 * Read and parse a text map
 *
 * @throws NavError with MAP_LOAD_ERROR if the file cannot be read
 * @throws MalformedGridError if its content breaks the grid contract
 */
export function loadGridFile(filePath: string): Grid {
    let text: string;
    try {
        text = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
        throw new NavError(
            ErrorCodes.MAP_LOAD_ERROR,
            `Cannot read map file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
            { filePath }
        );
    }
    return parseGridText(text);
}

/**
 * Locate the bundled `maps` directory by walking up from this module.
 * Works from sources (tsx, vitest) and from build output alike.
 */
export function findMapsDir(from: string = __dirname): string {
    let dir = from;
    for (let depth = 0; depth < 6; depth++) {
        const candidate = path.join(dir, 'maps');
        if (fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()) {
            return candidate;
        }
        const parent = path.dirname(dir);
        if (parent === dir) break;
        dir = parent;
    }
    throw new NavError(ErrorCodes.MAP_LOAD_ERROR, `No maps directory found above ${from}`);
}
