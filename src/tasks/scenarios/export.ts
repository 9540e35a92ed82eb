/**
 * @module tasks/scenarios/export
 * @description Waypoint export for robot controllers
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Position } from '../../models/grid/types';

/**
 * CSV with an `index,row,col` header and one line per waypoint
 */
export function waypointsToCsv(waypoints: ReadonlyArray<Position>): string {
    const lines = ['index,row,col'];
    waypoints.forEach((p, i) => lines.push(`${i},${p.row},${p.col}`));
    return lines.join('\n') + '\n';
}

/**
 * Write waypoints as CSV, creating the parent directory when needed
 */
export function exportPath(waypoints: ReadonlyArray<Position>, filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, waypointsToCsv(waypoints), 'utf-8');
}
