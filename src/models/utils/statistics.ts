/**
 * @module utils/statistics
 * @description Planning statistics and path metrics
 */

import { areNeighbors, countCells, isInBounds, isObstacle } from '../grid/grid';
import { CellType, type Grid, type Position } from '../grid/types';
import { stepCost } from '../planning/utils';

// ==================== Path Metrics ====================

/**
 * Travel cost of a path: 1 per axial move, √2 per diagonal move.
 * Non-adjacent consecutive waypoints contribute their Euclidean distance.
 */
export function pathCost(path: ReadonlyArray<Position>): number {
    let cost = 0;
    for (let i = 1; i < path.length; i++) {
        const dRow = path[i].row - path[i - 1].row;
        const dCol = path[i].col - path[i - 1].col;
        cost += areNeighbors(path[i - 1], path[i]) ? stepCost(dRow, dCol) : Math.hypot(dRow, dCol);
    }
    return cost;
}

/**
 * Running cost after each waypoint (first entry is 0)
 */
export function cumulativePathCost(path: ReadonlyArray<Position>): number[] {
    const costs: number[] = [];
    for (let i = 0; i < path.length; i++) {
        costs.push(i === 0 ? 0 : costs[i - 1] + pathCost([path[i - 1], path[i]]));
    }
    return costs;
}

/**
 * Every consecutive pair is a distinct 8-connected neighbour
 */
export function isEightConnected(path: ReadonlyArray<Position>): boolean {
    for (let i = 1; i < path.length; i++) {
        if (!areNeighbors(path[i - 1], path[i])) return false;
    }
    return true;
}

/**
 * Every waypoint is inside the grid and not an obstacle
 */
export function pathAvoidsObstacles(grid: Grid, path: ReadonlyArray<Position>): boolean {
    return path.every(p => isInBounds(grid, p) && !isObstacle(grid, p));
}

/**
 * Mean of an array
 *
 * @throws Error on an empty array
 */
export function mean(arr: number[]): number {
    if (arr.length === 0) {
        throw new Error('Array cannot be empty');
    }
    return arr.reduce((sum, val) => sum + val, 0) / arr.length;
}

// ==================== Planning Statistics ====================

/**
 * Plain snapshot of a PlanningStatistics tracker
 */
export interface PlanningStatisticsSnapshot {
    mapRows: number;
    mapCols: number;
    obstacleCells: number;
    /** Obstacle share of all cells, in [0, 1] */
    obstacleDensity: number;
    robotWidth: number;
    robotHeight: number;
    planningTimeMs: number;
    nodesExplored: number;
    success: boolean;
    failureReason?: string;
    pathLength: number;
    pathCost: number;
}

/**
 * Accumulates the figures reported for one planning request
 */
export class PlanningStatistics {
    private mapRows = 0;
    private mapCols = 0;
    private obstacleCells = 0;
    private robotWidth = 1;
    private robotHeight = 1;
    private startedAt: number | null = null;
    private elapsedMs = 0;
    private nodesExplored = 0;
    private success = false;
    private failureReason?: string;
    private pathLength = 0;
    private pathCostValue = 0;

    setMapInfo(grid: Grid, robotWidth: number, robotHeight: number): void {
        this.mapRows = grid.rows;
        this.mapCols = grid.cols;
        this.obstacleCells = countCells(grid, CellType.OBSTACLE);
        this.robotWidth = robotWidth;
        this.robotHeight = robotHeight;
    }

    startTimer(): void {
        this.startedAt = performance.now();
    }

    /** Adds the time since startTimer(); no-op when the timer is not running */
    stopTimer(): void {
        if (this.startedAt === null) return;
        this.elapsedMs += performance.now() - this.startedAt;
        this.startedAt = null;
    }

    addNodesExplored(count: number): void {
        this.nodesExplored += count;
    }

    setSuccess(success: boolean, reason?: string): void {
        this.success = success;
        this.failureReason = success ? undefined : reason;
    }

    setPathInfo(path: ReadonlyArray<Position>): void {
        this.pathLength = path.length;
        this.pathCostValue = pathCost(path);
    }

    toSnapshot(): PlanningStatisticsSnapshot {
        const totalCells = this.mapRows * this.mapCols;
        return {
            mapRows: this.mapRows,
            mapCols: this.mapCols,
            obstacleCells: this.obstacleCells,
            obstacleDensity: totalCells > 0 ? this.obstacleCells / totalCells : 0,
            robotWidth: this.robotWidth,
            robotHeight: this.robotHeight,
            planningTimeMs: this.elapsedMs,
            nodesExplored: this.nodesExplored,
            success: this.success,
            failureReason: this.failureReason,
            pathLength: this.pathLength,
            pathCost: this.pathCostValue,
        };
    }

    /**
     * Multi-line human-readable summary
     */
    getSummary(): string {
        const s = this.toSnapshot();
        const lines = [
            'PLANNING STATISTICS',
            `  Map:            ${s.mapRows}x${s.mapCols} (${(s.obstacleDensity * 100).toFixed(1)}% obstacles)`,
            `  Robot:          ${s.robotHeight}x${s.robotWidth} cells`,
            `  Planning time:  ${s.planningTimeMs.toFixed(2)} ms`,
            `  Nodes explored: ${s.nodesExplored}`,
            `  Result:         ${s.success ? 'SUCCESS' : `FAILED${s.failureReason ? ` (${s.failureReason})` : ''}`}`,
        ];
        if (s.success) {
            lines.push(`  Path length:    ${s.pathLength} waypoints`);
            lines.push(`  Path cost:      ${s.pathCost.toFixed(3)}`);
        }
        return lines.join('\n');
    }
}
