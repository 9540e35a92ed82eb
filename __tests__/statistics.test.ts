/**
 * Path Metrics and Planning Statistics Tests
 */

import { describe, it, expect } from 'vitest';
import {
    PlanningStatistics,
    cumulativePathCost,
    isEightConnected,
    mean,
    pathAvoidsObstacles,
    pathCost,
} from '../src/models/utils/statistics';
import { pos } from '../src/models/grid/grid';
import { centreObstacleGrid } from './test-utils';

describe('path metrics', () => {
    const path = [pos(0, 0), pos(1, 1), pos(1, 2), pos(2, 3)];

    it('charges 1 per axial and sqrt(2) per diagonal move', () => {
        expect(pathCost(path)).toBeCloseTo(1 + 2 * Math.SQRT2, 12);
        expect(pathCost([pos(3, 3)])).toBe(0);
    });

    it('uses the euclidean distance across gaps', () => {
        expect(pathCost([pos(0, 0), pos(3, 4)])).toBe(5);
    });

    it('accumulates cost per waypoint', () => {
        const costs = cumulativePathCost(path);
        expect(costs[0]).toBe(0);
        expect(costs[1]).toBeCloseTo(Math.SQRT2, 12);
        expect(costs[2]).toBeCloseTo(Math.SQRT2 + 1, 12);
        expect(costs[3]).toBeCloseTo(2 * Math.SQRT2 + 1, 12);
    });

    it('checks connectivity and obstacle avoidance', () => {
        const grid = centreObstacleGrid();
        expect(isEightConnected(path)).toBe(true);
        expect(isEightConnected([pos(0, 0), pos(0, 2)])).toBe(false);
        expect(isEightConnected([pos(0, 0), pos(0, 0)])).toBe(false);
        expect(pathAvoidsObstacles(grid, path)).toBe(true);
        expect(pathAvoidsObstacles(grid, [pos(1, 1), pos(2, 2)])).toBe(false);
        expect(pathAvoidsObstacles(grid, [pos(4, 4), pos(5, 5)])).toBe(false);
    });

    it('averages values', () => {
        expect(mean([1, 2, 3, 6])).toBe(3);
        expect(() => mean([])).toThrow('Array cannot be empty');
    });
});

describe('PlanningStatistics', () => {
    it('records map, robot and path information', () => {
        const stats = new PlanningStatistics();
        stats.setMapInfo(centreObstacleGrid(), 3, 1);
        stats.addNodesExplored(10);
        stats.addNodesExplored(4);
        stats.setSuccess(true);
        stats.setPathInfo([pos(0, 0), pos(0, 1), pos(1, 2)]);

        const snapshot = stats.toSnapshot();
        expect(snapshot).toMatchObject({
            mapRows: 5,
            mapCols: 5,
            obstacleCells: 1,
            robotWidth: 3,
            robotHeight: 1,
            nodesExplored: 14,
            success: true,
            failureReason: undefined,
            pathLength: 3,
        });
        expect(snapshot.obstacleDensity).toBeCloseTo(0.04, 12);
        expect(snapshot.pathCost).toBeCloseTo(1 + Math.SQRT2, 12);
    });

    it('accumulates timer intervals and ignores a stop without a start', () => {
        const stats = new PlanningStatistics();
        stats.stopTimer();
        expect(stats.toSnapshot().planningTimeMs).toBe(0);

        stats.startTimer();
        stats.stopTimer();
        const first = stats.toSnapshot().planningTimeMs;
        expect(first).toBeGreaterThanOrEqual(0);

        stats.startTimer();
        stats.stopTimer();
        expect(stats.toSnapshot().planningTimeMs).toBeGreaterThanOrEqual(first);
    });

    it('keeps the failure reason only for failures', () => {
        const stats = new PlanningStatistics();
        stats.setSuccess(false, 'dead_end');
        expect(stats.toSnapshot().failureReason).toBe('dead_end');
        stats.setSuccess(true, 'ignored');
        expect(stats.toSnapshot().failureReason).toBeUndefined();
    });

    it('renders a summary', () => {
        const stats = new PlanningStatistics();
        stats.setMapInfo(centreObstacleGrid(), 1, 1);
        stats.setSuccess(false, 'cycle');
        const lines = stats.getSummary().split('\n');

        expect(lines[0]).toBe('PLANNING STATISTICS');
        expect(lines[1]).toBe('  Map:            5x5 (4.0% obstacles)');
        expect(lines[2]).toBe('  Robot:          1x1 cells');
        expect(lines[5]).toBe('  Result:         FAILED (cycle)');
        expect(lines).toHaveLength(6);
    });
});
