/**
 * Potential Field Tests
 */

import { describe, it, expect } from 'vitest';
import {
    attractivePotential,
    computeField,
    fieldFromMatrix,
    fieldToMatrix,
    getPotential,
    isImpassable,
    nearestObstacleDistance,
    repulsivePotential,
} from '../src/models/planning/potential-field';
import { inflate } from '../src/models/planning/inflation';
import { IMPASSABLE } from '../src/models/planning/types';
import { generateRandomGrid } from '../src/models/grid/generator';
import { pos } from '../src/models/grid/grid';
import { CellType } from '../src/models/grid/types';
import { DEFAULT_PLANNER_CONFIG, createPlannerConfig } from '../src/core/config';
import { ValidationError } from '../src/core/errors';
import { gridFromRows, openGrid } from './test-utils';

const config = DEFAULT_PLANNER_CONFIG;

describe('repulsivePotential', () => {
    it('follows k_rep * (1/d - 1/rho)^2 inside the influence radius', () => {
        expect(repulsivePotential(1, config)).toBeCloseTo(50 * (2 / 3) ** 2, 10);
        expect(repulsivePotential(2, config)).toBeCloseTo(50 / 36, 10);
    });

    it('cuts off hard at the influence radius', () => {
        expect(repulsivePotential(3, config)).toBe(0);
        expect(repulsivePotential(3.0001, config)).toBe(0);
        expect(repulsivePotential(Infinity, config)).toBe(0);
    });

    it('clamps a zero distance to a finite value', () => {
        const value = repulsivePotential(0, config);
        expect(Number.isFinite(value)).toBe(true);
        expect(value).toBe(repulsivePotential(config.minObstacleDistance, config));
        expect(value).toBeGreaterThan(repulsivePotential(1, config));
    });

    it('scales with the repulsive gain', () => {
        const doubled = { ...config, repulsiveGain: 100 };
        expect(repulsivePotential(2, doubled)).toBeCloseTo(2 * repulsivePotential(2, config), 10);
    });
});

describe('attractivePotential', () => {
    it('is the gain times the euclidean distance to the goal', () => {
        expect(attractivePotential(pos(0, 0), pos(3, 4), config)).toBe(5);
        expect(attractivePotential(pos(0, 0), pos(3, 4), { attractiveGain: 2 })).toBe(10);
    });
});

describe('nearestObstacleDistance', () => {
    it('is Infinity without obstacles', () => {
        expect(nearestObstacleDistance(openGrid(3, 3), pos(1, 1))).toBe(Infinity);
    });

    it('finds the closest obstacle', () => {
        const grid = gridFromRows(['#S.....G']);
        expect(nearestObstacleDistance(grid, pos(0, 4))).toBe(4);
        expect(nearestObstacleDistance(grid, pos(0, 0))).toBe(0);
    });
});

describe('computeField', () => {
    it('equals the attractive term when there are no obstacles', () => {
        const grid = openGrid(3, 3);
        const field = computeField(grid, grid.goal, config);
        expect(field.rows).toBe(3);
        expect(field.cols).toBe(3);
        expect(getPotential(field, pos(0, 0))).toBeCloseTo(2 * Math.SQRT2, 12);
        expect(getPotential(field, pos(1, 2))).toBe(1);
        expect(getPotential(field, pos(2, 2))).toBe(0);
    });

    it('adds repulsion within the radius and none beyond it', () => {
        const grid = gridFromRows(['#S.....G']);
        const field = computeField(grid, grid.goal, config);
        expect(getPotential(field, pos(0, 0))).toBe(IMPASSABLE);
        expect(getPotential(field, pos(0, 1))).toBeCloseTo(6 + 50 * (2 / 3) ** 2, 10);
        expect(getPotential(field, pos(0, 2))).toBeCloseTo(5 + 50 / 36, 10);
        expect(getPotential(field, pos(0, 3))).toBe(4);
        expect(getPotential(field, pos(0, 4))).toBe(3);
        expect(getPotential(field, pos(0, 7))).toBe(0);
    });

    it('marks exactly the obstacle cells impassable', () => {
        for (const seed of [11, 12, 13]) {
            const grid = inflate(generateRandomGrid({ rows: 14, cols: 18, density: 0.2, seed }), 3, 3);
            const field = computeField(grid, grid.goal, config);
            for (let i = 0; i < field.values.length; i++) {
                const obstacle = grid.cells[i] === CellType.OBSTACLE;
                expect(isImpassable(field.values[i])).toBe(obstacle);
                if (!obstacle) {
                    expect(Number.isFinite(field.values[i])).toBe(true);
                    expect(field.values[i]).toBeGreaterThanOrEqual(0);
                }
            }
        }
    });

    it('accepts a goal other than the grid GOAL cell', () => {
        const grid = openGrid(3, 3);
        const field = computeField(grid, pos(0, 0), createPlannerConfig({ attractiveGain: 3 }));
        expect(getPotential(field, pos(0, 0))).toBe(0);
        expect(getPotential(field, pos(0, 2))).toBe(6);
    });

    it('rejects a goal outside the grid', () => {
        const grid = openGrid(3, 3);
        expect(() => computeField(grid, pos(3, 0), config)).toThrow(ValidationError);
    });
});

describe('field matrices', () => {
    it('maps non-finite entries to IMPASSABLE', () => {
        const field = fieldFromMatrix([
            [1, Infinity],
            [NaN, 2],
        ]);
        expect(Array.from(field.values)).toEqual([1, IMPASSABLE, IMPASSABLE, 2]);
        expect(fieldToMatrix(field)).toEqual([
            [1, Infinity],
            [Infinity, 2],
        ]);
    });

    it('rejects ragged rows', () => {
        expect(() => fieldFromMatrix([[1, 2], [3]])).toThrow('Field row 1 has 1 values, expected 2');
    });
});
