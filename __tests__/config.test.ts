/**
 * Planner Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import {
    DEFAULT_PLANNER_CONFIG,
    computeConfigHash,
    createPlannerConfig,
    validatePlannerConfig,
} from '../src/core/config';
import { ErrorCodes, InvalidConfigError, hasErrorCode } from '../src/core/errors';
import { SeededRandom, computeObjectHash, createHash, createRng, sortObjectKeys } from '../src/core/repro';

describe('DEFAULT_PLANNER_CONFIG', () => {
    it('uses the documented defaults', () => {
        expect(DEFAULT_PLANNER_CONFIG).toEqual({
            attractiveGain: 1.0,
            repulsiveGain: 50.0,
            obstacleInfluence: 3,
            robotWidth: 2,
            robotHeight: 2,
            minObstacleDistance: 1e-6,
            searchIterationFactor: 4,
            descentStepFactor: 2,
            cycleWindow: 20,
            cycleMaxRepeats: 2,
            cycleWarmupSteps: 10,
        });
    });

    it('passes validation without warnings', () => {
        expect(validatePlannerConfig(DEFAULT_PLANNER_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
    });
});

describe('validatePlannerConfig', () => {
    it('rejects negative or non-finite gains', () => {
        const result = validatePlannerConfig({ ...DEFAULT_PLANNER_CONFIG, attractiveGain: -1, repulsiveGain: NaN });
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual([
            'attractiveGain must be a finite number >= 0',
            'repulsiveGain must be a finite number >= 0',
        ]);
    });

    it('requires a positive influence radius and distance floor', () => {
        const result = validatePlannerConfig({ ...DEFAULT_PLANNER_CONFIG, obstacleInfluence: 0, minObstacleDistance: 0 });
        expect(result.errors).toEqual([
            'obstacleInfluence must be a finite number > 0',
            'minObstacleDistance must be a finite number > 0',
        ]);
    });

    it('requires integer footprints and caps', () => {
        const result = validatePlannerConfig({
            ...DEFAULT_PLANNER_CONFIG,
            robotWidth: 1.5,
            cycleWindow: 0,
            descentStepFactor: -1,
        });
        expect(result.errors).toEqual([
            'robotWidth must be an integer >= 1',
            'cycleWindow must be an integer >= 1',
            'descentStepFactor must be an integer >= 0',
        ]);
    });

    it('warns about settings that disable a mechanism', () => {
        const result = validatePlannerConfig({
            ...DEFAULT_PLANNER_CONFIG,
            searchIterationFactor: 0,
            cycleMaxRepeats: 20,
        });
        expect(result.valid).toBe(true);
        expect(result.warnings).toEqual([
            'searchIterationFactor is 0: primary search is disabled and descent always runs',
            'cycleMaxRepeats >= cycleWindow: cycle detection can never trigger',
        ]);
    });
});

describe('createPlannerConfig', () => {
    it('merges overrides onto the defaults', () => {
        const config = createPlannerConfig({ robotWidth: 3, repulsiveGain: 10 });
        expect(config.robotWidth).toBe(3);
        expect(config.repulsiveGain).toBe(10);
        expect(config.robotHeight).toBe(2);
    });

    it('throws InvalidConfigError listing every problem', () => {
        let caught: unknown;
        try {
            createPlannerConfig({ robotHeight: 0, obstacleInfluence: -2 });
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(InvalidConfigError);
        expect(hasErrorCode(caught, ErrorCodes.INVALID_CONFIG)).toBe(true);
        if (caught instanceof InvalidConfigError) {
            expect(caught.errors).toEqual([
                'obstacleInfluence must be a finite number > 0',
                'robotHeight must be an integer >= 1',
            ]);
            expect(caught.message).toBe(
                'Invalid planner config: obstacleInfluence must be a finite number > 0; robotHeight must be an integer >= 1'
            );
        }
    });
});

describe('computeConfigHash', () => {
    it('is stable and sensitive to every field', () => {
        const base = computeConfigHash(DEFAULT_PLANNER_CONFIG);
        expect(base).toHaveLength(32);
        expect(computeConfigHash({ ...DEFAULT_PLANNER_CONFIG })).toBe(base);
        expect(computeConfigHash({ ...DEFAULT_PLANNER_CONFIG, cycleWarmupSteps: 11 })).not.toBe(base);
    });
});

describe('repro helpers', () => {
    it('hashes objects independent of key order', () => {
        expect(computeObjectHash({ a: 1, b: [2, { d: 4, c: 3 }] })).toBe(
            computeObjectHash({ b: [2, { c: 3, d: 4 }], a: 1 })
        );
        expect(sortObjectKeys({ b: 1, a: { d: 2, c: 3 } })).toEqual({ a: { c: 3, d: 2 }, b: 1 });
        expect(createHash('grid')).toMatch(/^[0-9a-f]{32}$/);
    });

    it('replays a seeded sequence', () => {
        const a = createRng(42);
        const b = new SeededRandom(42);
        const first = [a.random(), a.random(), a.random()];
        expect([b.random(), b.random(), b.random()]).toEqual(first);
        for (const value of first) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });
});
