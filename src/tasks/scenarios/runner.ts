/**
 * @module tasks/scenarios/runner
 * @description Batch execution of bundled scenarios
 */

import * as path from 'path';
import { wrapError, type NavError } from '../../core/errors';
import type { PlannerConfig } from '../../core/config';
import type { Logger } from '../../core/logging';
import { GridNavigator } from '../../navigation/planner';
import type { PlanResult } from '../../navigation/planner';
import { exportPath } from './export';
import { findMapsDir, loadGridFile } from './loader';
import { getScenario, type ScenarioDefinition } from './scenarios';

export interface ScenarioRunOptions {
    /** Defaults to the bundled maps directory */
    mapsDir?: string;
    /** When set, the waypoints are written to `<outputDir>/scenario_<id>_path.csv` */
    outputDir?: string;
    logger?: Logger;
    /** Applied on top of the scenario's own footprint */
    config?: Partial<PlannerConfig>;
}

export interface ScenarioRunResult {
    scenario: ScenarioDefinition;
    /** Set when planning ran; absent when the scenario failed before or during planning */
    plan?: PlanResult;
    exportedTo?: string;
    error?: NavError;
}

/**
 * Run one scenario. Failures are captured on the result, never thrown,
 * except for an unknown id.
 *
 * @throws ScenarioNotFoundError
 */
export function runScenario(id: number, options: ScenarioRunOptions = {}): ScenarioRunResult {
    const scenario = getScenario(id);
    try {
        const mapsDir = options.mapsDir ?? findMapsDir();
        const grid = loadGridFile(path.join(mapsDir, scenario.mapFile));
        const navigator = new GridNavigator(
            { robotWidth: scenario.robotWidth, robotHeight: scenario.robotHeight, ...options.config },
            options.logger
        );
        const plan = navigator.plan(grid);

        let exportedTo: string | undefined;
        if (options.outputDir !== undefined) {
            exportedTo = path.join(options.outputDir, `scenario_${id}_path.csv`);
            exportPath(plan.path, exportedTo);
        }
        return { scenario, plan, exportedTo };
    } catch (error) {
        return { scenario, error: wrapError(error) };
    }
}

/**
 * Run several scenarios in order
 */
export function runScenarios(ids: ReadonlyArray<number>, options: ScenarioRunOptions = {}): ScenarioRunResult[] {
    return ids.map(id => runScenario(id, options));
}

export interface ScenarioSummary {
    total: number;
    succeeded: number;
    partial: number;
    failed: number;
    /** succeeded / total, 0 for an empty batch */
    successRate: number;
}

/**
 * Count results: succeeded reached the goal, partial returned a path that
 * stops short, failed raised an error
 */
export function summarizeResults(results: ReadonlyArray<ScenarioRunResult>): ScenarioSummary {
    let succeeded = 0;
    let partial = 0;
    let failed = 0;
    for (const result of results) {
        if (!result.plan) failed++;
        else if (result.plan.success) succeeded++;
        else partial++;
    }
    const total = results.length;
    return { total, succeeded, partial, failed, successRate: total > 0 ? succeeded / total : 0 };
}
