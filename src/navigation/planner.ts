/**
 * @module src/navigation/planner
 * @description Point-to-point navigation pipeline
 *
 * inflate → computeField → extractPath, for one request at a time.
 * Each stage consumes the previous stage's output and never mutates it.
 */

import { computeConfigHash, createPlannerConfig, type PlannerConfig } from '../core/config';
import { ValidationError } from '../core/errors';
import type { Logger } from '../core/logging';
import { assertInBounds, assertValidGrid, isObstacle, positionsEqual } from '../models/grid/grid';
import type { Grid, Position } from '../models/grid/types';
import { inflate } from '../models/planning/inflation';
import { extractPath } from '../models/planning/path-extractor';
import { computeField } from '../models/planning/potential-field';
import type { ExtractionMetrics, Path, PotentialField } from '../models/planning/types';
import { PlanningStatistics, pathCost, type PlanningStatisticsSnapshot } from '../models/utils/statistics';

/**
 * Per-request options
 */
export interface PlanOptions {
    /** Overrides merged onto DEFAULT_PLANNER_CONFIG */
    config?: Partial<PlannerConfig>;
    /** Defaults to the grid's START cell */
    start?: Position;
    /** Defaults to the grid's GOAL cell */
    goal?: Position;
    logger?: Logger;
}

/**
 * Planner result
 */
export interface PlanResult {
    path: Path;
    metrics: ExtractionMetrics;
    /** Path ends at the goal */
    success: boolean;
    inflatedGrid: Grid;
    field: PotentialField;
    statistics: PlanningStatisticsSnapshot;
    configHash: string;
}

/**
 * Run the full pipeline on a grid.
 *
 * @throws MalformedGridError if the grid breaks the loader contract
 * @throws InvalidConfigError if the merged configuration is invalid
 * @throws ValidationError if start or goal is outside the grid, or is an
 *   obstacle once the grid is inflated
 */
export function planTrajectory(grid: Grid, options: PlanOptions = {}): PlanResult {
    return new GridNavigator(options.config, options.logger).plan(grid, options.start, options.goal);
}

/**
 * Reusable planner bound to one configuration and logger
 */
export class GridNavigator {
    private readonly config: PlannerConfig;
    private readonly configHash: string;
    private readonly logger?: Logger;

    constructor(config: Partial<PlannerConfig> = {}, logger?: Logger) {
        this.config = createPlannerConfig(config);
        this.configHash = computeConfigHash(this.config);
        this.logger = logger;
    }

    getConfig(): PlannerConfig {
        return { ...this.config };
    }

    /**
     * Plan from start to goal (grid START/GOAL cells by default)
     */
    plan(grid: Grid, start: Position = grid.start, goal: Position = grid.goal): PlanResult {
        assertValidGrid(grid);
        assertInBounds(grid, start, 'start');
        assertInBounds(grid, goal, 'goal');

        const { robotWidth, robotHeight } = this.config;
        const stats = new PlanningStatistics();
        stats.setMapInfo(grid, robotWidth, robotHeight);

        let mark = performance.now();
        const inflatedGrid = inflate(grid, robotWidth, robotHeight);
        this.logger?.logStage({
            stage: 'inflate',
            durationMs: performance.now() - mark,
            details: { robotWidth, robotHeight },
        });
        for (const [label, cell] of [['start', start], ['goal', goal]] as const) {
            if (isObstacle(inflatedGrid, cell)) {
                throw new ValidationError(
                    `${label} (${cell.row}, ${cell.col}) is blocked for a ${robotWidth}x${robotHeight} robot`,
                    { [label]: cell }
                );
            }
        }

        stats.startTimer();
        mark = performance.now();
        const field = computeField(inflatedGrid, goal, this.config);
        this.logger?.logStage({ stage: 'field', durationMs: performance.now() - mark });

        const { path, metrics } = extractPath(field, start, goal, this.config, this.logger);
        stats.stopTimer();
        stats.addNodesExplored(metrics.nodesExpanded);

        const success = positionsEqual(path[path.length - 1], goal);
        if (success) {
            stats.setSuccess(true);
            stats.setPathInfo(path);
        } else {
            stats.setSuccess(false, metrics.partialReason ?? 'goal not reached');
        }

        const snapshot = stats.toSnapshot();
        this.logger?.logReport({
            success,
            strategy: metrics.strategy,
            waypoints: path.length,
            pathCost: pathCost(path),
            nodesExpanded: metrics.nodesExpanded,
            planningTimeMs: snapshot.planningTimeMs,
            partialReason: metrics.partialReason,
            configHash: this.configHash,
        });

        return {
            path,
            metrics,
            success,
            inflatedGrid,
            field,
            statistics: snapshot,
            configHash: this.configHash,
        };
    }
}
