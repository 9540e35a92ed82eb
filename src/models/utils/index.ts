/**
 * @module utils
 * @description Path metrics and planning statistics
 */

export {
    pathCost,
    cumulativePathCost,
    isEightConnected,
    pathAvoidsObstacles,
    mean,
    PlanningStatistics,
    type PlanningStatisticsSnapshot,
} from './statistics';
