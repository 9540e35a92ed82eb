/**
 * @module navigation
 * @description End-to-end planning pipeline
 */

export { planTrajectory, GridNavigator } from './planner';
export type { PlanOptions, PlanResult } from './planner';
