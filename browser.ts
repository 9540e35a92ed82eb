/**
 * @packageDocumentation
 * @module gridfield-nav/browser
 *
 * Browser-compatible entry point.
 *
 * Excludes the Node.js-dependent modules (`tasks`, the JSONL file logger)
 * so the planner bundles cleanly with Vite, Webpack and friends.
 *
 * ## Usage Example
 * ```typescript
 * import { grid, navigation, core } from 'gridfield-nav/browser';
 *
 * const logger = new core.MemoryLogger({ scenario: 'editor' });
 * const result = navigation.planTrajectory(grid.parseGridText(text), { logger });
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as grid from './src/models/grid';
export * as planning from './src/models/planning';
export * as metrics from './src/models/utils';
export * as navigation from './src/navigation';

export const VERSION = '1.0.0';
