/**
 * @packageDocumentation
 * @module gridfield-nav
 *
 * Potential-field path planning on 2D occupancy grids.
 *
 * Pipeline: footprint inflation → attractive/repulsive potential field →
 * A* keyed on the field, with a steepest-descent fallback.
 *
 * ## Modules
 * - `core` - Configuration, errors, logging, reproducibility helpers
 * - `grid` - Grid model, text map format, random map generator
 * - `planning` - Inflation, potential field, path extraction
 * - `metrics` - Path cost and planning statistics
 * - `navigation` - End-to-end planner (`planTrajectory`, `GridNavigator`)
 * - `tasks` - Bundled scenarios and waypoint export (Node.js only)
 *
 * ## Usage Example
 * ```typescript
 * import { grid, navigation } from 'gridfield-nav';
 *
 * const map = grid.parseGridText('S..\n.#.\n..G');
 * const result = navigation.planTrajectory(map, {
 *   config: { robotWidth: 1, robotHeight: 1 },
 * });
 * console.log(result.success, result.path);
 * ```
 *
 * @license MIT
 */

// ==================== Core ====================
export * as core from './src/core';

// ==================== Models ====================
export * as grid from './src/models/grid';
export * as planning from './src/models/planning';
export * as metrics from './src/models/utils';

// ==================== Pipeline ====================
export * as navigation from './src/navigation';

// ==================== Tasks ====================
export * as tasks from './src/tasks';

// ==================== Version ====================
export const VERSION = '1.0.0';
