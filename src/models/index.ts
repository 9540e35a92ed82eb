/**
 * @module src/models
 * @description Grid model, planning algorithms and path metrics
 *
 * - grid/: cell types, grid construction, text format, random maps
 * - planning/: inflation, potential field, A* and descent
 * - utils/: path metrics and planning statistics
 */

export * as grid from './grid';
export * as planning from './planning';
export * as utils from './utils';
