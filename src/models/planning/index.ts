/**
 * @module src/models/planning
 * @description Footprint inflation, potential field and path extraction
 *
 * Pipeline: inflate → computeField → extractPath
 */

export * from './types';
export * from './utils';
export * from './inflation';
export * from './potential-field';
export * from './astar';
export * from './descent';
export * from './path-extractor';
