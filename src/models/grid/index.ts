/**
 * @module grid
 * @description Occupancy grid model, text map format and random generation
 */

export * from './types';
export * from './grid';
export * from './parser';
export * from './generator';
