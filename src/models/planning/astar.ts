/**
 * @module planning/astar
 * @description Primary path search: A* keyed on the potential field
 *
 * Priority of a cell is `g + U(cell)`: accumulated path cost plus the field
 * value, which stands in for the cost-to-go. Repulsive terms can push U above
 * the true remaining cost, so the heuristic is not admissible and the path
 * found is not guaranteed to be the cheapest one.
 */

import type { PlannerConfig } from '../../core/config';
import { NEIGHBOR_OFFSETS, type Position } from '../grid/types';
import type { Path, PotentialField, PrimarySearchResult } from './types';
import { PriorityQueue, stepCost } from './utils';

interface FrontierItem {
    index: number;
    g: number;
}

/**
 * Walk parent pointers back from `goalIndex`
 */
function reconstructPath(parents: Int32Array, goalIndex: number, cols: number): Path {
    const path: Path = [];
    let current = goalIndex;
    while (current !== -1) {
        path.push({ row: Math.floor(current / cols), col: current % cols });
        current = parents[current];
    }
    return path.reverse();
}

/**
 * Search the 8-connected graph of finite-potential cells from start to goal.
 *
 * - Edge cost 1 for axial moves, √2 for diagonal moves
 * - Equal priorities are popped in insertion order
 * - A cell is re-queued only when a strictly cheaper `g` is found; stale
 *   queue entries are dropped when popped
 * - At most `searchIterationFactor × rows × cols` pops
 *
 * Start and goal are assumed to lie inside the field.
 */
export function searchPrimary(
    field: PotentialField,
    start: Position,
    goal: Position,
    config: Pick<PlannerConfig, 'searchIterationFactor'>
): PrimarySearchResult {
    const { rows, cols, values } = field;
    const iterationLimit = config.searchIterationFactor * rows * cols;
    const startIndex = start.row * cols + start.col;
    const goalIndex = goal.row * cols + goal.col;

    const bestCost = new Float64Array(rows * cols).fill(Infinity);
    const parents = new Int32Array(rows * cols).fill(-1);
    const frontier = new PriorityQueue<FrontierItem>();

    bestCost[startIndex] = 0;
    frontier.push({ index: startIndex, g: 0 }, values[startIndex]);

    let iterations = 0;
    let nodesExpanded = 0;

    while (!frontier.isEmpty()) {
        if (iterations >= iterationLimit) {
            return { path: [], nodesExpanded, iterations, outcome: 'iteration_limit' };
        }

        const entry = frontier.pop();
        if (entry === undefined) break;
        iterations++;

        const { index, g } = entry.item;
        if (g > bestCost[index]) continue;
        nodesExpanded++;

        if (index === goalIndex) {
            return {
                path: reconstructPath(parents, goalIndex, cols),
                nodesExpanded,
                iterations,
                outcome: 'found',
            };
        }

        const row = Math.floor(index / cols);
        const col = index % cols;

        for (const [dRow, dCol] of NEIGHBOR_OFFSETS) {
            const nRow = row + dRow;
            const nCol = col + dCol;

            // Boundary validation
            if (nRow < 0 || nRow >= rows || nCol < 0 || nCol >= cols) continue;

            const nIndex = nRow * cols + nCol;
            const potential = values[nIndex];

            // Obstacle check
            if (!Number.isFinite(potential)) continue;

            const nextCost = g + stepCost(dRow, dCol);
            if (nextCost < bestCost[nIndex]) {
                bestCost[nIndex] = nextCost;
                parents[nIndex] = index;
                frontier.push({ index: nIndex, g: nextCost }, nextCost + potential);
            }
        }
    }

    return { path: [], nodesExpanded, iterations, outcome: 'frontier_exhausted' };
}
