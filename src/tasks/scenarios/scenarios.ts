/**
 * @module tasks/scenarios/scenarios
 * @description Registry of bundled planning scenarios
 */

import { ScenarioNotFoundError } from '../../core/errors';

/**
 * One bundled scenario
 */
export interface ScenarioDefinition {
    id: number;
    name: string;
    /** File name under the maps directory */
    mapFile: string;
    robotWidth: number;
    robotHeight: number;
    description: string;
}

export const SCENARIOS: ReadonlyArray<ScenarioDefinition> = [
    {
        id: 1,
        name: 'Open Space Navigation',
        mapFile: 'open_space.txt',
        robotWidth: 1,
        robotHeight: 1,
        description: 'Obstacle-free pathfinding',
    },
    {
        id: 2,
        name: 'Corridor Traversal',
        mapFile: 'corridor.txt',
        robotWidth: 1,
        robotHeight: 1,
        description: 'Constrained passage navigation',
    },
    {
        id: 3,
        name: 'Complex Maze',
        mapFile: 'maze.txt',
        robotWidth: 1,
        robotHeight: 1,
        description: 'Multi-turn maze solving',
    },
    {
        id: 4,
        name: 'Dense Obstacle Field',
        mapFile: 'cluttered.txt',
        robotWidth: 1,
        robotHeight: 1,
        description: 'High-density obstacle avoidance',
    },
    {
        id: 5,
        name: 'Narrow Gap Challenge',
        mapFile: 'narrow_gap.txt',
        robotWidth: 1,
        robotHeight: 1,
        description: 'Precision maneuvering through a one-cell gap',
    },
    {
        id: 6,
        name: 'Narrow Gap, Wide Robot',
        mapFile: 'narrow_gap.txt',
        robotWidth: 3,
        robotHeight: 3,
        description: 'Footprint inflation closes the gap; expected to stop short',
    },
    {
        id: 7,
        name: 'Large-Scale Environment',
        mapFile: 'large.txt',
        robotWidth: 1,
        robotHeight: 1,
        description: 'Extended range planning',
    },
];

/**
 * Look up a scenario by id
 *
 * @throws ScenarioNotFoundError
 */
export function getScenario(id: number): ScenarioDefinition {
    const scenario = SCENARIOS.find(s => s.id === id);
    if (!scenario) {
        throw new ScenarioNotFoundError(id);
    }
    return scenario;
}

/**
 * One line per scenario: `id. name - description`
 */
export function listScenarios(): string[] {
    return SCENARIOS.map(s => `${String(s.id).padStart(2)}. ${s.name.padEnd(26)} - ${s.description}`);
}
