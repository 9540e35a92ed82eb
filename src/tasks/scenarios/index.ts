/**
 * @module tasks/scenarios
 * @description Bundled scenarios, map loading and waypoint export (Node.js only)
 */

export {
    SCENARIOS,
    getScenario,
    listScenarios,
    type ScenarioDefinition,
} from './scenarios';

export { loadGridFile, findMapsDir } from './loader';

export { waypointsToCsv, exportPath } from './export';

export {
    runScenario,
    runScenarios,
    summarizeResults,
    type ScenarioRunOptions,
    type ScenarioRunResult,
    type ScenarioSummary,
} from './runner';

export { runCli } from './command';
