/**
 * @packageDocumentation
 * @module gridfield-nav/node
 *
 * Node.js entry point: everything from the main index plus the JSONL
 * file logger.
 *
 * ## Usage Example
 * ```typescript
 * import { tasks, JsonlLogger } from 'gridfield-nav/node';
 *
 * const logger = new JsonlLogger('output/run.jsonl', { scenario: 'nightly' });
 * const result = tasks.scenarios.runScenario(3, { logger, outputDir: 'output' });
 * logger.close();
 * ```
 *
 * @license MIT
 */

export * from './index';
export { JsonlLogger, createJsonlLogger } from './src/core/logging-node';
