/**
 * @module tasks
 * @description Runnable tasks built on the navigation pipeline (Node.js only)
 *
 * - scenarios: bundled maps, batch runner and CLI
 */

export * as scenarios from './scenarios';
