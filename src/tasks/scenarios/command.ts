/**
 * @module tasks/scenarios/command
 * @description Scenario command: argument parsing, batch run and console report
 */

import { ConsoleLogger, MultiLogger, type Logger } from '../../core/logging';
import { JsonlLogger } from '../../core/logging-node';
import { renderGridAscii } from '../../models/grid/parser';
import { runScenarios, summarizeResults, type ScenarioRunResult } from './runner';
import { SCENARIOS, listScenarios } from './scenarios';

// ==================== Argument Parsing ====================

interface CliArgs {
    ids: number[];
    list: boolean;
    outputDir?: string;
    logFile?: string;
    mapsDir?: string;
    quiet: boolean;
    help: boolean;
    unknown: string[];
}

function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = {
        ids: [],
        list: false,
        quiet: false,
        help: false,
        unknown: [],
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--list' || arg === '-l') {
            args.list = true;
        } else if (arg === '--quiet' || arg === '-q') {
            args.quiet = true;
        } else if (arg === '--out' || arg === '-o') {
            args.outputDir = argv[++i];
        } else if (arg === '--log') {
            args.logFile = argv[++i];
        } else if (arg === '--maps') {
            args.mapsDir = argv[++i];
        } else if (/^\d+$/.test(arg)) {
            args.ids.push(parseInt(arg, 10));
        } else {
            args.unknown.push(arg);
        }
    }

    return args;
}

function printHelp(): void {
    console.log(`
gridfield-nav - Potential-field grid navigation scenarios

Usage:
  npx tsx src/tasks/scenarios/cli.ts [options] [id ...]

Options:
  -h, --help       Show this help message
  -l, --list       List available scenarios
  -o, --out DIR    Write each path to DIR/scenario_<id>_path.csv
      --log FILE   Append JSONL log entries to FILE
      --maps DIR   Read map files from DIR (default: bundled maps)
  -q, --quiet      Print the summary only

Without ids every scenario runs.

Examples:
  npx tsx src/tasks/scenarios/cli.ts --list
  npx tsx src/tasks/scenarios/cli.ts 1 5 6 --out output
`);
}

// ==================== Output ====================

function printResult(result: ScenarioRunResult, quiet: boolean): void {
    const { scenario, plan, error } = result;
    if (error || !plan) {
        console.error(`[FAILED] ${scenario.id}. ${scenario.name}: ${error?.message ?? 'no result'}`);
        return;
    }

    const tag = plan.success ? '[OK]' : '[PARTIAL]';
    console.log(`${tag} ${scenario.id}. ${scenario.name} (${plan.metrics.strategy})`);
    if (quiet) return;

    console.log('');
    console.log(renderGridAscii(plan.inflatedGrid, plan.path));
    console.log('');
    console.log(formatSnapshot(plan));
    if (result.exportedTo) {
        console.log(`  Exported to:    ${result.exportedTo}`);
    }
    console.log('');
}

function formatSnapshot(plan: NonNullable<ScenarioRunResult['plan']>): string {
    const s = plan.statistics;
    const lines = [
        `  Map:            ${s.mapRows}x${s.mapCols} (${(s.obstacleDensity * 100).toFixed(1)}% obstacles)`,
        `  Robot:          ${s.robotHeight}x${s.robotWidth} cells`,
        `  Planning time:  ${s.planningTimeMs.toFixed(2)} ms`,
        `  Nodes explored: ${s.nodesExplored}`,
    ];
    if (s.success) {
        lines.push(`  Path length:    ${s.pathLength} waypoints`);
        lines.push(`  Path cost:      ${s.pathCost.toFixed(3)}`);
    } else {
        lines.push(`  Stopped short:  ${s.failureReason ?? 'unknown'} after ${plan.path.length} waypoints`);
    }
    return lines.join('\n');
}

// ==================== Main ====================

/**
 * Run the scenario command for `argv` (arguments after the script name).
 * Returns the process exit code: 1 if any scenario failed or the run was
 * aborted, 0 otherwise.
 */
export function runCli(argv: string[]): number {
    const args = parseArgs(argv);

    if (args.help) {
        printHelp();
        return 0;
    }

    if (args.unknown.length > 0) {
        console.error(`Unknown argument(s): ${args.unknown.join(' ')}`);
        printHelp();
        return 1;
    }

    if (args.list) {
        for (const line of listScenarios()) {
            console.log(line);
        }
        return 0;
    }

    console.log('');
    console.log('============================================================');
    console.log('     GRIDFIELD-NAV - Potential-Field Navigation Scenarios   ');
    console.log('============================================================');
    console.log('');

    const ids = args.ids.length > 0 ? args.ids : SCENARIOS.map(s => s.id);
    let logger: MultiLogger | undefined;
    let exitCode = 0;
    try {
        const loggers: Logger[] = [];
        if (!args.quiet) loggers.push(new ConsoleLogger('warn'));
        if (args.logFile) loggers.push(new JsonlLogger(args.logFile, { scenario: 'cli', logStages: true }));
        logger = new MultiLogger(loggers);

        const results = runScenarios(ids, {
            mapsDir: args.mapsDir,
            outputDir: args.outputDir,
            logger,
        });
        for (const result of results) {
            printResult(result, args.quiet);
        }

        const summary = summarizeResults(results);
        console.log('');
        console.log(
            `Summary: ${summary.succeeded}/${summary.total} reached goal, ` +
            `${summary.partial} partial, ${summary.failed} failed ` +
            `(${(summary.successRate * 100).toFixed(1)}%)`
        );
        if (summary.failed > 0) {
            exitCode = 1;
        }
    } catch (error) {
        console.error('');
        console.error('[FAILED] Run aborted:');
        console.error(`  ${error instanceof Error ? error.message : String(error)}`);
        console.error('');
        exitCode = 1;
    } finally {
        logger?.close();
    }
    return exitCode;
}
