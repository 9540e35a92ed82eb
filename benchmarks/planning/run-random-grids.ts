#!/usr/bin/env npx tsx
/**
 * @module benchmarks/planning/run-random-grids
 * @description Planner throughput and success rate on seeded random grids
 *
 * Usage:
 *   npx tsx benchmarks/planning/run-random-grids.ts
 *   npx tsx benchmarks/planning/run-random-grids.ts --size=60 --density=0.25 --trials=50 --seed=7
 *   npx tsx benchmarks/planning/run-random-grids.ts --output=benchmarks/planning/results
 */

import * as fs from 'fs';
import * as path from 'path';

import { grid, metrics, navigation } from '../../index';

// ==================== CLI Parsing ====================

interface CliArgs {
    size: number;
    density: number;
    trials: number;
    seed: number;
    footprint: number;
    output?: string;
}

function parseArgs(): CliArgs {
    const args = process.argv.slice(2);
    const result: CliArgs = {
        size: 40,
        density: 0.2,
        trials: 20,
        seed: 42,
        footprint: 1,
    };

    for (const arg of args) {
        if (arg.startsWith('--size=')) {
            result.size = parseInt(arg.split('=')[1], 10);
        } else if (arg.startsWith('--density=')) {
            result.density = parseFloat(arg.split('=')[1]);
        } else if (arg.startsWith('--trials=')) {
            result.trials = parseInt(arg.split('=')[1], 10);
        } else if (arg.startsWith('--seed=')) {
            result.seed = parseInt(arg.split('=')[1], 10);
        } else if (arg.startsWith('--footprint=')) {
            result.footprint = parseInt(arg.split('=')[1], 10);
        } else if (arg.startsWith('--output=')) {
            result.output = arg.split('=')[1];
        }
    }

    return result;
}

// ==================== Benchmark Runner ====================

interface TrialSummary {
    trial: number;
    seed: number;
    success: boolean;
    strategy: 'primary' | 'fallback';
    partialReason?: string;
    waypoints: number;
    pathCost: number;
    nodesExpanded: number;
    planningTimeMs: number;
}

function runTrials(args: CliArgs): TrialSummary[] {
    const navigator = new navigation.GridNavigator({
        robotWidth: args.footprint,
        robotHeight: args.footprint,
    });
    const summaries: TrialSummary[] = [];

    for (let trial = 0; trial < args.trials; trial++) {
        const seed = args.seed + trial;
        const map = grid.generateRandomGrid({
            rows: args.size,
            cols: args.size,
            density: args.density,
            seed,
        });
        const result = navigator.plan(map);

        summaries.push({
            trial,
            seed,
            success: result.success,
            strategy: result.metrics.strategy,
            partialReason: result.metrics.partialReason,
            waypoints: result.path.length,
            pathCost: metrics.pathCost(result.path),
            nodesExpanded: result.metrics.nodesExpanded,
            planningTimeMs: result.statistics.planningTimeMs,
        });

        if ((trial + 1) % 10 === 0 || trial === args.trials - 1) {
            console.log(`  Trial ${trial + 1}/${args.trials}`);
        }
    }

    return summaries;
}

// ==================== Main ====================

function main(): void {
    const args = parseArgs();

    console.log('╔════════════════════════════════════════════════╗');
    console.log('║        Random Grid Planning Benchmark          ║');
    console.log('╚════════════════════════════════════════════════╝');
    console.log(`\n ${args.size}x${args.size} cells, density ${args.density}, footprint ${args.footprint}, ${args.trials} trials`);

    const summaries = runTrials(args);
    if (summaries.length === 0) {
        console.log('\n No trials run.');
        return;
    }

    const reached = summaries.filter(s => s.success);
    const viaFallback = summaries.filter(s => s.strategy === 'fallback');

    console.log('\n Results:');
    console.log(`   Reached goal:   ${reached.length}/${summaries.length}`);
    console.log(`   Used fallback:  ${viaFallback.length}`);
    console.log(`   Avg time:       ${metrics.mean(summaries.map(s => s.planningTimeMs)).toFixed(3)} ms`);
    console.log(`   Avg expansions: ${metrics.mean(summaries.map(s => s.nodesExpanded)).toFixed(1)}`);
    if (reached.length > 0) {
        console.log(`   Avg path cost:  ${metrics.mean(reached.map(s => s.pathCost)).toFixed(3)}`);
    }

    if (args.output) {
        fs.mkdirSync(args.output, { recursive: true });
        const summaryPath = path.join(args.output, `random_${args.size}_${args.density}_${Date.now()}_summary.json`);
        fs.writeFileSync(summaryPath, JSON.stringify(summaries, null, 2));
        console.log(`\n Saved ${summaryPath}`);
    }
}

main();
