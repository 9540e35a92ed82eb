/**
 * Structured Logging Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
    ConsoleLogger,
    DEFAULT_SCHEMA_VERSION,
    MemoryLogger,
    MultiLogger,
    createLogger,
    type ReportLogInput,
} from '../src/core/logging';
import { JsonlLogger, createJsonlLogger } from '../src/core/logging-node';

const REPORT: ReportLogInput = {
    success: false,
    strategy: 'fallback',
    waypoints: 12,
    pathCost: 11.5,
    nodesExpanded: 10,
    planningTimeMs: 0.75,
    partialReason: 'cycle',
    configHash: 'test-hash',
};

describe('MemoryLogger', () => {
    it('stamps entries with the base fields', () => {
        const logger = new MemoryLogger({ scenario: 'unit' });
        logger.logReport(REPORT);
        expect(logger.reports[0]).toMatchObject({
            ...REPORT,
            logType: 'report',
            scenario: 'unit',
            schemaVersion: DEFAULT_SCHEMA_VERSION,
        });
        expect(typeof logger.reports[0].timestamp).toBe('number');
    });

    it('keeps stage entries unless disabled', () => {
        const verbose = new MemoryLogger({ scenario: 'unit' });
        verbose.logStage({ stage: 'inflate', durationMs: 0.1 });
        expect(verbose.stages).toHaveLength(1);

        const quiet = new MemoryLogger({ scenario: 'unit', logStages: false });
        quiet.logStage({ stage: 'inflate', durationMs: 0.1 });
        expect(quiet.stages).toHaveLength(0);
    });

    it('exports JSONL and clears', () => {
        const logger = new MemoryLogger({ scenario: 'unit', schemaVersion: '2.0.0' });
        logger.logStage({ stage: 'field', durationMs: 1 });
        logger.logFallback({ trigger: 'iteration_limit', nodesExpanded: 3, iterations: 4 });
        logger.logReport(REPORT);

        const lines = logger.toJSONL().split('\n');
        expect(lines).toHaveLength(3);
        expect(lines.map(line => JSON.parse(line).logType)).toEqual(['stage', 'fallback', 'report']);
        expect(JSON.parse(lines[1]).schemaVersion).toBe('2.0.0');

        logger.clear();
        expect(logger.getAllLogs()).toEqual([]);
    });
});

describe('MultiLogger', () => {
    it('forwards every entry to each logger', () => {
        const a = new MemoryLogger({ scenario: 'a' });
        const b = new MemoryLogger({ scenario: 'b' });
        const multi = new MultiLogger([a, b]);

        multi.logStage({ stage: 'search', durationMs: 2 });
        multi.logFallback({ trigger: 'frontier_exhausted', nodesExpanded: 1, iterations: 1 });
        multi.logReport(REPORT);
        multi.flush();
        multi.close();

        for (const logger of [a, b]) {
            expect(logger.stages).toHaveLength(1);
            expect(logger.fallbacks).toHaveLength(1);
            expect(logger.reports).toHaveLength(1);
        }
        expect(b.reports[0].scenario).toBe('b');
    });
});

describe('ConsoleLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('prints reports at info level and hides stages', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const logger = new ConsoleLogger('info');
        logger.logStage({ stage: 'inflate', durationMs: 1 });
        logger.logReport(REPORT);

        expect(log).toHaveBeenCalledTimes(1);
        expect(log).toHaveBeenCalledWith(
            '[REPORT] stopped short (cycle): waypoints=12, cost=11.500, nodes=10, time=0.75ms'
        );
    });

    it('prints stages at debug level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        new ConsoleLogger('debug').logStage({ stage: 'field', durationMs: 1.234 });
        expect(log).toHaveBeenCalledWith('[STAGE] field: 1.23ms');
    });

    it('warns on fallback and stays silent above warn', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const fallback = { trigger: 'iteration_limit' as const, nodesExpanded: 5, iterations: 100 };

        new ConsoleLogger('warn').logFallback(fallback);
        expect(warn).toHaveBeenCalledWith(
            '[FALLBACK] A* iteration limit after 100 iterations, applying gradient descent'
        );

        new ConsoleLogger('error').logFallback(fallback);
        expect(warn).toHaveBeenCalledTimes(1);
    });
});

describe('createLogger', () => {
    it('builds console and memory loggers', () => {
        expect(createLogger('console', { scenario: 'x' })).toBeInstanceOf(ConsoleLogger);
        expect(createLogger('memory', { scenario: 'x' })).toBeInstanceOf(MemoryLogger);
    });
});

describe('JsonlLogger', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gridfield-log-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('buffers entries and appends them on flush', () => {
        const file = path.join(tmpDir, 'nested', 'run.jsonl');
        const logger = new JsonlLogger(file, { scenario: 'file' });

        logger.logStage({ stage: 'inflate', durationMs: 1 });
        logger.logReport(REPORT);
        expect(fs.existsSync(file)).toBe(false);

        logger.flush();
        const lines = fs.readFileSync(file, 'utf-8').trim().split('\n');
        expect(lines).toHaveLength(1);
        expect(JSON.parse(lines[0])).toMatchObject({ logType: 'report', scenario: 'file', waypoints: 12 });
        logger.close();
    });

    it('flushes when the buffer fills and on close', () => {
        const file = path.join(tmpDir, 'run.jsonl');
        const logger = createJsonlLogger(file, { scenario: 'file', bufferSize: 2, logStages: true });

        logger.logStage({ stage: 'inflate', durationMs: 1 });
        logger.logStage({ stage: 'field', durationMs: 2 });
        expect(fs.readFileSync(file, 'utf-8').trim().split('\n')).toHaveLength(2);

        logger.logReport(REPORT);
        logger.close();
        expect(fs.readFileSync(file, 'utf-8').trim().split('\n')).toHaveLength(3);
    });

    it('refuses writes after close', () => {
        const logger = new JsonlLogger(path.join(tmpDir, 'closed.jsonl'), { scenario: 'file' });
        logger.close();
        expect(() => logger.logReport(REPORT)).toThrow('is closed');
    });
});
