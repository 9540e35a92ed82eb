/**
 * @module core/logging
 * @description Structured logging for planning requests
 *
 * Provides console and in-memory loggers with fixed field schemas (versioned,
 * append-only). Stage-level, fallback and report-level entries are emitted by
 * the navigation pipeline.
 *
 * Browser-compatible: ConsoleLogger and MemoryLogger work in all environments.
 * Node.js only: use `src/core/logging-node` for the file-based logger.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Pipeline stage identifier
 */
export type PlanningStage = 'inflate' | 'field' | 'search' | 'descent';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Scenario or request label */
    scenario: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Stage completion entry
 */
export interface StageLogEntry extends BaseLogEntry {
    logType: 'stage';
    stage: PlanningStage;
    durationMs: number;
    details?: Record<string, number | string | boolean>;
}

/**
 * Emitted when the primary search fails and descent takes over
 */
export interface FallbackLogEntry extends BaseLogEntry {
    logType: 'fallback';
    trigger: 'frontier_exhausted' | 'iteration_limit';
    nodesExpanded: number;
    iterations: number;
}

/**
 * Final outcome of one planning request
 */
export interface ReportLogEntry extends BaseLogEntry {
    logType: 'report';
    success: boolean;
    strategy: 'primary' | 'fallback';
    waypoints: number;
    pathCost: number;
    nodesExpanded: number;
    planningTimeMs: number;
    partialReason?: 'dead_end' | 'cycle' | 'step_limit';
    configHash: string;
}

/**
 * Union of all log entry types
 */
export type LogEntry = StageLogEntry | FallbackLogEntry | ReportLogEntry;

type EntryInput<T extends LogEntry> = Omit<T, 'logType' | 'schemaVersion' | 'timestamp' | 'scenario'>;

export type StageLogInput = EntryInput<StageLogEntry>;
export type FallbackLogInput = EntryInput<FallbackLogEntry>;
export type ReportLogInput = EntryInput<ReportLogEntry>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log a completed pipeline stage */
    logStage(entry: StageLogInput): void;
    /** Log a switch from primary search to descent */
    logFallback(entry: FallbackLogInput): void;
    /** Log final report */
    logReport(entry: ReportLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Scenario or request label stamped on every entry */
    scenario: string;
    /** Schema version */
    schemaVersion?: string;
    /** Whether to keep stage-level entries (can be verbose) */
    logStages?: boolean;
    /** Buffer size before flushing (file loggers) */
    bufferSize?: number;
    /** Minimum level printed by console loggers */
    level?: LogLevel;
}

// ==================== Constants ====================

export const DEFAULT_SCHEMA_VERSION = '1.0.0';

// ==================== Console Logger (Browser-compatible) ====================

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * Console Logger: Print to console
 * Works in both browser and Node.js environments.
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(level: LogLevel = 'info') {
        this.level = level;
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    logStage(entry: StageLogInput): void {
        if (this.enabled('debug')) {
            console.log(`[STAGE] ${entry.stage}: ${entry.durationMs.toFixed(2)}ms`);
        }
    }

    logFallback(entry: FallbackLogInput): void {
        if (this.enabled('warn')) {
            console.warn(
                `[FALLBACK] A* ${entry.trigger.replace('_', ' ')} after ${entry.iterations} iterations, ` +
                `applying gradient descent`
            );
        }
    }

    logReport(entry: ReportLogInput): void {
        if (!this.enabled('info')) return;
        const outcome = entry.success
            ? `reached goal via ${entry.strategy}`
            : `stopped short (${entry.partialReason ?? 'unknown'})`;
        console.log(
            `[REPORT] ${outcome}: waypoints=${entry.waypoints}, ` +
            `cost=${entry.pathCost.toFixed(3)}, nodes=${entry.nodesExpanded}, ` +
            `time=${entry.planningTimeMs.toFixed(2)}ms`
        );
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger (Browser-compatible) ====================

/**
 * Memory Logger: Store logs in memory
 * Works in both browser and Node.js environments.
 * Useful for testing and for callers that post-process runs.
 */
export class MemoryLogger implements Logger {
    private config: { scenario: string; schemaVersion: string; logStages: boolean };
    public stages: StageLogEntry[] = [];
    public fallbacks: FallbackLogEntry[] = [];
    public reports: ReportLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = {
            scenario: config.scenario,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
            logStages: config.logStages ?? true,
        };
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            scenario: this.config.scenario,
            timestamp: Date.now(),
        };
    }

    logStage(entry: StageLogInput): void {
        if (!this.config.logStages) return;
        this.stages.push({
            ...this.createBaseEntry(),
            logType: 'stage',
            ...entry,
        });
    }

    logFallback(entry: FallbackLogInput): void {
        this.fallbacks.push({
            ...this.createBaseEntry(),
            logType: 'fallback',
            ...entry,
        });
    }

    logReport(entry: ReportLogInput): void {
        this.reports.push({
            ...this.createBaseEntry(),
            logType: 'report',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.stages, ...this.fallbacks, ...this.reports];
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.stages = [];
        this.fallbacks = [];
        this.reports = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger (Browser-compatible) ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logStage(entry: StageLogInput): void {
        for (const logger of this.loggers) {
            logger.logStage(entry);
        }
    }

    logFallback(entry: FallbackLogInput): void {
        for (const logger of this.loggers) {
            logger.logFallback(entry);
        }
    }

    logReport(entry: ReportLogInput): void {
        for (const logger of this.loggers) {
            logger.logReport(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format (browser-compatible)
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config.level ?? 'info');
        case 'memory':
            return new MemoryLogger(config);
    }
}
