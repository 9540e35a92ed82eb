/**
 * @module core/logging-node
 * @description File-based logger (Node.js only)
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    DEFAULT_SCHEMA_VERSION,
    type BaseLogEntry,
    type FallbackLogInput,
    type LogEntry,
    type Logger,
    type LoggerConfig,
    type ReportLogInput,
    type StageLogInput,
} from './logging';

/**
 * JSONL Logger: one JSON object per line, appended to a file
 */
export class JsonlLogger implements Logger {
    private readonly filePath: string;
    private readonly config: { scenario: string; schemaVersion: string; logStages: boolean; bufferSize: number };
    private buffer: string[] = [];
    private closed = false;

    constructor(filePath: string, config: LoggerConfig) {
        this.filePath = filePath;
        this.config = {
            scenario: config.scenario,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
            logStages: config.logStages ?? false,
            bufferSize: config.bufferSize ?? 32,
        };
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            scenario: this.config.scenario,
            timestamp: Date.now(),
        };
    }

    private write(entry: LogEntry): void {
        if (this.closed) {
            throw new Error(`JsonlLogger for ${this.filePath} is closed`);
        }
        this.buffer.push(JSON.stringify(entry));
        if (this.buffer.length >= this.config.bufferSize) {
            this.flush();
        }
    }

    logStage(entry: StageLogInput): void {
        if (!this.config.logStages) return;
        this.write({ ...this.createBaseEntry(), logType: 'stage', ...entry });
    }

    logFallback(entry: FallbackLogInput): void {
        this.write({ ...this.createBaseEntry(), logType: 'fallback', ...entry });
    }

    logReport(entry: ReportLogInput): void {
        this.write({ ...this.createBaseEntry(), logType: 'report', ...entry });
    }

    flush(): void {
        if (this.buffer.length === 0) return;
        fs.appendFileSync(this.filePath, this.buffer.join('\n') + '\n', 'utf-8');
        this.buffer = [];
    }

    close(): void {
        if (this.closed) return;
        this.flush();
        this.closed = true;
    }
}

/**
 * Create a JSONL file logger
 */
export function createJsonlLogger(filePath: string, config: LoggerConfig): JsonlLogger {
    return new JsonlLogger(filePath, config);
}
