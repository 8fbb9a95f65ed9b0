/**
 * @module core/logging
 * @description Structured logging for root searches
 *
 * Loggers receive one entry per evaluated iteration and one summary entry per
 * finished search. They are optional: a finder without loggers performs no I/O.
 *
 * This is independent of the per-finder `ConvergenceLog`, which is the
 * retrievable diagnostic trace of the most recent search.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Root finding method that produced the entry */
    method: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Iteration-level log entry
 */
export interface IterationLogEntry extends BaseLogEntry {
    logType: 'iteration';
    iteration: number;
    x: number[];
    fx: number[];
}

/**
 * Search-level summary log entry
 */
export interface SearchLogEntry extends BaseLogEntry {
    logType: 'search';
    ok: boolean;
    iterations: number;
    root?: number;
    errorCode?: string;
    message?: string;
}

/**
 * Union of all log entry types
 */
export type LogEntry = IterationLogEntry | SearchLogEntry;

type IterationInput = Omit<IterationLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>;
type SearchInput = Omit<SearchLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log one evaluated iteration */
    logIteration(entry: IterationInput): void;
    /** Log the outcome of a finished search */
    logSearch(entry: SearchInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Minimum level printed by console loggers */
    level?: LogLevel;
    /** Schema version */
    schemaVersion?: string;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console (for debugging)
 *
 * Iterations print at `debug`, successful searches at `info` and failed
 * searches at `warn`.
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
        } else {
            this.level = levelOrConfig.level ?? 'info';
        }
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    logIteration(entry: IterationInput): void {
        if (this.enabled('debug')) {
            console.log(
                `[ITERATION] ${entry.method} #${entry.iteration}: ` +
                `x=[${entry.x.join(', ')}] fx=[${entry.fx.join(', ')}]`
            );
        }
    }

    logSearch(entry: SearchInput): void {
        if (entry.ok) {
            if (this.enabled('info')) {
                console.log(
                    `[SEARCH] ${entry.method}: root=${entry.root} after ${entry.iterations} iterations`
                );
            }
        } else if (this.enabled('warn')) {
            console.log(
                `[SEARCH] ${entry.method}: failed (${entry.errorCode}) after ${entry.iterations} iterations: ${entry.message}`
            );
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for shipping traces elsewhere.
 */
export class MemoryLogger implements Logger {
    private schemaVersion: string;
    public iterations: IterationLogEntry[] = [];
    public searches: SearchLogEntry[] = [];

    constructor(config: LoggerConfig = {}) {
        this.schemaVersion = config.schemaVersion ?? DEFAULT_SCHEMA_VERSION;
    }

    logIteration(entry: IterationInput): void {
        this.iterations.push({
            schemaVersion: this.schemaVersion,
            timestamp: Date.now(),
            logType: 'iteration',
            ...entry,
        });
    }

    logSearch(entry: SearchInput): void {
        this.searches.push({
            schemaVersion: this.schemaVersion,
            timestamp: Date.now(),
            logType: 'search',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.iterations, ...this.searches];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            iterations: this.iterations,
            searches: this.searches,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.iterations = [];
        this.searches = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logIteration(entry: IterationInput): void {
        for (const logger of this.loggers) {
            logger.logIteration(entry);
        }
    }

    logSearch(entry: SearchInput): void {
        for (const logger of this.loggers) {
            logger.logSearch(entry);
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
 * Create a logger based on format
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig = {}
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
