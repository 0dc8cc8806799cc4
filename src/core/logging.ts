/**
 * @module core/logging
 * @description Structured logging for stacked environments
 *
 * Loggers receive versioned records with a fixed field schema: one entry per
 * macro-step and one per finished episode, plus free-form debug messages.
 * ConsoleLogger and MemoryLogger work in every JS runtime.
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
    /** Task identifier */
    task: string;
    /** Seed passed to the last reset (0 when none was given) */
    seed: number;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * One macro-step of a stacked environment
 */
export interface MacroStepLogEntry extends BaseLogEntry {
    logType: 'step';
    episode: number;
    /** Macro-step index within the episode, starting at 1 */
    step: number;
    /** Inner environment steps executed by this macro-step */
    innerSteps: number;
    reward: number;
    done: boolean;
    /** The macro-step began with a termination already recorded */
    latched: boolean;
}

/**
 * Episode-level summary log entry
 */
export interface EpisodeLogEntry extends BaseLogEntry {
    logType: 'episode';
    episode: number;
    macroSteps: number;
    innerSteps: number;
    totalReward: number;
    avgReward: number;
    /** Episode ended because maxEpisodeSteps was reached */
    hitStepLimit: boolean;
}

export interface DebugLogEntry extends BaseLogEntry {
    logType: 'debug';
    message: string;
    data?: Record<string, unknown>;
}

/**
 * Union of all log entry types
 */
export type LogEntry = MacroStepLogEntry | EpisodeLogEntry | DebugLogEntry;

type EntryInput<T extends LogEntry> = Omit<T, 'logType' | 'schemaVersion' | 'timestamp'>;

export type MacroStepLogInput = EntryInput<MacroStepLogEntry>;
export type EpisodeLogInput = EntryInput<EpisodeLogEntry>;
export type DebugLogInput = EntryInput<DebugLogEntry>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log a macro-step */
    logStep(entry: MacroStepLogInput): void;
    /** Log episode summary */
    logEpisode(entry: EpisodeLogInput): void;
    /** Log a diagnostic message */
    debug(entry: DebugLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Console verbosity */
    level?: LogLevel;
    /** Schema version */
    schemaVersion?: string;
}

// ==================== Constants ====================

export const DEFAULT_SCHEMA_VERSION = '1.0.0';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console (for debugging)
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        this.level = typeof levelOrConfig === 'string'
            ? levelOrConfig
            : levelOrConfig.level ?? 'info';
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    logStep(entry: MacroStepLogInput): void {
        if (this.enabled('debug')) {
            console.log(
                `[STEP] E${entry.episode} S${entry.step}: inner=${entry.innerSteps}, ` +
                `reward=${entry.reward.toFixed(3)}, done=${entry.done}` +
                (entry.latched ? ' (latched)' : '')
            );
        }
    }

    logEpisode(entry: EpisodeLogInput): void {
        if (this.enabled('info')) {
            console.log(
                `[EPISODE] E${entry.episode}: steps=${entry.macroSteps}, inner=${entry.innerSteps}, ` +
                `reward=${entry.totalReward.toFixed(3)}` +
                (entry.hitStepLimit ? ', step limit reached' : '')
            );
        }
    }

    debug(entry: DebugLogInput): void {
        if (this.enabled('debug')) {
            console.debug(`[DEBUG] ${entry.task}: ${entry.message}`, entry.data ?? '');
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for inspecting a run afterwards.
 */
export class MemoryLogger implements Logger {
    private schemaVersion: string;
    public steps: MacroStepLogEntry[] = [];
    public episodes: EpisodeLogEntry[] = [];
    public messages: DebugLogEntry[] = [];
    public closed = false;

    constructor(config: LoggerConfig = {}) {
        this.schemaVersion = config.schemaVersion ?? DEFAULT_SCHEMA_VERSION;
    }

    private stamp(): Pick<BaseLogEntry, 'schemaVersion' | 'timestamp'> {
        return {
            schemaVersion: this.schemaVersion,
            timestamp: Date.now(),
        };
    }

    logStep(entry: MacroStepLogInput): void {
        this.steps.push({ ...this.stamp(), logType: 'step', ...entry });
    }

    logEpisode(entry: EpisodeLogInput): void {
        this.episodes.push({ ...this.stamp(), logType: 'episode', ...entry });
    }

    debug(entry: DebugLogInput): void {
        this.messages.push({ ...this.stamp(), logType: 'debug', ...entry });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.steps, ...this.episodes, ...this.messages];
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.steps = [];
        this.episodes = [];
        this.messages = [];
    }

    flush(): void { /* no-op for memory logger */ }

    close(): void {
        this.closed = true;
    }
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

    logStep(entry: MacroStepLogInput): void {
        for (const logger of this.loggers) {
            logger.logStep(entry);
        }
    }

    logEpisode(entry: EpisodeLogInput): void {
        for (const logger of this.loggers) {
            logger.logEpisode(entry);
        }
    }

    debug(entry: DebugLogInput): void {
        for (const logger of this.loggers) {
            logger.debug(entry);
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
