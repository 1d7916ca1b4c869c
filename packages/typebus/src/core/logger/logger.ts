import { LOG_LEVEL_RANK } from "./levels";
import type { LogEntry, LoggerContext, LoggerOptions, LogHandler, LogLevel } from "./types";

export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();
    private threshold: LogLevel;

    constructor(options: LoggerOptions = {}) {
        this.threshold = options.level ?? "debug";
        for (const handler of options.handlers ?? []) {
            this.handlers.add(handler);
        }
    }

    get level(): LogLevel {
        return this.threshold;
    }

    setLevel(level: LogLevel): void {
        this.threshold = level;
    }

    isEnabled(level: LogLevel): boolean {
        return LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[this.threshold];
    }

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void {
        if (this.handlers.size === 0 || !this.isEnabled(level)) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}
