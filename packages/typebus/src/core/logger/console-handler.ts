import type { LogEntry, LogHandler, LogLevel } from "./types";

const KEY = "\x1b[36m";
const STRING = "\x1b[32m";
const NUMBER = "\x1b[33m";
const DIM = "\x1b[90m";
const RESET = "\x1b[0m";

const WRITERS: Record<LogLevel, (line: string) => void> = {
    debug: (line) => console.log(line),
    warn: (line) => console.warn(line),
    error: (line) => console.error(line),
};

// Bus and executor details are flat: names, ids, counts and error messages.
function formatValue(value: unknown): string {
    if (typeof value === "string") return `${STRING}"${value}"${RESET}`;
    if (typeof value === "number" || typeof value === "boolean") return `${NUMBER}${String(value)}${RESET}`;
    return `${DIM}${String(value)}${RESET}`;
}

function formatDetails(details: Record<string, unknown>): string {
    const pairs = Object.entries(details).map(([key, value]) => `${KEY}${key}${RESET}=${formatValue(value)}`);
    return pairs.length === 0 ? "" : ` { ${pairs.join(" ")} }`;
}

/** Format entries as `HH:MM:SS [tag] code → message { key=value }` and route them by level. */
export function createConsoleHandler(): LogHandler {
    return (entry: LogEntry) => {
        const time = new Date(entry.timestamp).toTimeString().slice(0, 8);
        const tag = entry.level === "debug" ? "typebus" : entry.level;
        const details = entry.details ? formatDetails(entry.details) : "";
        WRITERS[entry.level](`${time} [${tag}] ${entry.code} → ${entry.message}${details}`);
    };
}
