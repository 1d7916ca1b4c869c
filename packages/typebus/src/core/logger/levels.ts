import type { LogLevel } from "./types";

export const LOG_LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
    debug: 0,
    warn: 1,
    error: 2,
});

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LOG_LEVEL_RANK, value);
}
