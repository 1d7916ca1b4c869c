import { createConsoleHandler } from "./console-handler";
import { Logger } from "./logger";
import type { LogLevel } from "./types";

/** Logger wired to the console, as the library builds it when nothing else is configured. */
export function createDefaultLogger(level: LogLevel = "warn"): Logger {
    return new Logger({ level, handlers: [createConsoleHandler()] });
}

/** Normalise anything thrown into an `Error`. */
export function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}
