import { createConsoleHandler } from "../core/logger/console-handler";
import { isLogLevel } from "../core/logger/levels";
import { Logger } from "../core/logger/logger";
import type { LogHandler } from "../core/logger/types";
import type { BusConfig, DefineBusConfigInput, LoggerInput } from "./types";

export const DEFAULT_BUS_NAME = "bus";

export function defineBusConfig(input: DefineBusConfigInput = {}): BusConfig {
    const name = input.name ?? DEFAULT_BUS_NAME;
    if (name.trim().length === 0) {
        throw new Error("[typebus] defineBusConfig: name must be a non-empty string");
    }

    return {
        name,
        logger: resolveLogger(input.logger),
        mainExecutor: input.mainExecutor,
        backgroundPool: input.backgroundPool,
        onHandlerError: input.onHandlerError,
    } as BusConfig;
}

function resolveLogger(input: Logger | LoggerInput | undefined): Logger {
    if (input instanceof Logger) return input;

    const level = input?.level ?? "warn";
    if (!isLogLevel(level)) {
        throw new Error(`[typebus] defineBusConfig: unknown log level "${String(level)}"`);
    }

    const handlers: LogHandler[] = [];
    if (input?.console !== false) handlers.push(createConsoleHandler());
    handlers.push(...(input?.handlers ?? []));
    return new Logger({ level, handlers });
}
