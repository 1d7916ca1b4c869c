import type { HandlerErrorHook } from "../core/event-bus/types";
import type { BackgroundPool } from "../core/executor/background-pool";
import type { Executor } from "../core/executor/types";
import type { Logger } from "../core/logger/logger";
import type { LogHandler, LogLevel } from "../core/logger/types";

// ── Brand symbol (type-level only) ─────────────────────────────────

declare const BUS_CONFIG_BRAND: unique symbol;

// ── Branded definition type ────────────────────────────────────────

export interface BusConfig {
    readonly [BUS_CONFIG_BRAND]: true;
    readonly name: string;
    readonly logger: Logger;
    readonly mainExecutor?: Executor;
    readonly backgroundPool?: BackgroundPool;
    readonly onHandlerError?: HandlerErrorHook;
}

// ── Input type (what users pass to defineBusConfig) ────────────────

export interface LoggerInput {
    /** Defaults to `"warn"`. */
    level?: LogLevel;
    handlers?: readonly LogHandler[];
    /** Attach the console handler. Defaults to true. */
    console?: boolean;
}

export interface DefineBusConfigInput {
    name?: string;
    /** A ready logger, or options to build one. */
    logger?: Logger | LoggerInput;
    /** Defaults to the process-wide main executor. */
    mainExecutor?: Executor;
    /** Defaults to the process-wide background pool. */
    backgroundPool?: BackgroundPool;
    onHandlerError?: HandlerErrorHook;
}
