import type { BackgroundPriority, ThreadKind } from "../thread-target/enums";
import type { LoggerContext } from "../logger/types";

/** A unit of work handed to an executor. An async job holds its slot until it settles. */
export type Job = () => void | Promise<void>;

export type MainContext = { readonly kind: ThreadKind.Main };

export type BackgroundContext = {
    readonly kind: ThreadKind.Background;
    readonly priority: BackgroundPriority;
};

/** The managed context a piece of code is running in. Code on a caller's own stack has none. */
export type ExecutionContext = MainContext | BackgroundContext;

export interface Executor {
    submit(job: Job): void;
    /** Resolves once nothing is queued or running. */
    idle(): Promise<void>;
    readonly isIdle: boolean;
}

export type MainExecutorOptions = {
    logger?: LoggerContext;
};

export type BackgroundPoolOptions = {
    /** Jobs allowed to run at once. Defaults to 4. */
    concurrency?: number;
    logger?: LoggerContext;
};

export interface BackgroundPoolStatus {
    concurrency: number;
    running: number;
    queued: Record<BackgroundPriority, number>;
}
