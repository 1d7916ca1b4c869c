import { AsyncLocalStorage } from "node:async_hooks";
import { BackgroundPriority, ThreadKind } from "../thread-target/enums";
import type { BackgroundContext, ExecutionContext, MainContext } from "./types";

const storage = new AsyncLocalStorage<ExecutionContext>();

export const MAIN_CONTEXT: MainContext = Object.freeze({ kind: ThreadKind.Main });

const BACKGROUND_CONTEXTS: Readonly<Record<BackgroundPriority, BackgroundContext>> = Object.freeze({
    [BackgroundPriority.High]: Object.freeze({ kind: ThreadKind.Background, priority: BackgroundPriority.High }),
    [BackgroundPriority.Default]: Object.freeze({ kind: ThreadKind.Background, priority: BackgroundPriority.Default }),
    [BackgroundPriority.Low]: Object.freeze({ kind: ThreadKind.Background, priority: BackgroundPriority.Low }),
});

export function backgroundContext(priority: BackgroundPriority): BackgroundContext {
    return BACKGROUND_CONTEXTS[priority];
}

/** Run `fn` with `context` as the current execution context, including its async continuations. */
export function runInContext<R>(context: ExecutionContext, fn: () => R): R {
    return storage.run(context, fn);
}

/** The managed context the caller runs in, or `undefined` outside main and background jobs. */
export function currentExecutionContext(): ExecutionContext | undefined {
    return storage.getStore();
}

export function isMainContext(): boolean {
    return storage.getStore()?.kind === ThreadKind.Main;
}
