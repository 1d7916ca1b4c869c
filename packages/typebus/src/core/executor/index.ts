export { BackgroundPool } from "./background-pool";
export { backgroundContext, currentExecutionContext, isMainContext, MAIN_CONTEXT, runInContext } from "./context";
export { MainExecutor } from "./main-executor";
export { getBackgroundPool, getMainExecutor } from "./shared";
export type {
    BackgroundContext,
    BackgroundPoolOptions,
    BackgroundPoolStatus,
    ExecutionContext,
    Executor,
    Job,
    MainContext,
    MainExecutorOptions,
} from "./types";
