import { BackgroundPool } from "./background-pool";
import { MainExecutor } from "./main-executor";

let mainExecutor: MainExecutor | null = null;
let backgroundPool: BackgroundPool | null = null;

/** Process-wide main executor. Created on first use, never torn down. */
export function getMainExecutor(): MainExecutor {
    mainExecutor ??= new MainExecutor();
    return mainExecutor;
}

/** Process-wide background pool. Created on first use, never torn down. */
export function getBackgroundPool(): BackgroundPool {
    backgroundPool ??= new BackgroundPool();
    return backgroundPool;
}
