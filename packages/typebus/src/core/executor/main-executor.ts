import { isPromise } from "es-toolkit";
import { createDefaultLogger, toError } from "../logger/helpers";
import type { LoggerContext } from "../logger/types";
import { MAIN_CONTEXT, runInContext } from "./context";
import type { Executor, Job, MainExecutorOptions } from "./types";

/**
 * The single designated "main" execution context.
 *
 * A serial FIFO drained on a later event-loop turn. `submit` never runs a job
 * inline, not even when called from a main job; jobs submitted while a batch
 * drains run on the next turn. Async jobs are started in order but not awaited;
 * the executor stays busy until they settle.
 */
export class MainExecutor implements Executor {
    private queue: Job[] = [];
    private scheduled = false;
    private inFlight = 0;
    private idleWaiters: Array<() => void> = [];
    private readonly logger: LoggerContext;

    constructor(options: MainExecutorOptions = {}) {
        this.logger = options.logger ?? createDefaultLogger();
    }

    /** Jobs waiting for the next drain. */
    get pending(): number {
        return this.queue.length;
    }

    get isIdle(): boolean {
        return this.queue.length === 0 && !this.scheduled && this.inFlight === 0;
    }

    submit(job: Job): void {
        this.queue.push(job);
        this.schedule();
    }

    idle(): Promise<void> {
        if (this.isIdle) return Promise.resolve();
        return new Promise((resolve) => {
            this.idleWaiters.push(resolve);
        });
    }

    private schedule(): void {
        if (this.scheduled) return;
        this.scheduled = true;
        setImmediate(() => this.drain());
    }

    private drain(): void {
        this.scheduled = false;
        const batch = this.queue;
        this.queue = [];
        for (const job of batch) {
            this.run(job);
        }

        if (this.queue.length > 0) {
            this.schedule();
            return;
        }
        if (this.isIdle) this.settle();
    }

    private run(job: Job): void {
        try {
            const result = runInContext(MAIN_CONTEXT, job);
            if (isPromise(result)) {
                this.inFlight++;
                result
                    .catch((err: unknown) => this.report(err))
                    .finally(() => {
                        this.inFlight--;
                        if (this.isIdle) this.settle();
                    });
            }
        } catch (err) {
            this.report(err);
        }
    }

    private report(err: unknown): void {
        this.logger.error("executor", "main job failed", { error: toError(err).message });
    }

    private settle(): void {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) {
            resolve();
        }
    }
}
