import { noop } from "es-toolkit";
import { createDefaultLogger, toError } from "../logger/helpers";
import type { LoggerContext } from "../logger/types";
import { BackgroundPriority } from "../thread-target/enums";
import { backgroundContext, runInContext } from "./context";
import type { BackgroundPoolOptions, BackgroundPoolStatus, Executor, Job } from "./types";

const DEFAULT_CONCURRENCY = 4;

/** Dequeue order: every high job before any default job, every default job before any low job. */
const PRIORITY_ORDER: readonly BackgroundPriority[] = [
    BackgroundPriority.High,
    BackgroundPriority.Default,
    BackgroundPriority.Low,
];

type QueuedJob = {
    job: Job;
    priority: BackgroundPriority;
};

/**
 * Shared pool for background handler invocations.
 *
 * One FIFO per priority class, at most `concurrency` jobs in flight. Jobs are
 * picked on a later event-loop turn, never inside `submit`, and each runs in a
 * background execution context tagged with its priority.
 */
export class BackgroundPool implements Executor {
    readonly concurrency: number;
    private readonly queues: Record<BackgroundPriority, Job[]> = {
        [BackgroundPriority.High]: [],
        [BackgroundPriority.Default]: [],
        [BackgroundPriority.Low]: [],
    };
    private running = 0;
    private pumpScheduled = false;
    private idleWaiters: Array<() => void> = [];
    private readonly logger: LoggerContext;

    constructor(options: BackgroundPoolOptions = {}) {
        const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new Error("[typebus] BackgroundPool: concurrency must be a positive integer");
        }
        this.concurrency = concurrency;
        this.logger = options.logger ?? createDefaultLogger();
    }

    get isIdle(): boolean {
        return this.running === 0 && !this.pumpScheduled && this.queuedCount() === 0;
    }

    submit(job: Job, priority: BackgroundPriority = BackgroundPriority.Default): void {
        this.queues[priority].push(job);
        this.schedulePump();
    }

    status(): BackgroundPoolStatus {
        return {
            concurrency: this.concurrency,
            running: this.running,
            queued: {
                [BackgroundPriority.High]: this.queues[BackgroundPriority.High].length,
                [BackgroundPriority.Default]: this.queues[BackgroundPriority.Default].length,
                [BackgroundPriority.Low]: this.queues[BackgroundPriority.Low].length,
            },
        };
    }

    idle(): Promise<void> {
        if (this.isIdle) return Promise.resolve();
        return new Promise((resolve) => {
            this.idleWaiters.push(resolve);
        });
    }

    // ── Private: Scheduling ─────────────────────────────────────────────

    private schedulePump(): void {
        if (this.pumpScheduled) return;
        this.pumpScheduled = true;
        setImmediate(() => {
            this.pumpScheduled = false;
            this.pump();
        });
    }

    private pump(): void {
        while (this.running < this.concurrency) {
            const next = this.dequeue();
            if (!next) break;
            this.running++;
            this.execute(next).catch(noop);
        }
        if (this.isIdle) this.settle();
    }

    private dequeue(): QueuedJob | undefined {
        for (const priority of PRIORITY_ORDER) {
            const job = this.queues[priority].shift();
            if (job) return { job, priority };
        }
        return undefined;
    }

    private queuedCount(): number {
        return PRIORITY_ORDER.reduce((sum, priority) => sum + this.queues[priority].length, 0);
    }

    // ── Private: Execution ──────────────────────────────────────────────

    private async execute(entry: QueuedJob): Promise<void> {
        try {
            await runInContext(backgroundContext(entry.priority), entry.job);
        } catch (err) {
            this.logger.error("executor", "background job failed", {
                priority: entry.priority,
                error: toError(err).message,
            });
        } finally {
            this.running--;
            this.schedulePump();
        }
    }

    private settle(): void {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) {
            resolve();
        }
    }
}
