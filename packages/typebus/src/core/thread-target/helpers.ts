import { BackgroundPriority, ThreadKind } from "./enums";
import type { BackgroundThreadTarget, CurrentThreadTarget, MainThreadTarget, ThreadTarget } from "./types";

const PRIORITIES = new Set<string>(Object.values(BackgroundPriority));

const CURRENT: CurrentThreadTarget = Object.freeze({ kind: ThreadKind.Current });
const MAIN: MainThreadTarget = Object.freeze({ kind: ThreadKind.Main });

/** Run inline, on the stack that called `post`. */
export function currentThread(): CurrentThreadTarget {
    return CURRENT;
}

/** Run on the bus's main executor, after `post` returns. */
export function mainThread(): MainThreadTarget {
    return MAIN;
}

/** Run on the background pool, queued under the given priority class. Throws on an unknown priority. */
export function backgroundThread(priority: BackgroundPriority = BackgroundPriority.Default): BackgroundThreadTarget {
    if (!PRIORITIES.has(priority)) {
        throw new Error(`[typebus] backgroundThread: unknown priority "${String(priority)}"`);
    }
    return Object.freeze({ kind: ThreadKind.Background, priority });
}

export function describeThreadTarget(target: ThreadTarget): string {
    if (target.kind === ThreadKind.Background) return `background(${target.priority})`;
    return target.kind;
}
