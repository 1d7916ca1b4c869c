import type { SubscriptionHandle } from "./handle";

/**
 * Handles scoped to one owner, cancelled together when the scope ends.
 *
 * Lifecycle layers (a mounted view, a request, a plugin) collect their handles
 * here and call `cancelAll()` on teardown. The group stays usable afterwards.
 */
export class SubscriptionGroup {
    private handles: Set<SubscriptionHandle> = new Set();

    get size(): number {
        return this.handles.size;
    }

    /** Add a live handle. Already-cancelled handles are ignored, and stored ones that were cancelled since are dropped. */
    add(handle: SubscriptionHandle): void {
        this.prune();
        if (handle.cancelled) return;
        this.handles.add(handle);
    }

    has(handle: SubscriptionHandle): boolean {
        return this.handles.has(handle);
    }

    /** Cancel every stored handle in one pass and empty the group. */
    cancelAll(): void {
        const handles = this.handles;
        this.handles = new Set();
        for (const handle of handles) {
            handle.cancel();
        }
    }

    private prune(): void {
        for (const handle of this.handles) {
            if (handle.cancelled) this.handles.delete(handle);
        }
    }
}
