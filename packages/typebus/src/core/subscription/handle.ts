import type { SubscriptionGroup } from "./group";
import type { RegistrationId, RegistrationSink } from "./types";

/**
 * Cancellable token for exactly one registration.
 *
 * Discarding a handle does not cancel anything: the registration stays live
 * until `cancel()` is called or its bus is destroyed.
 */
export class SubscriptionHandle {
    private readonly sink: WeakRef<RegistrationSink> | null;
    private _cancelled = false;

    constructor(
        readonly id: RegistrationId,
        sink: RegistrationSink | null,
    ) {
        this.sink = sink ? new WeakRef(sink) : null;
    }

    /** True once cancelled, or once the registration is gone for any other reason. */
    get cancelled(): boolean {
        if (this._cancelled) return true;
        return !this.sink?.deref()?.has(this.id);
    }

    /** Remove the registration. Idempotent; never throws. */
    cancel(): void {
        if (this._cancelled) return;
        this._cancelled = true;
        this.sink?.deref()?.remove(this.id);
    }

    /** Store this handle in `group` and return it, for chaining off `subscribe`. */
    addTo(group: SubscriptionGroup): this {
        group.add(this);
        return this;
    }
}
