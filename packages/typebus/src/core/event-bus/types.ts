import type { Job } from "../executor/types";
import type { TypeFilter } from "../event-type/types";
import type { RegistrationId } from "../subscription/types";
import type { ThreadTarget } from "../thread-target/types";

/**
 * One stored subscription. `filter`, `target` and the matcher inside `prepare`
 * are fixed at creation; only `active` ever changes, and only to false.
 */
export interface Registration {
    readonly id: RegistrationId;
    readonly filter: TypeFilter;
    readonly target: ThreadTarget;
    /** Bind the handler to `event` when it matches, otherwise `null`. */
    readonly prepare: (event: unknown) => Job | null;
    active: boolean;
}

export type HandlerFailure = {
    bus: string;
    registrationId: RegistrationId;
    filter: TypeFilter;
    target: ThreadTarget;
    event: unknown;
    error: Error;
};

/** Diagnostic hook for handler failures. Delivery to other handlers continues either way. */
export type HandlerErrorHook = (failure: HandlerFailure) => void;
