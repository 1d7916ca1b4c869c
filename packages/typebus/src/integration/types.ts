import type { EventBus } from "../core/event-bus/event-bus";
import type { SubscriptionHandle } from "../core/subscription/handle";

/** A subscription waiting for a bus. Built with {@link binding}; type-erased so specs of different events mix. */
export interface BindingSpec {
    subscribe(bus: EventBus): SubscriptionHandle;
}
