import { BusState } from "../core/event-bus/enums";
import type { EventBus } from "../core/event-bus/event-bus";
import type { EventHandler, EventOf, TypeFilter } from "../core/event-type/types";
import { StateMachine } from "../core/state-machine/state-machine";
import { SubscriptionGroup } from "../core/subscription/group";
import type { ThreadTarget } from "../core/thread-target/types";
import { BindingState } from "./enums";
import type { BindingSpec } from "./types";

const BINDING_TRANSITIONS: Record<BindingState, BindingState[]> = {
    [BindingState.DETACHED]: [BindingState.ATTACHED, BindingState.DISPOSED],
    [BindingState.ATTACHED]: [BindingState.DETACHED, BindingState.DISPOSED],
    [BindingState.DISPOSED]: [],
};

/** Describe one subscription for a {@link LifecycleBinding}. */
export function binding<F extends TypeFilter>(
    filter: F,
    target: ThreadTarget,
    handler: EventHandler<EventOf<F>>,
): BindingSpec {
    return {
        subscribe: (bus) => bus.subscribe(filter, target, handler),
    };
}

/**
 * Subscribe on attach, cancel on detach.
 *
 * The shape a UI lifecycle hook needs: call `attach()` when the owner mounts
 * and `detach()` when it unmounts. Attaching twice is a no-op; re-attaching
 * after a detach subscribes afresh. While attached the binding follows the
 * bus and is disposed when the bus is destroyed; a detached binding holds
 * nothing on the bus. `dispose()` detaches it for good.
 */
export class LifecycleBinding {
    readonly state: StateMachine<BindingState>;
    private readonly group = new SubscriptionGroup();
    private offBusTransition: (() => void) | null = null;

    constructor(
        private readonly bus: EventBus,
        private readonly specs: readonly BindingSpec[],
    ) {
        this.state = new StateMachine<BindingState>({
            transitions: BINDING_TRANSITIONS,
            initial: BindingState.DETACHED,
            name: `LifecycleBinding(${bus.name})`,
        });
    }

    get attached(): boolean {
        return this.state.is(BindingState.ATTACHED);
    }

    /** Live subscriptions held by this binding. */
    get size(): number {
        return this.group.size;
    }

    /** Subscribe every spec. Attaching to a destroyed bus disposes the binding instead. */
    attach(): void {
        if (!this.state.is(BindingState.DETACHED)) return;
        if (this.bus.state.is(BusState.DESTROYED)) {
            this.dispose();
            return;
        }
        for (const spec of this.specs) {
            spec.subscribe(this.bus).addTo(this.group);
        }
        this.offBusTransition = this.bus.state.onTransition((_from, to) => {
            if (to === BusState.DESTROYED) this.dispose();
        });
        this.state.transition(BindingState.ATTACHED);
    }

    detach(): void {
        if (!this.state.is(BindingState.ATTACHED)) return;
        this.release();
        this.state.transition(BindingState.DETACHED);
    }

    /** Detach and refuse later `attach()` calls. Idempotent. */
    dispose(): void {
        if (this.state.is(BindingState.DISPOSED)) return;
        this.release();
        this.state.transition(BindingState.DISPOSED);
    }

    private release(): void {
        this.group.cancelAll();
        this.offBusTransition?.();
        this.offBusTransition = null;
    }
}
