import { isPromise } from "es-toolkit";
import { defineBusConfig } from "../../config/define-config";
import type { BusConfig } from "../../config/types";
import { createMatcher, describeFilter } from "../event-type/matcher";
import type { EventHandler, EventOf, TypeFilter } from "../event-type/types";
import type { BackgroundPool } from "../executor/background-pool";
import { getBackgroundPool, getMainExecutor } from "../executor/shared";
import type { Executor, Job } from "../executor/types";
import { toError } from "../logger/helpers";
import type { Logger } from "../logger/logger";
import { StateMachine } from "../state-machine/state-machine";
import { SubscriptionHandle } from "../subscription/handle";
import type { RegistrationId } from "../subscription/types";
import { BackgroundPriority, ThreadKind } from "../thread-target/enums";
import { backgroundThread, currentThread, describeThreadTarget, mainThread } from "../thread-target/helpers";
import type { ThreadTarget } from "../thread-target/types";
import { BusState } from "./enums";
import { SubscriptionRegistry } from "./registry";
import type { HandlerErrorHook, Registration } from "./types";

const BUS_TRANSITIONS: Record<BusState, BusState[]> = {
    [BusState.ACTIVE]: [BusState.DESTROYED],
    [BusState.DESTROYED]: [],
};

/**
 * Type-discriminated publish/subscribe bus.
 *
 * `post` matches a value against every registration by runtime type and runs
 * each matching handler on its thread target: inline for `current`, through
 * the main executor for `main`, through the background pool for `background`.
 * `post` never waits for main or background handlers.
 *
 * Handler failures are isolated: they are logged, passed to `onHandlerError`,
 * and never stop delivery to the other handlers of the same post.
 */
export class EventBus {
    readonly name: string;
    readonly state: StateMachine<BusState>;
    private readonly registry: SubscriptionRegistry;
    private readonly logger: Logger;
    private readonly mainExecutor: Executor;
    private readonly backgroundPool: BackgroundPool;
    private readonly onHandlerError: HandlerErrorHook | undefined;
    private nextId: RegistrationId = 1;

    constructor(config: BusConfig = defineBusConfig()) {
        this.name = config.name;
        this.logger = config.logger;
        this.mainExecutor = config.mainExecutor ?? getMainExecutor();
        this.backgroundPool = config.backgroundPool ?? getBackgroundPool();
        this.onHandlerError = config.onHandlerError;

        this.state = new StateMachine<BusState>({
            transitions: BUS_TRANSITIONS,
            initial: BusState.ACTIVE,
            name: `EventBus(${this.name})`,
        });

        this.registry = new SubscriptionRegistry((registration) => {
            this.logger.debug("event-bus", `cancelled #${registration.id}`, {
                bus: this.name,
                filter: describeFilter(registration.filter),
            });
        });
    }

    /** Number of live registrations. */
    get size(): number {
        return this.registry.size;
    }

    // ── Posting ──────────────────────────────────────────────────────────

    /** Deliver `event` to every matching registration. Silent when nothing matches or the bus is destroyed. */
    post(event: unknown): void {
        if (!this.state.is(BusState.ACTIVE)) return;

        for (const registration of this.registry.snapshot()) {
            // Cancelled by an earlier handler of this same post.
            if (!registration.active) continue;
            let invocation: Job | null;
            try {
                invocation = registration.prepare(event);
            } catch (err) {
                // A throwing guard counts as a failure of its registration.
                this.reportFailure(registration, event, err);
                continue;
            }
            if (invocation) this.dispatch(registration, event, invocation);
        }
    }

    // ── Subscribing ──────────────────────────────────────────────────────

    subscribe<F extends TypeFilter>(
        filter: F,
        target: ThreadTarget,
        handler: EventHandler<EventOf<F>>,
    ): SubscriptionHandle {
        const id = this.nextId++;

        if (!this.state.is(BusState.ACTIVE)) {
            this.logger.warn("event-bus", "subscribe on a destroyed bus ignored", {
                bus: this.name,
                filter: describeFilter(filter),
            });
            return new SubscriptionHandle(id, null);
        }

        const matches = createMatcher(filter);
        this.registry.add({
            id,
            filter,
            target,
            active: true,
            prepare: (event) => {
                if (!matches(event)) return null;
                const matched = event;
                return () => handler(matched);
            },
        });

        this.logger.debug("event-bus", `subscribed #${id}`, {
            bus: this.name,
            filter: describeFilter(filter),
            target: describeThreadTarget(target),
        });
        return new SubscriptionHandle(id, this.registry);
    }

    /** Subscribe on the posting stack. */
    onReceive<F extends TypeFilter>(filter: F, handler: EventHandler<EventOf<F>>): SubscriptionHandle {
        return this.subscribe(filter, currentThread(), handler);
    }

    /** Subscribe on the main executor. */
    onMainThread<F extends TypeFilter>(filter: F, handler: EventHandler<EventOf<F>>): SubscriptionHandle {
        return this.subscribe(filter, mainThread(), handler);
    }

    /** Subscribe on the background pool. */
    onBackgroundThread<F extends TypeFilter>(
        filter: F,
        handler: EventHandler<EventOf<F>>,
        priority: BackgroundPriority = BackgroundPriority.Default,
    ): SubscriptionHandle {
        return this.subscribe(filter, backgroundThread(priority), handler);
    }

    // ── Lifecycle ────────────────────────────────────────────────────────

    /**
     * Release every registration without invoking any handler.
     * Afterwards `post` is a no-op and `subscribe` returns cancelled handles. Idempotent.
     */
    destroy(): void {
        if (!this.state.canTransition(BusState.DESTROYED)) return;
        this.state.transition(BusState.DESTROYED);
        const released = this.registry.clear();
        this.logger.debug("event-bus", "destroyed", { bus: this.name, released });
    }

    /** Resolves once the executors this bus dispatches to have nothing queued or running. */
    async idle(): Promise<void> {
        while (!this.mainExecutor.isIdle || !this.backgroundPool.isIdle) {
            await Promise.all([this.mainExecutor.idle(), this.backgroundPool.idle()]);
        }
    }

    // ── Private: Dispatch ───────────────────────────────────────────────

    private dispatch(registration: Registration, event: unknown, invocation: Job): void {
        const run: Job = () => this.invoke(registration, event, invocation);
        const target = registration.target;

        switch (target.kind) {
            case ThreadKind.Current:
                run();
                return;
            case ThreadKind.Main:
                this.mainExecutor.submit(run);
                return;
            case ThreadKind.Background:
                this.backgroundPool.submit(run, target.priority);
                return;
        }
    }

    private invoke(registration: Registration, event: unknown, invocation: Job): void | Promise<void> {
        let result: void | Promise<void>;
        try {
            result = invocation();
        } catch (err) {
            this.reportFailure(registration, event, err);
            return;
        }
        if (isPromise(result)) {
            return result.catch((err: unknown) => this.reportFailure(registration, event, err));
        }
    }

    private reportFailure(registration: Registration, event: unknown, err: unknown): void {
        const error = toError(err);
        this.logger.error("event-bus", `handler #${registration.id} for ${describeFilter(registration.filter)} failed`, {
            bus: this.name,
            target: describeThreadTarget(registration.target),
            error: error.message,
        });

        if (!this.onHandlerError) return;
        try {
            this.onHandlerError({
                bus: this.name,
                registrationId: registration.id,
                filter: registration.filter,
                target: registration.target,
                event,
                error,
            });
        } catch (hookErr) {
            this.logger.error("event-bus", "onHandlerError hook failed", {
                bus: this.name,
                error: toError(hookErr).message,
            });
        }
    }
}
