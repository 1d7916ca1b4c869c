import type { EventGuard, EventType, EventTypeId } from "./types";

/**
 * Creates a runtime event type from a guard.
 *
 * @example
 * const UserLoggedIn = createEventType("user-logged-in", (v): v is { userId: string } =>
 *     typeof v === "object" && v !== null && "userId" in v);
 */
export function createEventType<T>(id: EventTypeId, guard: EventGuard<T>): EventType<T> {
    if (!id || id.trim().length === 0) throw new Error("createEventType: id is required");
    return Object.freeze({ id, guard });
}

/** The universal filter: matches every posted value, `null` and `undefined` included. */
export const AnyEvent: EventType<unknown> = createEventType("any", (_value: unknown): _value is unknown => true);
