export type EventTypeId = string;

export type EventGuard<T> = (value: unknown) => value is T;

/**
 * Runtime token for events that have no class of their own
 * (interface-shaped objects, tagged unions). Created by {@link createEventType}.
 */
export interface EventType<T> {
    readonly id: EventTypeId;
    readonly guard: EventGuard<T>;
}

/** Any class or constructor function. Matches by `instanceof`, so subclasses match their base. */
export type Constructor<T> = abstract new (...args: never[]) => T;

/** Primitive wrappers. These match by `typeof`, never by boxed instances. */
export type PrimitiveFilter =
    | StringConstructor
    | NumberConstructor
    | BooleanConstructor
    | BigIntConstructor
    | SymbolConstructor;

export type TypeFilter = PrimitiveFilter | Constructor<unknown> | EventType<unknown>;

/** Event type a handler receives for a given filter. */
export type EventOf<F> = F extends StringConstructor
    ? string
    : F extends NumberConstructor
      ? number
      : F extends BooleanConstructor
        ? boolean
        : F extends BigIntConstructor
          ? bigint
          : F extends SymbolConstructor
            ? symbol
            : F extends EventType<infer T>
              ? T
              : F extends Constructor<infer T>
                ? T
                : never;

export type EventHandler<T> = (event: T) => void | Promise<void>;

/** Matcher captured at registration time; narrows a posted value to the filter's event type. */
export type Matcher<T> = (value: unknown) => value is T;
