import type { EventOf, EventType, Matcher, TypeFilter } from "./types";

type PrimitiveTypeName = "string" | "number" | "boolean" | "bigint" | "symbol";

const PRIMITIVE_TYPES = new Map<TypeFilter, PrimitiveTypeName>([
    [String, "string"],
    [Number, "number"],
    [Boolean, "boolean"],
    [BigInt, "bigint"],
    [Symbol, "symbol"],
]);

export function isEventType(filter: TypeFilter): filter is EventType<unknown> {
    return typeof filter === "object";
}

/** Build the matcher a registration keeps for its whole life. */
export function createMatcher<F extends TypeFilter>(filter: F): Matcher<EventOf<F>> {
    const erased: TypeFilter = filter;

    if (isEventType(erased)) {
        const guard = erased.guard;
        return (value: unknown): value is EventOf<F> => guard(value);
    }

    const primitive = PRIMITIVE_TYPES.get(erased);
    if (primitive) {
        return (value: unknown): value is EventOf<F> => typeof value === primitive;
    }

    return (value: unknown): value is EventOf<F> => value instanceof erased;
}

export function describeFilter(filter: TypeFilter): string {
    if (isEventType(filter)) return filter.id;
    return filter.name || "anonymous";
}
