export { AnyEvent, createEventType } from "./helpers";
export { createMatcher, describeFilter, isEventType } from "./matcher";
export type {
    Constructor,
    EventGuard,
    EventHandler,
    EventOf,
    EventType,
    EventTypeId,
    Matcher,
    PrimitiveFilter,
    TypeFilter,
} from "./types";
