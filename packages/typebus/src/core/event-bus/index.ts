export { BusState } from "./enums";
export { EventBus } from "./event-bus";
export { SubscriptionRegistry } from "./registry";
export { getSharedBus } from "./shared";
export type { HandlerErrorHook, HandlerFailure, Registration } from "./types";
