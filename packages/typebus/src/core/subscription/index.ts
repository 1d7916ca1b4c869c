export { SubscriptionGroup } from "./group";
export { SubscriptionHandle } from "./handle";
export type { RegistrationId, RegistrationSink } from "./types";
