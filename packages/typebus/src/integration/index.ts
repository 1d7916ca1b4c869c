export { BindingState } from "./enums";
export { binding, LifecycleBinding } from "./lifecycle-binding";
export type { BindingSpec } from "./types";
