export { StateMachine } from "./state-machine";
export type { StateMachineConfig, TransitionListener } from "./types";
