export { BackgroundPriority, ThreadKind } from "./enums";
export { backgroundThread, currentThread, describeThreadTarget, mainThread } from "./helpers";
export type { BackgroundThreadTarget, CurrentThreadTarget, MainThreadTarget, ThreadTarget } from "./types";
