// ── Bus ──────────────────────────────────────────────────────────────
export { BusState, EventBus, getSharedBus, SubscriptionRegistry } from "./core/event-bus";
export type { HandlerErrorHook, HandlerFailure, Registration } from "./core/event-bus";

// ── Event types ──────────────────────────────────────────────────────
export { AnyEvent, createEventType, createMatcher, describeFilter, isEventType } from "./core/event-type";
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
} from "./core/event-type";

// ── Thread targets ───────────────────────────────────────────────────
export {
    BackgroundPriority,
    backgroundThread,
    currentThread,
    describeThreadTarget,
    mainThread,
    ThreadKind,
} from "./core/thread-target";
export type { BackgroundThreadTarget, CurrentThreadTarget, MainThreadTarget, ThreadTarget } from "./core/thread-target";

// ── Executors ────────────────────────────────────────────────────────
export {
    BackgroundPool,
    currentExecutionContext,
    getBackgroundPool,
    getMainExecutor,
    isMainContext,
    MainExecutor,
} from "./core/executor";
export type {
    BackgroundContext,
    BackgroundPoolOptions,
    BackgroundPoolStatus,
    ExecutionContext,
    Executor,
    Job,
    MainContext,
    MainExecutorOptions,
} from "./core/executor";

// ── Subscriptions ────────────────────────────────────────────────────
export { SubscriptionGroup, SubscriptionHandle } from "./core/subscription";
export type { RegistrationId, RegistrationSink } from "./core/subscription";

// ── Logger ───────────────────────────────────────────────────────────
export { createConsoleHandler, createDefaultLogger, Logger } from "./core/logger";
export type { LogEntry, LoggerContext, LoggerOptions, LogHandler, LogLevel } from "./core/logger";

// ── Config ───────────────────────────────────────────────────────────
export { DEFAULT_BUS_NAME, defineBusConfig } from "./config";
export type { BusConfig, DefineBusConfigInput, LoggerInput } from "./config";

// ── Integration ──────────────────────────────────────────────────────
export { BindingState, binding, LifecycleBinding } from "./integration";
export type { BindingSpec } from "./integration";
