export enum BindingState {
    DETACHED = "detached",
    ATTACHED = "attached",
    DISPOSED = "disposed",
}
