export enum BusState {
    ACTIVE = "active",
    DESTROYED = "destroyed",
}
