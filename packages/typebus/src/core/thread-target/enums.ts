export enum ThreadKind {
    Current = "current",
    Main = "main",
    Background = "background",
}

export enum BackgroundPriority {
    High = "high",
    Default = "default",
    Low = "low",
}
