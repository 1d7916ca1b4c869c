import type { BackgroundPriority, ThreadKind } from "./enums";

export type CurrentThreadTarget = { readonly kind: ThreadKind.Current };

export type MainThreadTarget = { readonly kind: ThreadKind.Main };

export type BackgroundThreadTarget = {
    readonly kind: ThreadKind.Background;
    readonly priority: BackgroundPriority;
};

/**
 * Where a handler runs when a matching event is posted.
 *
 * Pure data. The bus resolves each variant to an executor at dispatch time.
 */
export type ThreadTarget = CurrentThreadTarget | MainThreadTarget | BackgroundThreadTarget;
