export type RegistrationId = number;

/**
 * The part of a bus registry a handle may touch.
 *
 * Handles keep it behind a `WeakRef`, so holding a handle never keeps a bus alive.
 */
export interface RegistrationSink {
    has(id: RegistrationId): boolean;
    /** Remove the registration. Returns false when it was already gone. */
    remove(id: RegistrationId): boolean;
}
