import type { RegistrationId, RegistrationSink } from "../subscription/types";
import type { Registration } from "./types";

/**
 * Live registrations of one bus, in insertion order.
 *
 * Every method is a single synchronous step, so a dispatch snapshot never sees
 * a half-added or half-removed registration. Removal flips `active` before the
 * entry leaves the map; dispatch checks that flag before each invocation.
 */
export class SubscriptionRegistry implements RegistrationSink {
    private readonly registrations: Map<RegistrationId, Registration> = new Map();

    constructor(private readonly onRemove?: (registration: Registration) => void) {}

    get size(): number {
        return this.registrations.size;
    }

    add(registration: Registration): void {
        this.registrations.set(registration.id, registration);
    }

    has(id: RegistrationId): boolean {
        return this.registrations.has(id);
    }

    remove(id: RegistrationId): boolean {
        const registration = this.registrations.get(id);
        if (!registration) return false;
        registration.active = false;
        this.registrations.delete(id);
        this.onRemove?.(registration);
        return true;
    }

    /** Copy of the current registrations. Later adds and removes do not change it. */
    snapshot(): readonly Registration[] {
        return Array.from(this.registrations.values());
    }

    /** Deactivate and drop everything. Returns how many registrations were released. */
    clear(): number {
        const released = this.registrations.size;
        for (const registration of this.registrations.values()) {
            registration.active = false;
        }
        this.registrations.clear();
        return released;
    }
}
