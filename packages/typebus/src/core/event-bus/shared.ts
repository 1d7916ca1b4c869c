import { defineBusConfig } from "../../config/define-config";
import { EventBus } from "./event-bus";

class SharedEventBus extends EventBus {
    override destroy(): never {
        throw new Error("[typebus] the shared bus cannot be destroyed");
    }
}

let shared: EventBus | null = null;

/**
 * Process-wide bus, created on first use and kept for the life of the process.
 * Prefer `new EventBus()` wherever isolation matters.
 */
export function getSharedBus(): EventBus {
    shared ??= new SharedEventBus(defineBusConfig({ name: "shared" }));
    return shared;
}
