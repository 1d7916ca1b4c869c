/**
 * Contract: SubscriptionHandle -- idempotent cancellation of one registration.
 *
 * Sections:
 *   1. cancel
 *   2. cancelled
 *   3. addTo
 */
import { describe, expect, it, vi } from "vitest";
import { SubscriptionGroup } from "./group";
import { SubscriptionHandle } from "./handle";
import type { RegistrationId, RegistrationSink } from "./types";

function createSink(ids: RegistrationId[]) {
    const live = new Set(ids);
    const sink: RegistrationSink = {
        has: (id) => live.has(id),
        remove: vi.fn((id: RegistrationId) => live.delete(id)),
    };
    return { sink, live };
}

describe("SubscriptionHandle", () => {
    describe("cancel", () => {
        it("removes exactly its own registration", () => {
            const { sink, live } = createSink([1, 2]);
            new SubscriptionHandle(1, sink).cancel();
            expect(live).toEqual(new Set([2]));
        });

        it("is idempotent: the sink is asked once", () => {
            const { sink } = createSink([1]);
            const handle = new SubscriptionHandle(1, sink);
            handle.cancel();
            handle.cancel();
            expect(sink.remove).toHaveBeenCalledTimes(1);
        });

        it("never throws for a handle without a sink", () => {
            const handle = new SubscriptionHandle(7, null);
            expect(() => handle.cancel()).not.toThrow();
        });
    });

    describe("cancelled", () => {
        it("is false while the registration is live", () => {
            const { sink } = createSink([1]);
            expect(new SubscriptionHandle(1, sink).cancelled).toBe(false);
        });

        it("is true after cancel", () => {
            const { sink } = createSink([1]);
            const handle = new SubscriptionHandle(1, sink);
            handle.cancel();
            expect(handle.cancelled).toBe(true);
        });

        it("is true when the registration disappeared without cancel", () => {
            const { sink, live } = createSink([1]);
            const handle = new SubscriptionHandle(1, sink);
            live.clear();
            expect(handle.cancelled).toBe(true);
        });

        it("is true for a handle without a sink", () => {
            expect(new SubscriptionHandle(3, null).cancelled).toBe(true);
        });
    });

    describe("addTo", () => {
        it("stores the handle in the group and returns it", () => {
            const { sink } = createSink([1]);
            const group = new SubscriptionGroup();
            const handle = new SubscriptionHandle(1, sink);
            expect(handle.addTo(group)).toBe(handle);
            expect(group.has(handle)).toBe(true);
        });
    });
});
