/**
 * Contract: Logger -- transport-based logging with pluggable handlers.
 *
 * Sections:
 *   1. Handler management
 *   2. Level threshold
 *   3. Entry shape
 *   4. Console handler formatting
 *   5. Helpers
 */
import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleHandler } from "./console-handler";
import { createDefaultLogger, toError } from "./helpers";
import { isLogLevel } from "./levels";
import { Logger } from "./logger";
import type { LogEntry } from "./types";

function capture(logger: Logger): LogEntry[] {
    const entries: LogEntry[] = [];
    logger.addHandler((entry) => entries.push(entry));
    return entries;
}

describe("Logger", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    // -- 1. Handler management --
    describe("Handler management", () => {
        it("handlers passed to the constructor receive entries", () => {
            const handler = vi.fn();
            const logger = new Logger({ handlers: [handler] });
            logger.debug("bus", "hello");
            expect(handler).toHaveBeenCalledOnce();
        });

        it("removeHandler stops the handler from receiving entries", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.removeHandler(handler);
            logger.debug("bus", "hello");
            expect(handler).not.toHaveBeenCalled();
        });

        it("fans out to multiple handlers", () => {
            const logger = new Logger();
            const a = vi.fn();
            const b = vi.fn();
            logger.addHandler(a);
            logger.addHandler(b);
            logger.warn("bus", "hello");
            expect(a).toHaveBeenCalledOnce();
            expect(b).toHaveBeenCalledOnce();
        });

        it("no handlers means no error", () => {
            const logger = new Logger();
            expect(() => logger.error("bus", "hello")).not.toThrow();
        });
    });

    // -- 2. Level threshold --
    describe("Level threshold", () => {
        it("defaults to debug, letting every level through", () => {
            const logger = new Logger();
            const entries = capture(logger);
            logger.debug("a", "1");
            logger.warn("b", "2");
            logger.error("c", "3");
            expect(entries.map((e) => e.level)).toEqual(["debug", "warn", "error"]);
        });

        it("drops entries below the configured level", () => {
            const logger = new Logger({ level: "warn" });
            const entries = capture(logger);
            logger.debug("a", "dropped");
            logger.warn("b", "kept");
            logger.error("c", "kept");
            expect(entries.map((e) => e.code)).toEqual(["b", "c"]);
        });

        it("setLevel changes the threshold at runtime", () => {
            const logger = new Logger({ level: "error" });
            const entries = capture(logger);
            logger.warn("a", "dropped");
            logger.setLevel("debug");
            logger.debug("b", "kept");
            expect(logger.level).toBe("debug");
            expect(entries.map((e) => e.code)).toEqual(["b"]);
        });

        it("isEnabled compares against the threshold", () => {
            const logger = new Logger({ level: "warn" });
            expect(logger.isEnabled("debug")).toBe(false);
            expect(logger.isEnabled("warn")).toBe(true);
            expect(logger.isEnabled("error")).toBe(true);
        });
    });

    // -- 3. Entry shape --
    describe("Entry shape", () => {
        it("carries level, code, message, details and a timestamp", () => {
            const logger = new Logger();
            const entries = capture(logger);
            logger.error("event-bus", "handler failed", { registrationId: 3 });
            expect(entries).toHaveLength(1);
            expect(entries[0]).toEqual({
                level: "error",
                code: "event-bus",
                message: "handler failed",
                details: { registrationId: 3 },
                timestamp: expect.any(Number),
            });
        });

        it("details is undefined when not provided", () => {
            const logger = new Logger();
            const entries = capture(logger);
            logger.debug("bus", "msg");
            expect(entries[0]?.details).toBeUndefined();
        });
    });

    // -- 4. Console handler --
    describe("Console handler (createConsoleHandler)", () => {
        it("logs debug to console.log with the library tag", () => {
            const spy = vi.spyOn(console, "log").mockImplementation(() => {});
            createConsoleHandler()({ level: "debug", code: "event-bus", message: "subscribed", timestamp: 0 });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toContain("[typebus] event-bus → subscribed");
        });

        it("logs warn to console.warn", () => {
            const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
            createConsoleHandler()({ level: "warn", code: "event-bus", message: "late", timestamp: 0 });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toContain("[warn] event-bus → late");
        });

        it("logs error to console.error with coloured details", () => {
            const spy = vi.spyOn(console, "error").mockImplementation(() => {});
            createConsoleHandler()({
                level: "error",
                code: "executor",
                message: "job failed",
                details: { attempt: 2 },
                timestamp: 0,
            });
            expect(spy).toHaveBeenCalledOnce();
            const line = String(spy.mock.calls[0]?.[0]);
            expect(line).toContain("[error] executor → job failed");
            expect(line).toContain(" { \x1b[36mattempt\x1b[0m=\x1b[33m2\x1b[0m }");
        });

        it("quotes string details and prints the time as HH:MM:SS", () => {
            const spy = vi.spyOn(console, "log").mockImplementation(() => {});
            const timestamp = new Date(2024, 0, 1, 9, 5, 7).getTime();
            createConsoleHandler()({
                level: "debug",
                code: "event-bus",
                message: "subscribed #1",
                details: { bus: "test" },
                timestamp,
            });
            expect(spy.mock.calls[0]?.[0]).toBe(
                '09:05:07 [typebus] event-bus → subscribed #1 { \x1b[36mbus\x1b[0m=\x1b[32m"test"\x1b[0m }',
            );
        });

        it("omits empty details", () => {
            const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
            createConsoleHandler()({ level: "warn", code: "bus", message: "bare", details: {}, timestamp: 0 });
            expect(String(spy.mock.calls[0]?.[0]).endsWith("[warn] bus → bare")).toBe(true);
        });
    });

    // -- 5. Helpers --
    describe("Helpers", () => {
        it("createDefaultLogger uses the warn threshold unless told otherwise", () => {
            expect(createDefaultLogger().level).toBe("warn");
            expect(createDefaultLogger("debug").level).toBe("debug");
        });

        it("createDefaultLogger writes to the console", () => {
            const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
            createDefaultLogger().warn("bus", "visible");
            expect(spy).toHaveBeenCalledOnce();
        });

        it("isLogLevel accepts only known levels", () => {
            expect(isLogLevel("warn")).toBe(true);
            expect(isLogLevel("info")).toBe(false);
            expect(isLogLevel("toString")).toBe(false);
        });

        it("toError keeps errors and wraps everything else", () => {
            const err = new Error("boom");
            expect(toError(err)).toBe(err);
            expect(toError("plain")).toEqual(new Error("plain"));
            expect(toError(42).message).toBe("42");
        });
    });
});
