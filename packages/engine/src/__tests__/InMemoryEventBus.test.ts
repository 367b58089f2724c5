/**
 * @fileoverview Unit tests for InMemoryEventBus
 *
 * Tests cover:
 * - Plugin lifecycle events reaching type and wildcard subscribers
 * - Raise-order delivery when handlers emit further events
 * - Handler failures reported through the logger
 *
 * @module @mapcore/engine/__tests__/InMemoryEventBus
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { createEvent, type EventPayload } from "../contracts/EventBus.js";
import { createMockLogger } from "./helpers.js";

const flushMicrotasks = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("InMemoryEventBus", () => {
    let bus: InMemoryEventBus;
    let logger: ReturnType<typeof createMockLogger>;

    beforeEach(() => {
        logger = createMockLogger();
        bus = new InMemoryEventBus({ logger });
    });

    describe("plugin events", () => {
        // Scenario: A state change reaches its own subscribers before wildcard ones
        it("should deliver to type subscribers and then to wildcard subscribers", () => {
            const seen: string[] = [];
            bus.subscribe("*", (event) => {
                seen.push(`*:${event.type}`);
            });
            bus.subscribe("plugin:stateChanged", (event) => {
                seen.push(`state:${String(event.data?.to)}`);
            });

            bus.emit(createEvent("plugin:stateChanged", { pluginId: "measure", from: "Initialized", to: "Started" }));
            bus.emit(createEvent("plugin:loaded", { pluginId: "measure" }));

            expect(seen).toEqual(["state:Started", "*:plugin:stateChanged", "*:plugin:loaded"]);
        });

        // Scenario: Plugins raise their own event types
        it("should carry custom plugin events with their data", () => {
            const handler = vi.fn();
            bus.subscribe("measure:completed", handler);

            const event = createEvent("measure:completed", { pluginId: "measure", metres: 12.5 }, "trace-1");
            bus.emit(event);

            expect(handler).toHaveBeenCalledWith(event);
            expect(event.traceId).toBe("trace-1");
        });

        // Scenario: once() sees only the first plugin:unloaded
        it("should drop a once() handler after its first event", () => {
            const handler = vi.fn();
            bus.once("plugin:unloaded", handler);

            bus.emit(createEvent("plugin:unloaded", { pluginId: "a" }));
            bus.emit(createEvent("plugin:unloaded", { pluginId: "b" }));

            expect(handler).toHaveBeenCalledTimes(1);
            expect(handler.mock.calls[0]?.[0].data).toEqual({ pluginId: "a" });
            expect(bus.handlerCount("plugin:unloaded")).toBe(0);
        });

        // Scenario: Clearing one type leaves the others subscribed
        it("should clear one event type or all of them", () => {
            bus.subscribe("tool:activated", vi.fn());
            bus.subscribe("tool:deactivated", vi.fn());
            bus.subscribe("*", vi.fn());

            bus.clear("tool:activated");
            expect(bus.handlerCount("tool:activated")).toBe(0);
            expect(bus.handlerCount("tool:deactivated")).toBe(1);

            bus.clear();
            expect(bus.handlerCount("tool:deactivated")).toBe(0);
            expect(bus.handlerCount("*")).toBe(0);
        });
    });

    describe("raise order", () => {
        // Scenario: An error event raised while handling a state change waits its turn
        it("should queue events emitted from inside a handler", () => {
            const order: string[] = [];
            bus.subscribe("plugin:stateChanged", (event) => {
                order.push(`first:${event.type}`);
                if (event.data?.to === "Error") {
                    bus.emit(createEvent("plugin:error", { pluginId: "broken" }));
                }
            });
            bus.subscribe("plugin:stateChanged", (event) => {
                order.push(`second:${event.type}`);
            });
            bus.subscribe("plugin:error", (event) => {
                order.push(`error:${String(event.data?.pluginId)}`);
            });

            bus.emit(createEvent("plugin:stateChanged", { pluginId: "broken", to: "Error" }));

            expect(order).toEqual([
                "first:plugin:stateChanged",
                "second:plugin:stateChanged",
                "error:broken",
            ]);
        });

        // Scenario: Nested raises from a wildcard listener keep raise order too
        it("should deliver a chain of nested events in the order raised", () => {
            const types: string[] = [];
            bus.subscribe("*", (event) => {
                types.push(event.type);
                if (event.type === "engine:starting") {
                    bus.emit(createEvent("plugin:loaded", { pluginId: "a" }));
                    bus.emit(createEvent("engine:started"));
                }
            });

            bus.emit(createEvent("engine:starting"));

            expect(types).toEqual(["engine:starting", "plugin:loaded", "engine:started"]);
        });

        // Scenario: A handler subscribed during delivery waits for the next event
        it("should not call a handler added while the event is being delivered", () => {
            const late = vi.fn();
            bus.subscribe("analysis:progress", () => {
                bus.subscribe("analysis:progress", late);
            });

            bus.emit(createEvent("analysis:progress", { progress: 10 }));
            expect(late).not.toHaveBeenCalled();

            bus.emit(createEvent("analysis:progress", { progress: 20 }));
            expect(late).toHaveBeenCalledTimes(1);
        });
    });

    describe("handler failures", () => {
        // Scenario: A throwing handler is logged and the rest still run
        it("should log a synchronous failure and keep delivering", () => {
            const after = vi.fn();
            bus.subscribe("plugin:loaded", () => {
                throw new Error("listener broke");
            });
            bus.subscribe("plugin:loaded", after);

            bus.emit(createEvent("plugin:loaded", { pluginId: "a" }));

            expect(after).toHaveBeenCalledTimes(1);
            expect(logger.error).toHaveBeenCalledWith("Event handler failed", {
                eventType: "plugin:loaded",
                error    : "listener broke",
            });
        });

        // Scenario: A rejected async handler is logged once it settles
        it("should log a rejected async handler", async () => {
            bus.subscribe("plugin:error", async () => {
                throw new Error("async listener broke");
            });

            bus.emit(createEvent("plugin:error", { pluginId: "a" }));
            await flushMicrotasks();

            expect(logger.error).toHaveBeenCalledWith("Event handler failed", {
                eventType: "plugin:error",
                error    : "async listener broke",
            });
        });

        // Scenario: Non-Error throws are described as strings
        it("should describe thrown values that are not errors", () => {
            bus.subscribe("engine:stopping", () => {
                throw "plain text";
            });

            bus.emit(createEvent("engine:stopping"));

            expect(logger.error).toHaveBeenCalledWith("Event handler failed", {
                eventType: "engine:stopping",
                error    : "plain text",
            });
        });

        // Scenario: A failure mid-queue does not strand the events behind it
        it("should deliver queued events after a failing handler", () => {
            const received: EventPayload[] = [];
            bus.subscribe("plugin:stateChanged", () => {
                bus.emit(createEvent("plugin:error", { pluginId: "a" }));
                throw new Error("state listener broke");
            });
            bus.subscribe("plugin:error", (event) => {
                received.push(event);
            });

            bus.emit(createEvent("plugin:stateChanged", { pluginId: "a", to: "Error" }));

            expect(received.map(e => e.data)).toEqual([{ pluginId: "a" }]);
            expect(logger.error).toHaveBeenCalledTimes(1);
        });
    });
});
