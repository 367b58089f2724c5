/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A synchronous, in-memory event bus shared by the host and its plugins.
 *
 * @module @mapcore/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import { describeError } from "../contracts/Errors.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";

/**
 * Options for the in-memory bus.
 */
export interface InMemoryEventBusConfig {
    /** Receives handler failures (default: console) */
    readonly logger?: EngineLogger;
}

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 * - Events emitted by a handler are delivered after the current event
 *   has reached every handler, so delivery order is raise order
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("plugin:loaded", (event) => {
 *     console.log("Loaded:", event.data);
 * });
 *
 * bus.emit(createEvent("plugin:loaded", { pluginId: "measure" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly queue: EventPayload[] = [];
    private dispatching = false;
    private readonly logger: EngineLogger;

    constructor(config: InMemoryEventBusConfig = {}) {
        this.logger = config.logger ?? createConsoleLogger("EventBus");
    }

    /**
     * Emit an event to all subscribers.
     *
     * Handlers for the event type run first, then "*" handlers.
     *
     * @param event - The event payload to emit
     */
    emit(event: EventPayload): void {
        this.queue.push(event);
        if (this.dispatching) {
            return;
        }

        this.dispatching = true;
        try {
            let next = this.queue.shift();
            while (next) {
                this.deliver(next);
                next = this.queue.shift();
            }
        }
        finally {
            this.dispatching = false;
        }
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription {
        const wrappedHandler: EventHandler = (event) => {
            subscription.unsubscribe();
            return handler(event);
        };

        const subscription = this.subscribe(eventType, wrappedHandler);
        return subscription;
    }

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (or "*" / undefined for everything)
     */
    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Get the number of handlers for a specific event type.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private deliver(event: EventPayload): void {
        // Snapshot so once() handlers can unsubscribe mid-iteration
        const specific = [...(this.handlers.get(event.type) ?? [])];
        const wildcard = [...(this.handlers.get("*") ?? [])];

        for (const handler of [...specific, ...wildcard]) {
            this.invoke(handler, event);
        }
    }

    private invoke(handler: EventHandler, event: EventPayload): void {
        try {
            const result = handler(event);
            if (result instanceof Promise) {
                result.catch((error: unknown) => this.reportFailure(event, error));
            }
        }
        catch (error) {
            this.reportFailure(event, error);
        }
    }

    private reportFailure(event: EventPayload, error: unknown): void {
        this.logger.error("Event handler failed", {
            eventType: event.type,
            error    : describeError(error),
        });
    }
}
