/**
 * @fileoverview Unit tests for InMemoryEventBus
 *
 * Tests cover:
 * - Basic event emission and subscription
 * - Wildcard subscriptions
 * - One-time subscriptions (once)
 * - Unsubscribe functionality
 * - Clear functionality
 * - Error handling in handlers
 *
 * @module @freshness/core/__tests__/InMemoryEventBus
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { createEvent, type EvaluationEvent } from "../contracts/EventBus.js";
import type { FreshnessLogger } from "../contracts/Logger.js";

function skippedEvent(index: number): EvaluationEvent<"record:skipped"> {
    return createEvent("record:skipped", {
        index,
        kind   : "missing_timestamp",
        message: "No timestamp field found (looked for: timestamp)",
    }, "ev_test");
}

function completedEvent(): EvaluationEvent<"dataset:completed"> {
    return createEvent("dataset:completed", {
        evaluatedEntries : 2,
        staleEntries     : 1,
        skippedEntries   : 0,
        averageConfidence: 0.5,
    });
}

describe("InMemoryEventBus", () => {
    let eventBus: InMemoryEventBus;

    beforeEach(() => {
        eventBus = new InMemoryEventBus();
    });

    describe("subscribe and emit", () => {
        // Scenario: Basic subscription receives emitted events
        it("should call handler when matching event is emitted", () => {
            const handler = vi.fn();
            const event = skippedEvent(3);

            eventBus.subscribe("record:skipped", handler);
            eventBus.emit(event);

            expect(handler).toHaveBeenCalledTimes(1);
            expect(handler).toHaveBeenCalledWith(event);
        });

        // Scenario: Handler receives typed data
        it("should pass the typed event data to the handler", () => {
            const indices: number[] = [];

            eventBus.subscribe("record:skipped", (event) => {
                indices.push(event.data.index);
            });
            eventBus.emit(skippedEvent(1));
            eventBus.emit(skippedEvent(4));

            expect(indices).toEqual([1, 4]);
        });

        // Scenario: Handler not called for non-matching event types
        it("should not call handler for non-matching event type", () => {
            const handler = vi.fn();

            eventBus.subscribe("record:skipped", handler);
            eventBus.emit(completedEvent());

            expect(handler).not.toHaveBeenCalled();
        });

        // Scenario: Handlers for different types share the bus without crossing
        it("should route each event only to handlers of its own type", () => {
            const skipped: number[] = [];
            const completed: number[] = [];

            const first = eventBus.subscribe("record:skipped", (event) => {
                skipped.push(event.data.index);
            });
            eventBus.subscribe("dataset:completed", (event) => {
                completed.push(event.data.staleEntries);
            });

            eventBus.emit(skippedEvent(5));
            eventBus.emit(completedEvent());
            first.unsubscribe();
            eventBus.emit(skippedEvent(6));

            expect(skipped).toEqual([5]);
            expect(completed).toEqual([1]);
            expect(eventBus.handlerCount("record:skipped")).toBe(0);
            expect(eventBus.handlerCount("dataset:completed")).toBe(1);
        });

        // Scenario: Multiple handlers run in subscription order
        it("should call all handlers in subscription order", () => {
            const calls: string[] = [];

            eventBus.subscribe("dataset:completed", () => calls.push("first"));
            eventBus.subscribe("dataset:completed", () => calls.push("second"));
            eventBus.emit(completedEvent());

            expect(calls).toEqual(["first", "second"]);
        });
    });

    describe("subscribeAll", () => {
        // Scenario: Wildcard handler sees every event, after typed handlers
        it("should call wildcard handlers for every event type", () => {
            const calls: string[] = [];

            eventBus.subscribeAll((event) => calls.push(`*:${event.type}`));
            eventBus.subscribe("record:skipped", () => calls.push("typed"));

            eventBus.emit(skippedEvent(0));
            eventBus.emit(completedEvent());

            expect(calls).toEqual(["typed", "*:record:skipped", "*:dataset:completed"]);
        });

        it("should stop calling a wildcard handler after unsubscribe", () => {
            const handler = vi.fn();
            const subscription = eventBus.subscribeAll(handler);

            subscription.unsubscribe();
            eventBus.emit(completedEvent());

            expect(handler).not.toHaveBeenCalled();
            expect(eventBus.handlerCount("*")).toBe(0);
        });
    });

    describe("once", () => {
        // Scenario: once handler fires a single time
        it("should call handler only for the first event", () => {
            const handler = vi.fn();

            eventBus.once("record:skipped", handler);
            eventBus.emit(skippedEvent(0));
            eventBus.emit(skippedEvent(1));

            expect(handler).toHaveBeenCalledTimes(1);
            expect(eventBus.handlerCount("record:skipped")).toBe(0);
        });

        it("should not fire after being unsubscribed", () => {
            const handler = vi.fn();

            eventBus.once("record:skipped", handler).unsubscribe();
            eventBus.emit(skippedEvent(0));

            expect(handler).not.toHaveBeenCalled();
        });
    });

    describe("unsubscribe", () => {
        it("should remove only the unsubscribed handler", () => {
            const kept = vi.fn();
            const removed = vi.fn();

            eventBus.subscribe("record:skipped", kept);
            eventBus.subscribe("record:skipped", removed).unsubscribe();
            eventBus.emit(skippedEvent(0));

            expect(kept).toHaveBeenCalledTimes(1);
            expect(removed).not.toHaveBeenCalled();
            expect(eventBus.handlerCount("record:skipped")).toBe(1);
        });
    });

    describe("clear", () => {
        it("should clear handlers of one event type", () => {
            eventBus.subscribe("record:skipped", vi.fn());
            eventBus.subscribe("dataset:completed", vi.fn());

            eventBus.clear("record:skipped");

            expect(eventBus.handlerCount("record:skipped")).toBe(0);
            expect(eventBus.handlerCount("dataset:completed")).toBe(1);
        });

        // Scenario: Clearing without a type also drops wildcard handlers
        it("should clear every handler when no type is given", () => {
            eventBus.subscribe("record:skipped", vi.fn());
            eventBus.subscribeAll(vi.fn());

            eventBus.clear();

            expect(eventBus.handlerCount("record:skipped")).toBe(0);
            expect(eventBus.handlerCount("*")).toBe(0);
        });
    });

    describe("error handling", () => {
        // Scenario: A throwing handler is logged and does not stop the others
        it("should keep calling handlers after one throws", () => {
            const logger: FreshnessLogger = {
                debug: vi.fn(),
                info : vi.fn(),
                warn : vi.fn(),
                error: vi.fn(),
            };
            const bus = new InMemoryEventBus({ logger });
            const after = vi.fn();

            bus.subscribe("dataset:completed", () => {
                throw new Error("handler exploded");
            });
            bus.subscribe("dataset:completed", after);
            bus.emit(completedEvent());

            expect(after).toHaveBeenCalledTimes(1);
            expect(logger.error).toHaveBeenCalledWith("Event handler failed", {
                eventType: "dataset:completed",
                error    : "handler exploded",
            });
        });
    });

    describe("createEvent", () => {
        it("should build a frozen event with a timestamp and trace id", () => {
            const event = skippedEvent(2);

            expect(Object.isFrozen(event)).toBe(true);
            expect(event.type).toBe("record:skipped");
            expect(event.traceId).toBe("ev_test");
            expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
        });
    });
});
