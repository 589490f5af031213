/**
 * @fileoverview EventBus Contract
 *
 * Observability hook for dataset evaluation. The evaluator emits an
 * event at each stage of a batch; subscribers may log, count or
 * collect them. Emission is synchronous and ordered.
 *
 * @module @freshness/core/contracts/EventBus
 */

import type { FreshnessErrorKind } from "./errors.js";

/**
 * Event data, keyed by event type.
 */
export interface EvaluationEventMap {
    "dataset:started": {
        readonly topicId: string;
        readonly totalEntries: number;
        readonly threshold: number;
        readonly referenceInstant: string;
    };
    "record:evaluated": {
        readonly index: number;
        readonly topicId: string;
        readonly currentConfidence: number;
        readonly ageDays: number;
        readonly isStale: boolean;
    };
    "record:skipped": {
        readonly index: number;
        readonly kind: FreshnessErrorKind;
        readonly message: string;
    };
    "dataset:completed": {
        readonly evaluatedEntries: number;
        readonly staleEntries: number;
        readonly skippedEntries: number;
        readonly averageConfidence: number;
    };
}

/**
 * All known event types.
 */
export type EvaluationEventType = keyof EvaluationEventMap;

/**
 * Event payload for a given type.
 */
export interface EvaluationEvent<K extends EvaluationEventType = EvaluationEventType> {
    readonly type: K;

    /** ISO timestamp when the event was emitted */
    readonly timestamp: string;

    /** Run id shared by every event of one batch */
    readonly traceId?: string;

    readonly data: EvaluationEventMap[K];
}

export type EventHandler<K extends EvaluationEventType = EvaluationEventType> = (event: EvaluationEvent<K>) => void;

/**
 * Handler for every event type.
 */
export type WildcardHandler = (event: EvaluationEvent) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * bus.subscribe("record:skipped", (event) => {
 *     console.warn(`Entry #${event.data.index}: ${event.data.message}`);
 * });
 *
 * checkDataset(records, "news", { eventBus: bus });
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers of its type and to wildcard subscribers.
     */
    emit<K extends EvaluationEventType>(event: EvaluationEvent<K>): void;

    /**
     * Subscribe to one event type.
     */
    subscribe<K extends EvaluationEventType>(eventType: K, handler: EventHandler<K>): Subscription;

    /**
     * Subscribe to every event.
     */
    subscribeAll(handler: WildcardHandler): Subscription;

    /**
     * Subscribe, auto-unsubscribing after the first event.
     */
    once<K extends EvaluationEventType>(eventType: K, handler: EventHandler<K>): Subscription;

    /**
     * Remove subscriptions for one type, or all when omitted.
     */
    clear(eventType?: EvaluationEventType): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Event data
 * @param traceId - Optional run id
 * @returns Frozen event with timestamp
 */
export function createEvent<K extends EvaluationEventType>(
    type: K,
    data: EvaluationEventMap[K],
    traceId?: string
): EvaluationEvent<K> {
    return Object.freeze({
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    });
}
