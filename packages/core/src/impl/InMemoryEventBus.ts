/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous, in-process event bus for evaluation events.
 *
 * @module @freshness/core/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EvaluationEvent,
    EvaluationEventType,
    EventHandler,
    Subscription,
    WildcardHandler,
} from "../contracts/EventBus.js";
import { noopLogger, type FreshnessLogger } from "../contracts/Logger.js";

function isEventOfType<K extends EvaluationEventType>(
    event: EvaluationEvent,
    eventType: K
): event is EvaluationEvent<K> {
    return event.type === eventType;
}

export interface InMemoryEventBusOptions {
    /** Receives handler failures (default: discarded) */
    readonly logger?: FreshnessLogger;
}

/**
 * In-memory EventBus implementation.
 *
 * - Handlers run synchronously, in subscription order
 * - Typed handlers run before wildcard handlers
 * - A throwing handler is reported and skipped; the rest still run
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("dataset:completed", (event) => {
 *     console.log(`${event.data.staleEntries} stale`);
 * });
 * ```
 */
export class InMemoryEventBus implements EventBus {
    /** Typed handlers are stored wrapped, narrowed on `event.type` */
    private readonly handlers = new Map<EvaluationEventType, Set<WildcardHandler>>();
    private readonly wildcardHandlers = new Set<WildcardHandler>();
    private readonly logger: FreshnessLogger;

    constructor(options: InMemoryEventBusOptions = {}) {
        this.logger = options.logger ?? noopLogger;
    }

    emit<K extends EvaluationEventType>(event: EvaluationEvent<K>): void {
        const typed = this.handlers.get(event.type);
        if (typed) {
            for (const handler of [...typed]) {
                this.invoke(event, () => handler(event));
            }
        }

        for (const handler of [...this.wildcardHandlers]) {
            this.invoke(event, () => handler(event));
        }
    }

    subscribe<K extends EvaluationEventType>(eventType: K, handler: EventHandler<K>): Subscription {
        const wrapper: WildcardHandler = (event) => {
            if (isEventOfType(event, eventType)) {
                handler(event);
            }
        };

        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        const registered = handlers;
        registered.add(wrapper);

        return {
            unsubscribe: () => {
                registered.delete(wrapper);
                if (registered.size === 0 && this.handlers.get(eventType) === registered) {
                    this.handlers.delete(eventType);
                }
            },
        };
    }

    subscribeAll(handler: WildcardHandler): Subscription {
        this.wildcardHandlers.add(handler);

        return {
            unsubscribe: () => {
                this.wildcardHandlers.delete(handler);
            },
        };
    }

    once<K extends EvaluationEventType>(eventType: K, handler: EventHandler<K>): Subscription {
        const subscription = this.subscribe<K>(eventType, (event) => {
            subscription.unsubscribe();
            handler(event);
        });
        return subscription;
    }

    /**
     * Remove subscriptions for one event type, or every subscription
     * (wildcards included) when called without a type.
     */
    clear(eventType?: EvaluationEventType): void {
        if (eventType === undefined) {
            this.handlers.clear();
            this.wildcardHandlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers for an event type, or of wildcard handlers.
     * Useful for testing.
     */
    handlerCount(eventType: EvaluationEventType | "*"): number {
        if (eventType === "*") {
            return this.wildcardHandlers.size;
        }
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private invoke(event: EvaluationEvent, call: () => void): void {
        try {
            call();
        }
        catch (error) {
            this.logger.error("Event handler failed", {
                eventType: event.type,
                error    : error instanceof Error ? error.message : String(error),
            });
        }
    }
}
