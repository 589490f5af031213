/**
 * @fileoverview Implementation barrel exports
 *
 * @module @freshness/core/impl
 */

export { InMemoryEventBus, type InMemoryEventBusOptions } from "./InMemoryEventBus.js";
