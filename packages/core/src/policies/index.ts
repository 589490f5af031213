/**
 * @fileoverview Policy catalog barrel exports
 *
 * @module @freshness/core/policies
 */

export {
    DEFAULT_TOPIC,
    getPolicy,
    hasPolicy,
    listPolicies,
    listPolicyIds,
    halfLifeDays,
} from "./PolicyCatalog.js";
