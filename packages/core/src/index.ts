/**
 * @fileoverview Freshness Core
 *
 * Temporal decay modeling for data freshness.
 *
 * The core provides:
 * - An immutable catalog of topic decay policies
 * - Single-record freshness calculation, with custom overrides
 * - Normalization of generic records (timestamp and confidence probing)
 * - Dataset evaluation with partial-failure tolerance
 *
 * It performs no I/O and writes nothing to the terminal.
 *
 * @module @freshness/core
 * @example
 * ```typescript
 * import { calculateFreshness, checkDataset } from "@freshness/core";
 *
 * calculateFreshness(0.9, "2024-01-01", "ai_training"); // 0.15
 *
 * const report = checkDataset(records, "news", { threshold: 0.4 });
 * if (report.staleEntries > 0) {
 *     console.log(report.summary);
 * }
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Component exports
// ============================================================================

export * from "./policies/index.js";
export * from "./calculator/index.js";
export * from "./normalizer/index.js";
export * from "./evaluator/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export * from "./impl/index.js";
