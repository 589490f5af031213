/**
 * @fileoverview Evaluator barrel exports
 *
 * @module @freshness/core/evaluator
 */

export {
    batchCheck,
    buildSummary,
    checkDataset,
    formatPercent,
    type BatchOptions,
    type DatasetOptions,
} from "./DatasetEvaluator.js";
