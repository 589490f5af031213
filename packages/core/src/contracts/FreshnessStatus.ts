/**
 * Freshness Status
 *
 * Coarse labelling of a confidence value, independent of any
 * caller-supplied staleness threshold. Used for display.
 *
 * Bands:
 * - stale: < 0.3
 * - aging: 0.3 - 0.5
 * - ok:    0.5 - 0.7
 * - fresh: >= 0.7
 */

export type FreshnessStatus = "fresh" | "ok" | "aging" | "stale";

/**
 * Lower bound of each band, highest first.
 */
const kSTATUS_BANDS: ReadonlyArray<readonly [FreshnessStatus, number]> = [
    ["fresh", 0.7],
    ["ok", 0.5],
    ["aging", 0.3],
];

/**
 * Map a confidence value to its status band.
 *
 * @param confidence - Current confidence (0.0 - 1.0)
 */
export function classifyFreshness(confidence: number): FreshnessStatus {
    for (const [status, lowerBound] of kSTATUS_BANDS) {
        if (confidence >= lowerBound) {
            return status;
        }
    }
    return "stale";
}

/**
 * One-line explanation of a status band.
 */
export function describeStatus(status: FreshnessStatus): string {
    switch (status) {
        case "fresh":
            return "Data is fresh (> 70% confidence)";
        case "ok":
            return "Data is acceptable (50-70% confidence)";
        case "aging":
            return "Data is aging (< 50% confidence)";
        case "stale":
            return "Data is STALE (< 30% confidence)";
    }
}
