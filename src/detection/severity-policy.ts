import {Severity} from "../types/severity.enum";

export type SeverityBand = { lowerBound: number; severity: Severity };

/** Bands ordered from the highest lower bound down; anything below the last band is LOW. */
export type SeverityPolicy = readonly SeverityBand[];

export type SeverityBounds = { high: number; medium: number };

export const DEFAULT_SEVERITY_BOUNDS: SeverityBounds = {
    high: 0.75,
    medium: 0.5,
};

export function createSeverityPolicy(bounds: Partial<SeverityBounds> = {}): SeverityPolicy {
    const { high, medium } = { ...DEFAULT_SEVERITY_BOUNDS, ...bounds };
    for (const [name, v] of [["high", high], ["medium", medium]] as const) {
        if (!Number.isFinite(v) || v < 0 || v > 1) {
            throw new RangeError(`Severity bound "${name}" must lie in [0, 1], got ${v}`);
        }
    }
    if (high <= medium) {
        throw new RangeError(`Severity bound "high" (${high}) must be greater than "medium" (${medium})`);
    }
    return Object.freeze([
        { lowerBound: high, severity: Severity.HIGH },
        { lowerBound: medium, severity: Severity.MEDIUM },
    ]);
}

export const DEFAULT_SEVERITY_POLICY: SeverityPolicy = createSeverityPolicy();

/** Puts hand-built bands in the highest-first order `classifySeverity` walks. */
export function orderSeverityPolicy(policy: SeverityPolicy): SeverityPolicy {
    return Object.freeze([...policy].sort((a, b) => b.lowerBound - a.lowerBound));
}

export function classifySeverity(confidence: number, policy: SeverityPolicy = DEFAULT_SEVERITY_POLICY): Severity {
    for (const band of policy) {
        if (confidence >= band.lowerBound) return band.severity;
    }
    return Severity.LOW;
}
