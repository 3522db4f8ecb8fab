import {Severity} from "../types/severity.enum";
import type {DetectionRecord, DetectionResult} from "../types/detection.types";

export type ConfidenceStats = {
    mean: number;
    median: number;
    min: number;
    max: number;
    std: number;    // population
};

export type SeverityCounts = Record<Severity, number>;

export type TrendDelta = {
    countDelta: number;
    /** null when either run has no detections */
    meanConfidenceDelta: number | null;
};

export type AlertStatus = "Critical" | "Safe";

/**
 * Snapshot over one record sequence. `confidence` and `trend` are null when
 * there is nothing to measure, which keeps "no detections" apart from
 * "detections at zero confidence".
 */
export type AnalyticsSummary = {
    count: number;
    confidence: ConfidenceStats | null;
    severityCounts: SeverityCounts;
    classCounts: Record<string, number>;
    trend: TrendDelta | null;
    status: AlertStatus;
};

export type SessionStats = {
    totalScans: number;
    totalDetections: number;
    scansWithDetections: number;
    averagePerScan: number | null;
    detectionRate: number | null;     // detections per scan, percent
};

export type TrendPoint = {
    timestamp: string;
    count: number;
    meanConfidence: number | null;
};

export function confidenceStats(values: readonly number[]): ConfidenceStats | null {
    if (values.length === 0) return null;

    const sorted = [...values].sort((a, b) => a - b);
    const n = sorted.length;
    const mean = sorted.reduce((s, v) => s + v, 0) / n;
    const mid = Math.floor(n / 2);
    const median = n % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
    const variance = sorted.reduce((s, v) => s + (v - mean) ** 2, 0) / n;

    return { mean, median, min: sorted[0], max: sorted[n - 1], std: Math.sqrt(variance) };
}

export function meanConfidence(records: readonly DetectionRecord[]): number | null {
    if (records.length === 0) return null;
    return records.reduce((s, r) => s + r.confidence, 0) / records.length;
}

/** Pure; severity is read from the records, never recomputed. */
export function summarize(records: readonly DetectionRecord[], priorResult?: DetectionResult): AnalyticsSummary {
    const severityCounts: SeverityCounts = {
        [Severity.HIGH]: 0,
        [Severity.MEDIUM]: 0,
        [Severity.LOW]: 0,
    };
    const classCounts = new Map<string, number>();

    for (const r of records) {
        severityCounts[r.severity] += 1;
        classCounts.set(r.classLabel, (classCounts.get(r.classLabel) ?? 0) + 1);
    }

    const confidence = confidenceStats(records.map(r => r.confidence));

    let trend: TrendDelta | null = null;
    if (priorResult) {
        const priorMean = meanConfidence(priorResult.records);
        trend = {
            countDelta: records.length - priorResult.records.length,
            meanConfidenceDelta: confidence && priorMean !== null ? confidence.mean - priorMean : null,
        };
    }

    return {
        count: records.length,
        confidence,
        severityCounts,
        classCounts: Object.fromEntries(classCounts),
        trend,
        status: records.length > 0 ? "Critical" : "Safe",
    };
}

export function sessionStats(results: readonly DetectionResult[]): SessionStats {
    const counts = results.map(r => r.records.length);
    const totalScans = counts.length;
    const totalDetections = counts.reduce((s, c) => s + c, 0);

    return {
        totalScans,
        totalDetections,
        scansWithDetections: counts.filter(c => c > 0).length,
        averagePerScan: totalScans > 0 ? totalDetections / totalScans : null,
        detectionRate: totalScans > 0 ? (totalDetections / totalScans) * 100 : null,
    };
}

export function trendSeries(results: readonly DetectionResult[]): TrendPoint[] {
    return results.map(r => ({
        timestamp: r.timestamp,
        count: r.records.length,
        meanConfidence: meanConfidence(r.records),
    }));
}
