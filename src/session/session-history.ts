import type {DetectionResult} from "../types/detection.types";

export type ResultPair = {
    current: DetectionResult;
    previous: DetectionResult;
};

/**
 * Append-only log of one operator session, oldest first.
 * Created when the session starts and dropped with it; nothing is persisted.
 */
export class SessionHistory {
    private readonly entries: DetectionResult[] = [];

    constructor(readonly startedAt: Date = new Date()) {}

    get size(): number {
        return this.entries.length;
    }

    append(result: DetectionResult): void {
        this.entries.push(isSealedResult(result) ? result : freezeResult(result));
    }

    /** Last `n` results in chronological order; a copy. */
    recent(n: number): DetectionResult[] {
        const k = Math.floor(n);
        // also rejects NaN; slice(-0) would return everything
        if (!(k > 0)) return [];
        return this.entries.slice(-k);
    }

    latestPair(): ResultPair | undefined {
        const len = this.entries.length;
        if (len < 2) return undefined;
        return { current: this.entries[len - 1], previous: this.entries[len - 2] };
    }

    latest(): DetectionResult | undefined {
        return this.entries[this.entries.length - 1];
    }

    all(): DetectionResult[] {
        return [...this.entries];
    }
}

/** Detector output is frozen all the way down and can be stored as-is. */
function isSealedResult(result: DetectionResult): boolean {
    return Object.isFrozen(result)
        && Object.isFrozen(result.records)
        && Object.isFrozen(result.image)
        && result.records.every(r => Object.isFrozen(r) && Object.isFrozen(r.boundingBox));
}

function freezeResult(result: DetectionResult): DetectionResult {
    return Object.freeze({
        ...result,
        records: Object.freeze(result.records.map(r => Object.freeze({
            ...r,
            boundingBox: Object.freeze({ ...r.boundingBox }),
        }))),
        image: Object.freeze({ ...result.image }),
    });
}
