import type {Box, RawCandidate} from "../types/detection.types";

export type YoloOutput = { data: Float32Array; dims: readonly number[] };

/**
 * Picks the detection head among the session outputs: the first `[1, 4+C, N]`
 * or `[1, N, 4+C]` tensor, otherwise the first output.
 */
export function pickDetOutput(results: Record<string, YoloOutput>, numClasses: number): YoloOutput {
    const expectedChannels = 4 + numClasses;
    const names = Object.keys(results);
    if (names.length === 0) {
        throw new Error("Model produced no float32 outputs");
    }

    for (const name of names) {
        const { dims } = results[name];
        if (dims.length === 3 && dims[0] === 1 && (dims[1] === expectedChannels || dims[2] === expectedChannels)) {
            return results[name];
        }
    }
    return results[names[0]];
}

/**
 * Decodes a YOLOv8 export. Scores are taken as-is (the export already emits
 * values in 0..1); boxes come out as corners in letterbox pixels.
 * Order follows the anchor order of the tensor.
 */
export function decodeYoloOutput(output: YoloOutput, numClasses: number, minConfidence: number): RawCandidate[] {
    const { data, dims } = output;
    const expectedChannels = 4 + numClasses;

    let channelFirst: boolean;
    let N: number;
    if (dims.length === 3 && dims[0] === 1 && dims[1] === expectedChannels) {
        channelFirst = true; N = dims[2];
    } else if (dims.length === 3 && dims[0] === 1 && dims[2] === expectedChannels) {
        channelFirst = false; N = dims[1];
    } else {
        throw new Error(`Unexpected output shape: ${dims.join("x")} for ${numClasses} classes`);
    }
    if (data.length < N * expectedChannels) {
        throw new Error(`Output holds ${data.length} values, shape ${dims.join("x")} needs ${N * expectedChannels}`);
    }

    const at = channelFirst
        ? (i: number, ch: number) => data[ch * N + i]
        : (i: number, ch: number) => data[i * expectedChannels + ch];

    const candidates: RawCandidate[] = [];
    for (let i = 0; i < N; i++) {
        const cx = at(i, 0), cy = at(i, 1), w = at(i, 2), h = at(i, 3);
        if (w <= 0 || h <= 0) continue;

        let bestScore = -Infinity, bestClass = -1;
        for (let c = 0; c < numClasses; c++) {
            const s = at(i, 4 + c);
            if (s > bestScore) { bestScore = s; bestClass = c; }
        }

        if (bestScore > 0 && bestScore >= minConfidence) {
            candidates.push({
                classId: bestClass,
                confidence: bestScore,
                box: { x1: cx - w / 2, y1: cy - h / 2, x2: cx + w / 2, y2: cy + h / 2 },
            });
        }
    }
    return candidates;
}

/** Class-wise greedy NMS. Returns survivors by descending confidence. */
export function applyNMS(candidates: RawCandidate[], iouThreshold: number): RawCandidate[] {
    let pending = [...candidates].sort((a, b) => b.confidence - a.confidence);
    const selected: RawCandidate[] = [];

    while (pending.length > 0) {
        const [current, ...rest] = pending;
        selected.push(current);
        pending = rest.filter((c) => c.classId !== current.classId || calculateIoU(current.box, c.box) < iouThreshold);
    }
    return selected;
}

export function calculateIoU(a: Box, b: Box): number {
    const iw = Math.max(0, Math.min(a.x2, b.x2) - Math.max(a.x1, b.x1));
    const ih = Math.max(0, Math.min(a.y2, b.y2) - Math.max(a.y1, b.y1));
    const inter = iw * ih;
    const union = (a.x2 - a.x1) * (a.y2 - a.y1) + (b.x2 - b.x1) * (b.y2 - b.y1) - inter;
    return union > 0 ? inter / union : 0;
}
