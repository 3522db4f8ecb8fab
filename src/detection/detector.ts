import {ImageProcessor, LetterboxedImage} from "../processors/image-processor";
import type {ImageSource} from "../types/image-source";
import type {DetectionRecord, DetectionResult, RawCandidate} from "../types/detection.types";
import type {WeightsHandle} from "../models/weights-handle";
import {describeCause, InferenceError} from "../errors/inspection-errors";
import {assertThreshold} from "../config/inspection-config";
import {classifySeverity, DEFAULT_SEVERITY_POLICY, orderSeverityPolicy, SeverityPolicy} from "./severity-policy";

export type DetectorOptions = {
    severityPolicy?: SeverityPolicy;
    imageProcessor?: ImageProcessor;
    now?: () => Date;
    debug?: boolean;
};

type NormalizeContext = Pick<LetterboxedImage, "originalWidth" | "originalHeight" | "scale" | "padX" | "padY"> & {
    classNames: readonly string[];
    threshold: number;
    policy: SeverityPolicy;
};

/**
 * Runs one image through a loaded model and turns the raw candidates into
 * detection records: threshold filter, labels, source-space boxes, severity,
 * descending confidence (stable for ties).
 */
export class Detector {
    private readonly severityPolicy: SeverityPolicy;
    private readonly imageProcessor: ImageProcessor;
    private readonly now: () => Date;
    private readonly debug: boolean;

    constructor(options: DetectorOptions = {}) {
        this.severityPolicy = orderSeverityPolicy(options.severityPolicy ?? DEFAULT_SEVERITY_POLICY);
        this.imageProcessor = options.imageProcessor ?? new ImageProcessor();
        this.now = options.now ?? (() => new Date());
        this.debug = options.debug ?? false;
    }

    async detect(src: ImageSource, model: WeightsHandle, threshold: number): Promise<DetectionResult> {
        assertThreshold("threshold", threshold);

        const letterboxed = await this.imageProcessor.letterbox(src, model.inputSize);

        let candidates: RawCandidate[];
        try {
            candidates = await model.infer(letterboxed.input, { minConfidence: threshold });
        } catch (e) {
            throw new InferenceError(`Inference failed for ${model.weightsPath}: ${describeCause(e)}`, { cause: e });
        }
        this.log(`Candidates from model: ${candidates.length}`);

        const records = normalizeCandidates(candidates, {
            ...letterboxed,
            classNames: model.classNames,
            threshold,
            policy: this.severityPolicy,
        });
        this.log(`Records after threshold ${threshold}: ${records.length}`);

        return Object.freeze({
            records: Object.freeze(records),
            image: Object.freeze({ width: letterboxed.originalWidth, height: letterboxed.originalHeight }),
            threshold,
            timestamp: this.now().toISOString(),
            weightsPath: model.weightsPath,
        });
    }

    private log(text: string) {
        if (this.debug) {
            console.log(text);
        }
    }
}

export function normalizeCandidates(candidates: readonly RawCandidate[], ctx: NormalizeContext): DetectionRecord[] {
    const { originalWidth: W, originalHeight: H, scale, padX, padY } = ctx;
    const clamp = (v: number, hi: number) => Math.max(0, Math.min(hi, v));

    const records: DetectionRecord[] = [];
    for (const c of candidates) {
        // NaN fails this comparison too
        if (!(c.confidence >= ctx.threshold)) continue;

        const x1 = clamp((c.box.x1 - padX) / scale, W);
        const y1 = clamp((c.box.y1 - padY) / scale, H);
        const x2 = clamp((c.box.x2 - padX) / scale, W);
        const y2 = clamp((c.box.y2 - padY) / scale, H);
        if (x2 <= x1 || y2 <= y1) continue;

        records.push(Object.freeze({
            classLabel: ctx.classNames[c.classId] ?? `class_${c.classId}`,
            confidence: c.confidence,
            boundingBox: Object.freeze({ x1, y1, x2, y2 }),
            severity: classifySeverity(c.confidence, ctx.policy),
        }));
    }

    // Array#sort is stable, so equal confidences keep model order
    return records.sort((a, b) => b.confidence - a.confidence);
}
