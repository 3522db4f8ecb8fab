import {buildConfig, InspectionConfig, InspectionConfigInput} from "../config/inspection-config";
import {Detector} from "../detection/detector";
import {createSeverityPolicy} from "../detection/severity-policy";
import {ModelRegistry} from "../models/model-registry";
import {OnnxModelLoader} from "../models/onnx-model-loader";
import type {ModelLoader} from "../models/weights-handle";
import {SessionHistory} from "../session/session-history";
import {
    AnalyticsSummary,
    SessionStats,
    sessionStats,
    summarize,
    TrendPoint,
    trendSeries,
} from "../analysis/analytics-engine";
import {InferenceError, InvalidImageError, isInspectionError, ModelLoadError} from "../errors/inspection-errors";
import type {DetectionResult} from "../types/detection.types";
import type {ImageSource} from "../types/image-source";

export type InspectionOutcome =
    | { ok: true; result: DetectionResult; summary: AnalyticsSummary }
    | { ok: false; error: ModelLoadError | InvalidImageError | InferenceError };

export type InspectOptions = {
    threshold?: number;     // falls back to config.confidenceThreshold
    weightsPath?: string;   // falls back to config.weightsPath
};

export type SessionOverview = {
    stats: SessionStats;
    trend: TrendPoint[];
    recent: DetectionResult[];
    latest?: AnalyticsSummary;
};

/**
 * Composition root for one process: owns the model registry and the detector
 * and runs a detection cycle (load → detect → summarize → append) per image.
 * The registry is built here so `inputSize` and `iouThreshold` reach every handle.
 */
export class InspectionPipeline {
    readonly config: InspectionConfig;
    readonly registry: ModelRegistry;
    private readonly detector: Detector;

    constructor(loader: ModelLoader, config: InspectionConfigInput = {}, detector?: Detector) {
        this.config = buildConfig(config);
        this.registry = new ModelRegistry(loader, {
            inputSize: this.config.inputSize,
            iouThreshold: this.config.iouThreshold,
            debug: this.config.debug,
        });
        this.detector = detector ?? new Detector({
            severityPolicy: createSeverityPolicy(this.config.severity),
            debug: this.config.debug,
        });
    }

    static create(config: InspectionConfigInput = {}): InspectionPipeline {
        return new InspectionPipeline(new OnnxModelLoader({ debug: config.debug }), config);
    }

    createSession(): SessionHistory {
        return new SessionHistory();
    }

    /**
     * On failure nothing is appended. Errors outside the inspection taxonomy
     * (including a RangeError for a threshold outside (0, 1)) are rethrown.
     */
    async inspect(src: ImageSource, session: SessionHistory, options: InspectOptions = {}): Promise<InspectionOutcome> {
        const threshold = options.threshold ?? this.config.confidenceThreshold;
        const weightsPath = options.weightsPath ?? this.config.weightsPath;

        try {
            const model = await this.registry.getModel(weightsPath);
            const result = await this.detector.detect(src, model, threshold);
            const summary = summarize(result.records, session.latest());
            session.append(result);
            return { ok: true, result, summary };
        } catch (e) {
            if (isInspectionError(e)) {
                return { ok: false, error: e };
            }
            throw e;
        }
    }

    /** Summary of the newest run against the one before it. */
    latestSummary(session: SessionHistory): AnalyticsSummary | undefined {
        const pair = session.latestPair();
        if (pair) {
            return summarize(pair.current.records, pair.previous);
        }
        const only = session.latest();
        return only ? summarize(only.records) : undefined;
    }

    overview(session: SessionHistory): SessionOverview {
        const all = session.all();
        return {
            stats: sessionStats(all),
            trend: trendSeries(all),
            recent: session.recent(this.config.historyPreviewSize),
            latest: this.latestSummary(session),
        };
    }
}
