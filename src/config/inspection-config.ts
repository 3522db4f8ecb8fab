import {DEFAULT_SEVERITY_BOUNDS, SeverityBounds} from "../detection/severity-policy";

export type InspectionConfig = {
    weightsPath: string;
    confidenceThreshold: number;  // default slider value, (0..1)
    iouThreshold: number;         // NMS inside the model handle
    inputSize: number;            // square letterbox side
    severity: SeverityBounds;
    historyPreviewSize: number;   // entries shown in "recent scans"
    debug: boolean;
};

export const DEFAULT_CONFIG: InspectionConfig = {
    weightsPath: "./models/infra/best.onnx",
    confidenceThreshold: 0.25,
    iouThreshold: 0.45,
    inputSize: 1024,
    severity: DEFAULT_SEVERITY_BOUNDS,
    historyPreviewSize: 10,
    debug: false,
};

export type InspectionConfigInput = Partial<Omit<InspectionConfig, "severity">> & {
    severity?: Partial<SeverityBounds>;
};

export function assertThreshold(name: string, v: number): void {
    if (!Number.isFinite(v) || v <= 0 || v >= 1) {
        throw new RangeError(`${name} must lie strictly between 0 and 1, got ${v}`);
    }
}

export function buildConfig(options: InspectionConfigInput = {}): InspectionConfig {
    const config: InspectionConfig = {
        ...DEFAULT_CONFIG,
        ...options,
        severity: { ...DEFAULT_CONFIG.severity, ...(options.severity ?? {}) },
    };
    assertThreshold("confidenceThreshold", config.confidenceThreshold);
    assertThreshold("iouThreshold", config.iouThreshold);
    if (!Number.isInteger(config.inputSize) || config.inputSize < 32 || config.inputSize % 32 !== 0) {
        throw new RangeError(`inputSize must be a positive multiple of 32, got ${config.inputSize}`);
    }
    if (!Number.isInteger(config.historyPreviewSize) || config.historyPreviewSize < 1) {
        throw new RangeError(`historyPreviewSize must be a positive integer, got ${config.historyPreviewSize}`);
    }
    if (!config.weightsPath) {
        throw new RangeError("weightsPath must not be empty");
    }
    return config;
}

/**
 * Reads overrides from the environment:
 * INFRA_WEIGHTS_PATH, INFRA_CONFIDENCE, INFRA_IOU, INFRA_INPUT_SIZE, INFRA_DEBUG.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): InspectionConfig {
    const options: InspectionConfigInput = {};
    if (env.INFRA_WEIGHTS_PATH) options.weightsPath = env.INFRA_WEIGHTS_PATH;
    if (env.INFRA_CONFIDENCE) options.confidenceThreshold = parseNumber("INFRA_CONFIDENCE", env.INFRA_CONFIDENCE);
    if (env.INFRA_IOU) options.iouThreshold = parseNumber("INFRA_IOU", env.INFRA_IOU);
    if (env.INFRA_INPUT_SIZE) options.inputSize = parseNumber("INFRA_INPUT_SIZE", env.INFRA_INPUT_SIZE);
    if (env.INFRA_DEBUG) options.debug = env.INFRA_DEBUG === "1" || env.INFRA_DEBUG.toLowerCase() === "true";
    return buildConfig(options);
}

/** Threshold from a command-line argument; null when it is not a number in (0, 1). */
export function parseThresholdArg(raw: string | undefined, fallback: number): number | null {
    if (raw === undefined) return fallback;
    const v = raw.trim() === "" ? Number.NaN : Number(raw);
    return v > 0 && v < 1 ? v : null;
}

function parseNumber(name: string, raw: string): number {
    const v = Number(raw);
    if (Number.isNaN(v)) {
        throw new RangeError(`${name} is not a number: "${raw}"`);
    }
    return v;
}
