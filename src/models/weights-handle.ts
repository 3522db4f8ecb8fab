import type {RawCandidate} from "../types/detection.types";

/** Letterboxed CHW tensor, values scaled to [0..1]. */
export type ModelInput = {
    data: Float32Array;
    dims: readonly [1, 3, number, number];
};

export type InferOptions = {
    /** Candidates scoring below this never reach NMS. */
    minConfidence: number;
};

/**
 * A loaded, inference-ready model. Immutable after construction;
 * `infer` does not touch handle state, so one handle serves concurrent requests.
 */
export interface WeightsHandle {
    readonly weightsPath: string;
    readonly classNames: readonly string[];
    readonly inputSize: number;
    infer(input: ModelInput, options: InferOptions): Promise<RawCandidate[]>;
}

/** How the handle is built: letterbox side and the NMS overlap limit. */
export type LoadOptions = {
    inputSize: number;
    iouThreshold: number;
};

export interface ModelLoader {
    load(weightsPath: string, options: LoadOptions): Promise<WeightsHandle>;
}

export type ModelInfo = {
    weightsPath: string;
    modelType: "yolov8-onnx";
    classNames: string[];
    numClasses: number;
    inputSize: number;
};

export function describeModel(model: WeightsHandle): ModelInfo {
    return {
        weightsPath: model.weightsPath,
        modelType: "yolov8-onnx",
        classNames: [...model.classNames],
        numClasses: model.classNames.length,
        inputSize: model.inputSize,
    };
}
