export * from "./types/detection.types";
export * from "./types/image-source";
export * from "./types/severity.enum";
export * from "./errors/inspection-errors";
export * from "./config/inspection-config";
export * from "./models/weights-handle";
export * from "./models/model-registry";
export * from "./models/onnx-model-loader";
export * from "./processors/image-processor";
export * from "./detection/severity-policy";
export * from "./detection/detector";
export * from "./analysis/analytics-engine";
export * from "./session/session-history";
export * from "./pipeline/inspection-pipeline";
export * from "./utils/draw-detections";
