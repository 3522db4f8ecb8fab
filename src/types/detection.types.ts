import {Severity} from "./severity.enum";

export type Box = { x1: number; y1: number; x2: number; y2: number };

/** One candidate as the model emits it, after its own NMS, in letterbox pixels. */
export type RawCandidate = {
    classId: number;
    confidence: number;
    box: Box;
};

export type DetectionRecord = {
    readonly classLabel: string;
    readonly confidence: number;      // [0..1]
    readonly boundingBox: Readonly<Box>; // source image pixels, x1<x2, y1<y2
    readonly severity: Severity;
};

export type DetectionResult = {
    readonly records: readonly DetectionRecord[]; // descending confidence
    readonly image: { readonly width: number; readonly height: number };
    readonly threshold: number;
    readonly timestamp: string;       // ISO 8601
    readonly weightsPath: string;
};
