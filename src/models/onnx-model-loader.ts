import { promises as fs, constants } from "fs";
import path from "path";
import ort from "onnxruntime-node";
import type {InferenceSession, Tensor} from "onnxruntime-node";
import type {RawCandidate} from "../types/detection.types";
import {describeCause, ModelLoadError} from "../errors/inspection-errors";
import type {InferOptions, LoadOptions, ModelInput, ModelLoader, WeightsHandle} from "./weights-handle";
import {applyNMS, decodeYoloOutput, pickDetOutput, YoloOutput} from "./yolo-output";

/**
 * YOLOv8 ONNX weights bound to an onnxruntime session.
 *
 * NMS runs here, after decoding, so callers see the candidate list the way
 * a framework `predict()` would hand it back.
 */
export class OnnxWeightsHandle implements WeightsHandle {
    constructor(
        readonly weightsPath: string,
        private readonly session: InferenceSession,
        readonly classNames: readonly string[],
        readonly inputSize: number,
        private readonly iouThreshold: number,
    ) {}

    async infer(input: ModelInput, options: InferOptions): Promise<RawCandidate[]> {
        const feeds: Record<string, Tensor> = {};
        feeds[this.session.inputNames[0]] = new ort.Tensor("float32", input.data, [...input.dims]);

        const results = await this.session.run(feeds);

        const outputs: Record<string, YoloOutput> = {};
        for (const name of this.session.outputNames) {
            const tensor = results[name];
            if (tensor && tensor.data instanceof Float32Array) {
                outputs[name] = { data: tensor.data, dims: tensor.dims };
            }
        }

        const output = pickDetOutput(outputs, this.classNames.length);
        const candidates = decodeYoloOutput(output, this.classNames.length, options.minConfidence);
        return applyNMS(candidates, this.iouThreshold);
    }
}

export type OnnxModelLoaderOptions = {
    classNames?: string[];   // overrides classes.txt
    debug?: boolean;
};

export class OnnxModelLoader implements ModelLoader {
    private readonly debug: boolean;

    constructor(private readonly options: OnnxModelLoaderOptions = {}) {
        this.debug = options.debug ?? false;
    }

    async load(weightsPath: string, { inputSize, iouThreshold }: LoadOptions): Promise<WeightsHandle> {
        this.log(`Loading model: ${weightsPath}`);

        const readable = await fs.access(weightsPath, constants.R_OK).then(() => true, () => false);
        if (!readable) {
            throw new ModelLoadError(weightsPath, "file not found or not readable");
        }

        const classNames = this.options.classNames ?? await readClassesTxt(weightsPath);
        if (classNames.length === 0) {
            throw new ModelLoadError(weightsPath, "class list is empty; put classes.txt next to the model or pass classNames");
        }

        let session: InferenceSession;
        try {
            session = await ort.InferenceSession.create(weightsPath);
        } catch (e) {
            throw new ModelLoadError(weightsPath, describeCause(e), { cause: e });
        }

        this.log(`   inputs: ${JSON.stringify(session.inputNames)}`);
        this.log(`   outputs: ${JSON.stringify(session.outputNames)}`);
        this.log(`   classes: ${classNames.length}`);

        return new OnnxWeightsHandle(weightsPath, session, Object.freeze([...classNames]), inputSize, iouThreshold);
    }

    private log(text: string) {
        if (this.debug) {
            console.log(text);
        }
    }
}

/** One label per line in `classes.txt` beside the weights; missing file means no labels. */
export async function readClassesTxt(weightsPath: string): Promise<string[]> {
    const classesPath = path.join(path.dirname(weightsPath), "classes.txt");
    let text: string;
    try {
        text = await fs.readFile(classesPath, "utf8");
    } catch (e) {
        if (isNotFound(e)) return [];
        throw new ModelLoadError(weightsPath, `cannot read ${classesPath}: ${describeCause(e)}`, { cause: e });
    }
    return text.split(/\r?\n/).map(s => s.trim()).filter(Boolean);
}

function isNotFound(e: unknown): boolean {
    return e instanceof Error && "code" in e && e.code === "ENOENT";
}
