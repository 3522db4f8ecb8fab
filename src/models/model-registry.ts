import path from "path";
import {describeCause, ModelLoadError} from "../errors/inspection-errors";
import {DEFAULT_CONFIG} from "../config/inspection-config";
import type {LoadOptions, ModelLoader, WeightsHandle} from "./weights-handle";

/**
 * Keyed cache of loaded models, owned by the composition root.
 *
 * The first `getModel` for a path starts the load and parks its promise in the
 * map synchronously, so concurrent first callers all await the same load and
 * receive the same handle. Every handle is built with the registry's load options. A failed load is evicted so the caller can retry.
 */
export class ModelRegistry {
    private readonly handles = new Map<string, Promise<WeightsHandle>>();
    private readonly loadOptions: LoadOptions;
    private readonly debug: boolean;

    constructor(private readonly loader: ModelLoader, options?: Partial<LoadOptions> & { debug?: boolean }) {
        this.loadOptions = {
            inputSize: options?.inputSize ?? DEFAULT_CONFIG.inputSize,
            iouThreshold: options?.iouThreshold ?? DEFAULT_CONFIG.iouThreshold,
        };
        this.debug = options?.debug ?? false;
    }

    getModel(weightsPath: string): Promise<WeightsHandle> {
        const key = path.resolve(weightsPath);
        const cached = this.handles.get(key);
        if (cached) {
            return cached;
        }

        this.log(`Model cache miss: ${key}`);
        const pending = this.load(weightsPath);
        this.handles.set(key, pending);
        void pending.then(
            () => this.log(`Model cached: ${key}`),
            () => {
                if (this.handles.get(key) === pending) {
                    this.handles.delete(key);
                }
            },
        );
        return pending;
    }

    /** True once a load for the path has started and not failed. */
    has(weightsPath: string): boolean {
        return this.handles.has(path.resolve(weightsPath));
    }

    loadedPaths(): string[] {
        return [...this.handles.keys()];
    }

    private async load(weightsPath: string): Promise<WeightsHandle> {
        try {
            return await this.loader.load(weightsPath, this.loadOptions);
        } catch (e) {
            if (e instanceof ModelLoadError) throw e;
            throw new ModelLoadError(weightsPath, describeCause(e), { cause: e });
        }
    }

    private log(text: string) {
        if (this.debug) {
            console.log(text);
        }
    }
}
