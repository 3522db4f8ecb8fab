/**
 * Error kinds surfaced by the inspection core.
 *
 * The core never prints these; whoever calls it decides what the operator sees.
 * An empty trend is not an error and is reported as `null` instead.
 */
export abstract class InspectionError extends Error {
    abstract readonly kind: "model-load" | "invalid-image" | "inference";

    protected constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Weights artifact missing, unreadable or not loadable by the runtime. */
export class ModelLoadError extends InspectionError {
    readonly kind = "model-load";

    constructor(readonly weightsPath: string, reason: string, options?: ErrorOptions) {
        super(`Failed to load model from ${weightsPath}: ${reason}`, options);
    }
}

/** Image is empty, has a zero dimension, or could not be decoded. */
export class InvalidImageError extends InspectionError {
    readonly kind = "invalid-image";
    readonly hint = "Upload a non-empty JPEG, PNG, WebP or TIFF image.";

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/** The model runtime threw while running the session. */
export class InferenceError extends InspectionError {
    readonly kind = "inference";

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export function isInspectionError(e: unknown): e is ModelLoadError | InvalidImageError | InferenceError {
    return e instanceof ModelLoadError || e instanceof InvalidImageError || e instanceof InferenceError;
}

export function describeCause(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
