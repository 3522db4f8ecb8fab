import path from "path";
import type {Metadata} from "sharp";
import {openSharp, isRawPixels} from "../utils/open-sharp";
import type {ImageSource} from "../types/image-source";
import type {ModelInput} from "../models/weights-handle";
import {describeCause, InvalidImageError} from "../errors/inspection-errors";

export interface ImageMetadata {
    width: number;
    height: number;
    format: string;
    channels: number;
}

/** Letterboxed model input plus what is needed to map boxes back to the source. */
export interface LetterboxedImage {
    input: ModelInput;
    originalWidth: number;
    originalHeight: number;
    scale: number;
    padX: number;
    padY: number;
}

export type FileCheck = { valid: true } | { valid: false; reason: string };

const VALID_EXTENSIONS = [".jpg", ".jpeg", ".png", ".webp", ".tiff"];
const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;
const PAD_VALUE = 114;

export class ImageProcessor {
    /** Throws InvalidImageError for empty, zero-sized or undecodable input. */
    async getImageMetadata(src: ImageSource): Promise<ImageMetadata> {
        this.assertNotEmpty(src);

        let meta: Metadata;
        try {
            meta = await openSharp(src).sh.metadata();
        } catch (e) {
            throw new InvalidImageError(`Image could not be decoded: ${describeCause(e)}`, { cause: e });
        }
        const width  = meta.width  ?? 0;
        const height = meta.height ?? 0;
        if (width === 0 || height === 0) {
            throw new InvalidImageError(`Invalid image dimensions: ${width}x${height}`);
        }
        return {
            width,
            height,
            format: meta.format || "raw",
            channels: meta.channels ?? 3,
        };
    }

    /**
     * Resizes with preserved aspect ratio into a `size`x`size` canvas padded with 114,
     * then lays it out as CHW float32 in [0..1].
     */
    async letterbox(src: ImageSource, size: number): Promise<LetterboxedImage> {
        const { width: originalWidth, height: originalHeight } = await this.getImageMetadata(src);

        const scale = Math.min(size / originalWidth, size / originalHeight);
        const newW = Math.max(1, Math.floor(originalWidth * scale));
        const newH = Math.max(1, Math.floor(originalHeight * scale));
        const padX = Math.floor((size - newW) / 2);
        const padY = Math.floor((size - newH) / 2);

        let resized: Buffer;
        let stride: number;
        try {
            const { data, info } = await openSharp(src).sh
                .resize(newW, newH, { fit: 'fill', kernel: 'lanczos3' })
                .toColorspace('srgb')
                .removeAlpha()
                .raw()
                .toBuffer({ resolveWithObject: true });
            resized = data;
            stride = info.channels;
        } catch (e) {
            throw new InvalidImageError(`Image could not be decoded: ${describeCause(e)}`, { cause: e });
        }

        const canvas = Buffer.alloc(size * size * 3, PAD_VALUE);
        for (let y = 0; y < newH; y++) {
            for (let x = 0; x < newW; x++) {
                const s = (y * newW + x) * stride;
                const d = ((padY + y) * size + padX + x) * 3;
                canvas[d]     = resized[s];
                canvas[d + 1] = resized[s + (stride >= 3 ? 1 : 0)];
                canvas[d + 2] = resized[s + (stride >= 3 ? 2 : 0)];
            }
        }

        const area = size * size;
        const data = new Float32Array(3 * area);
        for (let i = 0; i < area; i++) {
            data[i]            = canvas[i * 3] / 255;       // R
            data[area + i]     = canvas[i * 3 + 1] / 255;   // G
            data[2 * area + i] = canvas[i * 3 + 2] / 255;   // B
        }

        return {
            input: { data, dims: [1, 3, size, size] },
            originalWidth,
            originalHeight,
            scale,
            padX,
            padY,
        };
    }

    validateImageFile(filename: string, sizeBytes: number): FileCheck {
        const ext = path.extname(filename).toLowerCase();
        if (!VALID_EXTENSIONS.includes(ext)) {
            return { valid: false, reason: `Invalid file type. Supported: ${VALID_EXTENSIONS.join(", ")}` };
        }
        if (sizeBytes <= 0) {
            return { valid: false, reason: "File is empty" };
        }
        if (sizeBytes > MAX_UPLOAD_BYTES) {
            return { valid: false, reason: `File too large. Maximum size: ${MAX_UPLOAD_BYTES / (1024 * 1024)}MB` };
        }
        return { valid: true };
    }

    private assertNotEmpty(src: ImageSource) {
        if (typeof src === "string") {
            if (src.trim() === "") throw new InvalidImageError("Image path is empty");
            return;
        }
        if (Buffer.isBuffer(src)) {
            if (src.length === 0) throw new InvalidImageError("Image buffer is empty");
            return;
        }
        if (isRawPixels(src)) {
            const { pixels, width, height, channels } = src;
            if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
                throw new InvalidImageError(`Invalid image dimensions: ${width}x${height}`);
            }
            if (pixels.length !== width * height * channels) {
                throw new InvalidImageError(
                    `Pixel buffer holds ${pixels.length} bytes, ${width}x${height}x${channels} needs ${width * height * channels}`,
                );
            }
            return;
        }
        if (src.data.length === 0) {
            throw new InvalidImageError(src.filename ? `Uploaded image ${src.filename} is empty` : "Uploaded image is empty");
        }
    }
}
