import sharp, { Sharp } from 'sharp';
import path from 'node:path';
import type { ImageSource, RawPixels } from '../types/image-source';

export function isRawPixels(src: ImageSource): src is RawPixels {
    return typeof src === 'object' && !Buffer.isBuffer(src) && 'pixels' in src;
}

export function openSharp(src: ImageSource): { sh: Sharp; filename?: string } {
    if (typeof src === 'string') {
        return { sh: sharp(src), filename: path.basename(src) };
    }
    if (Buffer.isBuffer(src)) {
        return { sh: sharp(src) };
    }
    if (isRawPixels(src)) {
        const { pixels, width, height, channels } = src;
        return { sh: sharp(pixels, { raw: { width, height, channels } }) };
    }
    // { data: Buffer, ... }
    return { sh: sharp(src.data), filename: src.filename };
}
