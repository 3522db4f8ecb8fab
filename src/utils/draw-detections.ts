import sharp from "sharp";
import type {DetectionRecord} from "../types/detection.types";
import {Severity} from "../types/severity.enum";

export const SEVERITY_COLORS: Record<Severity, string> = {
    [Severity.HIGH]: "#ef4444",
    [Severity.MEDIUM]: "#f59e0b",
    [Severity.LOW]: "#22c55e",
};

const esc = (s: string) => s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

/**
 * Builds the overlay: one box per record plus a "label (0.93)" tag above it.
 * Colour comes from `classPalette[label]` when given, otherwise from severity.
 */
export function buildOverlaySvg(
    W: number,
    H: number,
    records: readonly DetectionRecord[],
    classPalette?: Record<string, string>,
): string {
    const strokeWidth = Math.max(2, Math.floor(Math.min(W, H) * 0.003));
    const fontSize = Math.max(14, Math.floor(Math.min(W, H) * 0.025));
    const padX = Math.max(6, Math.floor(fontSize * 0.5));
    const padY = Math.max(4, Math.floor(fontSize * 0.35));

    let svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${W}" height="${H}">` +
        `<style>.lbl{font-family:-apple-system,BlinkMacSystemFont,Segoe UI,Roboto,Helvetica,Arial;font-size:${fontSize}px;font-weight:600;}</style>`;

    for (const det of records) {
        const { classLabel, confidence, boundingBox: box, severity } = det;
        const x1 = Math.max(0, Math.min(W, Math.round(box.x1)));
        const y1 = Math.max(0, Math.min(H, Math.round(box.y1)));
        const x2 = Math.max(0, Math.min(W, Math.round(box.x2)));
        const y2 = Math.max(0, Math.min(H, Math.round(box.y2)));
        if (x2 <= x1 || y2 <= y1) continue;

        const col = classPalette?.[classLabel] ?? SEVERITY_COLORS[severity];
        const text = `${classLabel} (${confidence.toFixed(2)})`;
        // ~0.6em per glyph is close enough to size the tag background
        const bgW = Math.ceil(text.length * fontSize * 0.6) + padX * 2;
        const bgH = fontSize + padY * 2;
        const bgX = x1, bgY = Math.max(0, y1 - bgH - Math.max(2, strokeWidth));

        svg += `<rect x="${x1}" y="${y1}" width="${x2 - x1}" height="${y2 - y1}" fill="none" stroke="${col}" stroke-width="${strokeWidth}"/>` +
            `<rect x="${bgX}" y="${bgY}" width="${Math.min(bgW, W - bgX)}" height="${bgH}" fill="${col}" opacity="0.85" rx="${Math.floor(bgH * 0.2)}"/>` +
            `<text x="${bgX + padX}" y="${bgY + padY + Math.floor(fontSize * 0.8)}" class="lbl" fill="#fff">${esc(text)}</text>`;
    }
    return svg + `</svg>`;
}

export async function drawDetectionsOnBuffer(
    imageBuffer: Buffer,
    records: readonly DetectionRecord[],
    classPalette?: Record<string, string>,
): Promise<Buffer> {
    const meta = await sharp(imageBuffer).metadata();
    const W = meta.width ?? 0;
    const H = meta.height ?? 0;
    if (!W || !H) throw new Error('Could not determine image dimensions');

    const svg = buildOverlaySvg(W, H, records, classPalette);
    return await sharp(imageBuffer).composite([{ input: Buffer.from(svg), left: 0, top: 0 }]).toBuffer();
}
