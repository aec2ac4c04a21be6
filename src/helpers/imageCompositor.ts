import sharp from "sharp";
import type { RasterImage } from "../types/imposition.js";

export type Rgb = readonly [number, number, number];

export const toSharpColor = ([r, g, b]: Rgb) => ({ r, g, b });

/** Runs the pipeline and returns its pixels as raw 3-channel sRGB. */
export async function toRgbRaster(pipeline: sharp.Sharp): Promise<RasterImage> {
    const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
    if (info.channels === 3) {
        return { width: info.width, height: info.height, channels: 3, data };
    }
    const rgb = await sharp(data, { raw: { width: info.width, height: info.height, channels: info.channels } })
        .removeAlpha()
        .toColourspace('srgb')
        .raw()
        .toBuffer();
    return { width: info.width, height: info.height, channels: 3, data: rgb };
}

export function solidCanvas(width: number, height: number, color: Rgb): sharp.Sharp {
    return sharp({ create: { width, height, channels: 3, background: toSharpColor(color) } });
}

interface ClippedRect {
    /** Position on the canvas. */
    left: number;
    top: number;
    width: number;
    height: number;
    /** Offset of the visible part inside the source. */
    sourceLeft: number;
    sourceTop: number;
}

/** Part of the rectangle (x, y, w, h) that lies on a canvasWidth x canvasHeight canvas. */
export function clipToCanvas(
    x: number,
    y: number,
    w: number,
    h: number,
    canvasWidth: number,
    canvasHeight: number,
): ClippedRect | null {
    const left = Math.max(0, x);
    const top = Math.max(0, y);
    const right = Math.min(canvasWidth, x + w);
    const bottom = Math.min(canvasHeight, y + h);
    if (right <= left || bottom <= top) return null;
    return { left, top, width: right - left, height: bottom - top, sourceLeft: left - x, sourceTop: top - y };
}

/** Overlay that paints `image` with its top-left corner at (x, y), cropped to the canvas. */
export async function imageOverlay(
    image: RasterImage,
    x: number,
    y: number,
    canvasWidth: number,
    canvasHeight: number,
): Promise<sharp.OverlayOptions | null> {
    const clip = clipToCanvas(x, y, image.width, image.height, canvasWidth, canvasHeight);
    if (!clip) return null;

    const raw = { width: image.width, height: image.height, channels: image.channels };
    if (clip.width === image.width && clip.height === image.height) {
        return { input: image.data, raw, left: clip.left, top: clip.top };
    }

    const visible = await sharp(image.data, { raw })
        .extract({ left: clip.sourceLeft, top: clip.sourceTop, width: clip.width, height: clip.height })
        .raw()
        .toBuffer();
    return {
        input: visible,
        raw: { width: clip.width, height: clip.height, channels: image.channels },
        left: clip.left,
        top: clip.top,
    };
}

export function fillOverlay(
    x: number,
    y: number,
    w: number,
    h: number,
    color: Rgb,
    canvasWidth: number,
    canvasHeight: number,
): sharp.OverlayOptions | null {
    const clip = clipToCanvas(x, y, w, h, canvasWidth, canvasHeight);
    if (!clip) return null;
    return {
        input: { create: { width: clip.width, height: clip.height, channels: 3, background: toSharpColor(color) } },
        left: clip.left,
        top: clip.top,
    };
}

/** Four 1px edges whose outer boundary is the rectangle (x, y, w, h). */
export function outlineOverlays(
    x: number,
    y: number,
    w: number,
    h: number,
    color: Rgb,
    canvasWidth: number,
    canvasHeight: number,
): sharp.OverlayOptions[] {
    if (w <= 0 || h <= 0) return [];
    return [
        fillOverlay(x, y, w, 1, color, canvasWidth, canvasHeight),
        fillOverlay(x, y + h - 1, w, 1, color, canvasWidth, canvasHeight),
        fillOverlay(x, y, 1, h, color, canvasWidth, canvasHeight),
        fillOverlay(x + w - 1, y, 1, h, color, canvasWidth, canvasHeight),
    ].filter((overlay): overlay is sharp.OverlayOptions => overlay !== null);
}
