import sharp from "sharp";
import { CONSTANTS } from "../constants/commonConstants.js";
import type { PreparedCard, RasterImage } from "../types/imposition.js";
import { describeError, type Logger } from "./debug.js";
import { fillOverlay, solidCanvas, toRgbRaster, toSharpColor } from "./imageCompositor.js";

/**
 * Blank stand-in for a card that could not be prepared: black bleed with a
 * white card-sized rectangle inset by `bleedPx`.
 */
export async function createFallbackCard(cardWidthPx: number, cardHeightPx: number, bleedPx: number): Promise<RasterImage> {
    const width = cardWidthPx + 2 * bleedPx;
    const height = cardHeightPx + 2 * bleedPx;
    const card = fillOverlay(bleedPx, bleedPx, cardWidthPx, cardHeightPx, CONSTANTS.FALLBACK_CARD_COLOR, width, height);
    return toRgbRaster(solidCanvas(width, height, CONSTANTS.BLEED_COLOR).composite(card ? [card] : []));
}

/**
 * Loads a card image and returns it at exactly
 * `(cardWidthPx + 2*bleedPx) x (cardHeightPx + 2*bleedPx)` raw RGB pixels.
 *
 * The artwork is scaled to cover the card area (larger of the two axis
 * ratios), center-cropped to the card size and surrounded by black bleed.
 * Alpha is dropped before resizing, so transparent areas keep their
 * underlying colour. Never rejects: failures come back as `status: 'fallback'`.
 */
export async function prepareCard(
    imagePath: string,
    cardWidthPx: number,
    cardHeightPx: number,
    bleedPx: number,
    logger: Logger = console,
): Promise<PreparedCard> {
    const width = cardWidthPx + 2 * bleedPx;
    const height = cardHeightPx + 2 * bleedPx;

    try {
        const decoded = await toRgbRaster(sharp(imagePath).removeAlpha().toColourspace('srgb'));

        let pipeline = sharp(decoded.data, { raw: { width: decoded.width, height: decoded.height, channels: 3 } })
            .resize(cardWidthPx, cardHeightPx, {
                fit: 'cover',
                position: 'centre',
                kernel: sharp.kernel.lanczos3,
            });
        if (bleedPx > 0) {
            pipeline = pipeline.extend({
                top: bleedPx,
                bottom: bleedPx,
                left: bleedPx,
                right: bleedPx,
                background: toSharpColor(CONSTANTS.BLEED_COLOR),
            });
        }

        const image = await toRgbRaster(pipeline);
        if (image.width !== width || image.height !== height) {
            throw new Error(`unexpected output ${image.width}x${image.height}, wanted ${width}x${height}`);
        }
        return { status: 'ok', image };
    } catch (err) {
        const reason = describeError(err);
        logger.warn(`[prepare] Problem with ${imagePath}: ${reason}`);
        return {
            status: 'fallback',
            image: await createFallbackCard(cardWidthPx, cardHeightPx, bleedPx),
            reason,
        };
    }
}
