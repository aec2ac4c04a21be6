import { PDFDocument } from "pdf-lib";
import sharp from "sharp";
import { PX_TO_POINTS } from "../constants/commonConstants.js";
import type { RasterImage } from "../types/imposition.js";

export async function encodeRasterPng(image: RasterImage, dpi: number): Promise<Buffer> {
    return sharp(image.data, {
        raw: { width: image.width, height: image.height, channels: image.channels },
    })
        .withMetadata({ density: dpi })
        .png()
        .toBuffer();
}

/**
 * Duplex sheet document: page 1 is the front, page 2 the mirrored back.
 * Each page is sized so the canvas prints at exactly `dpi`.
 */
export async function buildSheetPdf(front: RasterImage, back: RasterImage, dpi: number): Promise<Uint8Array> {
    const pdfDoc = await PDFDocument.create();

    for (const canvas of [front, back]) {
        const png = await encodeRasterPng(canvas, dpi);
        const image = await pdfDoc.embedPng(png);
        const page = pdfDoc.addPage([PX_TO_POINTS(canvas.width, dpi), PX_TO_POINTS(canvas.height, dpi)]);
        page.drawImage(image, {
            x: 0, y: 0,
            width: page.getWidth(),
            height: page.getHeight(),
        });
    }

    return pdfDoc.save();
}
