import { describe, it, expect } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';
import { buildSheetPdf, encodeRasterPng } from './exportSheetPdf.js';
import { solidRaster } from '../test/rasterFixtures.js';

describe('exportSheetPdf', () => {
    it('encodes a raw canvas as a PNG with the same size', async () => {
        const canvas = await solidRaster(30, 20, [255, 0, 0]);

        const png = await encodeRasterPng(canvas, 300);
        const meta = await sharp(png).metadata();

        expect(meta.format).toBe('png');
        expect(meta.width).toBe(30);
        expect(meta.height).toBe(20);
        expect(meta.channels).toBe(3);
    });

    it('writes the front and back as two pages sized for the dpi', async () => {
        const front = await solidRaster(600, 300, [255, 255, 255]);
        const back = await solidRaster(600, 300, [0, 0, 0]);

        const bytes = await buildSheetPdf(front, back, 300);
        const pdf = await PDFDocument.load(bytes);

        expect(pdf.getPageCount()).toBe(2);
        for (const page of pdf.getPages()) {
            expect(page.getWidth()).toBeCloseTo(144, 6);
            expect(page.getHeight()).toBeCloseTo(72, 6);
        }
    });
});
