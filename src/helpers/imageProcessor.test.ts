import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { createFallbackCard, prepareCard } from './imageProcessor.js';
import { pixelAt } from '../test/rasterFixtures.js';

const createLogger = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('imageProcessor', () => {
    let dir: string;

    beforeAll(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'card-imposer-img-'));
    });

    afterAll(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    describe('createFallbackCard', () => {
        it('is a black bleed around a white card', async () => {
            const image = await createFallbackCard(20, 30, 4);
            expect(image.width).toBe(28);
            expect(image.height).toBe(38);
            expect(pixelAt(image, 3, 3)).toEqual([0, 0, 0]);
            expect(pixelAt(image, 4, 4)).toEqual([255, 255, 255]);
            expect(pixelAt(image, 23, 33)).toEqual([255, 255, 255]);
            expect(pixelAt(image, 24, 34)).toEqual([0, 0, 0]);
        });
    });

    describe('prepareCard', () => {
        it('covers the card area and adds black bleed', async () => {
            const file = path.join(dir, 'wide-red.png');
            await sharp({ create: { width: 200, height: 100, channels: 3, background: { r: 255, g: 0, b: 0 } } })
                .png()
                .toFile(file);

            const result = await prepareCard(file, 50, 70, 5, createLogger());

            expect(result.status).toBe('ok');
            expect(result.image.width).toBe(60);
            expect(result.image.height).toBe(80);
            expect(result.image.data.length).toBe(60 * 80 * 3);
            expect(pixelAt(result.image, 0, 0)).toEqual([0, 0, 0]);
            expect(pixelAt(result.image, 4, 40)).toEqual([0, 0, 0]);
            const [r, g, b] = pixelAt(result.image, 30, 40);
            expect(r).toBeGreaterThan(250);
            expect(g).toBeLessThan(5);
            expect(b).toBeLessThan(5);
        });

        it('drops the alpha channel', async () => {
            const file = path.join(dir, 'translucent.png');
            await sharp({ create: { width: 40, height: 40, channels: 4, background: { r: 0, g: 255, b: 0, alpha: 1 } } })
                .png()
                .toFile(file);

            const result = await prepareCard(file, 20, 20, 2, createLogger());
            expect(result.status).toBe('ok');
            expect(result.image.channels).toBe(3);
            expect(result.image.data.length).toBe(24 * 24 * 3);
        });

        it('keeps the colour under transparent pixels', async () => {
            const file = path.join(dir, 'transparent-red.png');
            const rgba = Buffer.alloc(8 * 8 * 4);
            for (let i = 0; i < rgba.length; i += 4) rgba[i] = 255;
            await sharp(rgba, { raw: { width: 8, height: 8, channels: 4 } }).png().toFile(file);

            const result = await prepareCard(file, 20, 20, 2, createLogger());

            expect(result.status).toBe('ok');
            expect(pixelAt(result.image, 0, 0)).toEqual([0, 0, 0]);
            const [r, g, b] = pixelAt(result.image, 12, 12);
            expect(r).toBeGreaterThan(250);
            expect(g).toBeLessThan(5);
            expect(b).toBeLessThan(5);
        });

        it('works without bleed', async () => {
            const file = path.join(dir, 'no-bleed.jpg');
            await sharp({ create: { width: 64, height: 64, channels: 3, background: { r: 10, g: 20, b: 30 } } })
                .jpeg()
                .toFile(file);

            const result = await prepareCard(file, 16, 24, 0, createLogger());
            expect(result.status).toBe('ok');
            expect(result.image.width).toBe(16);
            expect(result.image.height).toBe(24);
        });

        it('falls back to a blank card for a missing file', async () => {
            const logger = createLogger();
            const file = path.join(dir, 'missing.png');

            const result = await prepareCard(file, 50, 70, 5, logger);

            expect(result.status).toBe('fallback');
            expect(result.image.width).toBe(60);
            expect(result.image.height).toBe(80);
            expect(pixelAt(result.image, 4, 4)).toEqual([0, 0, 0]);
            expect(pixelAt(result.image, 5, 5)).toEqual([255, 255, 255]);
            expect(logger.warn).toHaveBeenCalledTimes(1);
            expect(String(logger.warn.mock.calls[0][0]).startsWith(`[prepare] Problem with ${file}: `)).toBe(true);
        });

        it('falls back for a file that is not an image', async () => {
            const file = path.join(dir, 'corrupt.png');
            await fs.writeFile(file, 'definitely not a png');

            const result = await prepareCard(file, 30, 40, 3, createLogger());

            expect(result.status).toBe('fallback');
            if (result.status === 'fallback') {
                expect(result.reason.length).toBeGreaterThan(0);
            }
            expect(result.image.data.length).toBe(36 * 46 * 3);
        });
    });
});
