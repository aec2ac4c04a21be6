import { describe, it, expect, vi } from 'vitest';
import { computeLayout, fitGrid, padSheetNumber, sheetCount, sheetSlice } from './layout.js';
import type { PhysicalConstants } from '../types/imposition.js';

const a3Plus: PhysicalConstants = {
    paperWidthMm: 329,
    paperHeightMm: 483,
    cardWidthMm: 63,
    cardHeightMm: 88,
    bleedMm: 4,
};

const createLogger = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('computeLayout', () => {
    it('converts the reference A3+ setup at 300 dpi', () => {
        const layout = computeLayout(a3Plus, 300, { columns: 4, rows: 5 }, createLogger());

        expect(layout).toMatchObject({
            paperWidthPx: 3885,
            paperHeightPx: 5704,
            cardWidthPx: 744,
            cardHeightPx: 1039,
            bleedPx: 47,
            cardWithBleedWidthPx: 838,
            cardWithBleedHeightPx: 1133,
            gridOffsetXPx: 266,
            gridOffsetYPx: 19,
            columns: 4,
            rows: 5,
            cardsPerSheet: 20,
            dpi: 300,
            fits: true,
        });
    });

    it('composes the bleed card from converted parts', () => {
        // 2mm -> 23.6px floors to 23, 5mm -> 59.05px floors to 59
        const layout = computeLayout(
            { paperWidthMm: 200, paperHeightMm: 200, cardWidthMm: 5, cardHeightMm: 5, bleedMm: 2 },
            300,
            { columns: 1, rows: 1 },
            createLogger(),
        );
        expect(layout.cardWidthPx).toBe(59);
        expect(layout.bleedPx).toBe(23);
        expect(layout.cardWithBleedWidthPx).toBe(59 + 2 * 23);
    });

    it('logs a summary without warning when the grid fits', () => {
        const logger = createLogger();
        computeLayout(a3Plus, 300, { columns: 4, rows: 5 }, logger);

        expect(logger.log).toHaveBeenCalledWith('[layout] Paper: 329x483mm (3885x5704px @ 300dpi)');
        expect(logger.log).toHaveBeenCalledWith('[layout] Cards: 63x88mm + 4mm bleed');
        expect(logger.log).toHaveBeenCalledWith('[layout] Grid: 4x5 = 20 cards per sheet');
        expect(logger.log).toHaveBeenCalledWith('[layout] Space used: 284x480mm');
        expect(logger.warn).not.toHaveBeenCalled();
    });

    it('warns but still lays out an overflowing grid', () => {
        const logger = createLogger();
        const layout = computeLayout(a3Plus, 300, { columns: 5, rows: 5 }, logger);

        expect(logger.warn).toHaveBeenCalledWith(
            '[layout] WARNING: Cards might not fit! Grid needs 355x480mm on 329x483mm paper',
        );
        expect(layout.fits).toBe(false);
        expect(layout.cardsPerSheet).toBe(25);
        expect(layout.gridOffsetXPx).toBe(-153);
    });

    it('keeps cardsPerSheet = columns * rows >= 1', () => {
        const tiny = computeLayout(
            { paperWidthMm: 10, paperHeightMm: 10, cardWidthMm: 63, cardHeightMm: 88, bleedMm: 4 },
            300,
            { columns: 1, rows: 1 },
            createLogger(),
        );
        expect(tiny.cardsPerSheet).toBe(1);

        const wide = computeLayout(a3Plus, 150, { columns: 3, rows: 7 }, createLogger());
        expect(wide.cardsPerSheet).toBe(21);
    });

    it('returns a frozen model', () => {
        const layout = computeLayout(a3Plus, 300, undefined, createLogger());
        expect(Object.isFrozen(layout)).toBe(true);
        expect(Object.isFrozen(layout.constants)).toBe(true);
        expect(layout.columns).toBe(4);
        expect(layout.rows).toBe(5);
    });
});

describe('fitGrid', () => {
    it('fits 4x5 bleed cards on A3+', () => {
        expect(fitGrid(a3Plus)).toEqual({ columns: 4, rows: 5 });
    });

    it('fits 2x3 on A4', () => {
        expect(fitGrid({ ...a3Plus, paperWidthMm: 210, paperHeightMm: 297 })).toEqual({ columns: 2, rows: 3 });
    });

    it('never returns an empty grid', () => {
        expect(fitGrid({ ...a3Plus, paperWidthMm: 20, paperHeightMm: 20 })).toEqual({ columns: 1, rows: 1 });
    });
});

describe('sheet slicing', () => {
    const layout = computeLayout(a3Plus, 300, { columns: 4, rows: 5 }, createLogger());

    it('needs three sheets for 45 cards at 20 per sheet', () => {
        expect(sheetCount(45, layout)).toBe(3);
        expect(sheetCount(40, layout)).toBe(2);
        expect(sheetCount(0, layout)).toBe(0);
    });

    it('slices each sheet and leaves the last one partial', () => {
        expect(sheetSlice(0, 45, layout)).toEqual({ start: 0, end: 20 });
        expect(sheetSlice(1, 45, layout)).toEqual({ start: 20, end: 40 });
        expect(sheetSlice(2, 45, layout)).toEqual({ start: 40, end: 45 });
    });
});

describe('padSheetNumber', () => {
    it('is 1-based and padded to two digits', () => {
        expect(padSheetNumber(0)).toBe('01');
        expect(padSheetNumber(11)).toBe('12');
        expect(padSheetNumber(99)).toBe('100');
    });
});
