import { CONSTANTS, MM_TO_PX, formatMm } from "../constants/commonConstants.js";
import type { GridSize, LayoutModel, PhysicalConstants } from "../types/imposition.js";
import type { Logger } from "./debug.js";

export const defaultGrid: GridSize = {
    columns: CONSTANTS.COLUMNS,
    rows: CONSTANTS.ROWS,
};

const FIT_EPSILON_MM = 1e-9;

/**
 * Largest grid of bleed-expanded cards that fits the paper, at least 1x1.
 */
export function fitGrid(constants: PhysicalConstants): GridSize {
    const pitchW = constants.cardWidthMm + 2 * constants.bleedMm;
    const pitchH = constants.cardHeightMm + 2 * constants.bleedMm;
    return {
        columns: Math.max(1, Math.floor((constants.paperWidthMm + FIT_EPSILON_MM) / pitchW)),
        rows: Math.max(1, Math.floor((constants.paperHeightMm + FIT_EPSILON_MM) / pitchH)),
    };
}

/**
 * Converts the physical setup into pixel geometry at `dpi`.
 *
 * Paper, card and bleed are converted independently and the bleed-expanded
 * card is composed from the converted parts (`card + 2 * bleed` in pixels).
 * The sheet builder and the cutting guide both derive from these numbers.
 */
export function computeLayout(
    constants: PhysicalConstants,
    dpi: number = CONSTANTS.DEFAULT_DPI,
    grid: GridSize = defaultGrid,
    logger: Logger = console,
): LayoutModel {
    const { columns, rows } = grid;
    const paperWidthPx = MM_TO_PX(constants.paperWidthMm, dpi);
    const paperHeightPx = MM_TO_PX(constants.paperHeightMm, dpi);
    const cardWidthPx = MM_TO_PX(constants.cardWidthMm, dpi);
    const cardHeightPx = MM_TO_PX(constants.cardHeightMm, dpi);
    const bleedPx = MM_TO_PX(constants.bleedMm, dpi);

    const cardWithBleedWidthPx = cardWidthPx + 2 * bleedPx;
    const cardWithBleedHeightPx = cardHeightPx + 2 * bleedPx;

    const neededWidthMm = columns * (constants.cardWidthMm + 2 * constants.bleedMm);
    const neededHeightMm = rows * (constants.cardHeightMm + 2 * constants.bleedMm);
    const fits = neededWidthMm <= constants.paperWidthMm + FIT_EPSILON_MM
        && neededHeightMm <= constants.paperHeightMm + FIT_EPSILON_MM;

    const layout: LayoutModel = {
        constants: Object.freeze({ ...constants }),
        dpi,
        columns,
        rows,
        paperWidthPx,
        paperHeightPx,
        cardWidthPx,
        cardHeightPx,
        bleedPx,
        cardWithBleedWidthPx,
        cardWithBleedHeightPx,
        gridOffsetXPx: Math.floor((paperWidthPx - columns * cardWithBleedWidthPx) / 2),
        gridOffsetYPx: Math.floor((paperHeightPx - rows * cardWithBleedHeightPx) / 2),
        cardsPerSheet: columns * rows,
        fits,
    };

    logger.log(`[layout] Paper: ${formatMm(constants.paperWidthMm)}x${formatMm(constants.paperHeightMm)}mm (${paperWidthPx}x${paperHeightPx}px @ ${dpi}dpi)`);
    logger.log(`[layout] Cards: ${formatMm(constants.cardWidthMm)}x${formatMm(constants.cardHeightMm)}mm + ${formatMm(constants.bleedMm)}mm bleed`);
    logger.log(`[layout] Grid: ${columns}x${rows} = ${layout.cardsPerSheet} cards per sheet`);
    logger.log(`[layout] Space used: ${formatMm(neededWidthMm)}x${formatMm(neededHeightMm)}mm`);
    if (!fits) {
        logger.warn(`[layout] WARNING: Cards might not fit! Grid needs ${formatMm(neededWidthMm)}x${formatMm(neededHeightMm)}mm on ${formatMm(constants.paperWidthMm)}x${formatMm(constants.paperHeightMm)}mm paper`);
    }

    return Object.freeze(layout);
}

export function sheetCount(totalCards: number, layout: LayoutModel): number {
    return Math.ceil(totalCards / layout.cardsPerSheet);
}

/** Global card indices `[start, end)` placed on a sheet. */
export function sheetSlice(sheetIndex: number, totalCards: number, layout: LayoutModel): { start: number; end: number } {
    const start = sheetIndex * layout.cardsPerSheet;
    return { start, end: Math.min(start + layout.cardsPerSheet, totalCards) };
}

/** 1-based sheet number padded to at least two digits: 0 -> "01". */
export function padSheetNumber(sheetIndex: number): string {
    return String(sheetIndex + 1).padStart(2, '0');
}
