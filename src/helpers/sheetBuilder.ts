import type sharp from "sharp";
import { CONSTANTS } from "../constants/commonConstants.js";
import type {
    CardPair,
    CardPreparer,
    LayoutModel,
    RasterImage,
    SheetSide,
    SlotPlacement,
} from "../types/imposition.js";
import { debugLog, type Logger } from "./debug.js";
import { imageOverlay, outlineOverlays, solidCanvas, toRgbRaster } from "./imageCompositor.js";
import { prepareCard } from "./imageProcessor.js";
import { sheetSlice } from "./layout.js";

export interface SheetFallback {
    sheetIndex: number;
    side: SheetSide;
    imagePath: string;
    reason: string;
}

export interface SheetCanvas {
    sheetIndex: number;
    side: SheetSide;
    image: RasterImage;
    fallbacks: SheetFallback[];
}

export interface BuildSheetOptions {
    preparer?: CardPreparer;
    logger?: Logger;
}

/**
 * Where every card of a sheet goes. On the back side columns are mirrored
 * (`columns - 1 - col`) so that after flipping the sheet around its vertical
 * axis each back lands behind its front.
 */
export function planSheet(
    pairs: readonly CardPair[],
    sheetIndex: number,
    layout: LayoutModel,
    side: SheetSide,
): SlotPlacement[] {
    const { start, end } = sheetSlice(sheetIndex, pairs.length, layout);
    const placements: SlotPlacement[] = [];

    for (let i = start; i < end; i++) {
        const slot = i - start;
        const row = Math.floor(slot / layout.columns);
        const frontCol = slot % layout.columns;
        const col = side === 'back' ? layout.columns - 1 - frontCol : frontCol;
        const pair = pairs[i];
        placements.push({
            globalIndex: i,
            slot,
            row,
            col,
            x: layout.gridOffsetXPx + col * layout.cardWithBleedWidthPx,
            y: layout.gridOffsetYPx + row * layout.cardWithBleedHeightPx,
            imagePath: side === 'back' ? pair.back : pair.front,
        });
    }
    return placements;
}

/**
 * Renders one side of a sheet: white paper, prepared cards at their slots and
 * a 1px reference border around each bleed-expanded card. Unfilled slots stay
 * white.
 */
export async function buildSheet(
    pairs: readonly CardPair[],
    sheetIndex: number,
    layout: LayoutModel,
    side: SheetSide,
    options: BuildSheetOptions = {},
): Promise<SheetCanvas> {
    const logger = options.logger ?? console;
    const preparer: CardPreparer = options.preparer
        ?? ((imagePath, w, h, bleed) => prepareCard(imagePath, w, h, bleed, logger));

    const { paperWidthPx, paperHeightPx } = layout;
    const overlays: sharp.OverlayOptions[] = [];
    const fallbacks: SheetFallback[] = [];

    for (const placement of planSheet(pairs, sheetIndex, layout, side)) {
        debugLog(`[sheet ${sheetIndex + 1}] ${side} slot ${placement.slot} (r${placement.row} c${placement.col}) <- ${placement.imagePath}`);
        const prepared = await preparer(placement.imagePath, layout.cardWidthPx, layout.cardHeightPx, layout.bleedPx);
        if (prepared.status === 'fallback') {
            logger.warn(`[sheet ${sheetIndex + 1}] ${side} slot ${placement.slot}: using blank card for ${placement.imagePath}`);
            fallbacks.push({ sheetIndex, side, imagePath: placement.imagePath, reason: prepared.reason });
        }

        const card = await imageOverlay(prepared.image, placement.x, placement.y, paperWidthPx, paperHeightPx);
        if (card) overlays.push(card);
        overlays.push(...outlineOverlays(
            placement.x,
            placement.y,
            layout.cardWithBleedWidthPx,
            layout.cardWithBleedHeightPx,
            CONSTANTS.GUIDE_COLOR,
            paperWidthPx,
            paperHeightPx,
        ));
    }

    const image = await toRgbRaster(
        solidCanvas(paperWidthPx, paperHeightPx, CONSTANTS.BACKGROUND_COLOR).composite(overlays),
    );

    return { sheetIndex, side, image, fallbacks };
}
