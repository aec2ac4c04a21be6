/**
 * Cut geometry for a sheet, in millimeters.
 * Derived only from the layout, so it never depends on card artwork.
 */
import { CONSTANTS, MM_TO_PX, PX_TO_MM } from "../constants/commonConstants.js";
import type { CutDescriptorSet, CutRectangle, LayoutModel } from "../types/imposition.js";

// Absorbs float noise like 265.99999999 before flooring to a whole pixel.
const PIXEL_EPSILON = 1e-6;

/**
 * Millimeter metrics snapped to the device pixel grid of `layout.dpi`.
 * Each length goes through the same floor conversion as the layout, and the
 * centering offset is floored to a whole pixel, so the results coincide with
 * the pixel positions the sheet builder uses.
 */
export function getGuideMetricsMm(layout: LayoutModel) {
    const { constants, dpi, columns, rows } = layout;
    const snap = (mm: number) => PX_TO_MM(MM_TO_PX(mm, dpi), dpi);
    const floorToPixel = (mm: number) => PX_TO_MM(Math.floor(mm * dpi / CONSTANTS.MM_PER_IN + PIXEL_EPSILON), dpi);

    const paperWidthMm = snap(constants.paperWidthMm);
    const paperHeightMm = snap(constants.paperHeightMm);
    const cardWidthMm = snap(constants.cardWidthMm);
    const cardHeightMm = snap(constants.cardHeightMm);
    const bleedMm = snap(constants.bleedMm);
    const pitchXMm = cardWidthMm + 2 * bleedMm;
    const pitchYMm = cardHeightMm + 2 * bleedMm;

    return {
        cardWidthMm,
        cardHeightMm,
        bleedMm,
        pitchXMm,
        pitchYMm,
        offsetXMm: floorToPixel((paperWidthMm - columns * pitchXMm) / 2),
        offsetYMm: floorToPixel((paperHeightMm - rows * pitchYMm) / 2),
    };
}

/**
 * One cut rectangle per grid cell, row-major. The rectangle is the finished
 * card: the bleed is outside the cut line. Y grows downward from the top edge
 * of the sheet, like the rendered page.
 */
export function buildCuttingGuide(sheetIndex: number, layout: LayoutModel): CutDescriptorSet {
    const m = getGuideMetricsMm(layout);
    const cuts: CutRectangle[] = [];

    for (let row = 0; row < layout.rows; row++) {
        for (let col = 0; col < layout.columns; col++) {
            const llx = m.offsetXMm + col * m.pitchXMm + m.bleedMm;
            const lly = m.offsetYMm + row * m.pitchYMm + m.bleedMm;
            cuts.push({
                sheetIndex,
                row,
                col,
                llx,
                lly,
                urx: llx + m.cardWidthMm,
                ury: lly + m.cardHeightMm,
                centerX: llx + m.cardWidthMm / 2,
                centerY: lly + m.cardHeightMm / 2,
                widthMm: m.cardWidthMm,
                heightMm: m.cardHeightMm,
            });
        }
    }

    return {
        sheetIndex,
        sheetNumber: sheetIndex + 1,
        paperWidthMm: layout.constants.paperWidthMm,
        paperHeightMm: layout.constants.paperHeightMm,
        cuts,
    };
}
