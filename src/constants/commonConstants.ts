/**
 * Imposition Constants
 *
 * Reference setup for card sheets plus the unit conversions every
 * geometry module shares.
 */
export const CONSTANTS = {
    /** Standard card game dimensions in mm */
    CARD_WIDTH_MM: 63,
    CARD_HEIGHT_MM: 88,

    /** Extra printed margin around each card, trimmed away when cutting */
    BLEED_MM: 4,

    /** A3+ sheet */
    PAPER_WIDTH_MM: 329,
    PAPER_HEIGHT_MM: 483,

    /** Default grid (fits 4x5 bleed cards on A3+) */
    COLUMNS: 4,
    ROWS: 5,

    /** Conversion constants */
    MM_PER_IN: 25.4,
    PDF_POINTS_PER_IN: 72,
    DEFAULT_DPI: 300,

    /** Reference border drawn around every placed card */
    GUIDE_COLOR: [0, 0, 255] as const,
    BACKGROUND_COLOR: [255, 255, 255] as const,
    BLEED_COLOR: [0, 0, 0] as const,
    FALLBACK_CARD_COLOR: [255, 255, 255] as const,

    /** Minutes between the Start and End stamps of a cutting job */
    CUTTING_JOB_MINUTES: 30,
} as const;

/** Whole device pixels covered by a length. Always rounds down. */
export const MM_TO_PX = (mm: number, dpi: number) => Math.floor(mm * dpi / CONSTANTS.MM_PER_IN);
export const PX_TO_MM = (px: number, dpi: number) => px * CONSTANTS.MM_PER_IN / dpi;
export const PX_TO_POINTS = (px: number, dpi: number) => px / dpi * CONSTANTS.PDF_POINTS_PER_IN;

/** Millimeters for display and JDF output: at most 3 decimals, no trailing zeros. */
export const formatMm = (mm: number) => String(Math.round(mm * 1000) / 1000);
