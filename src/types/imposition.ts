/** Physical dimensions, all in millimeters. */
export interface PhysicalConstants {
  paperWidthMm: number;
  paperHeightMm: number;
  cardWidthMm: number;
  cardHeightMm: number;
  bleedMm: number;
}

export interface GridSize {
  columns: number;
  rows: number;
}

export interface LayoutModel extends GridSize {
  readonly constants: PhysicalConstants;
  dpi: number;
  paperWidthPx: number;
  paperHeightPx: number;
  cardWidthPx: number;
  cardHeightPx: number;
  bleedPx: number;
  // cardPx + 2 * bleedPx
  cardWithBleedWidthPx: number;
  cardWithBleedHeightPx: number;
  gridOffsetXPx: number;
  gridOffsetYPx: number;
  cardsPerSheet: number;
  fits: boolean;
}

export interface CardPair {
  readonly front: string;
  readonly back: string;
}

export type SheetSide = 'front' | 'back';

export interface SlotPlacement {
  globalIndex: number;
  slot: number;
  row: number;
  col: number;
  x: number;
  y: number;
  imagePath: string;
}

/** Raw interleaved RGB pixels. */
export interface RasterImage {
  width: number;
  height: number;
  channels: 3;
  data: Buffer;
}

export type PreparedCard =
  | { status: 'ok'; image: RasterImage }
  | { status: 'fallback'; image: RasterImage; reason: string };

export type CardPreparer = (
  imagePath: string,
  cardWidthPx: number,
  cardHeightPx: number,
  bleedPx: number,
) => Promise<PreparedCard>;

export interface CutRectangle {
  sheetIndex: number;
  row: number;
  col: number;
  llx: number;
  lly: number;
  urx: number;
  ury: number;
  centerX: number;
  centerY: number;
  widthMm: number;
  heightMm: number;
}

export interface CutDescriptorSet {
  sheetIndex: number;
  sheetNumber: number;
  paperWidthMm: number;
  paperHeightMm: number;
  cuts: CutRectangle[];
}
