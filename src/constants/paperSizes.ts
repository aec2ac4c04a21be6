export interface PaperSize {
    readonly id: string;
    readonly name: string;
    readonly widthMm: number;
    readonly heightMm: number;
}

/** Portrait sheet sizes selectable by id (case-insensitive). */
export const PAPER_SIZES: readonly PaperSize[] = [
    { id: 'A4', name: 'A4', widthMm: 210, heightMm: 297 },
    { id: 'A3', name: 'A3', widthMm: 297, heightMm: 420 },
    { id: 'A3+', name: 'A3+ (Super B)', widthMm: 329, heightMm: 483 },
    { id: 'LETTER', name: 'Letter', widthMm: 215.9, heightMm: 279.4 },
    { id: 'LEGAL', name: 'Legal', widthMm: 215.9, heightMm: 355.6 },
    { id: 'TABLOID', name: 'Tabloid', widthMm: 279.4, heightMm: 431.8 },
] as const;

export function findPaperSize(id: string): PaperSize | undefined {
    const key = id.trim().toUpperCase();
    return PAPER_SIZES.find((p) => p.id === key);
}
