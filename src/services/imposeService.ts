import fs from "fs/promises";
import path from "path";
import { validateConfig, type ImposeConfig } from "../config.js";
import { collectCardPairs, type CardImageSource } from "../helpers/cardSources.js";
import { buildCuttingGuide } from "../helpers/cutGuideUtils.js";
import type { Logger } from "../helpers/debug.js";
import { buildSheetPdf } from "../helpers/exportSheetPdf.js";
import { FileSystemCardImageSource } from "../helpers/fileSystemSource.js";
import { buildCuttingGuideXml } from "../helpers/jdfExport.js";
import { computeLayout, padSheetNumber, sheetCount } from "../helpers/layout.js";
import { buildSheet, type SheetFallback } from "../helpers/sheetBuilder.js";
import type { CardPreparer, LayoutModel } from "../types/imposition.js";
import { pLimit } from "../utils/pLimit.js";

export class NoCardsError extends Error {
    constructor(message = 'No cards found! Check your folders.') {
        super(message);
        this.name = 'NoCardsError';
    }
}

type WriteFile = (filePath: string, data: Uint8Array | string) => Promise<void>;
type MakeDirectory = (dir: string) => Promise<void>;

export interface ImposeDependencies {
    source?: CardImageSource;
    preparer?: CardPreparer;
    logger?: Logger;
    writeFile?: WriteFile;
    mkdir?: MakeDirectory;
    now?: () => Date;
}

export interface SheetOutput {
    sheetIndex: number;
    pdfPath: string;
    cuttingGuidePath: string;
}

export interface RunSummary {
    layout: LayoutModel;
    totalCards: number;
    sheetCount: number;
    sheets: SheetOutput[];
    fallbacks: SheetFallback[];
}

export function sheetFileNames(sheetIndex: number) {
    const stem = `sheet_${padSheetNumber(sheetIndex)}`;
    return { pdf: `${stem}.pdf`, cuttingGuide: `${stem}_cutting.jdf` };
}

/**
 * Lays out every discovered card pair and writes, per sheet, a two-page duplex
 * PDF and a JDF cutting guide into `config.outputDir`.
 */
export async function runImposition(config: ImposeConfig, deps: ImposeDependencies = {}): Promise<RunSummary> {
    const logger = deps.logger ?? console;
    const source = deps.source ?? new FileSystemCardImageSource();
    const writeFile: WriteFile = deps.writeFile ?? ((filePath, data) => fs.writeFile(filePath, data));
    const mkdir: MakeDirectory = deps.mkdir ?? (async (dir) => { await fs.mkdir(dir, { recursive: true }); });
    const now = deps.now ?? (() => new Date());

    validateConfig(config);
    const layout = computeLayout(config.constants, config.dpi, config, logger);

    const pairs = await collectCardPairs(source, config, logger);
    if (pairs.length === 0) {
        throw new NoCardsError();
    }

    const count = sheetCount(pairs.length, layout);
    logger.log(`[impose] Total: ${pairs.length} cards`);
    logger.log(`[impose] Will need ${count} sheets`);

    await mkdir(config.outputDir);

    const limit = pLimit(config.concurrency);
    const buildOptions = { preparer: deps.preparer, logger };
    // Set by the first failed sheet; sheets still queued then never start.
    let failed = false;

    const renderSheet = async (sheetIndex: number) => {
        const label = `[sheet ${sheetIndex + 1}]`;
        logger.log(`${label} Making sheet ${sheetIndex + 1}...`);

        const front = await buildSheet(pairs, sheetIndex, layout, 'front', buildOptions);
        const back = await buildSheet(pairs, sheetIndex, layout, 'back', buildOptions);
        const names = sheetFileNames(sheetIndex);

        const pdfPath = path.join(config.outputDir, names.pdf);
        await writeFile(pdfPath, await buildSheetPdf(front.image, back.image, layout.dpi));

        const cuttingGuidePath = path.join(config.outputDir, names.cuttingGuide);
        const guide = buildCuttingGuide(sheetIndex, layout);
        await writeFile(cuttingGuidePath, buildCuttingGuideXml(guide, { now: now() }));

        logger.log(`${label} Saved: ${names.pdf}`);
        logger.log(`${label} Saved: ${names.cuttingGuide}`);

        return {
            output: { sheetIndex, pdfPath, cuttingGuidePath },
            fallbacks: [...front.fallbacks, ...back.fallbacks],
        };
    };

    const settled = await Promise.allSettled(Array.from({ length: count }, (_, sheetIndex) => limit(async () => {
        if (failed) return null;
        try {
            return await renderSheet(sheetIndex);
        } catch (err) {
            failed = true;
            throw err;
        }
    })));

    const rejected = settled.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (rejected) throw rejected.reason;
    const results = settled.flatMap((r) => (r.status === 'fulfilled' && r.value ? [r.value] : []));

    logger.log(`[impose] All done! Check the '${config.outputDir}' folder.`);
    logger.log('[impose] To print: print page 1, flip the paper on its long edge, print page 2.');
    logger.log('[impose] Blue lines show the bleed edge of each card.');

    return {
        layout,
        totalCards: pairs.length,
        sheetCount: count,
        sheets: results.map((r) => r.output),
        fallbacks: results.flatMap((r) => r.fallbacks),
    };
}
