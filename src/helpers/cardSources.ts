import type { CardPair } from "../types/imposition.js";
import { debugLog, type Logger } from "./debug.js";

/**
 * Where card images come from. Listings must be deterministic for an
 * unchanged input so sheet assignment is reproducible.
 */
export interface CardImageSource {
    exists(filePath: string): Promise<boolean>;
    /** Qualifying image paths directly under `dir`, or null when `dir` is missing. */
    listImages(dir: string): Promise<string[] | null>;
    /** Immediate subdirectory paths of `dir`, or null when `dir` is missing. */
    listCollections(dir: string): Promise<string[] | null>;
}

export const CARD_IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp', '.tif', '.tiff'] as const;

export function isCardImageFile(name: string): boolean {
    const lower = name.toLowerCase();
    return CARD_IMAGE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

export function createCardPair(front: string, back: string): CardPair {
    return Object.freeze({ front, back });
}

/**
 * Pairs images two at a time: (0,1), (2,3), ... An odd trailing image is dropped.
 */
export function pairConsecutive(images: string[]): CardPair[] {
    const pairs: CardPair[] = [];
    for (let i = 0; i + 1 < images.length; i += 2) {
        pairs.push(createCardPair(images[i], images[i + 1]));
    }
    return pairs;
}

/** Every image in `normalDir` backed by the shared backface. */
export async function collectSingleBackfaceCards(
    source: CardImageSource,
    normalDir: string,
    backfacePath: string,
    logger: Logger = console,
): Promise<CardPair[]> {
    if (!(await source.exists(backfacePath))) {
        logger.warn(`[sources] Can't find backface ${backfacePath}! Skipping single-backface cards.`);
        return [];
    }

    const images = await source.listImages(normalDir);
    if (!images) {
        logger.warn(`[sources] No "${normalDir}" folder, skipping single-backface cards.`);
        return [];
    }
    return images.map((front) => createCardPair(front, backfacePath));
}

/** Front/back pairs from every subfolder of `doubleDir`. */
export async function collectDoubleFacedCards(
    source: CardImageSource,
    doubleDir: string,
    logger: Logger = console,
): Promise<CardPair[]> {
    const collections = await source.listCollections(doubleDir);
    if (!collections) {
        logger.warn(`[sources] No "${doubleDir}" folder, skipping double-faced cards.`);
        return [];
    }

    const cards: CardPair[] = [];
    for (const collection of collections) {
        const images = (await source.listImages(collection)) ?? [];
        if (images.length % 2 === 1) {
            debugLog(`[sources] Dropping unpaired image ${images[images.length - 1]}`);
        }
        cards.push(...pairConsecutive(images));
    }
    return cards;
}

/** Single-backface cards first, then double-faced cards. */
export function mergeCardSources(single: CardPair[], double: CardPair[]): CardPair[] {
    return [...single, ...double];
}

export interface CardSourcePaths {
    backfacePath: string;
    normalDir: string;
    doubleDir: string;
}

export async function collectCardPairs(
    source: CardImageSource,
    paths: CardSourcePaths,
    logger: Logger = console,
): Promise<CardPair[]> {
    logger.log('[sources] Looking for cards...');
    const single = await collectSingleBackfaceCards(source, paths.normalDir, paths.backfacePath, logger);
    const double = await collectDoubleFacedCards(source, paths.doubleDir, logger);
    logger.log(`[sources] Found ${single.length} normal cards`);
    logger.log(`[sources] Found ${double.length} double-faced cards`);
    return mergeCardSources(single, double);
}
