import path from "path";
import { isCardImageFile, type CardImageSource } from "../helpers/cardSources.js";

/**
 * CardImageSource over a map of directory -> entry names. Names ending in "/"
 * are subdirectories; listing keeps the order given.
 */
export class InMemoryCardImageSource implements CardImageSource {
    constructor(
        private readonly dirs: Record<string, string[]>,
        private readonly files: string[] = [],
    ) {}

    async exists(filePath: string): Promise<boolean> {
        return this.files.includes(filePath);
    }

    async listImages(dir: string): Promise<string[] | null> {
        const entries = this.dirs[dir];
        if (!entries) return null;
        return entries
            .filter((name) => !name.endsWith('/') && isCardImageFile(name))
            .map((name) => path.join(dir, name));
    }

    async listCollections(dir: string): Promise<string[] | null> {
        const entries = this.dirs[dir];
        if (!entries) return null;
        return entries
            .filter((name) => name.endsWith('/'))
            .map((name) => path.join(dir, name.slice(0, -1)));
    }
}
