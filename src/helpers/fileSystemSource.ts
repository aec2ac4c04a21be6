import fs from "fs/promises";
import path from "path";
import { isCardImageFile, type CardImageSource } from "./cardSources.js";

function isMissing(err: unknown): boolean {
    return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

// Code-point order, independent of locale and of the order the OS returns.
const byName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

async function readEntries(dir: string) {
    try {
        const entries = await fs.readdir(dir, { withFileTypes: true });
        return entries.sort((a, b) => byName(a.name, b.name));
    } catch (err) {
        if (isMissing(err)) return null;
        throw err;
    }
}

export class FileSystemCardImageSource implements CardImageSource {
    async exists(filePath: string): Promise<boolean> {
        try {
            const stat = await fs.stat(filePath);
            return stat.isFile();
        } catch (err) {
            if (isMissing(err)) return false;
            throw err;
        }
    }

    async listImages(dir: string): Promise<string[] | null> {
        const entries = await readEntries(dir);
        if (!entries) return null;
        return entries
            .filter((e) => e.isFile() && isCardImageFile(e.name))
            .map((e) => path.join(dir, e.name));
    }

    async listCollections(dir: string): Promise<string[] | null> {
        const entries = await readEntries(dir);
        if (!entries) return null;
        return entries
            .filter((e) => e.isDirectory())
            .map((e) => path.join(dir, e.name));
    }
}
