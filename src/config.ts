import fs from "fs/promises";
import { CONSTANTS } from "./constants/commonConstants.js";
import { findPaperSize, PAPER_SIZES } from "./constants/paperSizes.js";
import { describeError } from "./helpers/debug.js";
import { fitGrid } from "./helpers/layout.js";
import type { PhysicalConstants } from "./types/imposition.js";

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export type GridCount = number | 'auto';

export interface ImposeConfig {
    backfacePath: string;
    normalDir: string;
    doubleDir: string;
    outputDir: string;
    constants: PhysicalConstants;
    dpi: number;
    columns: number;
    rows: number;
    concurrency: number;
}

/** One configuration layer (defaults, config file or CLI flags). */
export interface ImposeConfigInput {
    backfacePath?: string;
    normalDir?: string;
    doubleDir?: string;
    outputDir?: string;
    /** Paper preset id, e.g. "A3+" or "Letter". */
    paper?: string;
    paperWidthMm?: number;
    paperHeightMm?: number;
    cardWidthMm?: number;
    cardHeightMm?: number;
    bleedMm?: number;
    dpi?: number;
    columns?: GridCount;
    rows?: GridCount;
    concurrency?: number;
}

export const DEFAULT_CONFIG = {
    backfacePath: 'backface.jpg',
    normalDir: 'normal',
    doubleDir: 'double',
    outputDir: 'output_sheets',
    paper: 'A3+',
    cardWidthMm: CONSTANTS.CARD_WIDTH_MM,
    cardHeightMm: CONSTANTS.CARD_HEIGHT_MM,
    bleedMm: CONSTANTS.BLEED_MM,
    dpi: CONSTANTS.DEFAULT_DPI,
    columns: CONSTANTS.COLUMNS,
    rows: CONSTANTS.ROWS,
    concurrency: 1,
} satisfies ImposeConfigInput;

const STRING_KEYS = ['backfacePath', 'normalDir', 'doubleDir', 'outputDir', 'paper'] as const;
const NUMBER_KEYS = ['paperWidthMm', 'paperHeightMm', 'cardWidthMm', 'cardHeightMm', 'bleedMm', 'dpi', 'concurrency'] as const;
const GRID_KEYS = ['columns', 'rows'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates the shape of a parsed config file. Unknown keys are ignored.
 */
export function parseConfigObject(raw: unknown, origin = 'config'): ImposeConfigInput {
    if (!isRecord(raw)) {
        throw new ConfigError(`${origin}: expected a JSON object`);
    }

    const input: ImposeConfigInput = {};
    for (const key of STRING_KEYS) {
        const value = raw[key];
        if (value === undefined) continue;
        if (typeof value !== 'string') throw new ConfigError(`${origin}: "${key}" must be a string`);
        input[key] = value;
    }
    for (const key of NUMBER_KEYS) {
        const value = raw[key];
        if (value === undefined) continue;
        if (typeof value !== 'number') throw new ConfigError(`${origin}: "${key}" must be a number`);
        input[key] = value;
    }
    for (const key of GRID_KEYS) {
        const value = raw[key];
        if (value === undefined) continue;
        if (typeof value !== 'number' && value !== 'auto') {
            throw new ConfigError(`${origin}: "${key}" must be a number or "auto"`);
        }
        input[key] = value;
    }
    return input;
}

export async function loadConfigFile(filePath: string): Promise<ImposeConfigInput> {
    let text: string;
    try {
        text = await fs.readFile(filePath, 'utf8');
    } catch (err) {
        throw new ConfigError(`Cannot read config file ${filePath}: ${describeError(err)}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new ConfigError(`Invalid JSON in ${filePath}: ${describeError(err)}`);
    }
    return parseConfigObject(raw, filePath);
}

/** Later layers win; undefined values never override. */
export function mergeConfigInputs(...layers: ImposeConfigInput[]): ImposeConfigInput {
    const merged: Record<string, unknown> = {};
    for (const layer of layers) {
        for (const [key, value] of Object.entries(layer)) {
            if (value !== undefined) merged[key] = value;
        }
    }
    return parseConfigObject(merged);
}

function positive(name: string, value: number): void {
    if (!Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`${name} must be a positive number (got ${value})`);
    }
}

function positiveInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigError(`${name} must be an integer >= 1 (got ${value})`);
    }
}

export function validateConstants(c: PhysicalConstants): void {
    positive('paperWidthMm', c.paperWidthMm);
    positive('paperHeightMm', c.paperHeightMm);
    positive('cardWidthMm', c.cardWidthMm);
    positive('cardHeightMm', c.cardHeightMm);
    positive('bleedMm', c.bleedMm);
}

export function validateConfig(config: ImposeConfig): ImposeConfig {
    validateConstants(config.constants);
    positive('dpi', config.dpi);
    positiveInteger('columns', config.columns);
    positiveInteger('rows', config.rows);
    positiveInteger('concurrency', config.concurrency);
    return config;
}

/**
 * Replaces a layer's paper preset by its dimensions, so that later layers
 * override paper size field by field. Dimensions given in the same layer win
 * over its preset.
 */
export function expandPaperPreset(layer: ImposeConfigInput): ImposeConfigInput {
    if (layer.paper === undefined) return layer;
    const preset = findPaperSize(layer.paper);
    if (!preset) {
        const known = PAPER_SIZES.map((p) => p.id).join(', ');
        throw new ConfigError(`Unknown paper "${layer.paper}" (known: ${known})`);
    }
    return {
        ...layer,
        paperWidthMm: layer.paperWidthMm ?? preset.widthMm,
        paperHeightMm: layer.paperHeightMm ?? preset.heightMm,
    };
}

/**
 * Merges the layers over the defaults, applies paper presets and the
 * "auto" grid, and validates the result.
 */
export function resolveConfig(...layers: ImposeConfigInput[]): ImposeConfig {
    const input = mergeConfigInputs(...[DEFAULT_CONFIG, ...layers].map(expandPaperPreset));

    const { paperWidthMm, paperHeightMm } = input;
    if (paperWidthMm === undefined || paperHeightMm === undefined) {
        throw new ConfigError('Paper size needs a preset or both paperWidthMm and paperHeightMm');
    }

    const constants: PhysicalConstants = {
        paperWidthMm,
        paperHeightMm,
        cardWidthMm: input.cardWidthMm ?? DEFAULT_CONFIG.cardWidthMm,
        cardHeightMm: input.cardHeightMm ?? DEFAULT_CONFIG.cardHeightMm,
        bleedMm: input.bleedMm ?? DEFAULT_CONFIG.bleedMm,
    };
    validateConstants(constants);
    const fitted = fitGrid(constants);

    return validateConfig({
        backfacePath: input.backfacePath ?? DEFAULT_CONFIG.backfacePath,
        normalDir: input.normalDir ?? DEFAULT_CONFIG.normalDir,
        doubleDir: input.doubleDir ?? DEFAULT_CONFIG.doubleDir,
        outputDir: input.outputDir ?? DEFAULT_CONFIG.outputDir,
        constants,
        dpi: input.dpi ?? DEFAULT_CONFIG.dpi,
        columns: input.columns === 'auto' ? fitted.columns : input.columns ?? DEFAULT_CONFIG.columns,
        rows: input.rows === 'auto' ? fitted.rows : input.rows ?? DEFAULT_CONFIG.rows,
        concurrency: input.concurrency ?? DEFAULT_CONFIG.concurrency,
    });
}
