import { Command, InvalidArgumentError } from "commander";
import { loadConfigFile, resolveConfig, type GridCount, type ImposeConfigInput } from "./config.js";
import type { Logger } from "./helpers/debug.js";
import { computeLayout, sheetCount } from "./helpers/layout.js";
import { runImposition, type ImposeDependencies } from "./services/imposeService.js";

export interface CliOptions {
    config?: string;
    backface?: string;
    normal?: string;
    double?: string;
    output?: string;
    paper?: string;
    paperWidth?: number;
    paperHeight?: number;
    cardWidth?: number;
    cardHeight?: number;
    bleed?: number;
    dpi?: number;
    columns?: GridCount;
    rows?: GridCount;
    concurrency?: number;
}

function parseNumber(value: string): number {
    const n = Number(value);
    if (value.trim() === '' || !Number.isFinite(n)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return n;
}

function parseInteger(value: string): number {
    const n = parseNumber(value);
    if (!Number.isInteger(n)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return n;
}

function parseGridCount(value: string): GridCount {
    return value === 'auto' ? 'auto' : parseInteger(value);
}

export function optionsToConfigInput(options: CliOptions): ImposeConfigInput {
    return {
        backfacePath: options.backface,
        normalDir: options.normal,
        doubleDir: options.double,
        outputDir: options.output,
        paper: options.paper,
        paperWidthMm: options.paperWidth,
        paperHeightMm: options.paperHeight,
        cardWidthMm: options.cardWidth,
        cardHeightMm: options.cardHeight,
        bleedMm: options.bleed,
        dpi: options.dpi,
        columns: options.columns,
        rows: options.rows,
        concurrency: options.concurrency,
    };
}

async function resolveCliConfig(options: CliOptions) {
    const fileLayer = options.config ? await loadConfigFile(options.config) : {};
    return resolveConfig(fileLayer, optionsToConfigInput(options));
}

function addSharedOptions(command: Command): Command {
    return command
        .option('-c, --config <file>', 'JSON config file')
        .option('--paper <preset>', 'paper preset (A4, A3, A3+, Letter, Legal, Tabloid)')
        .option('--paper-width <mm>', 'paper width in mm', parseNumber)
        .option('--paper-height <mm>', 'paper height in mm', parseNumber)
        .option('--card-width <mm>', 'finished card width in mm', parseNumber)
        .option('--card-height <mm>', 'finished card height in mm', parseNumber)
        .option('--bleed <mm>', 'bleed on each side of a card in mm', parseNumber)
        .option('--dpi <dpi>', 'output resolution', parseNumber)
        .option('--columns <n>', 'cards across, or "auto"', parseGridCount)
        .option('--rows <n>', 'cards down, or "auto"', parseGridCount);
}

export function createProgram(deps: ImposeDependencies = {}): Command {
    const logger: Logger = deps.logger ?? console;
    const program = new Command();

    program
        .name('card-imposer')
        .version('1.0.0')
        .description('Arrange front/back card images on duplex print sheets with JDF cutting guides');

    addSharedOptions(program.command('impose', { isDefault: true }))
        .description('Render every sheet and its cutting guide (default)')
        .option('--backface <file>', 'shared back image for the normal folder')
        .option('--normal <dir>', 'folder of fronts that use the shared backface')
        .option('--double <dir>', 'folder of subfolders holding front/back image pairs')
        .option('-o, --output <dir>', 'output folder')
        .option('--concurrency <n>', 'sheets rendered at once', parseInteger)
        .action(async (options: CliOptions) => {
            const config = await resolveCliConfig(options);
            await runImposition(config, deps);
        });

    addSharedOptions(program.command('layout'))
        .description('Print the sheet layout without rendering anything')
        .option('--cards <n>', 'number of cards to plan sheets for', parseInteger)
        .action(async (options: CliOptions & { cards?: number }) => {
            const config = await resolveCliConfig(options);
            const layout = computeLayout(config.constants, config.dpi, config, logger);
            if (options.cards !== undefined) {
                logger.log(`[layout] ${options.cards} cards need ${sheetCount(options.cards, layout)} sheets`);
            }
        });

    return program;
}
