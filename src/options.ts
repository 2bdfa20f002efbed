import { parseArgs } from 'util';
import type { LineaturOptions, MarginState, Orientation, SlantSpec } from './interfaces.js';
import { InvalidOptionValueError, WrongArityError } from './errors.js';
import { lookupPaperSize } from './paper-sizes.js';
import { parseNumberList } from './number-list.js';
import { lookupPreset } from './presets.js';
import {
    DEFAULT_LINE_HEIGHT,
    DEFAULT_LINE_SPACING,
    DEFAULT_LINE_WIDTH,
    DEFAULT_MARGINS,
    DEFAULT_OUTPUT_FILE,
    DEFAULT_PAGE_COUNT,
    DEFAULT_PAPER_SIZE
} from './constants.js';

export type ParsedCommand =
    | { kind: 'help' }
    | { kind: 'render'; options: LineaturOptions };

const UNSIGNED_INTEGER = /^\d+$/;
const UNSIGNED_DECIMAL = /^(\d+\.?\d*|\.\d+)$/;

function parseInteger(text: string, option: string, min: number): number {
    const value = Number(text);
    if (!UNSIGNED_INTEGER.test(text) || !Number.isSafeInteger(value) || value < min) {
        throw new InvalidOptionValueError(`invalid value for ${option}: ${text} (expected an integer >= ${min})`);
    }
    return value;
}

function parsePositiveReal(text: string, option: string): number {
    const value = Number(text);
    if (!UNSIGNED_DECIMAL.test(text) || !(value > 0)) {
        throw new InvalidOptionValueError(`invalid value for ${option}: ${text} (expected a positive number)`);
    }
    return value;
}

function parseSlant(text: string): SlantSpec | undefined {
    const values = parseNumberList(text, '--slant');
    if (values.length === 0) {
        return undefined;
    }
    if (values.length !== 2) {
        throw new WrongArityError('--slant', text, [0, 2]);
    }
    return { angle: values[0], count: values[1] };
}

function parseMargins(text: string): MarginState {
    // An empty list falls back to the default margins
    const values = parseNumberList(text === '' ? DEFAULT_MARGINS : text, '--margins');
    if (values.length !== 4) {
        throw new WrongArityError('--margins', text, [0, 4]);
    }
    const [top, right, bottom, left] = values;
    return { top, right, bottom, left };
}

function runParseArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            strict: true,
            allowPositionals: false,
            options: {
                'output': { type: 'string', short: 'o' },
                'paper-size': { type: 'string' },
                'proportions': { type: 'string', short: 'p' },
                'slant': { type: 'string', short: 's' },
                'margins': { type: 'string', short: 'm' },
                'line-height': { type: 'string' },
                'line-spacing': { type: 'string' },
                'line-width': { type: 'string' },
                'pages': { type: 'string', short: 'n' },
                'landscape': { type: 'boolean' },
                'preset': { type: 'string' },
                'help': { type: 'boolean', short: 'h' }
            }
        });
    } catch (error) {
        // parseArgs reports unknown flags and missing values as TypeErrors
        if (error instanceof TypeError) {
            throw new InvalidOptionValueError(error.message);
        }
        throw error;
    }
}

/**
 * Validates the command line. Every configuration problem surfaces here as a
 * LineaturError, before any document is created.
 */
export function parseOptions(argv: string[]): ParsedCommand {
    const { values } = runParseArgs(argv);
    if (values.help) {
        return { kind: 'help' };
    }

    const paperSizeName = values['paper-size'] ?? DEFAULT_PAPER_SIZE;
    const paper = lookupPaperSize(paperSizeName);

    const preset = values.preset !== undefined ? lookupPreset(values.preset) : undefined;
    const proportions = values.proportions !== undefined
        ? parseNumberList(values.proportions, '--proportions')
        : preset?.proportions ?? [];
    const slant = values.slant !== undefined
        ? parseSlant(values.slant)
        : preset?.slant;
    const margins = parseMargins(values.margins ?? DEFAULT_MARGINS);

    const lineHeight = values['line-height'] !== undefined
        ? parseInteger(values['line-height'], '--line-height', 1)
        : DEFAULT_LINE_HEIGHT;
    const lineSpacing = values['line-spacing'] !== undefined
        ? parseInteger(values['line-spacing'], '--line-spacing', 0)
        : DEFAULT_LINE_SPACING;
    const lineWidth = values['line-width'] !== undefined
        ? parsePositiveReal(values['line-width'], '--line-width')
        : DEFAULT_LINE_WIDTH;
    const pages = values.pages !== undefined
        ? parseInteger(values.pages, '--pages', 1)
        : DEFAULT_PAGE_COUNT;
    const orientation: Orientation = values.landscape ? 'landscape' : 'portrait';

    return {
        kind: 'render',
        options: {
            output: values.output ?? DEFAULT_OUTPUT_FILE,
            paperSizeName,
            paper,
            orientation,
            proportions,
            slant,
            margins,
            lineHeight,
            lineSpacing,
            lineWidth,
            pages
        }
    };
}
