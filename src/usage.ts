import { paperSizeNames } from './paper-sizes.js';
import { listPresets } from './presets.js';
import {
    DEFAULT_LINE_HEIGHT,
    DEFAULT_LINE_SPACING,
    DEFAULT_LINE_WIDTH,
    DEFAULT_MARGINS,
    DEFAULT_OUTPUT_FILE,
    DEFAULT_PAGE_COUNT,
    DEFAULT_PAPER_SIZE
} from './constants.js';

const OPTIONS: ReadonlyArray<[string, string]> = [
    ['-o, --output <file>', `output file (default: ${DEFAULT_OUTPUT_FILE})`],
    ['--paper-size <name>', `paper size of your printer, print without scaling. Possible values: ${paperSizeNames().join(', ')} (default: ${DEFAULT_PAPER_SIZE})`],
    ['-p, --proportions <list>', 'line proportions, num[:num...]'],
    ['-s, --slant <angle:count>', 'angle and number per line of slanted helper lines'],
    ['-m, --margins <list>', `top, right, bottom and left page margins in mm (default: ${DEFAULT_MARGINS})`],
    ['--line-height <mm>', `line height in mm (default: ${DEFAULT_LINE_HEIGHT})`],
    ['--line-spacing <mm>', `space between line groups in mm (default: ${DEFAULT_LINE_SPACING})`],
    ['--line-width <mm>', `stroke width in mm (default: ${DEFAULT_LINE_WIDTH})`],
    ['-n, --pages <count>', `number of pages (default: ${DEFAULT_PAGE_COUNT})`],
    ['--landscape', 'use landscape orientation'],
    ['--preset <name>', 'start from a traditional lineatur, see below'],
    ['-h, --help', 'show this help'],
];

export function usage(): string {
    const width = Math.max(...OPTIONS.map(([flag]) => flag.length)) + 2;
    const lines = [
        'Usage: lineatur [options]',
        '',
        'Options:',
        ...OPTIONS.map(([flag, text]) => `  ${flag.padEnd(width)}${text}`),
        '',
        'Line proportions: no argument = just one line',
        'Line proportions: num = two lines (the value doesn\'t matter)',
        'Angles are measured from the baseline upwards.',
        '',
        'Presets:',
    ];

    const presets = listPresets();
    const presetWidth = Math.max(...presets.map(p => p.name.length)) + 2;
    for (const preset of presets) {
        const flags = [`-p ${preset.proportions.join(':')}`];
        if (preset.slant) {
            flags.push(`-s ${preset.slant.angle}:${preset.slant.count}`);
        }
        lines.push(`  ${preset.name.padEnd(presetWidth)}${flags.join(' ').padEnd(20)}${preset.script}`);
    }

    return lines.join('\n');
}
