import type { DrawingSurface, PaperSize } from './interfaces.js';
import { LineaturError } from './errors.js';
import { parseOptions } from './options.js';
import type { ParsedCommand } from './options.js';
import { pageGeometry } from './paper-sizes.js';
import { PdfSurface } from './pdf-surface.js';
import { renderLineatur } from './lineatur.js';
import type { RenderSummary } from './lineatur.js';
import { usage } from './usage.js';

export interface CliDependencies {
    openSurface: (page: PaperSize) => DrawingSurface;
}

const defaultDependencies: CliDependencies = {
    openSurface: page => new PdfSurface(page)
};

/**
 * Runs the command line tool and resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = defaultDependencies): Promise<number> {
    let command: ParsedCommand;
    try {
        command = parseOptions(argv);
    } catch (error) {
        if (error instanceof LineaturError) {
            console.error(error.message);
            console.error('Run with --help for usage.');
            return 1;
        }
        throw error;
    }

    if (command.kind === 'help') {
        console.log(usage());
        return 0;
    }

    const { options } = command;
    const surface = deps.openSurface(pageGeometry(options.paper, options.orientation));

    let summary: RenderSummary;
    try {
        summary = renderLineatur(options, surface);
    } catch (error) {
        if (error instanceof LineaturError) {
            console.error(error.message);
            return 1;
        }
        throw error;
    }

    try {
        await surface.writeToFile(options.output);
    } catch (error) {
        console.error('Error writing PDF:', error);
        return 1;
    }

    console.log(`Wrote ${summary.pages} page(s) with ${summary.groupsPerPage} line groups each to ${options.output}`);
    return 0;
}
