import type { PaperSize, Orientation } from './interfaces.js';
import { UnknownPaperSizeError } from './errors.js';

// Sheet dimensions in millimetres, see https://unsharpen.com/paper-sizes/
const PAPER_SIZES: ReadonlyMap<string, Readonly<PaperSize>> = new Map<string, Readonly<PaperSize>>([
    ['A5', Object.freeze({ width: 148, height: 210 })],
    ['A4', Object.freeze({ width: 210, height: 297 })],
    ['Invoice', Object.freeze({ width: 140, height: 216 })],
    ['Legal', Object.freeze({ width: 203, height: 330 })],
    ['Letter', Object.freeze({ width: 216, height: 279 })],
]);

export function paperSizeNames(): string[] {
    return [...PAPER_SIZES.keys()];
}

export function lookupPaperSize(name: string): PaperSize {
    const size = PAPER_SIZES.get(name);
    if (!size) {
        throw new UnknownPaperSizeError(name, paperSizeNames());
    }
    return { ...size };
}

// Landscape simply swaps the sheet's edges
export function pageGeometry(paper: PaperSize, orientation: Orientation): PaperSize {
    if (orientation === 'landscape') {
        return { width: paper.height, height: paper.width };
    }
    return { width: paper.width, height: paper.height };
}
