import PDFDocument from 'pdfkit';
import { createWriteStream } from 'fs';
import type { DrawingSurface, LineGroup, PaperSize } from './interfaces.js';
import { DOCUMENT_CREATOR, DOCUMENT_TITLE, MM_PER_INCH, POINTS_PER_INCH } from './constants.js';

export function mmToPoints(mm: number): number {
    return mm / MM_PER_INCH * POINTS_PER_INCH;
}

/**
 * pdfkit backed drawing surface. The layout works in millimetres, pdfkit in
 * points, so every coordinate is converted on the way through.
 */
export class PdfSurface implements DrawingSurface {
    private readonly doc: PDFKit.PDFDocument;

    constructor(page: PaperSize) {
        // Margins are handled by the layout and pages are added explicitly
        this.doc = new PDFDocument({
            size: [mmToPoints(page.width), mmToPoints(page.height)],
            margins: {
                top: 0,
                right: 0,
                bottom: 0,
                left: 0
            },
            autoFirstPage: false,
            info: {
                Title: DOCUMENT_TITLE,
                Creator: DOCUMENT_CREATOR
            }
        });
    }

    addPage(): void {
        this.doc.addPage();
    }

    setLineWidth(width: number): void {
        this.doc.lineWidth(mmToPoints(width));
    }

    strokeSegment(x1: number, y1: number, x2: number, y2: number): void {
        this.doc.moveTo(mmToPoints(x1), mmToPoints(y1))
            .lineTo(mmToPoints(x2), mmToPoints(y2))
            .stroke();
    }

    async writeToFile(filePath: string): Promise<void> {
        const writeStream = createWriteStream(filePath);
        this.doc.pipe(writeStream);
        this.doc.end();

        // Wait for the write stream to finish
        await new Promise<void>((resolve, reject) => {
            writeStream.on('finish', () => resolve());
            writeStream.on('error', reject);
        });
    }
}

// Strokes every segment in order, touching the line width only when it changes
export function drawLineGroups(surface: DrawingSurface, groups: readonly LineGroup[]): void {
    let currentWidth: number | undefined;
    for (const group of groups) {
        for (const segment of group.segments) {
            if (segment.lineWidth !== currentWidth) {
                surface.setLineWidth(segment.lineWidth);
                currentWidth = segment.lineWidth;
            }
            surface.strokeSegment(segment.x1, segment.y1, segment.x2, segment.y2);
        }
    }
}
