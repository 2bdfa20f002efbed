// Unit conversion (PDF points are 1/72 inch)
export const MM_PER_INCH = 25.4;
export const POINTS_PER_INCH = 72;

// Defaults for the command line options (lengths in millimetres)
export const DEFAULT_OUTPUT_FILE = 'output.pdf';
export const DEFAULT_PAPER_SIZE = 'A4';
export const DEFAULT_MARGINS = '5:15:15:5';  // top:right:bottom:left
export const DEFAULT_LINE_HEIGHT = 10;
export const DEFAULT_LINE_SPACING = 5;
export const DEFAULT_LINE_WIDTH = 0.3;
export const DEFAULT_PAGE_COUNT = 1;

// Metadata written into every generated document
export const DOCUMENT_TITLE = 'Lineatur';
export const DOCUMENT_CREATOR = 'lineatur';
