// Page margins in millimetres
export interface MarginState {
    top: number;
    right: number;
    bottom: number;
    left: number;
}

export interface PaperSize {
    width: number;   // mm
    height: number;  // mm
}

export type Orientation = 'portrait' | 'landscape';

// Angle is measured from the baseline upwards, count is guides per line group
export interface SlantSpec {
    angle: number;
    count: number;
}

export type SegmentKind = 'ruling' | 'border' | 'slant';

export interface Segment {
    x1: number;
    y1: number;
    x2: number;
    y2: number;
    lineWidth: number;
    kind: SegmentKind;
}

export interface LineGroup {
    x: number;
    y: number;
    segments: Segment[];
}

export interface LineGroupParameters {
    x: number;
    y: number;
    lineHeight: number;
    width: number;
    distances: readonly number[];
    lineWidth: number;
    slant?: SlantSpec;
}

export interface PageLayoutParameters {
    page: PaperSize;
    margins: MarginState;
    lineHeight: number;
    lineSpacing: number;
    proportions: readonly number[];
    slant?: SlantSpec;
    lineWidth: number;
}

export interface LineaturOptions {
    output: string;
    paperSizeName: string;
    paper: PaperSize;
    orientation: Orientation;
    proportions: number[];
    slant?: SlantSpec;
    margins: MarginState;
    lineHeight: number;
    lineSpacing: number;
    lineWidth: number;
    pages: number;
}

/**
 * Minimal drawing API the layout is stroked onto. Coordinates and widths are
 * in millimetres with the origin in the top left corner of the page.
 */
export interface DrawingSurface {
    addPage(): void;
    setLineWidth(width: number): void;
    strokeSegment(x1: number, y1: number, x2: number, y2: number): void;
    writeToFile(filePath: string): Promise<void>;
}
